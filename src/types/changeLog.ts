export type KnownChangeAction =
  | 'created'
  | 'updated'
  | 'deleted'
  | 'archived'
  | 'unarchived'
  | 'commented'
  | 'updated_comment'
  | 'deleted_comment'

// free-form in storage, the known tags keep autocompletion
export type ChangeAction = KnownChangeAction | (string & {})

export interface ChangeLogEntry {
  id: string
  taskId: string
  userId: string
  userName?: string
  action: ChangeAction
  details: string
  createdAt: string // ISO8601
}

export type NewChangeLogEntry = Pick<
  ChangeLogEntry,
  'taskId' | 'userId' | 'action' | 'details'
>
