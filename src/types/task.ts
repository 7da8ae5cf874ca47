export const TASK_STATUSES = ['To Do', 'In Progress', 'Done'] as const

export type TaskStatus = (typeof TASK_STATUSES)[number]

export interface Task {
  id: string
  title: string
  description: string
  status: TaskStatus
  creatorId: string
  creatorName?: string
  dueDate: string | null // ISO8601
  archived: boolean
  createdAt: string // ISO8601
  updatedAt: string // ISO8601
}

export interface CreateTaskInput {
  title: string
  description?: string
  status?: TaskStatus
  dueDate?: string | null
}

// undefined = leave as is, null dueDate = clear it
export interface UpdateTaskInput {
  title?: string
  description?: string
  status?: TaskStatus
  dueDate?: string | null
}

export interface Pagination {
  limit: number
  offset: number
}

export interface TaskListQuery extends Pagination {
  archived: boolean
}
