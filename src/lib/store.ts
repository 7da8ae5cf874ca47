/* eslint-disable prettier/prettier */
import type {
  Task,
  TaskListQuery,
  TaskStatus,
  UpdateTaskInput,
} from '@/types/task'
import type { Comment } from '@/types/comment'
import type { ChangeLogEntry, NewChangeLogEntry } from '@/types/changeLog'

export interface NewTask {
  title: string
  description: string
  status: TaskStatus
  dueDate: string | null
  creatorId: string
}

export interface TaskOwnership {
  creatorId: string
  title: string
}

export interface CommentOwnership {
  userId: string
  taskId: string
}

/**
 * Writes that take an owner id only touch rows that owner holds, and report
 * `undefined`/`false` when nothing matched.
 */
export interface TaskRepository {
  list(query: TaskListQuery): Promise<Task[]>
  get(id: string): Promise<Task | undefined>
  exists(id: string): Promise<boolean>
  findOwnership(id: string): Promise<TaskOwnership | undefined>
  insert(task: NewTask): Promise<Task>
  update(
    id: string,
    creatorId: string,
    patch: UpdateTaskInput
  ): Promise<Task | undefined>
  setArchived(
    id: string,
    creatorId: string,
    archived: boolean
  ): Promise<Task | undefined>
  delete(id: string, creatorId: string): Promise<boolean>
}

export interface CommentRepository {
  listByTask(taskId: string): Promise<Comment[]>
  findOwnership(id: string): Promise<CommentOwnership | undefined>
  insert(taskId: string, userId: string, content: string): Promise<Comment>
  update(
    id: string,
    userId: string,
    content: string
  ): Promise<Comment | undefined>
  delete(id: string, userId: string): Promise<boolean>
}

export interface ChangeLogRepository {
  insert(entry: NewChangeLogEntry): Promise<ChangeLogEntry>
  listByTask(taskId: string): Promise<ChangeLogEntry[]>
}

export interface UserRepository {
  /** Records the display name shown next to a user's tasks, comments and log entries. */
  remember(id: string, name: string): Promise<void>
}

export interface Store {
  users: UserRepository
  tasks: TaskRepository
  comments: CommentRepository
  changeLogs: ChangeLogRepository
}

export const nowISO = () => new Date().toISOString()
