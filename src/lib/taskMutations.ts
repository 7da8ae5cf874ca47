/* eslint-disable prettier/prettier */
import { NotFoundError } from '@/lib/errors'
import { requireTaskOwner } from '@/lib/ownership'
import type { Store } from '@/lib/store'
import type { Task, UpdateTaskInput } from '@/types/task'

export interface TaskUpdateResult {
  task: Task
  /** One fragment per changed field: title, description, status, due date. */
  changes: string[]
}

export const describeTaskChanges = (patch: UpdateTaskInput): string[] => {
  const changes: string[] = []
  if (patch.title !== undefined) changes.push(`changed title to '${patch.title}'`)
  if (patch.description !== undefined) changes.push('updated description')
  if (patch.status !== undefined) changes.push(`changed status to '${patch.status}'`)
  if (patch.dueDate === null) changes.push('cleared due date')
  else if (patch.dueDate !== undefined) changes.push(`changed due date to '${patch.dueDate}'`)
  return changes
}

/**
 * Applies only the fields present in `patch`. The write is conditional on the
 * owner, so a task deleted between the check and the update is reported as
 * not found.
 */
export const applyTaskUpdate = async (
  store: Store,
  taskId: string,
  userId: string,
  patch: UpdateTaskInput
): Promise<TaskUpdateResult> => {
  await requireTaskOwner(store, taskId, userId)
  const task = await store.tasks.update(taskId, userId, patch)
  if (!task) throw new NotFoundError('task not found')
  return { task, changes: describeTaskChanges(patch) }
}

export const applyArchiveFlag = async (
  store: Store,
  taskId: string,
  userId: string,
  archived: boolean
): Promise<{ task: Task; title: string }> => {
  const { title } = await requireTaskOwner(store, taskId, userId)
  const task = await store.tasks.setArchived(taskId, userId, archived)
  if (!task) throw new NotFoundError('task not found')
  return { task, title }
}
