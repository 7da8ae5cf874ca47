/* eslint-disable prettier/prettier */
import { NotFoundError } from '@/lib/errors'
import {
  assertValid,
  validateCreateTask,
  validatePagination,
  validateUpdateTask,
} from '@/lib/validators'
import { requireTaskOwner } from '@/lib/ownership'
import { formatChangeDetails, recordChange } from '@/lib/changeLog'
import { applyArchiveFlag, applyTaskUpdate } from '@/lib/taskMutations'
import { resolveStore, resolveWriter } from '@/lib/serviceContext'
import type { TaskServiceContext } from '@/lib/serviceContext'
import type { Task } from '@/types/task'
import type { ChangeLogEntry } from '@/types/changeLog'

export interface PageQuery {
  limit?: unknown
  offset?: unknown
}

const listPage = async (
  query: PageQuery,
  archived: boolean,
  ctx?: TaskServiceContext
): Promise<Task[]> => {
  const page = assertValid(validatePagination(query))
  const { store } = resolveStore(ctx)
  return store.tasks.list({ ...page, archived })
}

export const tasksService = {
  list: async (query: PageQuery = {}, ctx?: TaskServiceContext) =>
    listPage(query, false, ctx),

  listArchived: async (query: PageQuery = {}, ctx?: TaskServiceContext) =>
    listPage(query, true, ctx),

  get: async (id: string, ctx?: TaskServiceContext): Promise<Task> => {
    const { store } = resolveStore(ctx)
    const task = await store.tasks.get(id)
    if (!task) throw new NotFoundError('task not found')
    return task
  },

  create: async (input: unknown, ctx?: TaskServiceContext): Promise<Task> => {
    const valid = assertValid(validateCreateTask(input))
    const { userId, store } = await resolveWriter(ctx)
    const task = await store.tasks.insert({
      title: valid.title,
      description: valid.description ?? '',
      status: valid.status ?? 'To Do',
      dueDate: valid.dueDate ?? null,
      creatorId: userId,
    })
    await recordChange(store.changeLogs, {
      taskId: task.id,
      userId,
      action: 'created',
      details: `Created task: ${task.title}`,
    })
    return task
  },

  update: async (
    id: string,
    input: unknown,
    ctx?: TaskServiceContext
  ): Promise<Task> => {
    const patch = assertValid(validateUpdateTask(input))
    const { userId, store } = await resolveWriter(ctx)
    const { task, changes } = await applyTaskUpdate(store, id, userId, patch)
    if (changes.length) {
      await recordChange(store.changeLogs, {
        taskId: task.id,
        userId,
        action: 'updated',
        details: formatChangeDetails(changes),
      })
    }
    return task
  },

  delete: async (id: string, ctx?: TaskServiceContext): Promise<void> => {
    const { userId, store } = await resolveWriter(ctx)
    const { title } = await requireTaskOwner(store, id, userId)
    // written while the row still exists; the cascade takes it along with the task
    await recordChange(store.changeLogs, {
      taskId: id,
      userId,
      action: 'deleted',
      details: `Deleted task: ${title}`,
    })
    const deleted = await store.tasks.delete(id, userId)
    if (!deleted) throw new NotFoundError('task not found')
  },

  archive: async (id: string, ctx?: TaskServiceContext): Promise<Task> => {
    const { userId, store } = await resolveWriter(ctx)
    const { task, title } = await applyArchiveFlag(store, id, userId, true)
    await recordChange(store.changeLogs, {
      taskId: task.id,
      userId,
      action: 'archived',
      details: `Archived task: ${title}`,
    })
    return task
  },

  unarchive: async (id: string, ctx?: TaskServiceContext): Promise<Task> => {
    const { userId, store } = await resolveWriter(ctx)
    const { task, title } = await applyArchiveFlag(store, id, userId, false)
    await recordChange(store.changeLogs, {
      taskId: task.id,
      userId,
      action: 'unarchived',
      details: `Restored task: ${title}`,
    })
    return task
  },

  logs: async (id: string, ctx?: TaskServiceContext): Promise<ChangeLogEntry[]> => {
    const { store } = resolveStore(ctx)
    return store.changeLogs.listByTask(id)
  },
}
