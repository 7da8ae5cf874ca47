/* eslint-disable prettier/prettier */
import { NotFoundError } from '@/lib/errors'
import { assertValid, validateCommentContent } from '@/lib/validators'
import { requireCommentAuthor } from '@/lib/ownership'
import { recordChange } from '@/lib/changeLog'
import { resolveStore, resolveWriter } from '@/lib/serviceContext'
import type { TaskServiceContext } from '@/lib/serviceContext'
import type { Comment } from '@/types/comment'

export const commentsService = {
  list: async (taskId: string, ctx?: TaskServiceContext): Promise<Comment[]> => {
    const { store } = resolveStore(ctx)
    if (!(await store.tasks.exists(taskId))) throw new NotFoundError('task not found')
    return store.comments.listByTask(taskId)
  },

  create: async (
    taskId: string,
    input: unknown,
    ctx?: TaskServiceContext
  ): Promise<Comment> => {
    const { content } = assertValid(validateCommentContent(input))
    const { userId, store } = await resolveWriter(ctx)
    if (!(await store.tasks.exists(taskId))) throw new NotFoundError('task not found')
    const comment = await store.comments.insert(taskId, userId, content)
    await recordChange(store.changeLogs, {
      taskId,
      userId,
      action: 'commented',
      details: 'Added a comment',
    })
    return comment
  },

  update: async (
    id: string,
    input: unknown,
    ctx?: TaskServiceContext
  ): Promise<Comment> => {
    const { content } = assertValid(validateCommentContent(input))
    const { userId, store } = await resolveWriter(ctx)
    const { taskId } = await requireCommentAuthor(store, id, userId)
    const comment = await store.comments.update(id, userId, content)
    if (!comment) throw new NotFoundError('comment not found')
    await recordChange(store.changeLogs, {
      taskId,
      userId,
      action: 'updated_comment',
      details: 'Updated a comment',
    })
    return comment
  },

  delete: async (id: string, ctx?: TaskServiceContext): Promise<void> => {
    const { userId, store } = await resolveWriter(ctx)
    const { taskId } = await requireCommentAuthor(store, id, userId)
    await recordChange(store.changeLogs, {
      taskId,
      userId,
      action: 'deleted_comment',
      details: 'Deleted a comment',
    })
    const deleted = await store.comments.delete(id, userId)
    if (!deleted) throw new NotFoundError('comment not found')
  },
}
