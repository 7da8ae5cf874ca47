import { ForbiddenError, NotFoundError } from '@/lib/errors'
import type {
  CommentOwnership,
  Store,
  TaskOwnership,
} from '@/lib/store'

/**
 * Resolves the task's owner in one lookup and hands back the title so callers
 * can log without reading the row again.
 */
export const requireTaskOwner = async (
  store: Store,
  taskId: string,
  userId: string
): Promise<TaskOwnership> => {
  const owner = await store.tasks.findOwnership(taskId)
  if (!owner) throw new NotFoundError('task not found')
  if (owner.creatorId !== userId) {
    throw new ForbiddenError('you can only modify your own tasks')
  }
  return owner
}

export const requireCommentAuthor = async (
  store: Store,
  commentId: string,
  userId: string
): Promise<CommentOwnership> => {
  const owner = await store.comments.findOwnership(commentId)
  if (!owner) throw new NotFoundError('comment not found')
  if (owner.userId !== userId) {
    throw new ForbiddenError('you can only modify your own comments')
  }
  return owner
}
