import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { commentsService } from '@/lib/commentsService'
import { tasksService } from '@/lib/tasksService'
import { ForbiddenError, NotFoundError, ValidationError } from '@/lib/errors'
import type { Store } from '@/lib/store'
import type { Task } from '@/types/task'
import { countRows, makeBackend } from './helpers'
import type { TestBackend } from './helpers'

let backend: TestBackend
let task: Task

beforeEach(async () => {
  backend = makeBackend()
  task = await tasksService.create({ title: 'Discuss' }, backend.as('alice'))
})

afterEach(() => {
  backend.db.close()
  vi.restoreAllMocks()
})

describe('create', () => {
  it('lets any user comment on an existing task', async () => {
    const comment = await commentsService.create(task.id, { content: '  on it  ' }, backend.as('bob'))
    expect(comment).toMatchObject({ taskId: task.id, userId: 'bob', content: 'on it' })

    const [latest] = await tasksService.logs(task.id, backend.as('bob'))
    expect([latest.action, latest.details, latest.userId]).toEqual(['commented', 'Added a comment', 'bob'])
  })

  it('returns not found for a missing task and writes nothing', async () => {
    await expect(commentsService.create('missing', { content: 'hello' }, backend.as('bob'))).rejects.toBeInstanceOf(
      NotFoundError
    )
    expect(countRows(backend.db, 'comments')).toBe(0)
  })

  it('validates content before looking up the task', async () => {
    const exists = vi.spyOn(backend.store.tasks, 'exists')
    await expect(commentsService.create(task.id, { content: ' ' }, backend.as('bob'))).rejects.toBeInstanceOf(
      ValidationError
    )
    expect(exists).not.toHaveBeenCalled()
  })
})

describe('list', () => {
  it('returns comments oldest first', async () => {
    await commentsService.create(task.id, { content: 'first' }, backend.as('bob'))
    await commentsService.create(task.id, { content: 'second' }, backend.as('alice'))
    const comments = await commentsService.list(task.id, backend.as('carol'))
    expect(comments.map((c) => c.content)).toEqual(['first', 'second'])
  })

  it('returns an empty array for a task without comments', async () => {
    expect(await commentsService.list(task.id, backend.as('carol'))).toEqual([])
  })

  it('returns not found for a missing task', async () => {
    await expect(commentsService.list('missing', backend.as('carol'))).rejects.toBeInstanceOf(NotFoundError)
  })
})

describe('update', () => {
  it('lets the author edit the content', async () => {
    const comment = await commentsService.create(task.id, { content: 'typo' }, backend.as('bob'))
    const updated = await commentsService.update(comment.id, { content: 'fixed' }, backend.as('bob'))
    expect(updated).toMatchObject({ id: comment.id, content: 'fixed', userId: 'bob' })

    const [latest] = await tasksService.logs(task.id, backend.as('bob'))
    expect([latest.action, latest.details]).toEqual(['updated_comment', 'Updated a comment'])
  })

  it('is forbidden for others and not found for unknown ids', async () => {
    const comment = await commentsService.create(task.id, { content: 'mine' }, backend.as('bob'))
    await expect(commentsService.update(comment.id, { content: 'hijack' }, backend.as('alice'))).rejects.toBeInstanceOf(
      ForbiddenError
    )
    await expect(commentsService.update('missing', { content: 'x' }, backend.as('bob'))).rejects.toBeInstanceOf(
      NotFoundError
    )
    const [stored] = await commentsService.list(task.id, backend.as('bob'))
    expect(stored.content).toBe('mine')
  })

  it('rejects content over 5000 characters', async () => {
    const comment = await commentsService.create(task.id, { content: 'short' }, backend.as('bob'))
    await expect(
      commentsService.update(comment.id, { content: 'x'.repeat(5001) }, backend.as('bob'))
    ).rejects.toThrow('comment must be at most 5000 characters')
  })
})

describe('delete', () => {
  it('removes the comment and logs it on the task', async () => {
    const comment = await commentsService.create(task.id, { content: 'bye' }, backend.as('bob'))
    await commentsService.delete(comment.id, backend.as('bob'))

    expect(await commentsService.list(task.id, backend.as('bob'))).toEqual([])
    const logs = await tasksService.logs(task.id, backend.as('bob'))
    expect(logs.map((l) => l.action)).toEqual(['deleted_comment', 'commented', 'created'])
  })

  it('is forbidden for others and not found for unknown ids', async () => {
    const comment = await commentsService.create(task.id, { content: 'stay' }, backend.as('bob'))
    await expect(commentsService.delete(comment.id, backend.as('alice'))).rejects.toBeInstanceOf(ForbiddenError)
    await expect(commentsService.delete('missing', backend.as('alice'))).rejects.toBeInstanceOf(NotFoundError)
    expect(countRows(backend.db, 'comments')).toBe(1)
  })
})

describe('writes that match no row', () => {
  it('reports a comment removed before its update as not found', async () => {
    const comment = await commentsService.create(task.id, { content: 'racy' }, backend.as('bob'))
    vi.spyOn(backend.store.comments, 'update').mockResolvedValueOnce(undefined)
    await expect(commentsService.update(comment.id, { content: 'edit' }, backend.as('bob'))).rejects.toThrow(
      'comment not found'
    )
    const logs = await tasksService.logs(task.id, backend.as('bob'))
    expect(logs.map((l) => l.action)).toEqual(['commented', 'created'])
  })

  it('reports a comment removed before its delete as not found', async () => {
    const comment = await commentsService.create(task.id, { content: 'racy' }, backend.as('bob'))
    vi.spyOn(backend.store.comments, 'delete').mockResolvedValueOnce(false)
    await expect(commentsService.delete(comment.id, backend.as('bob'))).rejects.toBeInstanceOf(NotFoundError)
  })
})

describe('when the change log cannot be written', () => {
  it('still stores the comment', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const broken: Store = {
      ...backend.store,
      changeLogs: {
        ...backend.store.changeLogs,
        insert: async () => {
          throw new Error('disk full')
        },
      },
    }

    const comment = await commentsService.create(task.id, { content: 'kept' }, { userId: 'bob', store: broken })
    expect(comment.content).toBe('kept')
    expect(countRows(backend.db, 'comments')).toBe(1)
    expect(warn).toHaveBeenCalledWith(`[changeLog] dropped commented entry for task ${task.id}: disk full`)
  })
})

describe('display names', () => {
  it('shows the author name on comments', async () => {
    await commentsService.create(task.id, { content: 'hi' }, { ...backend.as('bob'), userName: 'Bob' })
    const [comment] = await commentsService.list(task.id, backend.as('carol'))
    expect(comment.userName).toBe('Bob')
  })
})
