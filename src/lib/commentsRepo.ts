/* eslint-disable prettier/prettier */
import { randomUUID } from 'crypto'
import type { SqliteDatabase } from '@/lib/database'
import { ensureUser } from '@/lib/usersRepo'
import { nowISO } from '@/lib/store'
import type { CommentOwnership, CommentRepository } from '@/lib/store'
import type { Comment } from '@/types/comment'

type CommentRow = Omit<Comment, 'userName'> & { userName: string | null }

const SELECT_COMMENTS =
  'SELECT comments.*, users.name AS userName FROM comments LEFT JOIN users ON users.id = comments.userId'

const toComment = ({ userName, ...row }: CommentRow): Comment =>
  userName ? { ...row, userName } : row

export const createCommentsRepo = (db: SqliteDatabase): CommentRepository => {
  const get = (id: string) => {
    const row = db
      .prepare<[string], CommentRow>(`${SELECT_COMMENTS} WHERE comments.id = ?`)
      .get(id)
    return row ? toComment(row) : undefined
  }

  return {
    async listByTask(taskId) {
      return db
        .prepare<[string], CommentRow>(
          `${SELECT_COMMENTS} WHERE comments.taskId = ? ORDER BY comments.createdAt ASC, comments.rowid ASC`
        )
        .all(taskId)
        .map(toComment)
    },

    async findOwnership(id) {
      return db
        .prepare<[string], CommentOwnership>(
          'SELECT userId, taskId FROM comments WHERE id = ?'
        )
        .get(id)
    },

    async insert(taskId, userId, content) {
      ensureUser(db, userId)
      const id = randomUUID()
      const now = nowISO()
      db.prepare<[string, string, string, string, string, string]>(
        'INSERT INTO comments (id, taskId, userId, content, createdAt, updatedAt) VALUES (?, ?, ?, ?, ?, ?)'
      ).run(id, taskId, userId, content, now, now)
      const created = get(id)
      if (!created) throw new Error('comment vanished after insert')
      return created
    },

    async update(id, userId, content) {
      const result = db
        .prepare<[string, string, string, string]>(
          'UPDATE comments SET content = ?, updatedAt = ? WHERE id = ? AND userId = ?'
        )
        .run(content, nowISO(), id, userId)
      return result.changes === 0 ? undefined : get(id)
    },

    async delete(id, userId) {
      const result = db
        .prepare<[string, string]>(
          'DELETE FROM comments WHERE id = ? AND userId = ?'
        )
        .run(id, userId)
      return result.changes > 0
    },
  }
}
