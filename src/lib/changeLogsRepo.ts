/* eslint-disable prettier/prettier */
import { randomUUID } from 'crypto'
import type { SqliteDatabase } from '@/lib/database'
import { ensureUser } from '@/lib/usersRepo'
import { nowISO } from '@/lib/store'
import type { ChangeLogRepository } from '@/lib/store'
import type { ChangeLogEntry } from '@/types/changeLog'

type ChangeLogRow = Omit<ChangeLogEntry, 'userName'> & { userName: string | null }

const toEntry = ({ userName, ...row }: ChangeLogRow): ChangeLogEntry =>
  userName ? { ...row, userName } : row

export const createChangeLogsRepo = (
  db: SqliteDatabase
): ChangeLogRepository => ({
  async insert(entry) {
    ensureUser(db, entry.userId)
    const row: ChangeLogEntry = { ...entry, id: randomUUID(), createdAt: nowISO() }
    db.prepare<[string, string, string, string, string, string]>(
      'INSERT INTO change_logs (id, taskId, userId, action, details, createdAt) VALUES (?, ?, ?, ?, ?, ?)'
    ).run(row.id, row.taskId, row.userId, row.action, row.details, row.createdAt)
    return row
  },

  async listByTask(taskId) {
    return db
      .prepare<[string], ChangeLogRow>(
        `SELECT change_logs.*, users.name AS userName FROM change_logs
         LEFT JOIN users ON users.id = change_logs.userId
         WHERE change_logs.taskId = ? ORDER BY change_logs.createdAt DESC, change_logs.rowid DESC`
      )
      .all(taskId)
      .map(toEntry)
  },
})
