/* eslint-disable prettier/prettier */
import type { SqliteDatabase } from '@/lib/database'
import { nowISO } from '@/lib/store'
import type { UserRepository } from '@/lib/store'

// rows referenced by foreign keys; the name is filled in once one is known
export function ensureUser(db: SqliteDatabase, userId: string) {
  db.prepare<[string, string]>(
    'INSERT OR IGNORE INTO users (id, createdAt) VALUES (?, ?)'
  ).run(userId, nowISO())
}

export const createUsersRepo = (db: SqliteDatabase): UserRepository => ({
  async remember(id, name) {
    db.prepare<[string, string, string]>(
      `INSERT INTO users (id, name, createdAt) VALUES (?, ?, ?)
       ON CONFLICT(id) DO UPDATE SET name = excluded.name`
    ).run(id, name, nowISO())
  },
})
