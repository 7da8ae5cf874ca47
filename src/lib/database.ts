/* eslint-disable prettier/prettier */
import Database from 'better-sqlite3'
import fs from 'fs'
import path from 'path'
import { loadConfig } from '@/lib/config'

export type SqliteDatabase = Database.Database

function ensureDir(p: string) {
  if (!fs.existsSync(p)) fs.mkdirSync(p, { recursive: true })
}

function ensureColumn(
  db: SqliteDatabase,
  table: string,
  column: string,
  definition: string
) {
  const info = db
    .prepare<[], { name: string }>(`PRAGMA table_info(${table})`)
    .all()
  if (info.some((c) => c.name === column)) return
  db.exec(`ALTER TABLE ${table} ADD COLUMN ${definition}`)
}

export function migrate(db: SqliteDatabase) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      createdAt TEXT NOT NULL
    );
    CREATE TABLE IF NOT EXISTS tasks (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL CHECK (length(title) <= 500),
      description TEXT NOT NULL DEFAULT '',
      status TEXT NOT NULL DEFAULT 'To Do'
        CHECK (status IN ('To Do', 'In Progress', 'Done')),
      creatorId TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      dueDate TEXT,
      createdAt TEXT NOT NULL,
      updatedAt TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_tasks_creatorId ON tasks(creatorId);
    CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status);
    CREATE TABLE IF NOT EXISTS comments (
      id TEXT PRIMARY KEY,
      taskId TEXT NOT NULL REFERENCES tasks(id) ON DELETE CASCADE,
      userId TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      content TEXT NOT NULL,
      createdAt TEXT NOT NULL,
      updatedAt TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_comments_taskId ON comments(taskId);
    CREATE INDEX IF NOT EXISTS idx_comments_userId ON comments(userId);
    CREATE TABLE IF NOT EXISTS change_logs (
      id TEXT PRIMARY KEY,
      taskId TEXT NOT NULL REFERENCES tasks(id) ON DELETE CASCADE,
      userId TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      action TEXT NOT NULL,
      details TEXT NOT NULL DEFAULT '',
      createdAt TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_change_logs_taskId ON change_logs(taskId);
  `)

  // archiving arrived after the first release
  ensureColumn(db, 'tasks', 'archived', 'archived INTEGER NOT NULL DEFAULT 0')
  db.exec('CREATE INDEX IF NOT EXISTS idx_tasks_archived ON tasks(archived)')
  ensureColumn(db, 'users', 'name', 'name TEXT')
}

export function openDatabase(file: string): SqliteDatabase {
  if (file !== ':memory:') ensureDir(path.dirname(file))
  const db = new Database(file)
  db.pragma('journal_mode = WAL')
  // cascades depend on it, SQLite ships with it off
  db.pragma('foreign_keys = ON')
  migrate(db)
  return db
}

let shared: SqliteDatabase | null = null

export function getDatabase(): SqliteDatabase {
  if (!shared) shared = openDatabase(loadConfig().dbPath)
  return shared
}

export function closeDatabase() {
  if (!shared) return
  shared.close()
  shared = null
}
