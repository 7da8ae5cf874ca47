/* eslint-disable prettier/prettier */
import { randomUUID } from 'crypto'
import type { SqliteDatabase } from '@/lib/database'
import { nowISO } from '@/lib/store'
import { ensureUser } from '@/lib/usersRepo'
import type {
  NewTask,
  TaskOwnership,
  TaskRepository,
} from '@/lib/store'
import type { Task, TaskStatus, UpdateTaskInput } from '@/types/task'

interface TaskRow {
  id: string
  title: string
  description: string
  status: TaskStatus
  creatorId: string
  dueDate: string | null
  creatorName: string | null
  archived: number
  createdAt: string
  updatedAt: string
}

type Bind = Record<string, string | number | null>

const SELECT_TASKS =
  'SELECT tasks.*, users.name AS creatorName FROM tasks LEFT JOIN users ON users.id = tasks.creatorId'

const toTask = ({ creatorName, archived, ...row }: TaskRow): Task => ({
  ...row,
  archived: archived === 1,
  ...(creatorName ? { creatorName } : {}),
})

export const createTasksRepo = (db: SqliteDatabase) => {
  const get = (id: string): Task | undefined => {
    const row = db
      .prepare<[string], TaskRow>(`${SELECT_TASKS} WHERE tasks.id = ?`)
      .get(id)
    return row ? toTask(row) : undefined
  }

  const repo: TaskRepository = {
    async list({ archived, limit, offset }) {
      // rowid breaks ties between rows written in the same millisecond
      const order = archived
        ? 'tasks.updatedAt DESC, tasks.rowid DESC'
        : 'tasks.createdAt DESC, tasks.rowid DESC'
      const rows = db
        .prepare<[number, number, number], TaskRow>(
          `${SELECT_TASKS} WHERE tasks.archived = ? ORDER BY ${order} LIMIT ? OFFSET ?`
        )
        .all(archived ? 1 : 0, limit, offset)
      return rows.map(toTask)
    },

    async get(id) {
      return get(id)
    },

    async exists(id) {
      const row = db
        .prepare<[string], { id: string }>('SELECT id FROM tasks WHERE id = ?')
        .get(id)
      return !!row
    },

    async findOwnership(id) {
      return db
        .prepare<[string], TaskOwnership>(
          'SELECT creatorId, title FROM tasks WHERE id = ?'
        )
        .get(id)
    },

    async insert(task: NewTask) {
      ensureUser(db, task.creatorId)
      const id = randomUUID()
      const createdAt = nowISO()
      db.prepare<Bind>(
        `INSERT INTO tasks (id, title, description, status, creatorId, dueDate, archived, createdAt, updatedAt)
         VALUES (@id, @title, @description, @status, @creatorId, @dueDate, 0, @createdAt, @updatedAt)`
      ).run({ ...task, id, createdAt, updatedAt: createdAt })
      const created = get(id)
      if (!created) throw new Error('task vanished after insert')
      return created
    },

    async update(id: string, creatorId: string, patch: UpdateTaskInput) {
      const sets: string[] = []
      const bind: Bind = { id, creatorId, updatedAt: nowISO() }
      if (patch.title !== undefined) {
        sets.push('title = @title')
        bind.title = patch.title
      }
      if (patch.description !== undefined) {
        sets.push('description = @description')
        bind.description = patch.description
      }
      if (patch.status !== undefined) {
        sets.push('status = @status')
        bind.status = patch.status
      }
      if (patch.dueDate !== undefined) {
        sets.push('dueDate = @dueDate')
        bind.dueDate = patch.dueDate
      }
      if (!sets.length) throw new Error('no fields to update')
      sets.push('updatedAt = @updatedAt')

      const result = db
        .prepare<Bind>(
          `UPDATE tasks SET ${sets.join(', ')} WHERE id = @id AND creatorId = @creatorId`
        )
        .run(bind)
      return result.changes === 0 ? undefined : get(id)
    },

    async setArchived(id, creatorId, archived) {
      const result = db
        .prepare<[number, string, string, string]>(
          'UPDATE tasks SET archived = ?, updatedAt = ? WHERE id = ? AND creatorId = ?'
        )
        .run(archived ? 1 : 0, nowISO(), id, creatorId)
      return result.changes === 0 ? undefined : get(id)
    },

    async delete(id, creatorId) {
      const result = db
        .prepare<[string, string]>(
          'DELETE FROM tasks WHERE id = ? AND creatorId = ?'
        )
        .run(id, creatorId)
      return result.changes > 0
    },
  }

  return repo
}
