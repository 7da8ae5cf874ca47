import type { NextApiRequest, NextApiResponse } from 'next'
import { createMocks } from 'node-mocks-http'
import type { RequestMethod } from 'node-mocks-http'
import { openDatabase } from '@/lib/database'
import type { SqliteDatabase } from '@/lib/database'
import { createSqliteStore } from '@/lib/sqliteStore'
import type { Store } from '@/lib/store'
import type { TaskServiceContext } from '@/lib/serviceContext'

export interface TestBackend {
  db: SqliteDatabase
  store: Store
  as: (userId: string) => TaskServiceContext
}

export function makeBackend(): TestBackend {
  const db = openDatabase(':memory:')
  const store = createSqliteStore(db)
  return { db, store, as: (userId) => ({ userId, store }) }
}

export function countRows(db: SqliteDatabase, table: 'tasks' | 'comments' | 'change_logs'): number {
  const row = db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()
  return row ? row.n : 0
}

type Handler = (req: NextApiRequest, res: NextApiResponse) => unknown

export interface CallOptions {
  method: RequestMethod
  user?: string
  name?: string
  query?: Record<string, string>
  body?: Record<string, unknown>
}

export async function callApi(handler: Handler, { method, user, name, query, body }: CallOptions) {
  const headers: Record<string, string> = {}
  if (user) headers['x-user-id'] = user
  if (name) headers['x-user-name'] = name
  const { req, res } = createMocks<NextApiRequest, NextApiResponse>({
    method,
    query: query ?? {},
    body: body ?? {},
    headers,
  })
  await handler(req, res)
  return res
}
