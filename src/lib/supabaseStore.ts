/* eslint-disable prettier/prettier */
import { randomUUID } from 'crypto'
import { z } from 'zod'
import type { SupabaseClient } from '@supabase/supabase-js'
import { nowISO } from '@/lib/store'
import type {
  ChangeLogRepository,
  CommentRepository,
  Store,
  TaskRepository,
  UserRepository,
} from '@/lib/store'
import { TASK_STATUSES } from '@/types/task'
import type { Task } from '@/types/task'

// Rows come back untyped from PostgREST; parse them at the boundary.
const taskRow = z.object({
  id: z.string(),
  title: z.string(),
  description: z
    .string()
    .nullable()
    .transform((v) => v ?? ''),
  status: z.enum(TASK_STATUSES),
  creatorId: z.string(),
  dueDate: z.string().nullable(),
  archived: z.boolean(),
  createdAt: z.string(),
  updatedAt: z.string(),
})

const commentRow = z.object({
  id: z.string(),
  taskId: z.string(),
  userId: z.string(),
  content: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
})

const changeLogRow = z.object({
  id: z.string(),
  taskId: z.string(),
  userId: z.string(),
  action: z.string(),
  details: z
    .string()
    .nullable()
    .transform((v) => v ?? ''),
  createdAt: z.string(),
})

const ownershipRow = z.object({ creatorId: z.string(), title: z.string() })
const commentOwnershipRow = z.object({ userId: z.string(), taskId: z.string() })
const profileRow = z.object({ id: z.string(), name: z.string() })

// ids are uuid columns; anything else would fail the cast server side
const uuid = z.string().uuid()
const isUuid = (id: string) => uuid.safeParse(id).success

function fail(error: { message: string }): never {
  throw new Error(error.message)
}

const namesFor = async (
  client: SupabaseClient,
  ids: string[]
): Promise<Map<string, string>> => {
  const unique = [...new Set(ids)]
  if (!unique.length) return new Map()
  const { data, error } = await client
    .from('profiles')
    .select('id,name')
    .in('id', unique)
  if (error) fail(error)
  return new Map(
    profileRow
      .array()
      .parse(data ?? [])
      .map((p): [string, string] => [p.id, p.name])
  )
}

const withCreatorNames = async (
  client: SupabaseClient,
  tasks: Task[]
): Promise<Task[]> => {
  const names = await namesFor(client, tasks.map((t) => t.creatorId))
  return tasks.map((t) => {
    const creatorName = names.get(t.creatorId)
    return creatorName ? { ...t, creatorName } : t
  })
}

const withUserNames = async <T extends { userId: string }>(
  client: SupabaseClient,
  rows: T[]
): Promise<T[]> => {
  const names = await namesFor(client, rows.map((r) => r.userId))
  return rows.map((r) => {
    const userName = names.get(r.userId)
    return userName ? { ...r, userName } : r
  })
}

const withCreatorName = async (client: SupabaseClient, task: Task) =>
  (await withCreatorNames(client, [task]))[0]

const supabaseUsers = (client: SupabaseClient): UserRepository => ({
  async remember(id, name) {
    const { error } = await client
      .from('profiles')
      .upsert({ id, name, updatedAt: nowISO() })
    if (error) fail(error)
  },
})

const supabaseTasks = (client: SupabaseClient): TaskRepository => ({
  async list({ archived, limit, offset }) {
    const { data, error } = await client
      .from('tasks')
      .select('*')
      .eq('archived', archived)
      .order(archived ? 'updatedAt' : 'createdAt', { ascending: false })
      .range(offset, offset + limit - 1)
    if (error) fail(error)
    return withCreatorNames(client, taskRow.array().parse(data ?? []))
  },

  async get(id) {
    if (!isUuid(id)) return undefined
    const { data, error } = await client
      .from('tasks')
      .select('*')
      .eq('id', id)
      .maybeSingle()
    if (error) fail(error)
    return data ? withCreatorName(client, taskRow.parse(data)) : undefined
  },

  async exists(id) {
    if (!isUuid(id)) return false
    const { data, error } = await client
      .from('tasks')
      .select('id')
      .eq('id', id)
      .maybeSingle()
    if (error) fail(error)
    return !!data
  },

  async findOwnership(id) {
    if (!isUuid(id)) return undefined
    const { data, error } = await client
      .from('tasks')
      .select('creatorId,title')
      .eq('id', id)
      .maybeSingle()
    if (error) fail(error)
    return data ? ownershipRow.parse(data) : undefined
  },

  async insert(task) {
    const now = nowISO()
    const row: Task = {
      ...task,
      id: randomUUID(),
      archived: false,
      createdAt: now,
      updatedAt: now,
    }
    const { data, error } = await client
      .from('tasks')
      .insert(row)
      .select('*')
      .single()
    if (error) fail(error)
    return withCreatorName(client, taskRow.parse(data))
  },

  async update(id, creatorId, patch) {
    if (!isUuid(id)) return undefined
    const upd: Record<string, string | null> = { updatedAt: nowISO() }
    if (patch.title !== undefined) upd.title = patch.title
    if (patch.description !== undefined) upd.description = patch.description
    if (patch.status !== undefined) upd.status = patch.status
    if (patch.dueDate !== undefined) upd.dueDate = patch.dueDate
    const { data, error } = await client
      .from('tasks')
      .update(upd)
      .eq('id', id)
      .eq('creatorId', creatorId)
      .select('*')
      .maybeSingle()
    if (error) fail(error)
    return data ? withCreatorName(client, taskRow.parse(data)) : undefined
  },

  async setArchived(id, creatorId, archived) {
    if (!isUuid(id)) return undefined
    const { data, error } = await client
      .from('tasks')
      .update({ archived, updatedAt: nowISO() })
      .eq('id', id)
      .eq('creatorId', creatorId)
      .select('*')
      .maybeSingle()
    if (error) fail(error)
    return data ? withCreatorName(client, taskRow.parse(data)) : undefined
  },

  async delete(id, creatorId) {
    if (!isUuid(id)) return false
    const { data, error } = await client
      .from('tasks')
      .delete()
      .eq('id', id)
      .eq('creatorId', creatorId)
      .select('id')
    if (error) fail(error)
    return !!data && data.length > 0
  },
})

const supabaseComments = (client: SupabaseClient): CommentRepository => ({
  async listByTask(taskId) {
    if (!isUuid(taskId)) return []
    const { data, error } = await client
      .from('comments')
      .select('*')
      .eq('taskId', taskId)
      .order('createdAt', { ascending: true })
    if (error) fail(error)
    return withUserNames(client, commentRow.array().parse(data ?? []))
  },

  async findOwnership(id) {
    if (!isUuid(id)) return undefined
    const { data, error } = await client
      .from('comments')
      .select('userId,taskId')
      .eq('id', id)
      .maybeSingle()
    if (error) fail(error)
    return data ? commentOwnershipRow.parse(data) : undefined
  },

  async insert(taskId, userId, content) {
    const now = nowISO()
    const { data, error } = await client
      .from('comments')
      .insert({ id: randomUUID(), taskId, userId, content, createdAt: now, updatedAt: now })
      .select('*')
      .single()
    if (error) fail(error)
    const [named] = await withUserNames(client, [commentRow.parse(data)])
    return named
  },

  async update(id, userId, content) {
    if (!isUuid(id)) return undefined
    const { data, error } = await client
      .from('comments')
      .update({ content, updatedAt: nowISO() })
      .eq('id', id)
      .eq('userId', userId)
      .select('*')
      .maybeSingle()
    if (error) fail(error)
    if (!data) return undefined
    const [named] = await withUserNames(client, [commentRow.parse(data)])
    return named
  },

  async delete(id, userId) {
    if (!isUuid(id)) return false
    const { data, error } = await client
      .from('comments')
      .delete()
      .eq('id', id)
      .eq('userId', userId)
      .select('id')
    if (error) fail(error)
    return !!data && data.length > 0
  },
})

const supabaseChangeLogs = (client: SupabaseClient): ChangeLogRepository => ({
  async insert(entry) {
    const { data, error } = await client
      .from('change_logs')
      .insert({ ...entry, id: randomUUID(), createdAt: nowISO() })
      .select('*')
      .single()
    if (error) fail(error)
    return changeLogRow.parse(data)
  },

  async listByTask(taskId) {
    if (!isUuid(taskId)) return []
    const { data, error } = await client
      .from('change_logs')
      .select('*')
      .eq('taskId', taskId)
      .order('createdAt', { ascending: false })
    if (error) fail(error)
    return withUserNames(client, changeLogRow.array().parse(data ?? []))
  },
})

export const createSupabaseStore = (client: SupabaseClient): Store => ({
  users: supabaseUsers(client),
  tasks: supabaseTasks(client),
  comments: supabaseComments(client),
  changeLogs: supabaseChangeLogs(client),
})
