/* eslint-disable prettier/prettier */
import type { SupabaseClient } from '@supabase/supabase-js'
import { loadConfig } from '@/lib/config'
import { getDatabase } from '@/lib/database'
import { createSqliteStore } from '@/lib/sqliteStore'
import { createSupabaseStore } from '@/lib/supabaseStore'
import { createServerSupabase } from '@/lib/supabaseClient'
import type { Store } from '@/lib/store'

export interface TaskServiceContext {
  userId: string
  userName?: string
  client?: SupabaseClient | null
  store?: Store
}

const ensureContext = (ctx?: TaskServiceContext) => {
  if (!ctx || !ctx.userId) throw new Error('user context required')
  return ctx
}

/** Picks the backend: an explicit store, then Supabase when enabled, then local SQLite. */
export const resolveStore = (ctx?: TaskServiceContext): { userId: string; store: Store } => {
  const { userId, client, store } = ensureContext(ctx)
  if (store) return { userId, store }
  if (loadConfig().useSupabase) {
    const sb = client || createServerSupabase()
    if (sb) return { userId, store: createSupabaseStore(sb) }
  }
  return { userId, store: createSqliteStore(getDatabase()) }
}

/** As `resolveStore`, and records the caller's display name before a write. */
export const resolveWriter = async (
  ctx?: TaskServiceContext
): Promise<{ userId: string; store: Store }> => {
  const resolved = resolveStore(ctx)
  const name = ctx?.userName?.trim()
  if (name) await resolved.store.users.remember(resolved.userId, name)
  return resolved
}
