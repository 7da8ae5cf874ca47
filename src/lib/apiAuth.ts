/* eslint-disable prettier/prettier */
import type { NextApiRequest } from 'next'
import type { SupabaseClient } from '@supabase/supabase-js'
import { loadConfig } from '@/lib/config'
import { createServerSupabaseWithToken } from '@/lib/supabaseClient'

export const DEFAULT_LOCAL_USER_ID = 'local-default-user'

export class UnauthorizedError extends Error {
  status = 401

  constructor(message = 'unauthorized') {
    super(message)
    this.name = 'UnauthorizedError'
  }
}

export interface ApiAuthContext {
  userId: string
  userName?: string
  client?: SupabaseClient | null
}

export const firstValue = (value: string | string[] | undefined): string | undefined => {
  if (!value) return undefined
  return Array.isArray(value) ? value[0] : value
}

export const resolveApiAuth = async (req: NextApiRequest): Promise<ApiAuthContext> => {
  const authHeader = req.headers.authorization || ''
  const token = authHeader.startsWith('Bearer ') ? authHeader.slice(7) : undefined
  const supabase = createServerSupabaseWithToken(token)
  if (supabase) {
    const { data, error } = await supabase.auth.getUser()
    if (error || !data.user) {
      throw new UnauthorizedError(error?.message || 'unauthorized')
    }
    const name = data.user.user_metadata?.name
    return {
      userId: data.user.id,
      userName: typeof name === 'string' ? name : undefined,
      client: supabase,
    }
  }

  // without a verified token only local mode may trust the caller
  if (loadConfig().useSupabase) throw new UnauthorizedError('bearer token required')

  const userName = firstValue(req.headers['x-user-name'])?.trim() || undefined
  const fallback = firstValue(req.headers['x-user-id'])?.trim()
  if (fallback) {
    return { userId: fallback, userName, client: null }
  }

  return { userId: DEFAULT_LOCAL_USER_ID, userName, client: null }
}
