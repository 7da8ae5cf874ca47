/* eslint-disable prettier/prettier */
import { createClient, SupabaseClient } from '@supabase/supabase-js'
import { loadConfig } from '@/lib/config'

export const createServerSupabase = (): SupabaseClient | null => {
  const { supabaseUrl, supabaseServiceRole, supabaseAnonKey } = loadConfig()
  const key = supabaseServiceRole || supabaseAnonKey
  if (!supabaseUrl || !key) return null
  return createClient(supabaseUrl, key, {
    auth: { persistSession: false },
  })
}

export const createServerSupabaseWithToken = (token?: string): SupabaseClient | null => {
  const { supabaseUrl, supabaseAnonKey } = loadConfig()
  if (!supabaseUrl || !supabaseAnonKey || !token) return null
  return createClient(supabaseUrl, supabaseAnonKey, {
    global: { headers: { Authorization: `Bearer ${token}` } },
    auth: { persistSession: false },
  })
}
