/* eslint-disable prettier/prettier */
import path from 'path'
import { z } from 'zod'

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined))

const envSchema = z.object({
  USE_SUPABASE: z
    .string()
    .optional()
    .transform((v) => v === 'true'),
  NEXT_PUBLIC_SUPABASE_URL: optionalString,
  NEXT_PUBLIC_SUPABASE_ANON_KEY: optionalString,
  SUPABASE_SERVICE_ROLE: optionalString,
  TASKS_DB_PATH: optionalString,
})

export interface AppConfig {
  useSupabase: boolean
  supabaseUrl?: string
  supabaseAnonKey?: string
  supabaseServiceRole?: string
  dbPath: string
}

export const loadConfig = (
  env: Record<string, string | undefined> = process.env
): AppConfig => {
  const parsed = envSchema.parse(env)
  return {
    useSupabase: parsed.USE_SUPABASE && !!parsed.NEXT_PUBLIC_SUPABASE_URL,
    supabaseUrl: parsed.NEXT_PUBLIC_SUPABASE_URL,
    supabaseAnonKey: parsed.NEXT_PUBLIC_SUPABASE_ANON_KEY,
    supabaseServiceRole: parsed.SUPABASE_SERVICE_ROLE,
    dbPath:
      parsed.TASKS_DB_PATH ?? path.join(process.cwd(), 'data', 'tasks.db'),
  }
}
