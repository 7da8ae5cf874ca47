process.env.TASKS_DB_PATH = ':memory:'
delete process.env.USE_SUPABASE
delete process.env.NEXT_PUBLIC_SUPABASE_URL
delete process.env.NEXT_PUBLIC_SUPABASE_ANON_KEY
delete process.env.SUPABASE_SERVICE_ROLE
