import type { SqliteDatabase } from '@/lib/database'
import type { Store } from '@/lib/store'
import { createTasksRepo } from '@/lib/tasksRepo'
import { createCommentsRepo } from '@/lib/commentsRepo'
import { createChangeLogsRepo } from '@/lib/changeLogsRepo'
import { createUsersRepo } from '@/lib/usersRepo'

export const createSqliteStore = (db: SqliteDatabase): Store => ({
  users: createUsersRepo(db),
  tasks: createTasksRepo(db),
  comments: createCommentsRepo(db),
  changeLogs: createChangeLogsRepo(db),
})
