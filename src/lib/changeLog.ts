/* eslint-disable prettier/prettier */
import type { ChangeLogRepository } from '@/lib/store'
import type { NewChangeLogEntry } from '@/types/changeLog'

/** Joins change fragments into one sentence, with an Oxford comma from three items on. */
export const formatChangeDetails = (changes: readonly string[]): string => {
  if (changes.length === 0) return ''
  if (changes.length === 1) return changes[0]
  if (changes.length === 2) return `${changes[0]} and ${changes[1]}`
  const head = changes.slice(0, -1).join(', ')
  return `${head}, and ${changes[changes.length - 1]}`
}

/**
 * Best-effort post-commit hook: appends an audit entry after the primary write
 * has gone through. It never rejects; `false` means the entry was dropped.
 */
export const recordChange = async (
  repo: ChangeLogRepository,
  entry: NewChangeLogEntry
): Promise<boolean> => {
  try {
    await repo.insert(entry)
    return true
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    console.warn(
      `[changeLog] dropped ${entry.action} entry for task ${entry.taskId}: ${reason}`
    )
    return false
  }
}
