/* eslint-disable prettier/prettier */
import { z } from 'zod'
import { ValidationError } from '@/lib/errors'
import { TASK_STATUSES } from '@/types/task'
import type {
  CreateTaskInput,
  Pagination,
  UpdateTaskInput,
} from '@/types/task'
import type { CommentInput } from '@/types/comment'

export const MAX_TITLE_LENGTH = 500
export const MAX_COMMENT_LENGTH = 5000
export const DEFAULT_LIMIT = 10
export const MAX_LIMIT = 100

export interface ValidationFailure {
  field: string
  reason: string
}

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ValidationFailure }

const titleSchema = z
  .string({
    required_error: 'title is required',
    invalid_type_error: 'title must be a string',
  })
  .refine((s) => s.trim().length > 0, 'title is required')
  .refine(
    (s) => s.length <= MAX_TITLE_LENGTH,
    `title must be at most ${MAX_TITLE_LENGTH} characters`
  )
  .transform((s) => s.trim())

const statusSchema = z.enum(TASK_STATUSES, {
  errorMap: () => ({
    message: "invalid status: must be 'To Do', 'In Progress', or 'Done'",
  }),
})

const descriptionSchema = z.string({
  invalid_type_error: 'description must be a string',
})

// RFC 3339 timestamps, or a calendar date taken as midnight UTC
const timestampSchema = z.string().datetime({ offset: true })
const calendarDateSchema = z.string().date()

const dueDateSchema = z
  .string({ invalid_type_error: 'dueDate must be a date string' })
  .refine(
    (s) =>
      timestampSchema.safeParse(s).success ||
      calendarDateSchema.safeParse(s).success,
    'dueDate must be a valid date'
  )
  .transform((s) => new Date(s).toISOString())
  .nullable()

const bodySchema = <T extends z.ZodRawShape>(shape: T) =>
  z.object(shape, {
    required_error: 'request body is required',
    invalid_type_error: 'request body must be a JSON object',
  })

const createTaskSchema = bodySchema({
  title: titleSchema,
  description: descriptionSchema.optional(),
  status: statusSchema.optional(),
  dueDate: dueDateSchema.optional(),
})

const updateTaskSchema = bodySchema({
  title: titleSchema.optional(),
  description: descriptionSchema.optional(),
  status: statusSchema.optional(),
  dueDate: dueDateSchema.optional(),
})

// `?limit=` arrives as an empty string and means the same as leaving it out
const blankAsUnset = (v: unknown) => (v === '' ? undefined : v)

const paginationSchema = z.object({
  limit: z.preprocess(
    blankAsUnset,
    z.coerce
      .number({ invalid_type_error: 'limit must be an integer' })
      .int('limit must be an integer')
      .min(1, `limit must be between 1 and ${MAX_LIMIT}`)
      .max(MAX_LIMIT, `limit must be between 1 and ${MAX_LIMIT}`)
      .default(DEFAULT_LIMIT)
  ),
  offset: z.preprocess(
    blankAsUnset,
    z.coerce
      .number({ invalid_type_error: 'offset must be an integer' })
      .int('offset must be an integer')
      .min(0, 'offset must be >= 0')
      .default(0)
  ),
})

const commentSchema = bodySchema({
  content: z
    .string({
      required_error: 'comment content is required',
      invalid_type_error: 'comment content must be a string',
    })
    .refine((s) => s.trim().length > 0, 'comment content is required')
    .refine(
      (s) => s.length <= MAX_COMMENT_LENGTH,
      `comment must be at most ${MAX_COMMENT_LENGTH} characters`
    )
    .transform((s) => s.trim()),
})

type ParseOutcome<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError }

const toResult = <T>(parsed: ParseOutcome<T>): ValidationResult<T> => {
  if (parsed.success) return { ok: true, value: parsed.data }
  const issue = parsed.error.issues[0]
  return {
    ok: false,
    error: {
      field: issue && issue.path.length ? issue.path.join('.') : 'body',
      reason: issue?.message ?? 'invalid request',
    },
  }
}

export const validateCreateTask = (
  input: unknown
): ValidationResult<CreateTaskInput> =>
  toResult(createTaskSchema.safeParse(input))

export const validateUpdateTask = (
  input: unknown
): ValidationResult<UpdateTaskInput> => {
  const result = toResult(updateTaskSchema.safeParse(input))
  if (!result.ok) return result
  const present = Object.values(result.value).some((v) => v !== undefined)
  if (!present) {
    return { ok: false, error: { field: 'body', reason: 'no fields to update' } }
  }
  return result
}

export const validatePagination = (input: {
  limit?: unknown
  offset?: unknown
}): ValidationResult<Pagination> =>
  toResult(
    paginationSchema.safeParse({ limit: input.limit, offset: input.offset })
  )

export const validateCommentContent = (
  input: unknown
): ValidationResult<CommentInput> => toResult(commentSchema.safeParse(input))

export const assertValid = <T>(result: ValidationResult<T>): T => {
  if (!result.ok) {
    throw new ValidationError(result.error.field, result.error.reason)
  }
  return result.value
}
