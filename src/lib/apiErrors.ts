/* eslint-disable prettier/prettier */
import type { NextApiResponse } from 'next'
import { UnauthorizedError } from '@/lib/apiAuth'
import { ForbiddenError, NotFoundError, ValidationError } from '@/lib/errors'

export const sendApiError = (res: NextApiResponse, e: unknown) => {
  if (e instanceof ValidationError) {
    res.status(400).json({ error: e.message, field: e.field })
    return
  }
  if (
    e instanceof UnauthorizedError ||
    e instanceof ForbiddenError ||
    e instanceof NotFoundError
  ) {
    res.status(e.status).json({ error: e.message })
    return
  }
  console.error('[api] unexpected error:', e)
  res.status(500).json({ error: e instanceof Error ? e.message : 'internal error' })
}

export const methodNotAllowed = (res: NextApiResponse, allow: string) => {
  res.setHeader('Allow', allow)
  res.status(405).end('Method Not Allowed')
}
