import type { NextApiRequest, NextApiResponse } from 'next'
import { tasksService } from '@/lib/tasksService'
import { resolveApiAuth } from '@/lib/apiAuth'
import { methodNotAllowed, sendApiError } from '@/lib/apiErrors'

export default async function handler(
  req: NextApiRequest,
  res: NextApiResponse
) {
  try {
    if (req.method !== 'GET') {
      methodNotAllowed(res, 'GET')
      return
    }
    const auth = await resolveApiAuth(req)
    const { limit, offset } = req.query
    const tasks = await tasksService.listArchived({ limit, offset }, auth)
    res.status(200).json(tasks)
  } catch (e) {
    sendApiError(res, e)
  }
}
