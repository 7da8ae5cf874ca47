import type { NextApiRequest, NextApiResponse } from 'next'
import { tasksService } from '@/lib/tasksService'
import { resolveApiAuth } from '@/lib/apiAuth'
import { methodNotAllowed, sendApiError } from '@/lib/apiErrors'

export default async function handler(
  req: NextApiRequest,
  res: NextApiResponse
) {
  try {
    const auth = await resolveApiAuth(req)
    if (req.method === 'GET') {
      const { limit, offset } = req.query
      const tasks = await tasksService.list({ limit, offset }, auth)
      res.status(200).json(tasks)
      return
    }

    if (req.method === 'POST') {
      const created = await tasksService.create(req.body, auth)
      res.status(201).json(created)
      return
    }

    methodNotAllowed(res, 'GET, POST')
  } catch (e) {
    sendApiError(res, e)
  }
}
