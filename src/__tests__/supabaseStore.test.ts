import { describe, it, expect, vi } from 'vitest'
import { createClient } from '@supabase/supabase-js'
import { createSupabaseStore } from '@/lib/supabaseStore'
import { tasksService } from '@/lib/tasksService'
import { commentsService } from '@/lib/commentsService'
import { NotFoundError } from '@/lib/errors'

const TASK_ID = '6f1c2a0e-5b7d-4c3e-9a1f-2d8e4b6c0a11'
const USER_ID = '0b9d7e52-3c1a-4f6e-8d2b-7a5c9e1f3b44'

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })

// PostgREST answered in process: every request goes through the stubbed fetch
function stubbedStore(respond: (url: URL) => Response) {
  const fetchStub = vi.fn<typeof fetch>(async (input) =>
    respond(new URL(input instanceof Request ? input.url : input.toString()))
  )
  const client = createClient('http://127.0.0.1:54321', 'test-anon-key', {
    auth: { persistSession: false, autoRefreshToken: false },
    global: { fetch: fetchStub },
  })
  return { store: createSupabaseStore(client), fetchStub }
}

const taskRow = {
  id: TASK_ID,
  title: 'Ship release',
  description: null,
  status: 'To Do',
  creatorId: USER_ID,
  dueDate: null,
  archived: false,
  createdAt: '2026-01-02T10:00:00+00:00',
  updatedAt: '2026-01-02T10:00:00+00:00',
}

describe('ids that are not uuids', () => {
  it('match nothing without querying', async () => {
    const { store, fetchStub } = stubbedStore(() => json([]))

    expect(await store.tasks.get('abc')).toBeUndefined()
    expect(await store.tasks.exists('abc')).toBe(false)
    expect(await store.tasks.findOwnership('abc')).toBeUndefined()
    expect(await store.tasks.update('abc', USER_ID, { title: 'x' })).toBeUndefined()
    expect(await store.tasks.setArchived('abc', USER_ID, true)).toBeUndefined()
    expect(await store.tasks.delete('abc', USER_ID)).toBe(false)
    expect(await store.comments.findOwnership('abc')).toBeUndefined()
    expect(await store.comments.update('abc', USER_ID, 'x')).toBeUndefined()
    expect(await store.comments.delete('abc', USER_ID)).toBe(false)
    expect(await store.comments.listByTask('abc')).toEqual([])
    expect(await store.changeLogs.listByTask('abc')).toEqual([])
    expect(fetchStub).not.toHaveBeenCalled()
  })

  it('surface as not found from the services', async () => {
    const { store } = stubbedStore(() => json([]))
    const ctx = { userId: USER_ID, store }

    await expect(tasksService.get('abc', ctx)).rejects.toBeInstanceOf(NotFoundError)
    await expect(tasksService.update('abc', { status: 'Done' }, ctx)).rejects.toBeInstanceOf(NotFoundError)
    await expect(tasksService.archive('abc', ctx)).rejects.toBeInstanceOf(NotFoundError)
    await expect(tasksService.delete('abc', ctx)).rejects.toBeInstanceOf(NotFoundError)
    await expect(commentsService.create('abc', { content: 'hi' }, ctx)).rejects.toBeInstanceOf(NotFoundError)
    await expect(commentsService.delete('abc', ctx)).rejects.toBeInstanceOf(NotFoundError)
  })
})

describe('reads', () => {
  it('parses the task row and attaches the creator name', async () => {
    const seen: string[] = []
    const { store } = stubbedStore((url) => {
      seen.push(`${url.pathname}?id=${url.searchParams.get('id')}`)
      if (url.pathname === '/rest/v1/profiles') return json([{ id: USER_ID, name: 'Alice' }])
      return json([taskRow])
    })

    expect(await store.tasks.get(TASK_ID)).toEqual({
      ...taskRow,
      description: '',
      creatorName: 'Alice',
    })
    expect(seen).toEqual([`/rest/v1/tasks?id=eq.${TASK_ID}`, `/rest/v1/profiles?id=in.(${USER_ID})`])
  })

  it('returns undefined when no row matches', async () => {
    const { store } = stubbedStore(() => json([]))
    expect(await store.tasks.get(TASK_ID)).toBeUndefined()
  })

  it('raises the PostgREST error message', async () => {
    const { store } = stubbedStore(() =>
      json({ code: '42501', message: 'permission denied for table tasks', details: null, hint: null }, 403)
    )
    await expect(store.tasks.get(TASK_ID)).rejects.toThrow('permission denied for table tasks')
  })
})

describe('users', () => {
  it('upserts the display name into profiles', async () => {
    const { store, fetchStub } = stubbedStore(() => new Response('', { status: 201 }))
    await store.users.remember(USER_ID, 'Alice')

    expect(fetchStub).toHaveBeenCalledTimes(1)
    const [input, init] = fetchStub.mock.calls[0]
    expect(new URL(String(input)).pathname).toBe('/rest/v1/profiles')
    expect(init?.method).toBe('POST')
    expect(JSON.parse(String(init?.body))).toMatchObject({ id: USER_ID, name: 'Alice' })
  })
})
