import { describe, it, expect, vi, afterEach } from 'vitest'
import { createApp } from './index'
import { buildReferenceTable } from './lib/match'

const table = buildReferenceTable([{ name: 'pizza', caloriesPer100g: 266 }])

afterEach(() => {
  vi.restoreAllMocks()
})

describe('createApp', () => {
  it('answers on /', async () => {
    const res = await createApp(table).request('/')
    expect(res.status).toBe(200)
    expect(await res.text()).toBe('calorie-lens')
  })

  it('returns JSON 404 for unknown routes', async () => {
    const res = await createApp(table).request('/api/unknown')
    expect(res.status).toBe(404)
    expect(await res.json()).toEqual({ ok: false, error: 'not found' })
  })

  it('returns JSON 500 and logs unexpected errors', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const app = createApp(table)
    const boom = new Error('boom')
    app.get('/boom', () => {
      throw boom
    })
    const res = await app.request('/boom')
    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({ ok: false, error: 'internal error' })
    expect(error).toHaveBeenCalledWith('[server] %s %s failed', 'GET', '/boom', boom)
  })

  it('shares the injected table with every request', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    const app = createApp(table)
    const first = await (await app.request('/api/lookup?label=pizza')).json()
    const second = await (await app.request('/api/lookup?label=PIZZA')).json()
    expect(first).toMatchObject({ caloriesPer100g: 266 })
    expect(second).toMatchObject({ caloriesPer100g: 266 })
  })
})
