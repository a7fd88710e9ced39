import { Hono } from 'hono'
import type { AppEnv } from './env.d'
import type { ReferenceTable } from './types'
import { api } from './api'
import { errorBody } from './api/http'

/** Build the HTTP app around an already loaded reference table. */
export function createApp(table: ReferenceTable): Hono<AppEnv> {
  const app = new Hono<AppEnv>()

  app.use('*', async (c, next) => {
    c.set('table', table)
    await next()
  })

  app.get('/', (c) => c.text('calorie-lens'))
  app.route('/', api)

  app.notFound((c) => c.json(errorBody('not found'), 404))
  app.onError((err, c) => {
    console.error('[server] %s %s failed', c.req.method, c.req.path, err)
    return c.json(errorBody('internal error'), 500)
  })

  return app
}
