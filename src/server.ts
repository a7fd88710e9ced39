import 'dotenv/config'
import { serve } from '@hono/node-server'
import { loadEnv } from './config'
import { createApp } from './index'
import { FoodDbLoadError, loadFoodDb } from './lib/data/foodDb'
import type { ReferenceTable } from './types'

function loadTable(path: string): ReferenceTable {
  try {
    return loadFoodDb(path)
  } catch (e) {
    if (e instanceof FoodDbLoadError) {
      const where = e.line != null ? `${e.path}:${e.line}` : e.path ?? path
      console.error('[server] cannot load food database (%s): %s', where, e.message)
      process.exit(1)
    }
    throw e
  }
}

const config = loadEnv(process.env)
const app = createApp(loadTable(config.foodDbPath))

serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
  console.log('[server] listening on http://%s:%d', info.address, info.port)
})
