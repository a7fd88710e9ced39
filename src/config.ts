import { fileURLToPath } from 'url'
import { dirname, join, resolve } from 'path'
import type { Config, Env } from './env.d'

const __dirname = dirname(fileURLToPath(import.meta.url))

const DEFAULT_PORT = 8787
const DEFAULT_HOST = '0.0.0.0'
export const DEFAULT_FOOD_DB_PATH = join(__dirname, '..', 'data', 'food_db.csv')

export function loadEnv(env: Env): Config {
  const rawPort = env.PORT?.trim()
  const port = rawPort ? Number(rawPort) : DEFAULT_PORT
  if (!Number.isInteger(port) || port < 0 || port > 65535) throw new Error(`Invalid PORT: ${env.PORT}`)
  return {
    port,
    host: env.HOST?.trim() || DEFAULT_HOST,
    foodDbPath: env.FOOD_DB_PATH?.trim() ? resolve(env.FOOD_DB_PATH.trim()) : DEFAULT_FOOD_DB_PATH,
  }
}
