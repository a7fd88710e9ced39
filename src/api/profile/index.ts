import { Hono } from 'hono'
import type { AppEnv } from '../../env.d'
import { targetHandler } from './routes'

export const profileRouter = new Hono<AppEnv>().post('/target', targetHandler)
