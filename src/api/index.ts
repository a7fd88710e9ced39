import { Hono } from 'hono'
import type { AppEnv } from '../env.d'
import { lookupRouter } from './lookup'
import { profileRouter } from './profile'

export const api = new Hono<AppEnv>().basePath('/api').route('/lookup', lookupRouter).route('/profile', profileRouter)
