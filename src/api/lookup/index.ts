import { Hono } from 'hono'
import type { AppEnv } from '../../env.d'
import { getLookupHandler, postLookupHandler, predictionsHandler, servingHandler } from './routes'

export const lookupRouter = new Hono<AppEnv>()
  .get('/', getLookupHandler)
  .post('/', postLookupHandler)
  .post('/serving', servingHandler)
  .post('/predictions', predictionsHandler)
