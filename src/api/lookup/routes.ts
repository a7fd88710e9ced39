import type { Context } from 'hono'
import type { AppEnv } from '../../env.d'
import type { CalorieLookup } from '../../types'
import { lookupCalories } from '../../lib/match'
import { servingCalories } from '../../lib/food/calories'
import { DEFAULT_TOP_K, rankPredictions } from '../../lib/food/predictions'
import { errorBody, parseBody } from '../http'
import { formatLookupReply, formatPredictionsReply, formatServingReply } from './replies'
import { lookupBodySchema, predictionsBodySchema, servingBodySchema } from './schema'

const EMPTY_LABEL = 'label is empty'

function resolve(c: Context<AppEnv>, label: string): CalorieLookup | null {
  const lookup = lookupCalories(label, c.get('table'))
  if (lookup) {
    console.log('[lookup] %s -> %d kcal/100g (%s)', JSON.stringify(label), lookup.caloriesPer100g, lookup.matchedBy)
  }
  return lookup
}

/** GET /api/lookup?label= */
export async function getLookupHandler(c: Context<AppEnv>): Promise<Response> {
  const label = c.req.query('label') ?? ''
  const lookup = resolve(c, label)
  if (!lookup) return c.json(errorBody(EMPTY_LABEL), 400)
  return c.json(formatLookupReply(label, lookup))
}

/** POST /api/lookup — { label } */
export async function postLookupHandler(c: Context<AppEnv>): Promise<Response> {
  const body = await parseBody(c, lookupBodySchema)
  if ('error' in body) return c.json(errorBody(body.error), 400)
  const lookup = resolve(c, body.data.label)
  if (!lookup) return c.json(errorBody(EMPTY_LABEL), 400)
  return c.json(formatLookupReply(body.data.label, lookup))
}

/** POST /api/lookup/serving — { label, grams }; calories of one serving. */
export async function servingHandler(c: Context<AppEnv>): Promise<Response> {
  const body = await parseBody(c, servingBodySchema)
  if ('error' in body) return c.json(errorBody(body.error), 400)
  const { label, grams } = body.data
  const lookup = resolve(c, label)
  if (!lookup) return c.json(errorBody(EMPTY_LABEL), 400)
  return c.json(formatServingReply(label, lookup, grams, servingCalories(lookup.caloriesPer100g, grams)))
}

/** POST /api/lookup/predictions — { predictions: [{ label, score }], top? } */
export async function predictionsHandler(c: Context<AppEnv>): Promise<Response> {
  const body = await parseBody(c, predictionsBodySchema)
  if ('error' in body) return c.json(errorBody(body.error), 400)
  const ranked = rankPredictions(body.data.predictions, c.get('table'), body.data.top ?? DEFAULT_TOP_K)
  console.log('[lookup] ranked %d of %d predictions', ranked.length, body.data.predictions.length)
  return c.json(formatPredictionsReply(ranked))
}
