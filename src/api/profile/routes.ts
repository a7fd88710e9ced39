import type { Context } from 'hono'
import type { AppEnv } from '../../env.d'
import { dailyCalorieTarget, remainingCalories } from '../../lib/food/calories'
import { errorBody, parseBody } from '../http'
import { targetBodySchema } from './schema'

/** POST /api/profile/target — daily calorie target and what is left of it. */
export async function targetHandler(c: Context<AppEnv>): Promise<Response> {
  const body = await parseBody(c, targetBodySchema)
  if ('error' in body) return c.json(errorBody(body.error), 400)
  const { consumed = 0, ...profile } = body.data
  const target = dailyCalorieTarget(profile)
  return c.json({
    ok: true,
    dailyCalories: Math.round(target),
    consumed,
    remaining: Math.round(remainingCalories(target, consumed)),
  })
}
