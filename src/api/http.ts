import type { Context } from 'hono'
import type { z } from 'zod'
import type { AppEnv } from '../env.d'

export interface ErrorBody {
  ok: false
  error: string
}

export function errorBody(error: string): ErrorBody {
  return { ok: false, error }
}

/** Read a JSON body and validate it. On failure returns the message for a 400 reply. */
export async function parseBody<S extends z.ZodTypeAny>(
  c: Context<AppEnv>,
  schema: S
): Promise<{ data: z.output<S> } | { error: string }> {
  let raw: unknown
  try {
    raw = await c.req.json<unknown>()
  } catch {
    return { error: 'invalid JSON body' }
  }
  const parsed = schema.safeParse(raw)
  if (parsed.success) return { data: parsed.data }
  const issue = parsed.error.issues[0]
  if (!issue) return { error: 'invalid body' }
  return { error: issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message }
}
