import { z } from 'zod'

export const targetBodySchema = z.object({
  weightKg: z.number().min(20).max(200),
  heightCm: z.number().min(50).max(250),
  age: z.number().int().min(10).max(100),
  gender: z.enum(['male', 'female']),
  /** Calories already eaten today. */
  consumed: z.number().finite().nonnegative().optional(),
})
