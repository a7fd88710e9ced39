import { z } from 'zod'

export const lookupBodySchema = z.object({
  label: z.string({ required_error: 'label is required', invalid_type_error: 'label must be a string' }),
})

export const servingBodySchema = lookupBodySchema.extend({
  grams: z.number({ required_error: 'grams is required' }).finite().min(10).max(2000),
})

export const predictionSchema = z.object({
  label: z.string(),
  score: z.number().finite(),
})

/** Classifier output as posted by the client, e.g. the top predictions of an image model. */
export const predictionsBodySchema = z.object({
  predictions: z.array(predictionSchema).max(100),
  top: z.number().int().min(1).max(10).optional(),
})
