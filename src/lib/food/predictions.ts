import type { Prediction, RankedPrediction, ReferenceTable } from '../../types'
import { lookupCalories } from '../match'

export const DEFAULT_TOP_K = 3

/**
 * Top `k` classifier predictions by score, each with its calorie lookup.
 * Predictions with an empty label are skipped; equal scores keep input order.
 */
export function rankPredictions(
  predictions: readonly Prediction[],
  table: ReferenceTable,
  k = DEFAULT_TOP_K
): RankedPrediction[] {
  const ranked: RankedPrediction[] = []
  const sorted = predictions
    .map((p, i) => ({ p, i }))
    .sort((x, y) => y.p.score - x.p.score || x.i - y.i)
  for (const { p } of sorted) {
    if (ranked.length >= k) break
    const lookup = lookupCalories(p.label, table)
    if (lookup) ranked.push({ label: p.label, score: p.score, lookup })
  }
  return ranked
}
