import type { CalorieLookup, RankedPrediction } from '../../types'

/** JSON fields describing a lookup. `match` is the reference name as written in the food database. */
export function describeLookup(lookup: CalorieLookup) {
  return {
    normalized: lookup.normalized,
    caloriesPer100g: lookup.caloriesPer100g,
    matchedBy: lookup.matchedBy,
    match: lookup.entry?.originalName ?? null,
    score: lookup.score,
  }
}

export function formatLookupReply(label: string, lookup: CalorieLookup) {
  return { ok: true as const, label, ...describeLookup(lookup) }
}

export function formatServingReply(label: string, lookup: CalorieLookup, grams: number, calories: number) {
  return { ...formatLookupReply(label, lookup), grams, calories: Math.round(calories * 10) / 10 }
}

export function formatPredictionsReply(ranked: RankedPrediction[]) {
  return {
    ok: true as const,
    results: ranked.map((r) => ({ label: r.label, score: r.score, lookup: describeLookup(r.lookup) })),
  }
}
