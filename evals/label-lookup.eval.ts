/**
 * Label lookup quality eval: runs noisy labels through lookupCalories against the
 * bundled food database and scores calorie and tier agreement.
 */
import { readFileSync } from 'fs'
import { fileURLToPath } from 'url'
import { dirname, join } from 'path'
import { loadFoodDb } from '../src/lib/data/foodDb'
import { lookupCalories } from '../src/lib/match'
import type { MatchTier } from '../src/types'

const __dirname = dirname(fileURLToPath(import.meta.url))
const DATASET_PATH = join(__dirname, 'datasets', 'label-lookup.json')
const FOOD_DB_PATH = join(__dirname, '..', 'data', 'food_db.csv')

interface LabelLookupExample {
  label: string
  expectedCalories: number
  expectedTier: MatchTier
}

export interface EvalResult {
  passed: boolean
  score: number
  misses: string[]
  error?: string
}

/** Calories right: 0.7. Tier right as well: 1. */
function scoreExample(ex: LabelLookupExample, calories: number | null, tier: MatchTier | null): number {
  if (calories !== ex.expectedCalories) return 0
  return tier === ex.expectedTier ? 1 : 0.7
}

export function runLabelLookupEval(threshold: number): EvalResult {
  try {
    const dataset: LabelLookupExample[] = JSON.parse(readFileSync(DATASET_PATH, 'utf-8'))
    const table = loadFoodDb(FOOD_DB_PATH)
    let total = 0
    const misses: string[] = []
    for (const ex of dataset) {
      const r = lookupCalories(ex.label, table)
      const s = scoreExample(ex, r?.caloriesPer100g ?? null, r?.matchedBy ?? null)
      if (s < 1) {
        const got = r ? `${r.caloriesPer100g} (${r.matchedBy})` : 'no result'
        misses.push(`${ex.label}: got ${got}, want ${ex.expectedCalories} (${ex.expectedTier})`)
      }
      total += s
    }
    const score = dataset.length ? total / dataset.length : 0
    return { passed: score >= threshold, score, misses }
  } catch (e) {
    return { passed: false, score: 0, misses: [], error: String(e) }
  }
}
