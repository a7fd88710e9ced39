import type { CalorieLookup, ReferenceEntry, ReferenceRow, ReferenceTable } from '../types'
import { normalize } from './food/normalize'
import { closeMatches } from './food/similarity'

export const FALLBACK_CALORIES_PER_100G = 200
export const FUZZY_CUTOFF = 0.6

/**
 * Normalize every row once and index it. Rows whose name normalizes to nothing
 * are dropped. For duplicate names the index keeps the first row.
 */
export function buildReferenceTable(rows: readonly ReferenceRow[]): ReferenceTable {
  const entries: ReferenceEntry[] = []
  const byName = new Map<string, ReferenceEntry>()
  rows.forEach((row, i) => {
    const normalizedName = normalize(row.name)
    if (!normalizedName) {
      console.warn('[food-db] dropping row %d: name %s normalizes to empty', i + 1, JSON.stringify(row.name))
      return
    }
    const entry: ReferenceEntry = Object.freeze({
      originalName: row.name,
      normalizedName,
      caloriesPer100g: row.caloriesPer100g,
    })
    entries.push(entry)
    if (!byName.has(normalizedName)) byName.set(normalizedName, entry)
  })
  return Object.freeze({ entries: Object.freeze(entries), byName })
}

/**
 * Resolve a label to calories per 100 g: exact, then substring, then fuzzy,
 * then the fallback value. Returns null only for an empty label. A label that
 * normalizes to nothing ("!!!") is contained in every name, so it takes the
 * first entry by substring.
 */
export function lookupCalories(label: string | null | undefined, table: ReferenceTable): CalorieLookup | null {
  if (!label) return null
  const want = normalize(label)

  const exact = table.byName.get(want)
  if (exact) return found(want, exact, 'exact', 1)

  // loose on purpose: "pie" and "apple pie" match each other
  for (const entry of table.entries) {
    const n = entry.normalizedName
    if (n.includes(want) || want.includes(n)) return found(want, entry, 'substring', null)
  }

  const names = table.entries.map((e) => e.normalizedName)
  const [best] = closeMatches(want, names, 1, FUZZY_CUTOFF)
  if (best) {
    const entry = table.byName.get(best.candidate) ?? table.entries[best.index]
    return found(want, entry, 'fuzzy', best.score)
  }

  return {
    normalized: want,
    caloriesPer100g: FALLBACK_CALORIES_PER_100G,
    matchedBy: 'default',
    entry: null,
    score: null,
  }
}

function found(
  normalized: string,
  entry: ReferenceEntry,
  matchedBy: CalorieLookup['matchedBy'],
  score: number | null
): CalorieLookup {
  return { normalized, caloriesPer100g: entry.caloriesPer100g, matchedBy, entry, score }
}
