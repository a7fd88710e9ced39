/** One row of the reference food file, before normalization. */
export interface ReferenceRow {
  name: string
  caloriesPer100g: number
}

/** Reference food with its comparison key. Built once at load, never mutated. */
export interface ReferenceEntry {
  readonly originalName: string
  readonly normalizedName: string
  readonly caloriesPer100g: number
}

/**
 * Reference foods in source order, plus a first-wins index by normalized name.
 * Read-only after build, so one table is shared by every request.
 */
export interface ReferenceTable {
  readonly entries: readonly ReferenceEntry[]
  readonly byName: ReadonlyMap<string, ReferenceEntry>
}

export type MatchTier = 'exact' | 'substring' | 'fuzzy' | 'default'

/** Result of resolving a label. `entry` is null only for the default fallback. */
export interface CalorieLookup {
  normalized: string
  caloriesPer100g: number
  matchedBy: MatchTier
  entry: ReferenceEntry | null
  /** 1 for exact, similarity ratio for fuzzy, null otherwise. */
  score: number | null
}

/** One label from the external image classifier. */
export interface Prediction {
  label: string
  score: number
}

export interface RankedPrediction extends Prediction {
  lookup: CalorieLookup
}

export type Gender = 'male' | 'female'

export interface Profile {
  weightKg: number
  heightCm: number
  age: number
  gender: Gender
}
