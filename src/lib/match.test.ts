import { describe, it, expect, vi, afterEach } from 'vitest'
import { buildReferenceTable, lookupCalories, FALLBACK_CALORIES_PER_100G } from './match'

const table = buildReferenceTable([
  { name: 'Pizza', caloriesPer100g: 266 },
  { name: 'Apple Pie', caloriesPer100g: 237 },
])

afterEach(() => {
  vi.restoreAllMocks()
})

describe('buildReferenceTable', () => {
  it('normalizes names and keeps source order', () => {
    const t = buildReferenceTable([
      { name: 'Spaghetti_Bolognese', caloriesPer100g: 150 },
      { name: 'Apple Pie!', caloriesPer100g: 237 },
    ])
    expect(t.entries.map((e) => e.normalizedName)).toEqual(['spaghetti bolognese', 'apple pie'])
    expect(t.entries[0].originalName).toBe('Spaghetti_Bolognese')
    expect(t.byName.get('apple pie')?.caloriesPer100g).toBe(237)
  })

  it('drops rows whose name normalizes to empty', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const t = buildReferenceTable([
      { name: '---', caloriesPer100g: 10 },
      { name: 'Rice', caloriesPer100g: 130 },
    ])
    expect(t.entries).toHaveLength(1)
    expect(t.entries[0].originalName).toBe('Rice')
    expect(warn).toHaveBeenCalledWith('[food-db] dropping row %d: name %s normalizes to empty', 1, '"---"')
  })

  it('indexes the first of duplicate names', () => {
    const t = buildReferenceTable([
      { name: 'Pizza', caloriesPer100g: 266 },
      { name: 'pizza!', caloriesPer100g: 300 },
    ])
    expect(t.entries).toHaveLength(2)
    expect(t.byName.get('pizza')?.caloriesPer100g).toBe(266)
  })

  it('freezes the table', () => {
    expect(Object.isFrozen(table)).toBe(true)
    expect(Object.isFrozen(table.entries)).toBe(true)
    expect(Object.isFrozen(table.entries[0])).toBe(true)
  })
})

describe('lookupCalories', () => {
  it('returns null for empty or missing label', () => {
    expect(lookupCalories('', table)).toBeNull()
    expect(lookupCalories(null, table)).toBeNull()
    expect(lookupCalories(undefined, table)).toBeNull()
  })

  it('matches the first entry by substring when the label normalizes to nothing', () => {
    const t = buildReferenceTable([
      { name: 'apple pie', caloriesPer100g: 237 },
      { name: 'pizza', caloriesPer100g: 266 },
    ])
    for (const label of ['!!!', '   ', '_']) {
      const r = lookupCalories(label, t)
      expect(r).not.toBeNull()
      expect(r!.normalized).toBe('')
      expect(r!.caloriesPer100g).toBe(237)
      expect(r!.matchedBy).toBe('substring')
      expect(r!.entry?.originalName).toBe('apple pie')
    }
  })

  it('matches exact normalized name ignoring case and punctuation', () => {
    const r = lookupCalories('Pizza!', table)
    expect(r).not.toBeNull()
    expect(r!.caloriesPer100g).toBe(266)
    expect(r!.matchedBy).toBe('exact')
    expect(r!.score).toBe(1)
    expect(r!.entry?.originalName).toBe('Pizza')
    expect(r!.normalized).toBe('pizza')
  })

  it('matches exact through underscores', () => {
    const r = lookupCalories('apple_pie', table)
    expect(r!.caloriesPer100g).toBe(237)
    expect(r!.matchedBy).toBe('exact')
  })

  it('matches when a reference name is inside the label', () => {
    const r = lookupCalories('pepperoni pizza', table)
    expect(r!.caloriesPer100g).toBe(266)
    expect(r!.matchedBy).toBe('substring')
    expect(r!.score).toBeNull()
  })

  it('matches when the label is inside a reference name', () => {
    const r = lookupCalories('pie', table)
    expect(r!.caloriesPer100g).toBe(237)
    expect(r!.matchedBy).toBe('substring')
    expect(r!.entry?.originalName).toBe('Apple Pie')
  })

  it('matches a misspelled label by similarity', () => {
    const t = buildReferenceTable([{ name: 'spaghetti bolognese', caloriesPer100g: 150 }])
    const r = lookupCalories('spagetti bolonese', t)
    expect(r!.caloriesPer100g).toBe(150)
    expect(r!.matchedBy).toBe('fuzzy')
    expect(r!.score).toBeCloseTo(34 / 36, 10)
  })

  it('picks the most similar name, not the first qualifying one', () => {
    const t = buildReferenceTable([
      { name: 'chocolate cake', caloriesPer100g: 371 },
      { name: 'carrot cake', caloriesPer100g: 415 },
    ])
    const r = lookupCalories('carot cake', t)
    expect(r!.caloriesPer100g).toBe(415)
    expect(r!.matchedBy).toBe('fuzzy')
    expect(r!.score).toBeCloseTo(20 / 21, 10)
  })

  it('breaks fuzzy ties by table order', () => {
    const t = buildReferenceTable([
      { name: 'bake', caloriesPer100g: 310 },
      { name: 'cake', caloriesPer100g: 350 },
    ])
    const r = lookupCalories('lake', t)
    expect(r!.caloriesPer100g).toBe(310)
    expect(r!.score).toBe(0.75)
  })

  it('falls back to the default when nothing is similar', () => {
    const r = lookupCalories('unobtainium stew', table)
    expect(r).toEqual({
      normalized: 'unobtainium stew',
      caloriesPer100g: FALLBACK_CALORIES_PER_100G,
      matchedBy: 'default',
      entry: null,
      score: null,
    })
    expect(r!.caloriesPer100g).toBe(200)
  })

  it('returns the first duplicate for exact and substring, every time', () => {
    const t = buildReferenceTable([
      { name: 'Pizza', caloriesPer100g: 266 },
      { name: 'pizza!', caloriesPer100g: 300 },
    ])
    for (let i = 0; i < 3; i++) {
      expect(lookupCalories('PIZZA', t)!.caloriesPer100g).toBe(266)
      expect(lookupCalories('cheese pizza', t)!.caloriesPer100g).toBe(266)
    }
  })

  it('returns the first duplicate for fuzzy matches', () => {
    const t = buildReferenceTable([
      { name: 'cake', caloriesPer100g: 350 },
      { name: 'Cake.', caloriesPer100g: 390 },
    ])
    const r = lookupCalories('lake', t)
    expect(r!.matchedBy).toBe('fuzzy')
    expect(r!.caloriesPer100g).toBe(350)
  })
})
