import { readFileSync } from 'fs'
import { z } from 'zod'
import type { ReferenceRow, ReferenceTable } from '../../types'
import { buildReferenceTable } from '../match'

const NAME_COLUMN = 'food_name'
const CALORIES_COLUMN = 'calories_per_100g'

/** Reference food file could not be read or parsed. The server must not start. */
export class FoodDbLoadError extends Error {
  constructor(
    message: string,
    readonly path: string | null = null,
    readonly line: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'FoodDbLoadError'
  }
}

const rowSchema = z.object({
  name: z.string(),
  caloriesPer100g: z
    .string()
    .trim()
    .min(1, 'calories_per_100g is empty')
    .transform(Number)
    .pipe(
      z
        .number({ invalid_type_error: 'calories_per_100g is not a number' })
        .finite('calories_per_100g is not finite')
        .nonnegative('calories_per_100g is negative')
    ),
})

/** Split one CSV line. Quoted fields may hold commas; "" inside quotes is a literal quote. */
export function parseCsvLine(line: string): string[] | null {
  const out: string[] = []
  let i = 0
  for (;;) {
    let field = ''
    if (line[i] === '"') {
      i += 1
      for (;;) {
        if (i >= line.length) return null // unterminated quote
        if (line[i] === '"') {
          if (line[i + 1] === '"') {
            field += '"'
            i += 2
            continue
          }
          i += 1
          break
        }
        field += line[i]
        i += 1
      }
      if (i < line.length && line[i] !== ',') return null
    } else {
      while (i < line.length && line[i] !== ',') {
        field += line[i]
        i += 1
      }
    }
    out.push(field)
    if (i >= line.length) return out
    i += 1 // skip ,
  }
}

/**
 * Parse the reference food CSV. Needs a header with food_name and
 * calories_per_100g (any order, any case); other columns are ignored.
 */
export function parseFoodDbCsv(content: string, path: string | null = null): ReferenceRow[] {
  const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/)
  const headerAt = lines.findIndex((l) => l.trim() !== '')
  if (headerAt === -1) throw new FoodDbLoadError('food database is empty', path)

  const header = parseCsvLine(lines[headerAt])?.map((h) => h.trim().toLowerCase())
  if (!header) throw new FoodDbLoadError('malformed header', path, headerAt + 1)
  const nameIdx = header.indexOf(NAME_COLUMN)
  const calIdx = header.indexOf(CALORIES_COLUMN)
  if (nameIdx === -1 || calIdx === -1) {
    throw new FoodDbLoadError(`header must contain ${NAME_COLUMN} and ${CALORIES_COLUMN}`, path, headerAt + 1)
  }

  const rows: ReferenceRow[] = []
  for (let i = headerAt + 1; i < lines.length; i++) {
    const line = lines[i]
    if (line.trim() === '') continue
    const fields = parseCsvLine(line)
    if (!fields) throw new FoodDbLoadError('malformed quoted field', path, i + 1)
    if (fields.length !== header.length) {
      throw new FoodDbLoadError(`expected ${header.length} fields, got ${fields.length}`, path, i + 1)
    }
    const parsed = rowSchema.safeParse({ name: fields[nameIdx].trim(), caloriesPer100g: fields[calIdx] })
    if (!parsed.success) {
      throw new FoodDbLoadError(parsed.error.issues[0]?.message ?? 'invalid row', path, i + 1)
    }
    rows.push(parsed.data)
  }
  if (rows.length === 0) throw new FoodDbLoadError('food database has no rows', path)
  return rows
}

/** Read and index the reference food file. Throws FoodDbLoadError on any problem. */
export function loadFoodDb(path: string): ReferenceTable {
  let content: string
  try {
    content = readFileSync(path, 'utf-8')
  } catch (e) {
    throw new FoodDbLoadError(`cannot read food database: ${e instanceof Error ? e.message : String(e)}`, path, null, {
      cause: e,
    })
  }
  const table = buildReferenceTable(parseFoodDbCsv(content, path))
  console.log('[food-db] loaded %d foods from %s', table.entries.length, path)
  return table
}
