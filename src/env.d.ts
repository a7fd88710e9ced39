import type { ReferenceTable } from './types'

/** Environment for the calorie-lens server. Read once at startup by loadEnv. */
export interface Env {
  /** HTTP port. Defaults to 8787. */
  PORT?: string
  /** Interface to bind. Defaults to 0.0.0.0. */
  HOST?: string
  /** Reference foods CSV (food_name, calories_per_100g). Defaults to data/food_db.csv in the repo. */
  FOOD_DB_PATH?: string
}

export interface Config {
  port: number
  host: string
  foodDbPath: string
}

/** Hono context: the reference table is injected once and shared read-only by every request. */
export interface AppEnv {
  Variables: {
    table: ReferenceTable
  }
}
