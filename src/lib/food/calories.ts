import type { Profile } from '../../types'

/** Sedentary activity factor applied to BMR. */
const ACTIVITY_FACTOR = 1.2

/** Calories in `grams` of a food given its calories per 100 g. */
export function servingCalories(caloriesPer100g: number, grams: number): number {
  if (!Number.isFinite(grams) || grams <= 0) throw new RangeError(`grams must be > 0: ${grams}`)
  return caloriesPer100g * (grams / 100)
}

/** Mifflin-St Jeor BMR times a sedentary activity factor. */
export function dailyCalorieTarget(profile: Profile): number {
  const { weightKg, heightCm, age, gender } = profile
  const base = 10 * weightKg + 6.25 * heightCm - 5 * age
  const bmr = gender === 'male' ? base + 5 : base - 161
  return bmr * ACTIVITY_FACTOR
}

export function remainingCalories(target: number, consumed: number): number {
  return Math.max(target - consumed, 0)
}
