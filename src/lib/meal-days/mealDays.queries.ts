/**
 * Meal Days Queries
 *
 * Read-only derived values: payday countdown, recent takeout count,
 * rotation suggestion and the favorites list.
 */

import { addDays, daysBetween } from './dates';
import type { MealType } from './mealDays.types';
import type { MealPlanStore } from './mealPlanStore';

export type NextPayday = {
  nextPaydayDate: string;
  daysUntilNextPayday: number;
};

/**
 * First payday strictly after `today` on the grid `anchor + k * periodDays`
 * (k may be negative when today is before the anchor).
 */
export function nextPayday(
  today: string,
  anchor: string,
  periodDays = 14,
): NextPayday {
  const elapsed = daysBetween(anchor, today);
  const periods = Math.floor(elapsed / periodDays);
  const nextPaydayDate = addDays(anchor, (periods + 1) * periodDays);
  return {
    nextPaydayDate,
    daysUntilNextPayday: daysBetween(today, nextPaydayDate),
  };
}

/** Takeout meals over the last `windowDays` days, today included. */
export async function countRecentTakeout(
  store: MealPlanStore,
  today: string,
  windowDays = 7,
): Promise<number> {
  return store.countMeals({
    from: addDays(today, -(windowDays - 1)),
    to: today,
    isTakeout: true,
  });
}

/** Distinct trimmed favorite descriptions, sorted case-insensitively. */
export async function listFavorites(
  store: MealPlanStore,
  mealType?: MealType,
): Promise<string[]> {
  const descriptions = await store.listFavoriteDescriptions(mealType);
  return [...descriptions].sort(
    (a, b) => a.toLowerCase().localeCompare(b.toLowerCase()) || a.localeCompare(b),
  );
}

export type SuggestRotationOptions = {
  mealType?: MealType;
  recentDays?: number;
  /** Uniform value in [0, 1); defaults to Math.random */
  random?: () => number;
};

/**
 * A random favorite whose description (case-insensitive) was not served in
 * the last `recentDays` days, today included; null when every favorite was.
 */
export async function suggestRotation(
  store: MealPlanStore,
  today: string,
  options: SuggestRotationOptions = {},
): Promise<string | null> {
  const { mealType, recentDays = 3, random = Math.random } = options;

  const recentMeals = await store.listMeals({
    from: addDays(today, -(recentDays - 1)),
    to: today,
    type: mealType,
  });
  const recent = new Set(
    recentMeals
      .map((meal) => meal.description.trim().toLowerCase())
      .filter((d) => d !== ''),
  );

  const candidates = (await listFavorites(store, mealType)).filter(
    (description) => !recent.has(description.toLowerCase()),
  );
  if (candidates.length === 0) return null;

  const index = Math.min(
    candidates.length - 1,
    Math.floor(random() * candidates.length),
  );
  return candidates[index] ?? null;
}
