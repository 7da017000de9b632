/**
 * Meal Day Materializer
 *
 * Fetch-or-create for days keyed by date. Reading a date that has no row
 * yet creates it (with three empty meals) as a side effect.
 */

import { AppError } from '@/src/lib/errors/app-error';
import { createMealBoardLogger } from '@/src/lib/logging/mealBoardLogger';
import type { MealBoardLogger } from '@/src/lib/logging/mealBoardLogger';
import { addDays, dateRange } from './dates';
import type { MealDay } from './mealDays.types';
import type { MealPlanStore } from './mealPlanStore';

const defaultLogger = createMealBoardLogger('mealDayMaterializer');

/**
 * Return the day for `date`, creating it when missing.
 *
 * Two requests may race to create the same date; the loser's insert is
 * rejected by the unique date constraint and it returns the winner's row.
 */
export async function getOrCreateDay(
  store: MealPlanStore,
  date: string,
  logger: MealBoardLogger = defaultLogger,
): Promise<MealDay> {
  const existing = await store.findDayByDate(date);
  if (existing) return existing;

  const created = await store.insertDay(date);
  if (created) {
    logger.debug('day_created', { date, dayId: created.id });
    return created;
  }

  const winner = await store.findDayByDate(date);
  if (winner) {
    logger.debug('day_create_race_lost', { date, dayId: winner.id });
    return winner;
  }

  throw new AppError(
    'DB_ERROR',
    `Could not create the meal day for ${date}.`,
    { date },
  );
}

/**
 * Materialize `count` consecutive days starting at `start`, in date order.
 */
export async function materializeWindow(
  store: MealPlanStore,
  start: string,
  count: number,
  logger: MealBoardLogger = defaultLogger,
): Promise<MealDay[]> {
  if (count <= 0) return [];

  const existing = await store.findDaysInRange(start, addDays(start, count - 1));
  const byDate = new Map(existing.map((day) => [day.date, day]));

  const days: MealDay[] = [];
  for (const date of dateRange(start, count)) {
    days.push(byDate.get(date) ?? (await getOrCreateDay(store, date, logger)));
  }
  return days;
}
