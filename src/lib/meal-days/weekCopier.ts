/**
 * Week Copier
 *
 * Copies meal descriptions from `windowDays` consecutive source days onto
 * the same number of target days. Two phases: a read-only conflict scan over
 * the whole target range, then a single commit of every copied description.
 * Flags (takeout, favorite, cook) are never copied.
 */

import { AppError } from '@/src/lib/errors/app-error';
import { createMealBoardLogger } from '@/src/lib/logging/mealBoardLogger';
import type { MealBoardLogger } from '@/src/lib/logging/mealBoardLogger';
import { addDays } from './dates';
import { MEAL_TYPES } from './mealDays.types';
import type { MealChange, MealDay } from './mealDays.types';
import type { MealPlanStore } from './mealPlanStore';

const defaultLogger = createMealBoardLogger('weekCopier');

export type CopyWeekInput = {
  fromDate: string;
  toDate: string;
  overwrite: boolean;
};

export type CopyWeekResult = {
  copiedDays: number;
  copiedMeals: number;
};

function hasPlannedMeal(day: MealDay): boolean {
  return MEAL_TYPES.some((type) => (day.meals[type]?.description.trim() ?? '') !== '');
}

function conflictingDatesIn(targets: Map<string, MealDay>): string[] {
  return [...targets.values()]
    .filter(hasPlannedMeal)
    .map((day) => day.date)
    .sort();
}

async function loadRange(
  store: MealPlanStore,
  start: string,
  windowDays: number,
): Promise<Map<string, MealDay>> {
  const days = await store.findDaysInRange(start, addDays(start, windowDays - 1));
  return new Map(days.map((day) => [day.date, day]));
}

/**
 * Target dates, in order, whose day already has a non-blank description.
 */
export async function findCopyConflicts(
  store: MealPlanStore,
  toDate: string,
  windowDays: number,
): Promise<string[]> {
  return conflictingDatesIn(await loadRange(store, toDate, windowDays));
}

export async function copyWeek(
  store: MealPlanStore,
  input: CopyWeekInput,
  windowDays: number,
  logger: MealBoardLogger = defaultLogger,
): Promise<CopyWeekResult> {
  const { fromDate, toDate, overwrite } = input;

  const targets = await loadRange(store, toDate, windowDays);
  if (!overwrite) {
    const conflictingDates = conflictingDatesIn(targets);
    if (conflictingDates.length > 0) {
      logger.debug('copy_conflict', { fromDate, toDate, conflictingDates });
      throw new AppError(
        'CONFLICT',
        'The target week already has meals planned. Copy again with overwrite to replace them.',
        { conflictingDates },
      );
    }
  }

  const sources = await loadRange(store, fromDate, windowDays);
  const meals: MealChange[] = [];
  let copiedDays = 0;

  for (let offset = 0; offset < windowDays; offset++) {
    const source = sources.get(addDays(fromDate, offset));
    const target = targets.get(addDays(toDate, offset));
    if (!source || !target) continue;

    let copiedHere = 0;
    for (const type of MEAL_TYPES) {
      const meal = source.meals[type];
      if (!meal) continue;
      meals.push({ mealDayId: target.id, type, description: meal.description });
      copiedHere++;
    }
    if (copiedHere > 0) copiedDays++;
  }

  await store.commitChanges({ days: [], meals });
  logger.debug('copy_done', { fromDate, toDate, overwrite, copiedDays, copiedMeals: meals.length });

  return { copiedDays, copiedMeals: meals.length };
}
