/**
 * Meal Plan Store
 *
 * Storage handle for meal days and meals. Constructed explicitly, passed
 * into every operation and closed when the request is done.
 */

import type {
  MealDay,
  MealFilter,
  MealPlanChangeSet,
  MealType,
  MealWithDate,
} from './mealDays.types';

export interface MealPlanStore {
  findDayByDate(date: string): Promise<MealDay | null>;
  findDayById(id: number): Promise<MealDay | null>;
  /** Days with `from <= date <= to`, ordered by date */
  findDaysInRange(from: string, to: string): Promise<MealDay[]>;
  /**
   * Insert a day with its three empty meals in one transaction.
   * Resolves null when a day for `date` already exists (unique violation).
   */
  insertDay(date: string): Promise<MealDay | null>;
  /** Apply day flag and meal changes atomically */
  commitChanges(changes: MealPlanChangeSet): Promise<void>;
  /** Meals with their day's date, ordered by date then meal type */
  listMeals(filter: MealFilter): Promise<MealWithDate[]>;
  countMeals(filter: MealFilter): Promise<number>;
  /** Distinct trimmed, non-blank descriptions of favorite meals, in no particular order */
  listFavoriteDescriptions(type?: MealType): Promise<string[]>;
  close(): Promise<void>;
}

/**
 * Run `fn` with a freshly opened store and always close it afterwards.
 */
export async function withMealPlanStore<T>(
  openStore: () => MealPlanStore,
  fn: (store: MealPlanStore) => Promise<T>,
): Promise<T> {
  const store = openStore();
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}
