/**
 * Meal Days Types
 *
 * Domain types for the household meal board: one MealDay per calendar date,
 * owning one Meal per MealType.
 */

export const MEAL_TYPES = ['breakfast', 'lunch', 'dinner'] as const;

export type MealType = (typeof MEAL_TYPES)[number];

export type Meal = {
  id: number;
  mealDayId: number;
  type: MealType;
  description: string;
  /** Household member cooking this meal; null when nobody is assigned */
  cookingUser: string | null;
  isFavorite: boolean;
  isTakeout: boolean;
};

/**
 * Meals keyed by type, built once when a day is read. A slot is only
 * missing when the row was removed outside the application.
 */
export type MealsByType = Partial<Record<MealType, Meal>>;

export type MealDay = {
  id: number;
  /** ISO date (YYYY-MM-DD), unique per day */
  date: string;
  isStarred: boolean;
  isSammyWorking: boolean;
  meals: MealsByType;
};

/** A meal together with its owning day's date (query results). */
export type MealWithDate = Meal & { date: string };

export type MealFilter = {
  /** Inclusive lower date bound */
  from?: string;
  /** Inclusive upper date bound */
  to?: string;
  type?: MealType;
  isFavorite?: boolean;
  isTakeout?: boolean;
};

/** Day flag change; absent flags stay unchanged. */
export type DayFlagChange = {
  id: number;
  isStarred?: boolean;
  isSammyWorking?: boolean;
};

/**
 * Meal change keyed by (mealDayId, type). Creates the meal when the slot is
 * missing; absent fields stay unchanged.
 */
export type MealChange = {
  mealDayId: number;
  type: MealType;
  description?: string;
  cookingUser?: string | null;
  isFavorite?: boolean;
  isTakeout?: boolean;
};

/** Staged batch committed in one transaction. */
export type MealPlanChangeSet = {
  days: DayFlagChange[];
  meals: MealChange[];
};

export function isMealType(value: string): value is MealType {
  const known: readonly string[] = MEAL_TYPES;
  return known.includes(value);
}
