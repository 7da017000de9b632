/**
 * Meal Days Views
 *
 * View models for the board pages. Pages render these as-is; all date and
 * stat logic lives here.
 */

import { addDays, dateRange, formatShortDate, formatWeekday } from './dates';
import { materializeWindow } from './mealDayMaterializer';
import type { MealBoardConfig } from './mealDays.config';
import { countRecentTakeout, nextPayday } from './mealDays.queries';
import { MEAL_TYPES } from './mealDays.types';
import type { MealDay, MealType } from './mealDays.types';
import type { MealPlanStore } from './mealPlanStore';

export type BoardPageConfig = {
  title: string;
  showDaysUntilPayday: boolean;
  showDaysEatingOut: boolean;
  /** Past days: rendered read-only */
  daysAreStale: boolean;
};

export type BoardMealView = {
  type: MealType;
  label: string;
  description: string;
  cookingUser: string;
  isTakeout: boolean;
  isFavorite: boolean;
};

export type BoardDayView = {
  /** null for a past date that has no stored day */
  id: number | null;
  date: string;
  weekday: string;
  shortDate: string;
  isToday: boolean;
  isStarred: boolean;
  isSammyWorking: boolean;
  meals: BoardMealView[];
};

export type BoardView = {
  page: BoardPageConfig;
  today: string;
  days: BoardDayView[];
  daysUntilPayday: number | null;
  nextPaydayDate: string | null;
  takeoutCount: number | null;
  error: string | null;
};

export const INDEX_PAGE: BoardPageConfig = {
  title: 'Home',
  showDaysUntilPayday: true,
  showDaysEatingOut: true,
  daysAreStale: false,
};

export const BACKWARDS_PAGE: BoardPageConfig = {
  title: 'Past Meals',
  showDaysUntilPayday: false,
  showDaysEatingOut: false,
  daysAreStale: true,
};

const MEAL_LABELS: Record<MealType, string> = {
  breakfast: 'Breakfast',
  lunch: 'Lunch',
  dinner: 'Dinner',
};

function toDayView(date: string, today: string, day: MealDay | undefined): BoardDayView {
  return {
    id: day?.id ?? null,
    date,
    weekday: formatWeekday(date),
    shortDate: formatShortDate(date),
    isToday: date === today,
    isStarred: day?.isStarred ?? false,
    isSammyWorking: day?.isSammyWorking ?? false,
    meals: MEAL_TYPES.map((type) => {
      const meal = day?.meals[type];
      return {
        type,
        label: MEAL_LABELS[type],
        description: meal?.description ?? '',
        cookingUser: meal?.cookingUser ?? '',
        isTakeout: meal?.isTakeout ?? false,
        isFavorite: meal?.isFavorite ?? false,
      };
    }),
  };
}

export type BuildViewInput = {
  config: MealBoardConfig;
  today: string;
  error?: string | null;
};

/**
 * The editable board: the next `windowDays` days starting today. Missing
 * days are created.
 */
export async function buildIndexView(
  store: MealPlanStore,
  { config, today, error = null }: BuildViewInput,
): Promise<BoardView> {
  const days = await materializeWindow(store, today, config.windowDays);
  const payday = nextPayday(today, config.paydayAnchor, config.payPeriodDays);
  const takeoutCount = await countRecentTakeout(
    store,
    today,
    config.takeoutWindowDays,
  );

  return {
    page: INDEX_PAGE,
    today,
    days: days.map((day) => toDayView(day.date, today, day)),
    daysUntilPayday: payday.daysUntilNextPayday,
    nextPaydayDate: payday.nextPaydayDate,
    takeoutCount,
    error,
  };
}

/**
 * The read-only past: the `daysBackwards` days before today, oldest first.
 * Nothing is created; missing days render empty.
 */
export async function buildBackwardsView(
  store: MealPlanStore,
  { config, today, error = null }: BuildViewInput,
): Promise<BoardView> {
  const start = addDays(today, -config.daysBackwards);
  const stored = await store.findDaysInRange(start, addDays(today, -1));
  const byDate = new Map(stored.map((day) => [day.date, day]));

  return {
    page: BACKWARDS_PAGE,
    today,
    days: dateRange(start, config.daysBackwards).map((date) =>
      toDayView(date, today, byDate.get(date)),
    ),
    daysUntilPayday: null,
    nextPaydayDate: null,
    takeoutCount: null,
    error,
  };
}
