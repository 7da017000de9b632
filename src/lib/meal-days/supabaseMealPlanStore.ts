/**
 * Supabase Meal Plan Store
 *
 * MealPlanStore backed by the meal_days / meals tables. Rows are validated
 * with zod on the way in; multi-row writes go through Postgres RPC functions
 * so each one is a single transaction.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { AppError } from '@/src/lib/errors/app-error';
import { MEAL_TYPES } from './mealDays.types';
import type {
  DayFlagChange,
  Meal,
  MealChange,
  MealDay,
  MealFilter,
  MealPlanChangeSet,
  MealsByType,
  MealType,
  MealWithDate,
} from './mealDays.types';
import { mealTypeSchema } from './mealDays.schemas';
import type { MealPlanStore } from './mealPlanStore';

/** Explicit columns for meals (no SELECT *) */
const MEAL_COLUMNS =
  'id,meal_day_id,type,description,cooking_user,is_favorite,is_takeout';

/** Day with its meals embedded */
const DAY_COLUMNS = `id,date,is_starred,is_sammy_working,meals(${MEAL_COLUMNS})`;

const UNIQUE_VIOLATION = '23505';

/** Below PostgREST's default max_rows (1000), so a short page means the end */
export const PAGE_SIZE = 500;

const mealRowSchema = z.object({
  id: z.number().int(),
  meal_day_id: z.number().int(),
  type: mealTypeSchema,
  description: z.string().nullable(),
  cooking_user: z.string().nullable(),
  is_favorite: z.boolean().nullable(),
  is_takeout: z.boolean().nullable(),
});
export type MealRow = z.infer<typeof mealRowSchema>;

const dayRowSchema = z.object({
  id: z.number().int(),
  date: z.string(),
  is_starred: z.boolean().nullable(),
  is_sammy_working: z.boolean().nullable(),
  meals: z.array(mealRowSchema).nullable(),
});
export type DayRow = z.infer<typeof dayRowSchema>;

const mealWithDayRowSchema = mealRowSchema.extend({
  meal_days: z.object({ date: z.string() }),
});

const favoriteDescriptionRowSchema = z.object({ description: z.string() });

type StorageError = { message: string; code?: string };

function storageFailure(context: string, error: StorageError): AppError {
  return new AppError(
    'DB_ERROR',
    'The meal board storage is unavailable. Try again later.',
    new Error(`${context}: ${error.message}${error.code ? ` (${error.code})` : ''}`),
  );
}

export function mapMealRow(row: MealRow): Meal {
  return {
    id: row.id,
    mealDayId: row.meal_day_id,
    type: row.type,
    description: row.description ?? '',
    cookingUser: row.cooking_user,
    isFavorite: row.is_favorite ?? false,
    isTakeout: row.is_takeout ?? false,
  };
}

export function mapDayRow(row: DayRow): MealDay {
  const meals: MealsByType = {};
  for (const mealRow of row.meals ?? []) {
    // meals_day_type_unique: at most one row per type
    meals[mealRow.type] ??= mapMealRow(mealRow);
  }
  return {
    id: row.id,
    date: row.date,
    isStarred: row.is_starred ?? false,
    isSammyWorking: row.is_sammy_working ?? false,
    meals,
  };
}

function serializeDayChange(change: DayFlagChange): Record<string, unknown> {
  return {
    id: change.id,
    ...(change.isStarred !== undefined && { is_starred: change.isStarred }),
    ...(change.isSammyWorking !== undefined && {
      is_sammy_working: change.isSammyWorking,
    }),
  };
}

function serializeMealChange(change: MealChange): Record<string, unknown> {
  return {
    meal_day_id: change.mealDayId,
    type: change.type,
    ...(change.description !== undefined && {
      description: change.description,
    }),
    ...(change.cookingUser !== undefined && {
      cooking_user: change.cookingUser,
    }),
    ...(change.isFavorite !== undefined && { is_favorite: change.isFavorite }),
    ...(change.isTakeout !== undefined && { is_takeout: change.isTakeout }),
  };
}

/** RPC arguments for save_meal_plan_changes; absent fields are left out. */
export function serializeChangeSet(changes: MealPlanChangeSet): {
  p_days: Record<string, unknown>[];
  p_meals: Record<string, unknown>[];
} {
  return {
    p_days: changes.days.map(serializeDayChange),
    p_meals: changes.meals.map(serializeMealChange),
  };
}

/**
 * Collect every row of a ranged query. `fetchPage` receives inclusive
 * `from`/`to` offsets; paging stops at the first short page.
 */
export async function fetchAllPages<T>(
  fetchPage: (from: number, to: number) => Promise<T[]>,
  pageSize = PAGE_SIZE,
): Promise<T[]> {
  const rows: T[] = [];
  for (let from = 0; ; from += pageSize) {
    const page = await fetchPage(from, from + pageSize - 1);
    rows.push(...page);
    if (page.length < pageSize) return rows;
  }
}

function compareMeals(a: MealWithDate, b: MealWithDate): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  return MEAL_TYPES.indexOf(a.type) - MEAL_TYPES.indexOf(b.type);
}

export class SupabaseMealPlanStore implements MealPlanStore {
  constructor(private readonly client: SupabaseClient) {}

  async findDayByDate(date: string): Promise<MealDay | null> {
    const { data, error } = await this.client
      .from('meal_days')
      .select(DAY_COLUMNS)
      .eq('date', date)
      .maybeSingle();

    if (error) throw storageFailure('findDayByDate', error);
    return data ? mapDayRow(dayRowSchema.parse(data)) : null;
  }

  async findDayById(id: number): Promise<MealDay | null> {
    const { data, error } = await this.client
      .from('meal_days')
      .select(DAY_COLUMNS)
      .eq('id', id)
      .maybeSingle();

    if (error) throw storageFailure('findDayById', error);
    return data ? mapDayRow(dayRowSchema.parse(data)) : null;
  }

  async findDaysInRange(from: string, to: string): Promise<MealDay[]> {
    const { data, error } = await this.client
      .from('meal_days')
      .select(DAY_COLUMNS)
      .gte('date', from)
      .lte('date', to)
      .order('date', { ascending: true });

    if (error) throw storageFailure('findDaysInRange', error);
    return z.array(dayRowSchema).parse(data ?? []).map(mapDayRow);
  }

  async insertDay(date: string): Promise<MealDay | null> {
    const { data, error } = await this.client.rpc('create_meal_day', {
      p_date: date,
    });

    if (error) {
      if (error.code === UNIQUE_VIOLATION) return null;
      throw storageFailure('insertDay', error);
    }

    const id = z.number().int().parse(data);
    const created = await this.findDayById(id);
    if (!created) {
      throw storageFailure('insertDay', {
        message: `day ${id} missing right after create_meal_day`,
      });
    }
    return created;
  }

  async commitChanges(changes: MealPlanChangeSet): Promise<void> {
    if (changes.days.length === 0 && changes.meals.length === 0) return;

    const { error } = await this.client.rpc(
      'save_meal_plan_changes',
      serializeChangeSet(changes),
    );
    if (error) throw storageFailure('commitChanges', error);
  }

  async listMeals(filter: MealFilter): Promise<MealWithDate[]> {
    const rows = await fetchAllPages(async (from, to) => {
      const { data, error } = await this.filteredMeals(filter)
        .order('id', { ascending: true })
        .range(from, to);

      if (error) throw storageFailure('listMeals', error);
      return z.array(mealWithDayRowSchema).parse(data ?? []);
    });
    return rows
      .map((row) => ({ ...mapMealRow(row), date: row.meal_days.date }))
      .sort(compareMeals);
  }

  async listFavoriteDescriptions(type?: MealType): Promise<string[]> {
    const rows = await fetchAllPages(async (from, to) => {
      const { data, error } = await this.client
        .rpc('list_favorite_descriptions', { p_type: type ?? null })
        .order('description', { ascending: true })
        .range(from, to);

      if (error) throw storageFailure('listFavoriteDescriptions', error);
      return z.array(favoriteDescriptionRowSchema).parse(data ?? []);
    });
    return rows.map((row) => row.description);
  }

  async countMeals(filter: MealFilter): Promise<number> {
    const { count, error } = await this.filteredMeals(filter, true);

    if (error) throw storageFailure('countMeals', error);
    return count ?? 0;
  }

  async close(): Promise<void> {
    await this.client.removeAllChannels();
  }

  private filteredMeals(filter: MealFilter, countOnly = false) {
    let query = this.client
      .from('meals')
      .select(
        `${MEAL_COLUMNS},meal_days!inner(date)`,
        countOnly ? { count: 'exact', head: true } : undefined,
      );

    if (filter.from) query = query.gte('meal_days.date', filter.from);
    if (filter.to) query = query.lte('meal_days.date', filter.to);
    if (filter.type) query = query.eq('type', filter.type);
    if (filter.isFavorite !== undefined) {
      query = query.eq('is_favorite', filter.isFavorite);
    }
    if (filter.isTakeout !== undefined) {
      query = query.eq('is_takeout', filter.isTakeout);
    }
    return query;
  }
}
