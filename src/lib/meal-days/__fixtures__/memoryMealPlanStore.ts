/**
 * In-process MealPlanStore for tests. Mirrors the storage constraints:
 * unique day dates, unique (day, type) meals, and all-or-nothing commits.
 */

import { MEAL_TYPES } from '../mealDays.types';
import type {
  Meal,
  MealDay,
  MealFilter,
  MealPlanChangeSet,
  MealsByType,
  MealType,
  MealWithDate,
} from '../mealDays.types';
import type { MealPlanStore } from '../mealPlanStore';

type StoredDay = Omit<MealDay, 'meals'>;

export type SeedMeal = Partial<
  Pick<Meal, 'description' | 'cookingUser' | 'isFavorite' | 'isTakeout'>
>;

export type SeedDayInput = {
  isStarred?: boolean;
  isSammyWorking?: boolean;
  meals?: Partial<Record<MealType, SeedMeal>>;
  /** Meal slots to leave out, simulating rows removed outside the app */
  omitMeals?: MealType[];
};

export class MemoryMealPlanStore implements MealPlanStore {
  private days: StoredDay[] = [];
  private meals: Meal[] = [];
  private nextDayId = 1;
  private nextMealId = 1;

  /** Number of commitChanges calls that wrote something */
  commitCount = 0;
  insertCount = 0;
  closed = false;

  seedDay(date: string, input: SeedDayInput = {}): MealDay {
    const day: StoredDay = {
      id: this.nextDayId++,
      date,
      isStarred: input.isStarred ?? false,
      isSammyWorking: input.isSammyWorking ?? false,
    };
    this.days.push(day);
    for (const type of MEAL_TYPES) {
      if (input.omitMeals?.includes(type)) continue;
      const seed = input.meals?.[type] ?? {};
      this.meals.push({
        id: this.nextMealId++,
        mealDayId: day.id,
        type,
        description: seed.description ?? '',
        cookingUser: seed.cookingUser ?? null,
        isFavorite: seed.isFavorite ?? false,
        isTakeout: seed.isTakeout ?? false,
      });
    }
    return this.hydrate(day);
  }

  dayCount(): number {
    return this.days.length;
  }

  mealsOf(dayId: number): Meal[] {
    return this.meals.filter((m) => m.mealDayId === dayId).map((m) => ({ ...m }));
  }

  async findDayByDate(date: string): Promise<MealDay | null> {
    const day = this.days.find((d) => d.date === date);
    return day ? this.hydrate(day) : null;
  }

  async findDayById(id: number): Promise<MealDay | null> {
    const day = this.days.find((d) => d.id === id);
    return day ? this.hydrate(day) : null;
  }

  async findDaysInRange(from: string, to: string): Promise<MealDay[]> {
    return this.days
      .filter((d) => d.date >= from && d.date <= to)
      .sort((a, b) => (a.date < b.date ? -1 : 1))
      .map((d) => this.hydrate(d));
  }

  async insertDay(date: string): Promise<MealDay | null> {
    if (this.days.some((d) => d.date === date)) return null;
    this.insertCount++;
    return this.seedDay(date);
  }

  async commitChanges(changes: MealPlanChangeSet): Promise<void> {
    if (changes.days.length === 0 && changes.meals.length === 0) return;

    // Foreign keys are checked before anything is written.
    for (const ref of [
      ...changes.days.map((d) => d.id),
      ...changes.meals.map((m) => m.mealDayId),
    ]) {
      if (!this.days.some((d) => d.id === ref)) {
        throw new Error(`meal_days ${ref} does not exist`);
      }
    }

    for (const change of changes.days) {
      const day = this.days.find((d) => d.id === change.id);
      if (!day) continue;
      if (change.isStarred !== undefined) day.isStarred = change.isStarred;
      if (change.isSammyWorking !== undefined) {
        day.isSammyWorking = change.isSammyWorking;
      }
    }

    for (const change of changes.meals) {
      let meal = this.meals.find(
        (m) => m.mealDayId === change.mealDayId && m.type === change.type,
      );
      if (!meal) {
        meal = {
          id: this.nextMealId++,
          mealDayId: change.mealDayId,
          type: change.type,
          description: '',
          cookingUser: null,
          isFavorite: false,
          isTakeout: false,
        };
        this.meals.push(meal);
      }
      if (change.description !== undefined) meal.description = change.description;
      if (change.cookingUser !== undefined) meal.cookingUser = change.cookingUser;
      if (change.isFavorite !== undefined) meal.isFavorite = change.isFavorite;
      if (change.isTakeout !== undefined) meal.isTakeout = change.isTakeout;
    }

    this.commitCount++;
  }

  async listMeals(filter: MealFilter): Promise<MealWithDate[]> {
    const results: MealWithDate[] = [];
    for (const meal of this.meals) {
      const day = this.days.find((d) => d.id === meal.mealDayId);
      if (!day) continue;
      if (filter.from && day.date < filter.from) continue;
      if (filter.to && day.date > filter.to) continue;
      if (filter.type && meal.type !== filter.type) continue;
      if (filter.isFavorite !== undefined && meal.isFavorite !== filter.isFavorite) {
        continue;
      }
      if (filter.isTakeout !== undefined && meal.isTakeout !== filter.isTakeout) {
        continue;
      }
      results.push({ ...meal, date: day.date });
    }
    return results.sort((a, b) =>
      a.date !== b.date
        ? a.date < b.date
          ? -1
          : 1
        : MEAL_TYPES.indexOf(a.type) - MEAL_TYPES.indexOf(b.type),
    );
  }

  async countMeals(filter: MealFilter): Promise<number> {
    return (await this.listMeals(filter)).length;
  }

  async listFavoriteDescriptions(type?: MealType): Promise<string[]> {
    const favorites = await this.listMeals({ isFavorite: true, type });
    const distinct = new Set(
      favorites.map((meal) => meal.description.trim()).filter((d) => d !== ''),
    );
    return [...distinct];
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private hydrate(day: StoredDay): MealDay {
    const meals: MealsByType = {};
    for (const meal of this.meals) {
      if (meal.mealDayId === day.id) meals[meal.type] = { ...meal };
    }
    return { ...day, meals };
  }
}
