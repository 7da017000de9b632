import { describe, it } from 'node:test';
import assert from 'node:assert';
import { AppError } from '@/src/lib/errors/app-error';
import { getOrCreateDay, materializeWindow } from './mealDayMaterializer';
import { MemoryMealPlanStore } from './__fixtures__/memoryMealPlanStore';
import { MEAL_TYPES } from './mealDays.types';
import type { MealDay } from './mealDays.types';

/** Another request creates the date between our lookup and our insert. */
class RacingStore extends MemoryMealPlanStore {
  async insertDay(date: string): Promise<MealDay | null> {
    await super.insertDay(date);
    return null;
  }
}

/** Insert is rejected but the row never becomes visible. */
class BrokenStore extends MemoryMealPlanStore {
  async insertDay(): Promise<MealDay | null> {
    return null;
  }
}

describe('getOrCreateDay', () => {
  it('creates a missing day with three empty meals', async () => {
    const store = new MemoryMealPlanStore();

    const day = await getOrCreateDay(store, '2025-09-18');

    assert.strictEqual(day.date, '2025-09-18');
    assert.strictEqual(day.isStarred, false);
    assert.strictEqual(day.isSammyWorking, false);
    assert.deepStrictEqual(
      MEAL_TYPES.map((type) => {
        const m = day.meals[type];
        return [m?.type, m?.description, m?.cookingUser, m?.isFavorite, m?.isTakeout];
      }),
      [
        ['breakfast', '', null, false, false],
        ['lunch', '', null, false, false],
        ['dinner', '', null, false, false],
      ],
    );
    assert.strictEqual(store.dayCount(), 1);
  });

  it('returns an existing day unchanged', async () => {
    const store = new MemoryMealPlanStore();
    const seeded = store.seedDay('2025-09-18', {
      isStarred: true,
      meals: { dinner: { description: 'Chili' } },
    });

    const day = await getOrCreateDay(store, '2025-09-18');

    assert.deepStrictEqual(day, seeded);
    assert.strictEqual(store.insertCount, 0);
  });

  it('never produces two rows for the same date', async () => {
    const store = new MemoryMealPlanStore();

    const first = await getOrCreateDay(store, '2025-09-18');
    const second = await getOrCreateDay(store, '2025-09-18');

    assert.strictEqual(first.id, second.id);
    assert.strictEqual(store.dayCount(), 1);
  });

  it('returns the winning row after losing a creation race', async () => {
    const store = new RacingStore();

    const day = await getOrCreateDay(store, '2025-09-18');

    assert.strictEqual(day.date, '2025-09-18');
    assert.strictEqual(store.dayCount(), 1);
  });

  it('fails with DB_ERROR when the row cannot be created or found', async () => {
    const store = new BrokenStore();

    await assert.rejects(
      () => getOrCreateDay(store, '2025-09-18'),
      (err: unknown) => err instanceof AppError && err.code === 'DB_ERROR',
    );
  });
});

describe('materializeWindow', () => {
  it('returns consecutive days and only creates the missing ones', async () => {
    const store = new MemoryMealPlanStore();
    store.seedDay('2025-09-19', { meals: { lunch: { description: 'Soup' } } });

    const days = await materializeWindow(store, '2025-09-18', 3);

    assert.deepStrictEqual(
      days.map((d) => d.date),
      ['2025-09-18', '2025-09-19', '2025-09-20'],
    );
    assert.strictEqual(days[1]?.meals.lunch?.description, 'Soup');
    assert.strictEqual(store.insertCount, 2);
    assert.strictEqual(store.dayCount(), 3);
  });

  it('returns nothing for an empty window', async () => {
    const store = new MemoryMealPlanStore();
    assert.deepStrictEqual(await materializeWindow(store, '2025-09-18', 0), []);
    assert.strictEqual(store.dayCount(), 0);
  });
});
