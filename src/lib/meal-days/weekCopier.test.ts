import { describe, it } from 'node:test';
import assert from 'node:assert';
import { AppError } from '@/src/lib/errors/app-error';
import { addDays, dateRange } from './dates';
import { copyWeek, findCopyConflicts } from './weekCopier';
import { MemoryMealPlanStore } from './__fixtures__/memoryMealPlanStore';

const SOURCE = '2025-09-01';
const TARGET = '2025-09-15';

function seedWeeks(store: MemoryMealPlanStore, targetDays = 7) {
  for (const date of dateRange(SOURCE, 7)) {
    store.seedDay(
      date,
      date === SOURCE
        ? { meals: { breakfast: { description: 'Pancakes', isTakeout: true } } }
        : {},
    );
  }
  for (const date of dateRange(TARGET, targetDays)) {
    store.seedDay(date);
  }
}

describe('copyWeek', () => {
  it('copies descriptions onto an empty target week', async () => {
    const store = new MemoryMealPlanStore();
    seedWeeks(store);

    const result = await copyWeek(
      store,
      { fromDate: SOURCE, toDate: TARGET, overwrite: false },
      7,
    );

    assert.deepStrictEqual(result, { copiedDays: 7, copiedMeals: 21 });
    const t0 = await store.findDayByDate(TARGET);
    assert.strictEqual(t0?.meals.breakfast?.description, 'Pancakes');
    assert.strictEqual(t0?.meals.breakfast?.isTakeout, false);
    assert.strictEqual(t0?.meals.lunch?.description, '');
    const t1 = await store.findDayByDate(addDays(TARGET, 1));
    assert.strictEqual(t1?.meals.breakfast?.description, '');
    assert.strictEqual(store.commitCount, 1);
  });

  it('reports every conflicting target date and writes nothing', async () => {
    const store = new MemoryMealPlanStore();
    seedWeeks(store, 0);
    store.seedDay('2025-09-18', { meals: { dinner: { description: 'Chili' } } });
    store.seedDay('2025-09-15', { meals: { lunch: { description: 'Soup' } } });
    store.seedDay('2025-09-16', { meals: { lunch: { description: '   ' } } });

    await assert.rejects(
      () => copyWeek(store, { fromDate: SOURCE, toDate: TARGET, overwrite: false }, 7),
      (err: unknown) =>
        err instanceof AppError &&
        err.code === 'CONFLICT' &&
        JSON.stringify(err.details?.conflictingDates) ===
          JSON.stringify(['2025-09-15', '2025-09-18']),
    );
    assert.strictEqual(store.commitCount, 0);
    assert.strictEqual((await store.findDayByDate(TARGET))?.meals.breakfast?.description, '');
  });

  it('overwrites a planned target week when asked to', async () => {
    const store = new MemoryMealPlanStore();
    seedWeeks(store, 0);
    store.seedDay(TARGET, { meals: { lunch: { description: 'Soup' } } });

    const result = await copyWeek(
      store,
      { fromDate: SOURCE, toDate: TARGET, overwrite: true },
      7,
    );

    assert.deepStrictEqual(result, { copiedDays: 1, copiedMeals: 3 });
    const t0 = await store.findDayByDate(TARGET);
    assert.strictEqual(t0?.meals.breakfast?.description, 'Pancakes');
    assert.strictEqual(t0?.meals.lunch?.description, '');
  });

  it('skips offsets whose source or target day does not exist', async () => {
    const store = new MemoryMealPlanStore();
    seedWeeks(store, 5);
    const before = store.dayCount();

    const result = await copyWeek(
      store,
      { fromDate: SOURCE, toDate: TARGET, overwrite: false },
      7,
    );

    assert.deepStrictEqual(result, { copiedDays: 5, copiedMeals: 15 });
    assert.strictEqual(store.dayCount(), before);
    assert.strictEqual(await store.findDayByDate(addDays(TARGET, 6)), null);
  });

  it('skips a missing source meal slot and creates a missing target slot', async () => {
    const store = new MemoryMealPlanStore();
    store.seedDay(SOURCE, {
      omitMeals: ['lunch'],
      meals: { dinner: { description: 'Stew' } },
    });
    const target = store.seedDay(TARGET, { omitMeals: ['dinner'] });

    const result = await copyWeek(
      store,
      { fromDate: SOURCE, toDate: TARGET, overwrite: false },
      1,
    );

    assert.deepStrictEqual(result, { copiedDays: 1, copiedMeals: 2 });
    const meals = store.mealsOf(target.id);
    assert.deepStrictEqual(
      meals.map((m) => [m.type, m.description]).sort(),
      [
        ['breakfast', ''],
        ['dinner', 'Stew'],
        ['lunch', ''],
      ],
    );
  });

  it('honours a nine-day window', async () => {
    const store = new MemoryMealPlanStore();
    for (const date of dateRange(SOURCE, 9)) store.seedDay(date);
    for (const date of dateRange(TARGET, 9)) store.seedDay(date);
    store.seedDay('2025-09-25', { meals: { dinner: { description: 'Curry' } } });

    const conflicts = await findCopyConflicts(store, TARGET, 9);
    assert.deepStrictEqual(conflicts, []);

    const result = await copyWeek(
      store,
      { fromDate: SOURCE, toDate: TARGET, overwrite: false },
      9,
    );
    assert.deepStrictEqual(result, { copiedDays: 9, copiedMeals: 27 });
  });
});

describe('findCopyConflicts', () => {
  it('lists target dates holding a non-blank description', async () => {
    const store = new MemoryMealPlanStore();
    store.seedDay('2025-09-17', { meals: { breakfast: { description: 'Toast' } } });
    store.seedDay('2025-09-22', { meals: { breakfast: { description: 'Toast' } } });

    assert.deepStrictEqual(await findCopyConflicts(store, TARGET, 7), ['2025-09-17']);
  });
});
