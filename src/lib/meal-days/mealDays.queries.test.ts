import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  countRecentTakeout,
  listFavorites,
  nextPayday,
  suggestRotation,
} from './mealDays.queries';
import { MemoryMealPlanStore } from './__fixtures__/memoryMealPlanStore';

const ANCHOR = '2025-09-18';

describe('nextPayday', () => {
  it('moves a full period ahead on the anchor day itself', () => {
    assert.deepStrictEqual(nextPayday('2025-09-18', ANCHOR), {
      nextPaydayDate: '2025-10-02',
      daysUntilNextPayday: 14,
    });
  });

  it('counts down within a period', () => {
    assert.deepStrictEqual(nextPayday('2025-09-19', ANCHOR), {
      nextPaydayDate: '2025-10-02',
      daysUntilNextPayday: 13,
    });
    assert.deepStrictEqual(nextPayday('2025-10-01', ANCHOR), {
      nextPaydayDate: '2025-10-02',
      daysUntilNextPayday: 1,
    });
  });

  it('rolls over on a later payday', () => {
    assert.deepStrictEqual(nextPayday('2025-10-02', ANCHOR), {
      nextPaydayDate: '2025-10-16',
      daysUntilNextPayday: 14,
    });
  });

  it('steps back along the grid when today is before the anchor', () => {
    assert.deepStrictEqual(nextPayday('2025-09-17', ANCHOR), {
      nextPaydayDate: '2025-09-18',
      daysUntilNextPayday: 1,
    });
    assert.deepStrictEqual(nextPayday('2025-09-04', ANCHOR), {
      nextPaydayDate: '2025-09-18',
      daysUntilNextPayday: 14,
    });
    assert.deepStrictEqual(nextPayday('2025-08-01', ANCHOR), {
      nextPaydayDate: '2025-08-07',
      daysUntilNextPayday: 6,
    });
  });

  it('honours a custom period', () => {
    assert.deepStrictEqual(nextPayday('2025-09-20', ANCHOR, 7), {
      nextPaydayDate: '2025-09-25',
      daysUntilNextPayday: 5,
    });
  });
});

describe('countRecentTakeout', () => {
  it('counts takeout meals over the last seven days including today', async () => {
    const store = new MemoryMealPlanStore();
    store.seedDay('2025-09-11', { meals: { dinner: { isTakeout: true } } });
    store.seedDay('2025-09-12', {
      meals: { lunch: { isTakeout: true }, dinner: { isTakeout: true } },
    });
    store.seedDay('2025-09-18', { meals: { dinner: { isTakeout: true } } });
    store.seedDay('2025-09-19', { meals: { dinner: { isTakeout: true } } });
    store.seedDay('2025-09-15', { meals: { dinner: { description: 'Home cooked' } } });

    assert.strictEqual(await countRecentTakeout(store, '2025-09-18'), 3);
  });

  it('leaves out a takeout meal eight days back', async () => {
    const store = new MemoryMealPlanStore();
    store.seedDay('2025-09-11', { meals: { dinner: { isTakeout: true } } });

    assert.strictEqual(await countRecentTakeout(store, '2025-09-18'), 0);
  });

  it('is zero on an empty board', async () => {
    assert.strictEqual(
      await countRecentTakeout(new MemoryMealPlanStore(), '2025-09-18'),
      0,
    );
  });
});

describe('listFavorites', () => {
  it('returns distinct trimmed descriptions sorted case-insensitively', async () => {
    const store = new MemoryMealPlanStore();
    store.seedDay('2025-09-01', {
      meals: {
        breakfast: { description: 'pancakes', isFavorite: true },
        lunch: { description: ' Tacos ', isFavorite: true },
        dinner: { description: 'Lasagne', isFavorite: false },
      },
    });
    store.seedDay('2025-09-02', {
      meals: {
        lunch: { description: 'Tacos', isFavorite: true },
        dinner: { description: '   ', isFavorite: true },
      },
    });

    assert.deepStrictEqual(await listFavorites(store), ['pancakes', 'Tacos']);
    assert.deepStrictEqual(await listFavorites(store, 'lunch'), ['Tacos']);
  });
});

describe('suggestRotation', () => {
  function seedFavorites(store: MemoryMealPlanStore) {
    store.seedDay('2025-09-01', {
      meals: {
        lunch: { description: 'Tacos', isFavorite: true },
        dinner: { description: 'Pizza', isFavorite: true },
      },
    });
  }

  it('skips favorites served recently, ignoring case', async () => {
    const store = new MemoryMealPlanStore();
    seedFavorites(store);
    store.seedDay('2025-09-17', { meals: { dinner: { description: ' tacos' } } });

    for (const value of [0, 0.5, 0.99]) {
      assert.strictEqual(
        await suggestRotation(store, '2025-09-18', { random: () => value }),
        'Pizza',
      );
    }
  });

  it('returns null when every favorite was served recently', async () => {
    const store = new MemoryMealPlanStore();
    seedFavorites(store);
    store.seedDay('2025-09-16', {
      meals: { lunch: { description: 'PIZZA' }, dinner: { description: 'Tacos' } },
    });

    assert.strictEqual(await suggestRotation(store, '2025-09-18'), null);
  });

  it('picks among sorted candidates with the given random source', async () => {
    const store = new MemoryMealPlanStore();
    seedFavorites(store);

    assert.strictEqual(
      await suggestRotation(store, '2025-09-18', { random: () => 0 }),
      'Pizza',
    );
    assert.strictEqual(
      await suggestRotation(store, '2025-09-18', { random: () => 0.75 }),
      'Tacos',
    );
  });

  it('narrows both sets to one meal type', async () => {
    const store = new MemoryMealPlanStore();
    seedFavorites(store);
    store.seedDay('2025-09-18', { meals: { lunch: { description: 'Pizza' } } });

    assert.strictEqual(
      await suggestRotation(store, '2025-09-18', { mealType: 'dinner', random: () => 0 }),
      'Pizza',
    );
    assert.strictEqual(
      await suggestRotation(store, '2025-09-18', { mealType: 'breakfast' }),
      null,
    );
  });

  it('only looks back the configured number of days', async () => {
    const store = new MemoryMealPlanStore();
    seedFavorites(store);
    store.seedDay('2025-09-15', { meals: { dinner: { description: 'Pizza' } } });

    assert.strictEqual(
      await suggestRotation(store, '2025-09-18', { random: () => 0 }),
      'Pizza',
    );
    assert.strictEqual(
      await suggestRotation(store, '2025-09-18', { recentDays: 4, random: () => 0 }),
      'Tacos',
    );
  });
});
