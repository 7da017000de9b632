import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DEFAULT_MEAL_BOARD_CONFIG } from './mealDays.config';
import {
  BACKWARDS_PAGE,
  INDEX_PAGE,
  buildBackwardsView,
  buildIndexView,
} from './mealDays.views';
import { MemoryMealPlanStore } from './__fixtures__/memoryMealPlanStore';

const config = { ...DEFAULT_MEAL_BOARD_CONFIG, windowDays: 7 };

describe('buildIndexView', () => {
  it('materializes the window and fills the stats', async () => {
    const store = new MemoryMealPlanStore();
    store.seedDay('2025-09-19', {
      isStarred: true,
      meals: { dinner: { description: 'Curry', cookingUser: 'Sam', isTakeout: true } },
    });

    const view = await buildIndexView(store, { config, today: '2025-09-18' });

    assert.deepStrictEqual(view.page, INDEX_PAGE);
    assert.strictEqual(view.days.length, 7);
    assert.strictEqual(store.dayCount(), 7);
    assert.strictEqual(view.days[0]?.date, '2025-09-18');
    assert.strictEqual(view.days[0]?.weekday, 'Thursday');
    assert.strictEqual(view.days[0]?.shortDate, 'Sep 18');
    assert.strictEqual(view.days[0]?.isToday, true);
    assert.strictEqual(view.days[6]?.date, '2025-09-24');
    assert.deepStrictEqual(view.days[1]?.meals[2], {
      type: 'dinner',
      label: 'Dinner',
      description: 'Curry',
      cookingUser: 'Sam',
      isTakeout: true,
      isFavorite: false,
    });
    assert.strictEqual(view.days[1]?.isStarred, true);
    assert.strictEqual(view.daysUntilPayday, 14);
    assert.strictEqual(view.nextPaydayDate, '2025-10-02');
    assert.strictEqual(view.takeoutCount, 0);
    assert.strictEqual(view.error, null);
  });

  it('passes an error message through', async () => {
    const store = new MemoryMealPlanStore();

    const view = await buildIndexView(store, {
      config,
      today: '2025-09-18',
      error: 'Something went wrong',
    });

    assert.strictEqual(view.error, 'Something went wrong');
  });
});

describe('buildBackwardsView', () => {
  it('shows the previous days oldest first without creating any', async () => {
    const store = new MemoryMealPlanStore();
    const stored = store.seedDay('2025-09-16', {
      meals: { lunch: { description: 'Soup' } },
    });
    store.seedDay('2025-09-18', { meals: { lunch: { description: 'Today' } } });

    const view = await buildBackwardsView(store, { config, today: '2025-09-18' });

    assert.deepStrictEqual(view.page, BACKWARDS_PAGE);
    assert.deepStrictEqual(
      view.days.map((d) => [d.date, d.id, d.meals[1]?.description]),
      [
        ['2025-09-15', null, ''],
        ['2025-09-16', stored.id, 'Soup'],
        ['2025-09-17', null, ''],
      ],
    );
    assert.strictEqual(store.dayCount(), 2);
    assert.strictEqual(view.daysUntilPayday, null);
    assert.strictEqual(view.takeoutCount, null);
  });
});
