import type { Metadata } from 'next';
import { DayBoard } from '@/src/components/meal-days/DayBoard';
import { todayInTimeZone } from '@/src/lib/meal-days/dates';
import { withMealPlanStore } from '@/src/lib/meal-days/mealPlanStore';
import { mealBoardDeps } from '@/src/lib/meal-days/mealPlanStore.server';
import { buildBackwardsView } from '@/src/lib/meal-days/mealDays.views';

export const dynamic = 'force-dynamic';

export const metadata: Metadata = { title: 'Past Meals' };

export default async function Backwards() {
  const { openStore, config } = mealBoardDeps();
  const today = todayInTimeZone(config.timeZone);

  const view = await withMealPlanStore(openStore, (store) =>
    buildBackwardsView(store, { config, today }),
  );

  return <DayBoard view={view} />;
}
