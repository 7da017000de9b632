import type { Metadata } from 'next';
import { DayBoard } from '@/src/components/meal-days/DayBoard';
import { todayInTimeZone } from '@/src/lib/meal-days/dates';
import { withMealPlanStore } from '@/src/lib/meal-days/mealPlanStore';
import { mealBoardDeps } from '@/src/lib/meal-days/mealPlanStore.server';
import { buildIndexView } from '@/src/lib/meal-days/mealDays.views';

export const dynamic = 'force-dynamic';

export const metadata: Metadata = { title: 'Home' };

export default async function Home({
  searchParams,
}: {
  searchParams: Promise<{ error?: string | string[] }>;
}) {
  const { error } = await searchParams;
  const { openStore, config } = mealBoardDeps();
  const today = todayInTimeZone(config.timeZone);

  const view = await withMealPlanStore(openStore, (store) =>
    buildIndexView(store, {
      config,
      today,
      error: typeof error === 'string' ? error : null,
    }),
  );

  return <DayBoard view={view} />;
}
