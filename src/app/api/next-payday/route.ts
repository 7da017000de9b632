/**
 * @route GET /api/next-payday
 */

import { nextPaydayAction } from '@/src/lib/meal-days/mealDays.actions';
import { actionResponse } from '@/src/lib/meal-days/mealDays.response';
import { mealBoardDeps } from '@/src/lib/meal-days/mealPlanStore.server';

export const dynamic = 'force-dynamic';

export async function GET() {
  const result = await nextPaydayAction(mealBoardDeps());
  return actionResponse(result, (data) => ({
    days_until_next_payday: data.daysUntilNextPayday,
    next_payday_date: data.nextPaydayDate,
  }));
}
