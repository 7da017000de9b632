/**
 * Takeout meals over the last week.
 *
 * @route GET /api/how-many-times
 */

import { takeoutCountAction } from '@/src/lib/meal-days/mealDays.actions';
import { actionResponse } from '@/src/lib/meal-days/mealDays.response';
import { mealBoardDeps } from '@/src/lib/meal-days/mealPlanStore.server';

export const dynamic = 'force-dynamic';

export async function GET() {
  const result = await takeoutCountAction(mealBoardDeps());
  return actionResponse(result, (count) => ({ count }));
}
