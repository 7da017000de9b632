/**
 * Copy a week of meal descriptions onto another week.
 * Responds 409 with `conflicting_dates` unless `overwrite` is set.
 *
 * @route POST /api/copy-week
 */

import { copyWeekAction } from '@/src/lib/meal-days/mealDays.actions';
import { actionResponse, readJsonBody } from '@/src/lib/meal-days/mealDays.response';
import { mealBoardDeps } from '@/src/lib/meal-days/mealPlanStore.server';

export const dynamic = 'force-dynamic';

export async function POST(req: Request) {
  const parsed = await readJsonBody(req);
  if (!parsed.ok) return parsed.response;

  const result = await copyWeekAction(parsed.body, mealBoardDeps());
  return actionResponse(result, (data) => ({
    status: 'ok',
    copied_days: data.copiedDays,
    copied_meals: data.copiedMeals,
  }));
}
