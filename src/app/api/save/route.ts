/**
 * Save one day or a batch of days.
 *
 * @route POST /api/save
 */

import { saveDaysAction } from '@/src/lib/meal-days/mealDays.actions';
import { actionResponse, readJsonBody } from '@/src/lib/meal-days/mealDays.response';
import { mealBoardDeps } from '@/src/lib/meal-days/mealPlanStore.server';

export const dynamic = 'force-dynamic';

export async function POST(req: Request) {
  const parsed = await readJsonBody(req);
  if (!parsed.ok) return parsed.response;

  const result = await saveDaysAction(parsed.body, mealBoardDeps());
  return actionResponse(result, (data) => ({ status: 'ok', updated: data.updated }));
}
