/**
 * A favorite meal that was not served recently.
 *
 * @route GET /api/rotation-suggestions?meal_type=
 */

import type { NextRequest } from 'next/server';
import { rotationSuggestionAction } from '@/src/lib/meal-days/mealDays.actions';
import { actionResponse } from '@/src/lib/meal-days/mealDays.response';
import { mealBoardDeps } from '@/src/lib/meal-days/mealPlanStore.server';

export const dynamic = 'force-dynamic';

export async function GET(req: NextRequest) {
  const result = await rotationSuggestionAction(
    req.nextUrl.searchParams.get('meal_type'),
    mealBoardDeps(),
  );
  return actionResponse(result, (suggestion) => ({ suggestion }));
}
