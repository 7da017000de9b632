/**
 * @route GET /api/favorites?meal_type=
 */

import type { NextRequest } from 'next/server';
import { favoritesAction } from '@/src/lib/meal-days/mealDays.actions';
import { actionResponse } from '@/src/lib/meal-days/mealDays.response';
import { mealBoardDeps } from '@/src/lib/meal-days/mealPlanStore.server';

export const dynamic = 'force-dynamic';

export async function GET(req: NextRequest) {
  const result = await favoritesAction(
    req.nextUrl.searchParams.get('meal_type'),
    mealBoardDeps(),
  );
  return actionResponse(result, (descriptions) =>
    descriptions.map((description) => ({ description })),
  );
}
