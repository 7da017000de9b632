/**
 * Board form submission. Redirects back to the board either way; failures
 * carry their message in `?error=`.
 *
 * @route POST /update
 */

import { NextResponse } from 'next/server';
import { formDataEntries } from '@/src/lib/meal-days/dayForm';
import { submitDayFormAction } from '@/src/lib/meal-days/mealDays.actions';
import { boardErrorLocation } from '@/src/lib/meal-days/mealDays.http';
import { mealBoardDeps } from '@/src/lib/meal-days/mealPlanStore.server';

export const dynamic = 'force-dynamic';

export async function POST(req: Request) {
  const origin = new URL(req.url).origin;

  let entries: Array<[string, string]>;
  try {
    entries = formDataEntries(await req.formData());
  } catch {
    return NextResponse.redirect(
      boardErrorLocation(
        { code: 'MALFORMED_INPUT', message: 'Invalid form submission.' },
        origin,
      ),
      303,
    );
  }

  const result = await submitDayFormAction(entries, mealBoardDeps());
  if (!result.ok) {
    return NextResponse.redirect(boardErrorLocation(result.error, origin), 303);
  }
  return NextResponse.redirect(new URL('/', origin), 303);
}
