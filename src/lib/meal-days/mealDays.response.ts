/**
 * NextResponse helpers for meal board route handlers.
 */

import { NextResponse } from 'next/server';
import type { ActionResult } from '@/src/lib/types';
import { errorBody, errorStatus } from './mealDays.http';

export function actionResponse<T>(
  result: ActionResult<T>,
  toBody: (data: T) => unknown,
): NextResponse {
  if (result.ok) {
    return NextResponse.json(toBody(result.data), { status: 200 });
  }
  return NextResponse.json(errorBody(result.error), {
    status: errorStatus(result.error),
  });
}

/** JSON bodies that fail to parse are malformed input. */
export async function readJsonBody(
  req: Request,
): Promise<{ ok: true; body: unknown } | { ok: false; response: NextResponse }> {
  try {
    const body: unknown = await req.json();
    return { ok: true, body };
  } catch {
    return {
      ok: false,
      response: NextResponse.json(
        { message: 'Invalid request format. Expected JSON body.' },
        { status: 400 },
      ),
    };
  }
}
