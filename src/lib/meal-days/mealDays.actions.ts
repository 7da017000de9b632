/**
 * Meal Days Actions
 *
 * App-layer boundary for the meal board: every action opens a store for
 * the request, runs one operation and maps failures to an ActionError.
 * Route handlers turn the result into an HTTP response.
 */

import { AppError } from '@/src/lib/errors/app-error';
import { createMealBoardLogger } from '@/src/lib/logging/mealBoardLogger';
import type { MealBoardLogger } from '@/src/lib/logging/mealBoardLogger';
import type { ActionError, ActionResult } from '@/src/lib/types';
import { coerceFlag } from './coerceFlag';
import { todayInTimeZone } from './dates';
import { decodeDayForm } from './dayForm';
import { applyDayUpdates } from './dayUpdater';
import type { MealBoardConfig } from './mealDays.config';
import {
  countRecentTakeout,
  listFavorites,
  nextPayday,
  suggestRotation,
} from './mealDays.queries';
import type { NextPayday } from './mealDays.queries';
import {
  copyWeekRequestSchema,
  formatZodError,
  mealTypeQuerySchema,
} from './mealDays.schemas';
import type { MealType } from './mealDays.types';
import { withMealPlanStore } from './mealPlanStore';
import type { MealPlanStore } from './mealPlanStore';
import { copyWeek } from './weekCopier';
import type { CopyWeekResult } from './weekCopier';

export type MealBoardDeps = {
  openStore: () => MealPlanStore;
  config: MealBoardConfig;
  now?: () => Date;
  random?: () => number;
  logger?: MealBoardLogger;
};

export type SaveDaysResult = { updated: number[] };

const defaultLogger = createMealBoardLogger('mealDays.actions');

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Map any thrown value to an ActionError. Unexpected failures are logged
 * and reported as storage errors without internals.
 */
export function toActionError(
  error: unknown,
  logger: MealBoardLogger = defaultLogger,
): ActionError {
  if (error instanceof AppError) {
    if (error.code === 'DB_ERROR') {
      logger.error(error.safeMessage, error.cause ?? error.details ?? '');
    }
    const conflictingDates = error.details?.conflictingDates;
    return {
      code: error.code,
      message: error.safeMessage,
      ...(error.code === 'CONFLICT' && isStringArray(conflictingDates)
        ? { conflictingDates }
        : {}),
    };
  }

  logger.error('Unexpected meal board failure', error);
  return {
    code: 'DB_ERROR',
    message: 'The meal board storage is unavailable. Try again later.',
  };
}

function today(deps: MealBoardDeps): string {
  const now = deps.now ?? (() => new Date());
  return todayInTimeZone(deps.config.timeZone, now());
}

async function runWithStore<T>(
  deps: MealBoardDeps,
  fn: (store: MealPlanStore, logger: MealBoardLogger) => Promise<T>,
): Promise<ActionResult<T>> {
  const logger = deps.logger ?? defaultLogger;
  try {
    const data = await withMealPlanStore(deps.openStore, (store) =>
      fn(store, logger),
    );
    return { ok: true, data };
  } catch (error) {
    return { ok: false, error: toActionError(error, logger) };
  }
}

function malformed(message: string): { ok: false; error: ActionError } {
  return { ok: false, error: { code: 'MALFORMED_INPUT', message } };
}

function parseMealType(
  raw: string | null | undefined,
): { ok: true; data: MealType | undefined } | { ok: false; error: ActionError } {
  const parsed = mealTypeQuerySchema.safeParse(raw);
  if (!parsed.success) {
    return malformed(formatZodError(parsed.error, 'meal_type'));
  }
  return { ok: true, data: parsed.data };
}

/**
 * Save one day (`{ day }`) or a batch (`{ days: [...] }`).
 */
export async function saveDaysAction(
  body: unknown,
  deps: MealBoardDeps,
): Promise<ActionResult<SaveDaysResult>> {
  if (!isRecord(body)) {
    return malformed('Expected a JSON object body.');
  }

  let payloads: unknown[];
  if (body.days !== undefined) {
    if (!Array.isArray(body.days)) {
      return malformed("'days' must be a list of day objects.");
    }
    payloads = body.days;
  } else if (body.day !== undefined) {
    payloads = [body.day];
  } else {
    return malformed("Missing 'day' or 'days' field.");
  }

  return runWithStore(deps, async (store, logger) => {
    const { updatedDayIds } = await applyDayUpdates(store, payloads, logger);
    return { updated: updatedDayIds };
  });
}

/** Save the board form (`days[i][field]` entries). */
export async function submitDayFormAction(
  entries: Iterable<readonly [string, string]>,
  deps: MealBoardDeps,
): Promise<ActionResult<SaveDaysResult>> {
  const payloads = decodeDayForm(entries);
  return runWithStore(deps, async (store, logger) => {
    const { updatedDayIds } = await applyDayUpdates(store, payloads, logger);
    return { updated: updatedDayIds };
  });
}

export async function copyWeekAction(
  body: unknown,
  deps: MealBoardDeps,
): Promise<ActionResult<CopyWeekResult>> {
  const parsed = copyWeekRequestSchema.safeParse(body);
  if (!parsed.success) {
    return malformed(formatZodError(parsed.error));
  }

  const { from_date, to_date, overwrite } = parsed.data;
  return runWithStore(deps, (store, logger) =>
    copyWeek(
      store,
      {
        fromDate: from_date,
        toDate: to_date,
        overwrite: coerceFlag(overwrite),
      },
      deps.config.windowDays,
      logger,
    ),
  );
}

export async function favoritesAction(
  mealTypeRaw: string | null | undefined,
  deps: MealBoardDeps,
): Promise<ActionResult<string[]>> {
  const mealType = parseMealType(mealTypeRaw);
  if (!mealType.ok) return mealType;
  return runWithStore(deps, (store) => listFavorites(store, mealType.data));
}

export async function nextPaydayAction(
  deps: MealBoardDeps,
): Promise<ActionResult<NextPayday>> {
  try {
    const { paydayAnchor, payPeriodDays } = deps.config;
    return { ok: true, data: nextPayday(today(deps), paydayAnchor, payPeriodDays) };
  } catch (error) {
    return { ok: false, error: toActionError(error, deps.logger) };
  }
}

export async function takeoutCountAction(
  deps: MealBoardDeps,
): Promise<ActionResult<number>> {
  return runWithStore(deps, (store) =>
    countRecentTakeout(store, today(deps), deps.config.takeoutWindowDays),
  );
}

export async function rotationSuggestionAction(
  mealTypeRaw: string | null | undefined,
  deps: MealBoardDeps,
): Promise<ActionResult<string | null>> {
  const mealType = parseMealType(mealTypeRaw);
  if (!mealType.ok) return mealType;
  return runWithStore(deps, (store) =>
    suggestRotation(store, today(deps), {
      mealType: mealType.data,
      recentDays: deps.config.rotationRecentDays,
      random: deps.random,
    }),
  );
}
