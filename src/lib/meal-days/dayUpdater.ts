/**
 * Day Updater
 *
 * Applies a batch of day-update payloads (JSON API or decoded board form).
 * The whole batch is validated and resolved before anything is written,
 * then committed with a single commitChanges call.
 *
 * Field policy:
 * - is_starred / is_sammy_working and the nested meal fields overwrite when
 *   present and are left unchanged when absent (the board form always sends
 *   them through hidden inputs).
 * - breakfast / lunch / dinner descriptions default to '' when absent.
 * - cooking_user: blank or null clears the assignment.
 */

import { AppError } from '@/src/lib/errors/app-error';
import { createMealBoardLogger } from '@/src/lib/logging/mealBoardLogger';
import type { MealBoardLogger } from '@/src/lib/logging/mealBoardLogger';
import { coerceFlag } from './coerceFlag';
import { getOrCreateDay } from './mealDayMaterializer';
import { MEAL_TYPES } from './mealDays.types';
import type {
  DayFlagChange,
  MealChange,
  MealDay,
  MealPlanChangeSet,
} from './mealDays.types';
import { dayUpdatePayloadSchema, formatZodError } from './mealDays.schemas';
import type { DayUpdatePayload } from './mealDays.schemas';
import type { MealPlanStore } from './mealPlanStore';

const defaultLogger = createMealBoardLogger('dayUpdater');

export type ApplyDayUpdatesResult = {
  /** Ids of the days touched, in payload order, without duplicates */
  updatedDayIds: number[];
};

type DayWithPayload = { day: MealDay; payload: DayUpdatePayload };

function parsePayloads(payloads: readonly unknown[]): DayUpdatePayload[] {
  return payloads.map((raw, index) => {
    const parsed = dayUpdatePayloadSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AppError(
        'MALFORMED_INPUT',
        formatZodError(parsed.error, `days[${index}]`),
      );
    }
    return parsed.data;
  });
}

function normalizeCookingUser(value: string | null): string | null {
  const trimmed = value?.trim() ?? '';
  return trimmed === '' ? null : trimmed;
}

/**
 * Resolve every payload to a day. Lookups by id run for the whole batch
 * first; days are only created (by date) once every payload is known to be
 * resolvable.
 */
async function resolveDays(
  store: MealPlanStore,
  payloads: DayUpdatePayload[],
  logger: MealBoardLogger,
): Promise<DayWithPayload[]> {
  const byId = new Map<number, MealDay>();
  const found: Array<MealDay | undefined> = [];

  for (const [index, payload] of payloads.entries()) {
    if (payload.id === undefined && payload.date === undefined) {
      throw new AppError('VALIDATION_ERROR', "Each day must have an 'id'.", {
        field: 'id',
        index,
      });
    }

    let day: MealDay | undefined;
    if (payload.id !== undefined) {
      day = byId.get(payload.id) ?? (await store.findDayById(payload.id)) ?? undefined;
      if (day) byId.set(day.id, day);
      else if (payload.date === undefined) {
        throw new AppError(
          'VALIDATION_ERROR',
          `Day ${payload.id} does not exist; a 'date' is required to create it.`,
          { field: 'date', index },
        );
      }
    }
    found.push(day);
  }

  const resolved: DayWithPayload[] = [];
  for (const [index, payload] of payloads.entries()) {
    let day = found[index];
    if (!day) {
      if (payload.date === undefined) {
        throw new AppError('VALIDATION_ERROR', "Each day must have an 'id'.", {
          field: 'id',
          index,
        });
      }
      day = await getOrCreateDay(store, payload.date, logger);
    }
    resolved.push({ day, payload });
  }
  return resolved;
}

function stageChanges(
  pairs: DayWithPayload[],
  logger: MealBoardLogger,
): MealPlanChangeSet {
  const dayChanges = new Map<number, DayFlagChange>();
  const mealChanges = new Map<string, MealChange>();

  for (const { day, payload } of pairs) {
    const flags: DayFlagChange = dayChanges.get(day.id) ?? { id: day.id };
    if (payload.is_starred !== undefined) {
      flags.isStarred = coerceFlag(payload.is_starred);
    }
    if (payload.is_sammy_working !== undefined) {
      flags.isSammyWorking = coerceFlag(payload.is_sammy_working);
    }
    dayChanges.set(day.id, flags);

    for (const type of MEAL_TYPES) {
      const key = `${day.id}:${type}`;
      const change: MealChange = mealChanges.get(key) ?? { mealDayId: day.id, type };
      const current = day.meals[type];

      change.description = payload[type] ?? '';

      const fields = payload.meals?.[type];
      if (fields?.is_takeout !== undefined) {
        change.isTakeout = coerceFlag(fields.is_takeout);
      }
      if (fields?.cooking_user !== undefined) {
        change.cookingUser = normalizeCookingUser(fields.cooking_user);
      }
      if (fields?.is_favorite !== undefined) {
        change.isFavorite = coerceFlag(fields.is_favorite);
      }

      logger.debug('meal_change_staged', {
        date: day.date,
        mealType: type,
        from: current
          ? {
              description: current.description,
              isTakeout: current.isTakeout,
              cookingUser: current.cookingUser,
              isFavorite: current.isFavorite,
            }
          : null,
        to: change,
      });
      mealChanges.set(key, change);
    }
  }

  return {
    days: [...dayChanges.values()].filter(
      (c) => c.isStarred !== undefined || c.isSammyWorking !== undefined,
    ),
    meals: [...mealChanges.values()],
  };
}

/**
 * Apply a batch of day-update payloads. Any malformed or unresolvable
 * payload aborts the batch before a single change is committed.
 */
export async function applyDayUpdates(
  store: MealPlanStore,
  payloads: readonly unknown[],
  logger: MealBoardLogger = defaultLogger,
): Promise<ApplyDayUpdatesResult> {
  const parsed = parsePayloads(payloads);
  const pairs = await resolveDays(store, parsed, logger);
  const changes = stageChanges(pairs, logger);

  await store.commitChanges(changes);
  logger.debug('batch_committed', {
    days: changes.days.length,
    meals: changes.meals.length,
  });

  return { updatedDayIds: [...new Set(pairs.map(({ day }) => day.id))] };
}
