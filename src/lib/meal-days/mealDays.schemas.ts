/**
 * Meal Days Schemas
 *
 * Zod schemas for inbound payloads. Field names follow the wire format
 * (snake_case) shared by the JSON API and the board form.
 */

import { z } from 'zod';
import { isIsoDate } from './dates';
import { MEAL_TYPES } from './mealDays.types';

const emptyToUndefined = (value: unknown) =>
  value === '' || value === null ? undefined : value;

export const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date')
  .refine(isIsoDate, 'Not a calendar date');

export const mealTypeSchema = z.enum(MEAL_TYPES);

/** Flag as sent by JSON clients (boolean/number) or forms (string); see coerceFlag. */
export const flagValueSchema = z.union([
  z.boolean(),
  z.number(),
  z.string(),
  z.null(),
]);

export const dayIdSchema = z.preprocess(
  emptyToUndefined,
  z
    .union([z.number(), z.string().regex(/^\d+$/, 'Expected a numeric id')])
    .pipe(z.coerce.number().int().positive())
    .optional(),
);

const optionalDateSchema = z.preprocess(
  emptyToUndefined,
  isoDateSchema.optional(),
);

const descriptionSchema = z.string().nullable().optional();

export const mealFieldsSchema = z.object({
  is_takeout: flagValueSchema.optional(),
  cooking_user: z.string().max(64).nullable().optional(),
  is_favorite: flagValueSchema.optional(),
});

export const dayUpdatePayloadSchema = z.object({
  id: dayIdSchema,
  date: optionalDateSchema,
  is_starred: flagValueSchema.optional(),
  is_sammy_working: flagValueSchema.optional(),
  breakfast: descriptionSchema,
  lunch: descriptionSchema,
  dinner: descriptionSchema,
  meals: z
    .object({
      breakfast: mealFieldsSchema.optional(),
      lunch: mealFieldsSchema.optional(),
      dinner: mealFieldsSchema.optional(),
    })
    .optional(),
});
export type DayUpdatePayload = z.infer<typeof dayUpdatePayloadSchema>;
export type MealFieldsPayload = z.infer<typeof mealFieldsSchema>;

export const copyWeekRequestSchema = z.object({
  from_date: isoDateSchema,
  to_date: isoDateSchema,
  overwrite: flagValueSchema.optional(),
});
export type CopyWeekRequest = z.infer<typeof copyWeekRequestSchema>;

export const mealTypeQuerySchema = z.preprocess(
  emptyToUndefined,
  mealTypeSchema.optional(),
);

/** First issue as `path: message`, for safe error messages. */
export function formatZodError(error: z.ZodError, prefix?: string): string {
  const issue = error.issues[0];
  if (!issue) return prefix ?? 'Invalid input';
  const path = [prefix, ...issue.path.map(String)]
    .filter((part) => part !== undefined && part !== '')
    .join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}
