/**
 * Meal board config – loaded from config file and env.
 * Edit config/meal-planner.json or set MEAL_BOARD_* env vars; env wins.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { isoDateSchema } from './mealDays.schemas';

export type MealBoardConfig = {
  /** Days shown on the board and copied by a week copy (7 or 9 in practice) */
  windowDays: number;
  /** Past days shown on the read-only backwards view */
  daysBackwards: number;
  /** A known payday (YYYY-MM-DD) on the pay-period grid */
  paydayAnchor: string;
  payPeriodDays: number;
  takeoutWindowDays: number;
  rotationRecentDays: number;
  /** IANA zone used to decide what "today" is */
  timeZone: string;
};

export const DEFAULT_MEAL_BOARD_CONFIG: MealBoardConfig = {
  windowDays: 9,
  daysBackwards: 3,
  paydayAnchor: '2025-09-18',
  payPeriodDays: 14,
  takeoutWindowDays: 7,
  rotationRecentDays: 3,
  timeZone: 'UTC',
};

const positiveDays = z.coerce.number().int().min(1).max(62);

const fileConfigSchema = z
  .object({
    windowDays: positiveDays,
    daysBackwards: positiveDays,
    paydayAnchor: isoDateSchema,
    payPeriodDays: positiveDays,
    takeoutWindowDays: positiveDays,
    rotationRecentDays: positiveDays,
    timeZone: z.string().min(1),
  })
  .partial();

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

export type LoadMealBoardConfigOptions = {
  env?: Partial<NodeJS.ProcessEnv>;
  configPath?: string;
};

/**
 * Resolve config: defaults, then the JSON file, then env overrides.
 * Invalid values fail loudly; a missing file is not an error.
 */
export function loadMealBoardConfig(
  options: LoadMealBoardConfigOptions = {},
): MealBoardConfig {
  const env = options.env ?? process.env;
  const configPath =
    options.configPath ??
    env.MEAL_BOARD_CONFIG_PATH ??
    join(process.cwd(), 'config', 'meal-planner.json');

  let fromFile: z.infer<typeof fileConfigSchema> = {};
  if (existsSync(configPath)) {
    const raw: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
    const parsed = fileConfigSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(
        `Invalid meal board config in ${configPath}: ${parsed.error.issues
          .map((i) => `${i.path.join('.')} ${i.message}`)
          .join('; ')}`,
      );
    }
    fromFile = parsed.data;
  }

  const fromEnv = fileConfigSchema.parse({
    windowDays: env.MEAL_BOARD_WINDOW_DAYS,
    daysBackwards: env.MEAL_BOARD_DAYS_BACKWARDS,
    paydayAnchor: env.MEAL_BOARD_PAYDAY_ANCHOR,
    timeZone: env.MEAL_BOARD_TIME_ZONE,
  });

  const defaults = DEFAULT_MEAL_BOARD_CONFIG;
  const config: MealBoardConfig = {
    windowDays: fromEnv.windowDays ?? fromFile.windowDays ?? defaults.windowDays,
    daysBackwards: fromEnv.daysBackwards ?? fromFile.daysBackwards ?? defaults.daysBackwards,
    paydayAnchor: fromEnv.paydayAnchor ?? fromFile.paydayAnchor ?? defaults.paydayAnchor,
    payPeriodDays: fromEnv.payPeriodDays ?? fromFile.payPeriodDays ?? defaults.payPeriodDays,
    takeoutWindowDays: fromEnv.takeoutWindowDays ?? fromFile.takeoutWindowDays ?? defaults.takeoutWindowDays,
    rotationRecentDays: fromEnv.rotationRecentDays ?? fromFile.rotationRecentDays ?? defaults.rotationRecentDays,
    timeZone: fromEnv.timeZone ?? fromFile.timeZone ?? defaults.timeZone,
  };

  if (!isValidTimeZone(config.timeZone)) {
    throw new Error(`Invalid meal board time zone: ${config.timeZone}`);
  }
  return config;
}

let cached: MealBoardConfig | null = null;

export function getMealBoardConfig(): MealBoardConfig {
  if (!cached) cached = loadMealBoardConfig();
  return cached;
}
