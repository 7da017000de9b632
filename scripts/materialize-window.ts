#!/usr/bin/env tsx
/**
 * Materialize the board window
 *
 * Creates the day rows (with three empty meals each) for the configured
 * window starting today, so the board opens on existing rows.
 * Idempotent: days that already exist are left untouched.
 *
 * Usage: npm run db:materialize
 * Or: tsx scripts/materialize-window.ts
 */

import * as path from 'path';
import { config } from 'dotenv';
import { createAdminClient } from '../src/lib/supabase/admin';
import { todayInTimeZone } from '../src/lib/meal-days/dates';
import { materializeWindow } from '../src/lib/meal-days/mealDayMaterializer';
import { loadMealBoardConfig } from '../src/lib/meal-days/mealDays.config';
import { withMealPlanStore } from '../src/lib/meal-days/mealPlanStore';
import { SupabaseMealPlanStore } from '../src/lib/meal-days/supabaseMealPlanStore';

config({ path: path.join(process.cwd(), '.env.local') });
config();

async function run() {
  const boardConfig = loadMealBoardConfig();
  const today = todayInTimeZone(boardConfig.timeZone);

  const days = await withMealPlanStore(
    () => new SupabaseMealPlanStore(createAdminClient()),
    (store) => materializeWindow(store, today, boardConfig.windowDays),
  );

  console.log(`Window from ${today}: ${days.length} days ready`);
  for (const day of days) {
    console.log(`  ${day.date}  #${day.id}`);
  }
}

run().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
