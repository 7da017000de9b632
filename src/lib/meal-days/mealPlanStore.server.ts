import 'server-only';

import { createAdminClient } from '@/src/lib/supabase/admin';
import type { MealBoardDeps } from './mealDays.actions';
import { getMealBoardConfig } from './mealDays.config';
import type { MealPlanStore } from './mealPlanStore';
import { SupabaseMealPlanStore } from './supabaseMealPlanStore';

/** A fresh store for one request; the caller closes it. */
export function openMealPlanStore(): MealPlanStore {
  return new SupabaseMealPlanStore(createAdminClient());
}

export function mealBoardDeps(): MealBoardDeps {
  return { openStore: openMealPlanStore, config: getMealBoardConfig() };
}
