/**
 * Shared types for actions
 */

import type { AppErrorCode } from '@/src/lib/errors/app-error';

/**
 * Error response type. `conflictingDates` is set for CONFLICT only.
 */
export type ActionError = {
  code: AppErrorCode;
  message: string;
  conflictingDates?: string[];
};

/**
 * Result type for actions: ok/data on success, ok/error on failure.
 */
export type ActionResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: ActionError };
