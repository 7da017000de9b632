/**
 * HTTP mapping for meal board action errors.
 */

import type { AppErrorCode } from '@/src/lib/errors/app-error';
import type { ActionError } from '@/src/lib/types';

export const STATUS_BY_ERROR_CODE: Record<AppErrorCode, number> = {
  MALFORMED_INPUT: 400,
  CONFLICT: 409,
  VALIDATION_ERROR: 422,
  DB_ERROR: 500,
};

export type ErrorBody = {
  message: string;
  conflicting_dates?: string[];
};

export function errorStatus(error: ActionError): number {
  return STATUS_BY_ERROR_CODE[error.code];
}

export function errorBody(error: ActionError): ErrorBody {
  return {
    message: error.message,
    ...(error.conflictingDates
      ? { conflicting_dates: error.conflictingDates }
      : {}),
  };
}

/** Board URL carrying the error message, for form posts that failed. */
export function boardErrorLocation(error: ActionError, origin: string): URL {
  const url = new URL('/', origin);
  url.searchParams.set('error', error.message);
  return url;
}
