/**
 * Application Error Types
 *
 * Centralized error handling with typed error codes and safe messages.
 * Safe messages are user-facing and never carry storage internals.
 */

export type AppErrorCode =
  | 'MALFORMED_INPUT'
  | 'VALIDATION_ERROR'
  | 'CONFLICT'
  | 'DB_ERROR';

/**
 * Application Error
 *
 * Extends Error with a typed error code and safe user-facing message.
 * Plain-object details (e.g. `conflictingDates` for CONFLICT, `field` for
 * VALIDATION_ERROR) are kept for the response body; an Error is kept as cause.
 */
export class AppError extends Error {
  public readonly code: AppErrorCode;
  public readonly safeMessage: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: AppErrorCode,
    safeMessage: string,
    causeOrDetails?: unknown,
  ) {
    super(safeMessage);
    this.name = 'AppError';
    this.code = code;
    this.safeMessage = safeMessage;

    if (causeOrDetails instanceof Error) {
      this.cause = causeOrDetails;
    } else if (
      causeOrDetails &&
      typeof causeOrDetails === 'object' &&
      !Array.isArray(causeOrDetails)
    ) {
      this.details = { ...causeOrDetails };
    } else if (causeOrDetails) {
      this.cause = new Error(String(causeOrDetails));
    }
  }

  /**
   * Convert to a plain object for serialization
   */
  toJSON(): {
    code: AppErrorCode;
    message: string;
    details?: Record<string, unknown>;
  } {
    return {
      code: this.code,
      message: this.safeMessage,
      ...(this.details && { details: this.details }),
    };
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
