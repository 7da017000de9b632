/**
 * Meal Board Logger
 *
 * Console logging with a `[scope]` prefix. Debug events are structured JSON
 * lines and only emitted behind an env flag.
 *
 * Env flags:
 *   MEAL_BOARD_DEBUG_LOG=true   - emit debug events
 */

export type LogSink = Pick<Console, 'log' | 'warn' | 'error'>;

export type MealBoardLogger = {
  debug(event: string, payload?: Record<string, unknown>): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
};

export type CreateLoggerOptions = {
  env?: Partial<NodeJS.ProcessEnv>;
  sink?: LogSink;
  now?: () => Date;
};

export function isDebugLogEnabled(env: Partial<NodeJS.ProcessEnv> = process.env): boolean {
  const flag = env.MEAL_BOARD_DEBUG_LOG;
  return flag === 'true' || flag === '1';
}

export function createMealBoardLogger(
  scope: string,
  options: CreateLoggerOptions = {},
): MealBoardLogger {
  const sink = options.sink ?? console;
  const now = options.now ?? (() => new Date());
  const prefix = `[${scope}]`;

  return {
    debug(event, payload = {}) {
      if (!isDebugLogEnabled(options.env ?? process.env)) return;
      sink.log(
        JSON.stringify({ ts: now().toISOString(), scope, event, ...payload }),
      );
    },
    info(message, ...args) {
      sink.log(`${prefix} ${message}`, ...args);
    },
    warn(message, ...args) {
      sink.warn(`${prefix} ${message}`, ...args);
    },
    error(message, ...args) {
      sink.error(`${prefix} ${message}`, ...args);
    },
  };
}
