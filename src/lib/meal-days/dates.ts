/**
 * Calendar-date helpers. Dates are ISO `YYYY-MM-DD` strings; arithmetic runs
 * in UTC so that day offsets never shift across DST changes.
 */

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MS_PER_DAY = 24 * 60 * 60 * 1000;

function toUtcMillis(isoDate: string): number {
  const match = ISO_DATE_PATTERN.exec(isoDate);
  if (!match) {
    throw new RangeError(`Invalid ISO date: ${isoDate}`);
  }
  const [, year, month, day] = match;
  return Date.UTC(Number(year), Number(month) - 1, Number(day));
}

function fromUtcMillis(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

/** True for a well-formed, real calendar date (rejects 2025-02-30). */
export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_PATTERN.test(value)) return false;
  return fromUtcMillis(toUtcMillis(value)) === value;
}

export function addDays(isoDate: string, days: number): string {
  return fromUtcMillis(toUtcMillis(isoDate) + days * MS_PER_DAY);
}

/** Whole days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: string, to: string): number {
  return Math.round((toUtcMillis(to) - toUtcMillis(from)) / MS_PER_DAY);
}

/** `count` consecutive dates starting at `start`. */
export function dateRange(start: string, count: number): string[] {
  return Array.from({ length: Math.max(0, count) }, (_, i) =>
    addDays(start, i),
  );
}

/** Today's calendar date as seen in `timeZone`. */
export function todayInTimeZone(timeZone: string, now: Date = new Date()): string {
  // en-CA formats as YYYY-MM-DD
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(now);
}

export function formatWeekday(isoDate: string): string {
  return new Date(toUtcMillis(isoDate)).toLocaleDateString('en-US', {
    weekday: 'long',
    timeZone: 'UTC',
  });
}

export function formatShortDate(isoDate: string): string {
  return new Date(toUtcMillis(isoDate)).toLocaleDateString('en-US', {
    month: 'short',
    day: 'numeric',
    timeZone: 'UTC',
  });
}
