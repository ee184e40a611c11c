/**
 * Timestamp utilities for consistent time handling across the application.
 *
 * IMPORTANT: All timestamps in data files use milliseconds (13-digit Unix timestamps).
 * Listened time and track durations are the exception: they are seconds, the
 * unit the media catalog reports.
 */

export const SECOND_MS = 1000;
export const HOUR_MS = 60 * 60 * SECOND_MS;
export const DAY_MS = 24 * HOUR_MS;

/** Get current time as Unix milliseconds */
export const nowUnixMs = (): number => Date.now();

/** Seconds elapsed between two millisecond timestamps (never negative). */
export const elapsedSeconds = (fromMs: number, toMs: number): number =>
  Math.max(0, toMs - fromMs) / SECOND_MS;

/**
 * Start of the local calendar week containing the timestamp.
 * Weeks start on Monday.
 */
export function startOfLocalWeek(timestampMs: number): number {
  const date = new Date(timestampMs);
  date.setHours(0, 0, 0, 0);
  const daysSinceMonday = (date.getDay() + 6) % 7;
  date.setDate(date.getDate() - daysSinceMonday);
  return date.getTime();
}

/** Start of the local calendar month containing the timestamp. */
export function startOfLocalMonth(timestampMs: number): number {
  const date = new Date(timestampMs);
  return new Date(date.getFullYear(), date.getMonth(), 1).getTime();
}

/** Start of the local calendar year containing the timestamp. */
export function startOfLocalYear(timestampMs: number): number {
  const date = new Date(timestampMs);
  return new Date(date.getFullYear(), 0, 1).getTime();
}
