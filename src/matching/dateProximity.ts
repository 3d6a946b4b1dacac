/**
 * Date Proximity Scoring
 *
 * Scores how close a transaction date is to the date the user remembers.
 * Dates are compared as UTC calendar days.
 *
 * Scoring logic:
 * - Same day: 1.0
 * - Within tolerance: 1 - days / toleranceDays
 * - Beyond tolerance: 0
 */

import { IN_BAND_FLOOR, MS_PER_DAY } from './constants';

/**
 * Calculates the number of calendar days between two dates.
 * Returns absolute value (always positive).
 */
export function daysBetween(date1: Date, date2: Date): number {
  const utc1 = Date.UTC(date1.getUTCFullYear(), date1.getUTCMonth(), date1.getUTCDate());
  const utc2 = Date.UTC(date2.getUTCFullYear(), date2.getUTCMonth(), date2.getUTCDate());

  return Math.abs(Math.round((utc2 - utc1) / MS_PER_DAY));
}

/**
 * @param queryDate - Date the user remembers
 * @param transactionDate - Date on the transaction
 * @param toleranceDays - Largest accepted distance in days
 * @returns Score from 0 to 1
 *
 * @example
 * scoreDate(new Date('2024-01-15'), new Date('2024-01-15'), 3) // 1
 * scoreDate(new Date('2024-01-15'), new Date('2024-01-14'), 4) // 0.75
 * scoreDate(new Date('2024-01-15'), new Date('2024-01-10'), 3) // 0
 */
export function scoreDate(queryDate: Date, transactionDate: Date, toleranceDays: number): number {
  const difference = daysBetween(queryDate, transactionDate);

  if (difference === 0) {
    return 1;
  }

  if (difference > toleranceDays) {
    return 0;
  }

  return Math.max(IN_BAND_FLOOR, 1 - difference / toleranceDays);
}

/**
 * Parses a YYYY-MM-DD string into a UTC calendar date.
 * Returns null for malformed input or impossible dates such as 2024-02-30.
 */
export function parseCalendarDate(value: string): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) {
    return null;
  }

  const [, year, month, day] = match.map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return date;
}

/**
 * Formats a calendar date as YYYY-MM-DD
 */
export function formatCalendarDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export default scoreDate;
