/**
 * Calendar helpers for YYYY-MM-DD dates.
 * Dates carry no time or zone; arithmetic runs in UTC to avoid DST shifts.
 */
import { IsoDateSchema } from '@spendbook/types';
import type { IsoDate } from '@spendbook/types';

const MS_PER_DAY = 86_400_000;

export interface IsoWeek {
  year: number;
  week: number;
}

export function isIsoDate(value: string): boolean {
  return IsoDateSchema.safeParse(value).success;
}

/** Format a Date's local calendar day as YYYY-MM-DD */
export function formatLocalDate(date: Date): IsoDate {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/** Split YYYY-MM-DD into numeric parts (no validation) */
export function dateParts(date: IsoDate): { year: number; month: number; day: number } {
  const [year = 0, month = 0, day = 0] = date.split('-').map(Number);
  return { year, month, day };
}

/**
 * ISO-8601 week of a date.
 * Weeks start on Monday; week 1 is the week holding the year's first Thursday,
 * so early-January days can belong to the previous ISO year and late-December
 * days to the next.
 */
export function isoWeekOf(date: IsoDate): IsoWeek {
  const { year, month, day } = dateParts(date);
  const utc = new Date(Date.UTC(year, month - 1, day));
  const weekday = utc.getUTCDay() || 7; // Monday=1 … Sunday=7

  // Thursday of the same week decides the ISO year
  const thursday = new Date(utc.getTime() + (4 - weekday) * MS_PER_DAY);
  const isoYear = thursday.getUTCFullYear();
  const yearStart = Date.UTC(isoYear, 0, 1);
  const week = Math.floor((thursday.getTime() - yearStart) / MS_PER_DAY / 7) + 1;

  return { year: isoYear, week };
}
