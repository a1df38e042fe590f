/**
 * Calendar date helpers
 * Dates are plain YYYY-MM-DD strings; the binary layout stores them as
 * whole days since 1970-01-01.
 */

import { addDays, differenceInCalendarDays, format, isValid, parseISO } from 'date-fns';

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const EPOCH = new Date(1970, 0, 1);

export function isIsoDateFormat(value: string): boolean {
  return ISO_DATE_PATTERN.test(value);
}

/**
 * True for a YYYY-MM-DD string naming a real day (2024-02-29 yes, 2023-02-29 no)
 */
export function isCalendarDate(value: string): boolean {
  return isIsoDateFormat(value) && isValid(parseISO(value));
}

export function toEpochDay(date: string): number {
  return differenceInCalendarDays(parseISO(date), EPOCH);
}

/**
 * Returns null when the day count falls outside the representable date range
 */
export function fromEpochDay(days: number): string | null {
  const date = addDays(EPOCH, days);
  return isValid(date) ? format(date, 'yyyy-MM-dd') : null;
}
