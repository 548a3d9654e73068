import { differenceInCalendarDays, isValid, parseISO } from 'date-fns';

const CALENDAR_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * True for a real `YYYY-MM-DD` calendar date (rejects 2026-02-30).
 */
export function isCalendarDate(value: string): boolean {
  return CALENDAR_DATE_RE.test(value) && isValid(parseISO(value));
}

/**
 * True for an ISO-8601 date or date-time that starts with an extended
 * calendar date, e.g. "2026-10-19" or "2026-10-19T08:30:00Z".
 */
export function isIsoDateTime(value: string): boolean {
  return isCalendarDate(value.slice(0, 10)) && isValid(parseISO(value));
}

/**
 * The calendar day a timestamp was written for. Uses the date as written,
 * so "2026-10-19T23:30:00-05:00" is the 19th regardless of the host zone.
 */
export function calendarDay(isoDateTime: string): string {
  return isoDateTime.slice(0, 10);
}

/**
 * Whole calendar days from `earlier` to `later` (both `YYYY-MM-DD`).
 * Negative when `earlier` is actually after `later`.
 */
export function daysBetween(earlier: string, later: string): number {
  return differenceInCalendarDays(parseISO(later), parseISO(earlier));
}
