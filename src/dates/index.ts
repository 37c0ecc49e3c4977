/**
 * Date Arithmetic Module
 *
 * Year-agnostic calendar helpers used by the detector. Every function works on
 * plain calendar fields; `Date` values are only built internally (local
 * midnight) so date-fns can do the day arithmetic.
 *
 * Feb-29 dates are observed on Feb-28 (default) or Mar-1 in non-leap years.
 */

import {
  addDays,
  differenceInCalendarDays,
  format,
  getDaysInMonth,
  isLeapYear,
} from 'date-fns';
import type { BirthDate, CalendarDate, LeapDayPolicy, MonthDay } from '../types/index.js';

export const DEFAULT_LEAP_DAY_POLICY: LeapDayPolicy = 'feb28';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const YEARLESS_DATE_PATTERN = /^--(\d{2})-(\d{2})$/;

// ============================================================================
// Conversion
// ============================================================================

/**
 * Local-midnight Date for a calendar date. setFullYear keeps years < 100 intact.
 */
export function toLocalDate(date: CalendarDate): Date {
  const result = new Date(0);
  result.setFullYear(date.year, date.month - 1, date.day);
  result.setHours(0, 0, 0, 0);
  return result;
}

export function fromLocalDate(date: Date): CalendarDate {
  return {
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate(),
  };
}

function isLeap(year: number): boolean {
  return isLeapYear(toLocalDate({ year, month: 1, day: 1 }));
}

// ============================================================================
// Validation
// ============================================================================

export function isValidCalendarDate(date: CalendarDate): boolean {
  const { year, month, day } = date;
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return false;
  }
  if (year < 1 || month < 1 || month > 12 || day < 1) {
    return false;
  }
  return day <= getDaysInMonth(toLocalDate({ year, month, day: 1 }));
}

/**
 * Month/day valid in at least one year (Feb-29 included)
 */
export function isValidMonthDay(monthDay: MonthDay): boolean {
  return isValidCalendarDate({ year: 2000, month: monthDay.month, day: monthDay.day });
}

// ============================================================================
// Comparison
// ============================================================================

export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  if (a.year !== b.year) return a.year - b.year;
  if (a.month !== b.month) return a.month - b.month;
  return a.day - b.day;
}

function isLeapDay(monthDay: MonthDay): boolean {
  return monthDay.month === 2 && monthDay.day === 29;
}

/**
 * The date on which `target` is observed in `year`
 */
export function observedDate(
  target: MonthDay,
  year: number,
  policy: LeapDayPolicy = DEFAULT_LEAP_DAY_POLICY
): CalendarDate {
  if (isLeapDay(target) && !isLeap(year)) {
    return policy === 'feb28' ? { year, month: 2, day: 28 } : { year, month: 3, day: 1 };
  }
  return { year, month: target.month, day: target.day };
}

/**
 * Compare month and day only. With a year, Feb-29 on either side is first
 * resolved to its observed date in that year.
 */
export function isSameCalendarDay(
  a: MonthDay,
  b: MonthDay,
  year?: number,
  policy: LeapDayPolicy = DEFAULT_LEAP_DAY_POLICY
): boolean {
  if (year === undefined) {
    return a.month === b.month && a.day === b.day;
  }
  const left = observedDate(a, year, policy);
  const right = observedDate(b, year, policy);
  return left.month === right.month && left.day === right.day;
}

// ============================================================================
// Occurrence Arithmetic
// ============================================================================

/**
 * Next date on or after `reference` matching `target`
 */
export function nextOccurrence(
  reference: CalendarDate,
  target: MonthDay,
  policy: LeapDayPolicy = DEFAULT_LEAP_DAY_POLICY
): CalendarDate {
  const thisYear = observedDate(target, reference.year, policy);
  if (compareCalendarDates(thisYear, reference) >= 0) {
    return thisYear;
  }
  return observedDate(target, reference.year + 1, policy);
}

/**
 * Days from `reference` to the next occurrence of `target`, in [0, 365]
 */
export function daysUntilNextOccurrence(
  reference: CalendarDate,
  target: MonthDay,
  policy: LeapDayPolicy = DEFAULT_LEAP_DAY_POLICY
): number {
  const next = nextOccurrence(reference, target, policy);
  return differenceInCalendarDays(toLocalDate(next), toLocalDate(reference));
}

/**
 * Whole years from `start` to `reference`. A year counts once its
 * (observed) month/day is reached. Negative when start is after reference.
 */
export function elapsedYears(
  start: CalendarDate,
  reference: CalendarDate,
  policy: LeapDayPolicy = DEFAULT_LEAP_DAY_POLICY
): number {
  const years = reference.year - start.year;
  const anniversary = observedDate(start, reference.year, policy);
  return compareCalendarDates(reference, anniversary) < 0 ? years - 1 : years;
}

export function isWithinWindow(daysUntil: number, windowDays: number): boolean {
  return daysUntil >= 0 && daysUntil <= windowDays;
}

export function addDaysToCalendarDate(date: CalendarDate, days: number): CalendarDate {
  return fromLocalDate(addDays(toLocalDate(date), days));
}

// ============================================================================
// Parsing and Formatting
// ============================================================================

/**
 * Parse `YYYY-MM-DD`. Returns null for malformed or impossible dates.
 */
export function parseCalendarDate(value: string): CalendarDate | null {
  const match = ISO_DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const date = { year: Number(match[1]), month: Number(match[2]), day: Number(match[3]) };
  return isValidCalendarDate(date) ? date : null;
}

/**
 * Parse `YYYY-MM-DD` or the year-less `--MM-DD` form
 */
export function parseBirthDate(value: string): BirthDate | null {
  const yearless = YEARLESS_DATE_PATTERN.exec(value.trim());
  if (yearless) {
    const monthDay = { month: Number(yearless[1]), day: Number(yearless[2]) };
    return isValidMonthDay(monthDay) ? { ...monthDay, year: null } : null;
  }
  const full = parseCalendarDate(value);
  return full ? { year: full.year, month: full.month, day: full.day } : null;
}

export function formatCalendarDate(date: CalendarDate): string {
  const year = String(date.year).padStart(4, '0');
  const month = String(date.month).padStart(2, '0');
  const day = String(date.day).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Display form used in greetings, e.g. "August 15th"
 */
export function formatDateDisplay(date: MonthDay): string {
  return format(toLocalDate({ year: 2000, month: date.month, day: date.day }), 'MMMM do');
}

/**
 * Calendar date of `now` in a time zone (process local time when omitted)
 */
export function todayInTimeZone(now: Date, timeZone?: string): CalendarDate {
  if (!timeZone) {
    return fromLocalDate(now);
  }
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(now);
  const field = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((part) => part.type === type)?.value);
  return { year: field('year'), month: field('month'), day: field('day') };
}
