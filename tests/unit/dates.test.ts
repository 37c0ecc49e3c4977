/**
 * Unit tests for the calendar arithmetic helpers
 */

import { describe, it, expect } from '@jest/globals';
import {
  addDaysToCalendarDate,
  daysUntilNextOccurrence,
  elapsedYears,
  formatCalendarDate,
  formatDateDisplay,
  isSameCalendarDay,
  isValidCalendarDate,
  isWithinWindow,
  nextOccurrence,
  observedDate,
  parseBirthDate,
  parseCalendarDate,
  todayInTimeZone,
} from '../../src/dates/index.js';
import type { CalendarDate } from '../../src/types/index.js';

describe('Dates Module', () => {
  describe('isValidCalendarDate()', () => {
    it('accepts Feb 29 only in leap years', () => {
      expect(isValidCalendarDate({ year: 2024, month: 2, day: 29 })).toBe(true);
      expect(isValidCalendarDate({ year: 2023, month: 2, day: 29 })).toBe(false);
      expect(isValidCalendarDate({ year: 1900, month: 2, day: 29 })).toBe(false);
    });

    it('rejects out-of-range and fractional fields', () => {
      expect(isValidCalendarDate({ year: 2024, month: 13, day: 1 })).toBe(false);
      expect(isValidCalendarDate({ year: 2024, month: 4, day: 31 })).toBe(false);
      expect(isValidCalendarDate({ year: 2024, month: 1, day: 1.5 })).toBe(false);
      expect(isValidCalendarDate({ year: 2024, month: 0, day: 10 })).toBe(false);
    });
  });

  describe('observedDate()', () => {
    const leapDay = { month: 2, day: 29 };

    it('keeps Feb 29 in leap years', () => {
      expect(observedDate(leapDay, 2024)).toEqual({ year: 2024, month: 2, day: 29 });
    });

    it('moves Feb 29 to Feb 28 by default', () => {
      expect(observedDate(leapDay, 2023)).toEqual({ year: 2023, month: 2, day: 28 });
    });

    it('moves Feb 29 to Mar 1 with the mar1 policy', () => {
      expect(observedDate(leapDay, 2023, 'mar1')).toEqual({ year: 2023, month: 3, day: 1 });
    });
  });

  describe('occurrence properties', () => {
    const everyMonthDay = Array.from({ length: 12 }, (_, m) => m + 1).flatMap((month) =>
      Array.from({ length: 31 }, (_, d) => ({ month, day: d + 1 })).filter((md) =>
        isValidCalendarDate({ year: 2024, ...md })
      )
    );

    const everyDayOf = (year: number) => {
      const days: CalendarDate[] = [];
      for (let date = { year, month: 1, day: 1 }; date.year === year; date = addDaysToCalendarDate(date, 1)) {
        days.push(date);
      }
      return days;
    };

    it('covers every month/day including Feb 29', () => {
      expect(everyMonthDay).toHaveLength(366);
      expect(everyDayOf(2023)).toHaveLength(365);
      expect(everyDayOf(2024)).toHaveLength(366);
    });

    it.each<readonly [2023 | 2024, 'feb28' | 'mar1']>([
      [2023, 'feb28'],
      [2023, 'mar1'],
      [2024, 'feb28'],
      [2024, 'mar1'],
    ] as const)('stays within [0, 366] and hits 0 exactly on the day (%i, %s)', (year, policy) => {
      const violations: string[] = [];
      for (const reference of everyDayOf(year)) {
        for (const target of everyMonthDay) {
          const days = daysUntilNextOccurrence(reference, target, policy);
          const sameDay = isSameCalendarDay(reference, target, reference.year, policy);
          if (days < 0 || days > 366 || (days === 0) !== sameDay) {
            violations.push(`${formatCalendarDate(reference)} -> ${target.month}/${target.day}: ${days}`);
          }
        }
      }
      expect(violations).toEqual([]);
    });
  });

  describe('isSameCalendarDay()', () => {
    it('compares month and day only', () => {
      expect(isSameCalendarDay({ month: 8, day: 15 }, { month: 8, day: 15 })).toBe(true);
      expect(isSameCalendarDay({ month: 2, day: 29 }, { month: 2, day: 28 })).toBe(false);
    });

    it('resolves Feb 29 against the given year', () => {
      expect(isSameCalendarDay({ month: 2, day: 29 }, { month: 2, day: 28 }, 2023)).toBe(true);
      expect(isSameCalendarDay({ month: 2, day: 29 }, { month: 2, day: 28 }, 2024)).toBe(false);
      expect(isSameCalendarDay({ month: 2, day: 29 }, { month: 3, day: 1 }, 2023, 'mar1')).toBe(true);
    });
  });

  describe('nextOccurrence() / daysUntilNextOccurrence()', () => {
    it('finds an occurrence later this year', () => {
      const reference = { year: 2024, month: 8, day: 13 };
      expect(nextOccurrence(reference, { month: 8, day: 15 })).toEqual({ year: 2024, month: 8, day: 15 });
      expect(daysUntilNextOccurrence(reference, { month: 8, day: 15 })).toBe(2);
    });

    it('returns 0 on the day itself', () => {
      expect(daysUntilNextOccurrence({ year: 2024, month: 8, day: 15 }, { month: 8, day: 15 })).toBe(0);
    });

    it('wraps into the next year once the date has passed', () => {
      const reference = { year: 2024, month: 8, day: 16 };
      expect(nextOccurrence(reference, { month: 8, day: 15 })).toEqual({ year: 2025, month: 8, day: 15 });
    });

    it('crosses the year boundary', () => {
      expect(daysUntilNextOccurrence({ year: 2024, month: 12, day: 31 }, { month: 1, day: 1 })).toBe(1);
    });

    it('counts to the observed leap day in a non-leap year', () => {
      expect(daysUntilNextOccurrence({ year: 2023, month: 2, day: 28 }, { month: 2, day: 29 })).toBe(0);
      expect(daysUntilNextOccurrence({ year: 2023, month: 2, day: 28 }, { month: 2, day: 29 }, 'mar1')).toBe(1);
      // 2024-02-29 has passed; next is 2025-02-28
      expect(daysUntilNextOccurrence({ year: 2024, month: 3, day: 1 }, { month: 2, day: 29 })).toBe(364);
    });
  });

  describe('elapsedYears()', () => {
    const start = { year: 1990, month: 8, day: 15 };

    it('counts a year once the anniversary is reached', () => {
      expect(elapsedYears(start, { year: 2024, month: 8, day: 15 })).toBe(34);
      expect(elapsedYears(start, { year: 2024, month: 8, day: 14 })).toBe(33);
    });

    it('is negative when start is after the reference', () => {
      expect(elapsedYears({ year: 2030, month: 1, day: 1 }, { year: 2024, month: 6, day: 1 })).toBe(-6);
    });

    it('honours the leap day policy', () => {
      const leapStart = { year: 2000, month: 2, day: 29 };
      expect(elapsedYears(leapStart, { year: 2023, month: 2, day: 28 })).toBe(23);
      expect(elapsedYears(leapStart, { year: 2023, month: 2, day: 28 }, 'mar1')).toBe(22);
    });
  });

  describe('isWithinWindow()', () => {
    it('includes both ends of the window', () => {
      expect(isWithinWindow(0, 0)).toBe(true);
      expect(isWithinWindow(3, 3)).toBe(true);
      expect(isWithinWindow(4, 3)).toBe(false);
      expect(isWithinWindow(-1, 3)).toBe(false);
    });
  });

  describe('addDaysToCalendarDate()', () => {
    it('rolls over months and years', () => {
      expect(addDaysToCalendarDate({ year: 2024, month: 12, day: 30 }, 3)).toEqual({ year: 2025, month: 1, day: 2 });
      expect(addDaysToCalendarDate({ year: 2024, month: 2, day: 28 }, 1)).toEqual({ year: 2024, month: 2, day: 29 });
    });
  });

  describe('parsing', () => {
    it('parses ISO dates and rejects impossible ones', () => {
      expect(parseCalendarDate('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
      expect(parseCalendarDate(' 2024-01-05 ')).toEqual({ year: 2024, month: 1, day: 5 });
      expect(parseCalendarDate('2023-02-29')).toBeNull();
      expect(parseCalendarDate('15/08/1990')).toBeNull();
    });

    it('parses birth dates with and without a year', () => {
      expect(parseBirthDate('1990-08-15')).toEqual({ year: 1990, month: 8, day: 15 });
      expect(parseBirthDate('--02-29')).toEqual({ year: null, month: 2, day: 29 });
      expect(parseBirthDate('--13-01')).toBeNull();
      expect(parseBirthDate('')).toBeNull();
    });
  });

  describe('formatting', () => {
    it('formats ISO dates with zero padding', () => {
      expect(formatCalendarDate({ year: 2024, month: 8, day: 5 })).toBe('2024-08-05');
      expect(formatCalendarDate({ year: 5, month: 1, day: 2 })).toBe('0005-01-02');
    });

    it('formats display dates with ordinals', () => {
      expect(formatDateDisplay({ month: 8, day: 15 })).toBe('August 15th');
      expect(formatDateDisplay({ month: 3, day: 1 })).toBe('March 1st');
      expect(formatDateDisplay({ month: 2, day: 29 })).toBe('February 29th');
    });
  });

  describe('todayInTimeZone()', () => {
    it('uses the calendar date of the given zone', () => {
      const instant = new Date('2024-08-15T02:00:00Z');
      expect(todayInTimeZone(instant, 'America/New_York')).toEqual({ year: 2024, month: 8, day: 14 });
      expect(todayInTimeZone(instant, 'Asia/Tokyo')).toEqual({ year: 2024, month: 8, day: 15 });
      expect(todayInTimeZone(new Date('2024-12-31T20:00:00Z'), 'Asia/Tokyo')).toEqual({ year: 2025, month: 1, day: 1 });
    });

    it('falls back to local time without a zone', () => {
      const instant = new Date(2024, 7, 15, 12, 0);
      expect(todayInTimeZone(instant)).toEqual({ year: 2024, month: 8, day: 15 });
    });
  });
});
