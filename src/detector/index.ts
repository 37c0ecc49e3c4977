/**
 * Occasion Detector
 *
 * Turns a roster snapshot into the birthdays and work anniversaries that fall
 * inside the lookahead window. Pure: never reads or writes the ledger.
 */

import {
  DEFAULT_LEAP_DAY_POLICY,
  compareCalendarDates,
  daysUntilNextOccurrence,
  elapsedYears,
  isValidCalendarDate,
  isWithinWindow,
  nextOccurrence,
} from '../dates/index.js';
import { ConfigurationError } from '../errors/index.js';
import type {
  CalendarDate,
  DeliveryKey,
  LeapDayPolicy,
  MilestonePolicy,
  Occasion,
  OccasionKind,
  StaffRecord,
} from '../types/index.js';

export const DEFAULT_MILESTONE_POLICY: MilestonePolicy = {
  years: [1],
  interval: 5,
};

export interface DetectOptions {
  milestones?: MilestonePolicy;
  leapDayPolicy?: LeapDayPolicy;
  /** Drop anniversaries that are not milestones */
  anniversaryMilestonesOnly?: boolean;
}

const KIND_ORDER: Record<OccasionKind, number> = {
  birthday: 0,
  anniversary: 1,
};

export function isMilestone(years: number | null, policy: MilestonePolicy = DEFAULT_MILESTONE_POLICY): boolean {
  if (years === null || years <= 0) {
    return false;
  }
  if (policy.years.includes(years)) {
    return true;
  }
  return policy.interval > 0 && years % policy.interval === 0;
}

export function occasionKey(occasion: Occasion): DeliveryKey {
  return {
    subjectId: occasion.subjectId,
    kind: occasion.kind,
    year: occasion.referenceYear,
  };
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Deterministic processing order: target date, subject id, kind
 */
export function compareOccasions(a: Occasion, b: Occasion): number {
  return (
    compareCalendarDates(a.targetDate, b.targetDate) ||
    compareIds(a.subjectId, b.subjectId) ||
    KIND_ORDER[a.kind] - KIND_ORDER[b.kind]
  );
}

function detectBirthday(
  staff: StaffRecord,
  referenceDate: CalendarDate,
  windowDays: number,
  milestones: MilestonePolicy,
  leapDayPolicy: LeapDayPolicy
): Occasion | null {
  const daysUntil = daysUntilNextOccurrence(referenceDate, staff.birthDate, leapDayPolicy);
  if (!isWithinWindow(daysUntil, windowDays)) {
    return null;
  }

  const targetDate = nextOccurrence(referenceDate, staff.birthDate, leapDayPolicy);
  let age: number | null = null;
  if (staff.birthDate.year !== null) {
    const computed = elapsedYears(
      { year: staff.birthDate.year, month: staff.birthDate.month, day: staff.birthDate.day },
      targetDate,
      leapDayPolicy
    );
    age = computed >= 0 ? computed : null;
  }

  return {
    subjectId: staff.id,
    subject: staff,
    kind: 'birthday',
    referenceYear: targetDate.year,
    elapsedYears: age,
    milestone: isMilestone(age, milestones),
    targetDate,
    daysUntil,
  };
}

function detectAnniversary(
  staff: StaffRecord,
  referenceDate: CalendarDate,
  windowDays: number,
  milestones: MilestonePolicy,
  leapDayPolicy: LeapDayPolicy
): Occasion | null {
  const daysUntil = daysUntilNextOccurrence(referenceDate, staff.startDate, leapDayPolicy);
  if (!isWithinWindow(daysUntil, windowDays)) {
    return null;
  }

  const targetDate = nextOccurrence(referenceDate, staff.startDate, leapDayPolicy);
  const tenure = elapsedYears(staff.startDate, targetDate, leapDayPolicy);
  // zero-year anniversaries (the start date itself) are not occasions
  if (tenure < 1) {
    return null;
  }

  return {
    subjectId: staff.id,
    subject: staff,
    kind: 'anniversary',
    referenceYear: targetDate.year,
    elapsedYears: tenure,
    milestone: isMilestone(tenure, milestones),
    targetDate,
    daysUntil,
  };
}

/**
 * Detect qualifying occasions within `windowDays` of `referenceDate`
 *
 * @throws ConfigurationError for a negative or fractional window or an invalid reference date
 */
export function detect(
  roster: readonly StaffRecord[],
  referenceDate: CalendarDate,
  windowDays: number,
  options: DetectOptions = {}
): Occasion[] {
  if (!Number.isInteger(windowDays) || windowDays < 0) {
    throw new ConfigurationError('Invalid lookahead window', [
      `windowDays must be a non-negative integer, got ${windowDays}`,
    ]);
  }
  if (!isValidCalendarDate(referenceDate)) {
    throw new ConfigurationError('Invalid reference date', [JSON.stringify(referenceDate)]);
  }

  const milestones = options.milestones ?? DEFAULT_MILESTONE_POLICY;
  const leapDayPolicy = options.leapDayPolicy ?? DEFAULT_LEAP_DAY_POLICY;
  const occasions: Occasion[] = [];

  for (const staff of roster) {
    const birthday = detectBirthday(staff, referenceDate, windowDays, milestones, leapDayPolicy);
    if (birthday) {
      occasions.push(birthday);
    }

    const anniversary = detectAnniversary(staff, referenceDate, windowDays, milestones, leapDayPolicy);
    if (anniversary && (!options.anniversaryMilestonesOnly || anniversary.milestone)) {
      occasions.push(anniversary);
    }
  }

  return occasions.sort(compareOccasions);
}
