/**
 * Core type definitions for Staff Occasions
 *
 * This module exports all shared types used across the system.
 */

// ============================================================================
// Calendar Values
// ============================================================================

/**
 * A calendar date with no time or time zone attached.
 * month is 1-12, day is 1-31.
 */
export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

/**
 * Month and day of a recurring date, independent of year
 */
export interface MonthDay {
  month: number;
  day: number;
}

/**
 * A birth date whose year may be unknown
 */
export interface BirthDate extends MonthDay {
  year: number | null;
}

/**
 * How Feb-29 dates are observed in non-leap years
 */
export type LeapDayPolicy = 'feb28' | 'mar1';

// ============================================================================
// Roster
// ============================================================================

/**
 * Staff record as read from the roster. Treated as read-only input.
 */
export interface StaffRecord {
  id: string;
  name: string;
  /** Nickname or preferred name */
  alias: string | null;
  email: string;
  birthDate: BirthDate;
  startDate: CalendarDate;
  interests: string[];
}

// ============================================================================
// Occasions
// ============================================================================

export type OccasionKind = 'birthday' | 'anniversary';

/**
 * Milestone policy: a count is a milestone when it appears in `years`
 * or is a positive multiple of `interval` (0 disables the interval rule).
 */
export interface MilestonePolicy {
  years: number[];
  interval: number;
}

/**
 * A detected birthday or work anniversary for one subject in one year.
 * Built fresh on every scan and never persisted.
 */
export interface Occasion {
  subjectId: string;
  subject: StaffRecord;
  kind: OccasionKind;
  /** Calendar year of targetDate, part of the delivery key */
  referenceYear: number;
  /** Age for birthdays (null when the birth year is unknown), tenure for anniversaries */
  elapsedYears: number | null;
  milestone: boolean;
  targetDate: CalendarDate;
  daysUntil: number;
}

// ============================================================================
// Delivery Ledger
// ============================================================================

/**
 * Composite key identifying one occasion delivery
 */
export interface DeliveryKey {
  subjectId: string;
  kind: OccasionKind;
  year: number;
}

export type DeliveryStatus = 'pending' | 'delivered' | 'failed';

/**
 * Persisted delivery state for one key
 */
export interface DeliveryRecord {
  key: DeliveryKey;
  status: DeliveryStatus;
  updatedAt: string;
  retryCount: number;
  lastError: string | null;
  deliveredAt: string | null;
  messageId: string | null;
  /** Concurrency token assigned by the store; null before the first write */
  version: string | null;
}

// ============================================================================
// Collaborator Payloads
// ============================================================================

/**
 * Input for content and image generation
 */
export interface GreetingRequest {
  subjectId: string;
  subjectName: string;
  kind: OccasionKind;
  elapsedYears: number | null;
  milestone: boolean;
  interests: string[];
}

/**
 * Generated greeting text
 */
export interface GeneratedText {
  body: string;
  provider: string;
  model: string | null;
  generatedAt: string;
}

/**
 * Generated greeting card image
 */
export interface ImageHandle {
  /** Base64-encoded image bytes */
  base64: string;
  contentType: 'image/png' | 'image/jpeg';
  fileName: string;
  prompt: string;
  provider: string;
}

/**
 * Email ready to hand to a transport
 */
export interface RenderedGreeting {
  subject: string;
  bodyPlain: string;
  bodyHtml: string;
}

/**
 * Transport confirmation for an accepted message
 */
export interface DeliveryConfirmation {
  messageId: string;
  provider: string;
  acceptedAt: string;
}

/**
 * Options passed to every collaborator call
 */
export interface CallOptions {
  signal?: AbortSignal | undefined;
}

// ============================================================================
// Pipeline Results
// ============================================================================

export type AttemptOutcome =
  | 'delivered'
  | 'failed'
  | 'skipped_delivered'
  | 'skipped_exhausted'
  | 'skipped_in_flight'
  | 'cancelled';

/**
 * Result of pushing one occasion through the pipeline
 */
export interface DeliveryAttempt {
  occasion: Occasion;
  key: DeliveryKey;
  outcome: AttemptOutcome;
  content: GeneratedText | null;
  /** Null when image generation failed and delivery went ahead without it */
  image: ImageHandle | null;
  confirmation: DeliveryConfirmation | null;
  error: string | null;
  record: DeliveryRecord | null;
}
