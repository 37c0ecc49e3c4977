/**
 * Error taxonomy
 *
 * Per-occasion errors (GenerationError, TransportError) are recoverable and
 * become ledger transitions. Configuration, roster and ledger-store errors
 * are fatal to a cycle and surface to the operator.
 */

export type ErrorCode =
  | 'GENERATION_ERROR'
  | 'TRANSPORT_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'LEDGER_CONFLICT'
  | 'LEDGER_UNAVAILABLE'
  | 'ROSTER_ERROR'
  | 'CYCLE_IN_PROGRESS';

/**
 * Base class carrying a stable error code
 */
export abstract class OccasionError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Content or image provider failure or timeout
 */
export class GenerationError extends OccasionError {
  readonly code = 'GENERATION_ERROR' as const;
  readonly provider: string;
  readonly timedOut: boolean;

  constructor(
    message: string,
    options: { provider: string; timedOut?: boolean; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.provider = options.provider;
    this.timedOut = options.timedOut ?? false;
  }
}

/**
 * Delivery transport failure or timeout
 */
export class TransportError extends OccasionError {
  readonly code = 'TRANSPORT_ERROR' as const;
  readonly provider: string;
  readonly status: number | null;
  readonly timedOut: boolean;

  constructor(
    message: string,
    options: { provider: string; status?: number | null; timedOut?: boolean; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.provider = options.provider;
    this.status = options.status ?? null;
    this.timedOut = options.timedOut ?? false;
  }
}

/**
 * Missing or invalid configuration. Fatal at startup.
 */
export class ConfigurationError extends OccasionError {
  readonly code = 'CONFIGURATION_ERROR' as const;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

/**
 * A concurrent write changed the record between read and write
 */
export class LedgerConflictError extends OccasionError {
  readonly code = 'LEDGER_CONFLICT' as const;
  readonly key: string;

  constructor(key: string, options?: { cause?: unknown }) {
    super(`Concurrent ledger write detected for ${key}`, options);
    this.key = key;
  }
}

/**
 * The ledger store cannot be read or written
 */
export class LedgerUnavailableError extends OccasionError {
  readonly code = 'LEDGER_UNAVAILABLE' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * The roster cannot be loaded
 */
export class RosterError extends OccasionError {
  readonly code = 'ROSTER_ERROR' as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * Another process holds the cycle lock
 */
export class CycleInProgressError extends OccasionError {
  readonly code = 'CYCLE_IN_PROGRESS' as const;
  readonly owner: string | null;

  constructor(owner: string | null) {
    super(owner ? `A scan cycle is already running (${owner})` : 'A scan cycle is already running');
    this.owner = owner;
  }
}

export function isOccasionError(error: unknown): error is OccasionError {
  return error instanceof OccasionError;
}

/**
 * Message of a caught value
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Errno-style `code` of a caught value. Errors raised by Node's fs may come
 * from another realm, so this does not rely on `instanceof Error`.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}
