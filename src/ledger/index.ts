/**
 * Delivery Ledger
 *
 * Tracks, per (subject, kind, year), whether a greeting has been delivered.
 *
 * Every read-modify-write of a key runs under an in-process per-key lock and
 * is committed with the store's optimistic version check. A version mismatch
 * (another process wrote first) is resolved by re-reading and re-applying the
 * transition, never by overwriting. Delivered records are immutable.
 */

import { LedgerConflictError, LedgerUnavailableError } from '../errors/index.js';
import { defaultLogger, defaultMetrics, type Logger, type Metrics } from '../observability/index.js';
import { formatDeliveryKey, type LedgerStore } from '../storage/index.js';
import type { DeliveryKey, DeliveryRecord, DeliveryStatus } from '../types/index.js';

export { formatDeliveryKey } from '../storage/index.js';

const DEFAULT_MAX_CONFLICT_RETRIES = 5;

export const INTERRUPTED_REASON = 'interrupted: pending lease expired';

export type ClaimStatus = 'claimed' | 'delivered' | 'exhausted' | 'in_flight';

export interface ClaimOptions {
  maxAttempts: number;
  /** Age after which a pending record is considered abandoned */
  pendingLeaseMs: number;
}

export interface ClaimResult {
  status: ClaimStatus;
  record: DeliveryRecord | null;
  /** A stale pending record was converted into a failed attempt */
  expired: boolean;
}

export interface AttemptDetails {
  error?: string | null;
  messageId?: string | null;
}

export interface DeliveryLedgerOptions {
  store: LedgerStore;
  logger?: Logger;
  metrics?: Metrics;
  clock?: () => Date;
  maxConflictRetries?: number;
}

interface Transition<T> {
  next: DeliveryRecord | null;
  result: T;
}

export class DeliveryLedger {
  private readonly store: LedgerStore;
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly clock: () => Date;
  private readonly maxConflictRetries: number;
  private readonly locks = new Map<string, Promise<unknown>>();

  constructor(options: DeliveryLedgerOptions) {
    this.store = options.store;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
    this.clock = options.clock ?? (() => new Date());
    this.maxConflictRetries = options.maxConflictRetries ?? DEFAULT_MAX_CONFLICT_RETRIES;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  async get(key: DeliveryKey): Promise<DeliveryRecord | null> {
    return this.store.get(key);
  }

  async isDelivered(key: DeliveryKey): Promise<boolean> {
    const record = await this.store.get(key);
    return record?.status === 'delivered';
  }

  /**
   * Whether the pipeline may (re)attempt this key. Pending keys belong to
   * an attempt in flight and are not retried.
   */
  async shouldRetry(key: DeliveryKey, maxAttempts: number): Promise<boolean> {
    const record = await this.store.get(key);
    if (!record) {
      return true;
    }
    return record.status === 'failed' && record.retryCount < maxAttempts;
  }

  async list(): Promise<DeliveryRecord[]> {
    const records = await this.store.list();
    return records.sort((a, b) => compareKeys(a.key, b.key));
  }

  /**
   * Failed records that reached the attempt ceiling and need manual attention
   */
  async listTerminalFailures(maxAttempts: number): Promise<DeliveryRecord[]> {
    const records = await this.list();
    return records.filter((record) => record.status === 'failed' && record.retryCount >= maxAttempts);
  }

  /**
   * @throws LedgerUnavailableError when the store cannot be reached
   */
  async healthCheck(): Promise<void> {
    await this.store.ping();
  }

  // ==========================================================================
  // Transitions
  // ==========================================================================

  /**
   * Atomically decide whether this caller may attempt delivery.
   * On `claimed` the record is left `pending` for the caller to resolve.
   */
  async claim(key: DeliveryKey, options: ClaimOptions): Promise<ClaimResult> {
    const now = this.clock();

    const { result, record } = await this.mutate<{ status: ClaimStatus; expired: boolean }>(key, (current) => {
      if (!current) {
        return {
          next: this.buildRecord(key, null, 'pending', 0, {}, now),
          result: { status: 'claimed', expired: false },
        };
      }

      if (current.status === 'delivered') {
        return { next: null, result: { status: 'delivered', expired: false } };
      }

      if (current.status === 'pending') {
        const age = now.getTime() - Date.parse(current.updatedAt);
        if (age < options.pendingLeaseMs) {
          return { next: null, result: { status: 'in_flight', expired: false } };
        }
        const retryCount = current.retryCount + 1;
        if (retryCount >= options.maxAttempts) {
          return {
            next: this.buildRecord(key, current, 'failed', 1, { error: INTERRUPTED_REASON }, now),
            result: { status: 'exhausted', expired: true },
          };
        }
        return {
          next: {
            ...this.buildRecord(key, current, 'pending', 1, {}, now),
            lastError: INTERRUPTED_REASON,
          },
          result: { status: 'claimed', expired: true },
        };
      }

      if (current.retryCount >= options.maxAttempts) {
        return { next: null, result: { status: 'exhausted', expired: false } };
      }
      return {
        next: { ...this.buildRecord(key, current, 'pending', 0, {}, now), lastError: current.lastError },
        result: { status: 'claimed', expired: false },
      };
    });

    this.metrics.incrementCounter('ledger.claim', { status: result.status });
    if (result.expired) {
      this.logger.warn('Expired pending record converted to failed attempt', {
        key: formatDeliveryKey(key),
        retryCount: record?.retryCount,
      });
    }

    return { status: result.status, record, expired: result.expired };
  }

  /**
   * Record the outcome of an attempt.
   *
   * Once a key is delivered this is a no-op returning the delivered record,
   * whatever outcome is passed.
   */
  async recordAttempt(
    key: DeliveryKey,
    outcome: DeliveryStatus,
    retryCountIncrement = 0,
    details: AttemptDetails = {}
  ): Promise<DeliveryRecord> {
    const now = this.clock();

    const { record, result: changed } = await this.mutate<boolean>(key, (current) => {
      if (current?.status === 'delivered') {
        return { next: null, result: false };
      }
      return {
        next: this.buildRecord(key, current, outcome, retryCountIncrement, details, now),
        result: true,
      };
    });

    if (!record) {
      throw new LedgerUnavailableError(`Ledger record ${formatDeliveryKey(key)} missing after write`);
    }

    if (changed) {
      this.metrics.incrementCounter('ledger.transition', { status: outcome });
      this.logger.debug('Ledger record updated', {
        key: formatDeliveryKey(key),
        status: record.status,
        retryCount: record.retryCount,
      });
    } else if (outcome !== 'delivered') {
      this.logger.warn('Ignoring transition on delivered record', {
        key: formatDeliveryKey(key),
        attempted: outcome,
      });
    }

    return record;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private buildRecord(
    key: DeliveryKey,
    current: DeliveryRecord | null,
    status: DeliveryStatus,
    retryCountIncrement: number,
    details: AttemptDetails,
    now: Date
  ): DeliveryRecord {
    const timestamp = now.toISOString();
    return {
      key: { ...key },
      status,
      updatedAt: timestamp,
      retryCount: (current?.retryCount ?? 0) + retryCountIncrement,
      lastError: status === 'failed' ? details.error ?? current?.lastError ?? null : null,
      deliveredAt: status === 'delivered' ? timestamp : null,
      messageId: status === 'delivered' ? details.messageId ?? null : null,
      version: current?.version ?? null,
    };
  }

  /**
   * Read-modify-write under the key lock, re-applied on version conflicts
   */
  private mutate<T>(
    key: DeliveryKey,
    transition: (current: DeliveryRecord | null) => Transition<T>
  ): Promise<{ record: DeliveryRecord | null; result: T }> {
    return this.withKeyLock(formatDeliveryKey(key), async () => {
      let conflict: LedgerConflictError | null = null;

      for (let attempt = 0; attempt <= this.maxConflictRetries; attempt++) {
        const current = await this.store.get(key);
        const { next, result } = transition(current);
        if (!next) {
          return { record: current, result };
        }
        try {
          const saved = await this.store.put(next, current?.version ?? null);
          return { record: saved, result };
        } catch (error) {
          if (!(error instanceof LedgerConflictError)) {
            throw error;
          }
          conflict = error;
          this.metrics.incrementCounter('ledger.conflict');
          this.logger.warn('Ledger write conflict, retrying', {
            key: formatDeliveryKey(key),
            attempt: attempt + 1,
          });
        }
      }

      throw conflict ?? new LedgerConflictError(formatDeliveryKey(key));
    });
  }

  private async withKeyLock<T>(keyLabel: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(keyLabel) ?? Promise.resolve();
    const run = previous.then(operation, operation);
    const tail = run.catch(() => undefined);
    this.locks.set(keyLabel, tail);
    try {
      return await run;
    } finally {
      if (this.locks.get(keyLabel) === tail) {
        this.locks.delete(keyLabel);
      }
    }
  }
}

function compareKeys(a: DeliveryKey, b: DeliveryKey): number {
  if (a.year !== b.year) return a.year - b.year;
  if (a.subjectId !== b.subjectId) return a.subjectId < b.subjectId ? -1 : 1;
  if (a.kind !== b.kind) return a.kind === 'birthday' ? -1 : 1;
  return 0;
}
