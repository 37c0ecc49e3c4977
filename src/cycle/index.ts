/**
 * Scan Cycle
 *
 * One detect-then-deliver pass over the roster:
 * ledger health check -> roster snapshot -> detect -> process (or plan only).
 *
 * Ledger and roster failures abort the cycle before any occasion is touched.
 * A delivering cycle holds the cycle lock, when one is configured, from
 * start to finish.
 */

import { todayInTimeZone, formatCalendarDate } from '../dates/index.js';
import { detect, occasionKey, type DetectOptions } from '../detector/index.js';
import type { DeliveryLedger } from '../ledger/index.js';
import { defaultLogger, defaultMetrics, type Logger, type Metrics } from '../observability/index.js';
import type { PipelineOrchestrator } from '../orchestrator/index.js';
import type { RosterSource } from '../roster/index.js';
import type { CycleLock } from '../storage/index.js';
import type {
  AttemptOutcome,
  CalendarDate,
  DeliveryAttempt,
  DeliveryKey,
  DeliveryStatus,
  Occasion,
} from '../types/index.js';

export interface CycleOptions {
  /** Defaults to today in the configured time zone */
  referenceDate?: CalendarDate;
  /** Plan only: no collaborator calls, no ledger writes */
  dryRun?: boolean;
  /** Overrides the configured lookahead window */
  windowDays?: number;
  signal?: AbortSignal;
}

/**
 * Dry-run view of one occasion
 */
export interface PlannedOccasion {
  occasion: Occasion;
  key: DeliveryKey;
  status: DeliveryStatus | 'new';
  retryCount: number;
  willAttempt: boolean;
}

export interface CycleReport {
  referenceDate: CalendarDate;
  windowDays: number;
  dryRun: boolean;
  startedAt: string;
  durationMs: number;
  rosterSize: number;
  occasions: Occasion[];
  planned: PlannedOccasion[];
  attempts: DeliveryAttempt[];
  counts: Record<AttemptOutcome, number>;
}

export interface CycleRunnerOptions {
  roster: RosterSource;
  ledger: DeliveryLedger;
  orchestrator: PipelineOrchestrator;
  lookaheadDays: number;
  maxAttempts: number;
  detect?: DetectOptions;
  timeZone?: string | null;
  /** Held for every delivering cycle; dry runs only read */
  lock?: CycleLock | null;
  clock?: () => Date;
  logger?: Logger;
  metrics?: Metrics;
}

export function emptyCounts(): Record<AttemptOutcome, number> {
  return {
    delivered: 0,
    failed: 0,
    skipped_delivered: 0,
    skipped_exhausted: 0,
    skipped_in_flight: 0,
    cancelled: 0,
  };
}

export class CycleRunner {
  private readonly options: CycleRunnerOptions;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(options: CycleRunnerOptions) {
    this.options = options;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  today(): CalendarDate {
    return todayInTimeZone(this.clock(), this.options.timeZone ?? undefined);
  }

  /**
   * Run one cycle
   *
   * @throws LedgerUnavailableError, RosterError or ConfigurationError; these end the cycle
   * @throws CycleInProgressError when another process holds the cycle lock
   */
  async runCycle(options: CycleOptions = {}): Promise<CycleReport> {
    const lock = options.dryRun ? null : this.options.lock ?? null;
    if (!lock) {
      return this.execute(options);
    }
    const lease = await lock.acquire();
    try {
      return await this.execute(options);
    } finally {
      await lease.release();
    }
  }

  private async execute(options: CycleOptions): Promise<CycleReport> {
    const startedAt = this.clock();
    const startTime = Date.now();
    const referenceDate = options.referenceDate ?? this.today();
    const windowDays = options.windowDays ?? this.options.lookaheadDays;
    const dryRun = options.dryRun ?? false;
    const { ledger, roster, orchestrator, maxAttempts } = this.options;

    this.logger.info('Cycle started', {
      referenceDate: formatCalendarDate(referenceDate),
      windowDays,
      dryRun,
    });

    await ledger.healthCheck();
    const staff = await roster.listStaff();
    const occasions = detect(staff, referenceDate, windowDays, this.options.detect);

    this.logger.info('Occasions detected', { rosterSize: staff.length, occasions: occasions.length });
    this.metrics.recordGauge('cycle.occasions', occasions.length);

    const counts = emptyCounts();
    let planned: PlannedOccasion[] = [];
    let attempts: DeliveryAttempt[] = [];

    if (dryRun) {
      planned = await Promise.all(
        occasions.map(async (occasion): Promise<PlannedOccasion> => {
          const key = occasionKey(occasion);
          const record = await ledger.get(key);
          return {
            occasion,
            key,
            status: record?.status ?? 'new',
            retryCount: record?.retryCount ?? 0,
            willAttempt: await ledger.shouldRetry(key, maxAttempts),
          };
        })
      );
    } else {
      attempts = await orchestrator.process(occasions, options.signal ? { signal: options.signal } : {});
      for (const attempt of attempts) {
        counts[attempt.outcome] += 1;
      }
    }

    const durationMs = Date.now() - startTime;
    this.metrics.recordDuration('cycle.duration', durationMs, { dryRun: String(dryRun) });
    this.logger.info('Cycle finished', { dryRun, durationMs, ...counts });

    return {
      referenceDate,
      windowDays,
      dryRun,
      startedAt: startedAt.toISOString(),
      durationMs,
      rosterSize: staff.length,
      occasions,
      planned,
      attempts,
      counts,
    };
  }
}
