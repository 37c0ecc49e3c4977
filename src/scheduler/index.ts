/**
 * Scan Scheduler
 *
 * Runs a scan cycle once a day at a configured local time and on demand.
 * At most one cycle runs at a time: an overlapping trigger is rejected, or
 * with the `queue` policy held as a single follow-up run that later triggers
 * join. A cycle refused by another process's cycle lock is reported as
 * rejected. Cycle failures are logged and the next daily run stays scheduled.
 */

import { addDays, isAfter, set } from 'date-fns';
import type { CycleReport } from '../cycle/index.js';
import { ConfigurationError, CycleInProgressError, toErrorMessage } from '../errors/index.js';
import { defaultLogger, defaultMetrics, type Logger, type Metrics } from '../observability/index.js';

export type TriggerSource = 'schedule' | 'manual' | 'startup';

export type OverlapPolicy = 'reject' | 'queue';

export type TriggerOutcome =
  | { status: 'completed'; source: TriggerSource; report: CycleReport }
  | { status: 'failed'; source: TriggerSource; error: string }
  | { status: 'rejected'; source: TriggerSource; reason: 'cycle_in_progress' | 'stopped' };

export type CycleFn = (signal: AbortSignal, source: TriggerSource) => Promise<CycleReport>;

export interface ScanSchedulerOptions {
  runCycle: CycleFn;
  /** HH:MM, local time */
  dailyTime: string;
  overlap?: OverlapPolicy;
  runOnStart?: boolean;
  clock?: () => Date;
  logger?: Logger;
  metrics?: Metrics;
}

const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

function parseDailyTime(value: string): { hours: number; minutes: number } {
  const match = TIME_PATTERN.exec(value);
  if (!match) {
    throw new ConfigurationError('Invalid daily check time', [`expected HH:MM, got "${value}"`]);
  }
  return { hours: Number(match[1]), minutes: Number(match[2]) };
}

/**
 * First instant strictly after `now` whose local wall-clock time is `dailyTime`
 */
export function computeNextRunAt(now: Date, dailyTime: string): Date {
  const { hours, minutes } = parseDailyTime(dailyTime);
  const today = set(now, { hours, minutes, seconds: 0, milliseconds: 0 });
  return isAfter(today, now) ? today : set(addDays(now, 1), { hours, minutes, seconds: 0, milliseconds: 0 });
}

export class ScanScheduler {
  private readonly runCycle: CycleFn;
  private readonly dailyTime: string;
  private readonly overlap: OverlapPolicy;
  private readonly runOnStart: boolean;
  private readonly clock: () => Date;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  private started = false;
  private stopping = false;
  private timer: NodeJS.Timeout | null = null;
  private nextRun: Date | null = null;
  private current: Promise<TriggerOutcome> | null = null;
  private controller: AbortController | null = null;
  private queued: Promise<TriggerOutcome> | null = null;
  private lastOutcome: TriggerOutcome | null = null;

  constructor(options: ScanSchedulerOptions) {
    parseDailyTime(options.dailyTime);
    this.runCycle = options.runCycle;
    this.dailyTime = options.dailyTime;
    this.overlap = options.overlap ?? 'reject';
    this.runOnStart = options.runOnStart ?? false;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  /**
   * Start the daily schedule
   */
  start(): void {
    if (this.started) return;
    this.started = true;
    this.stopping = false;

    this.scheduleNext(this.clock());
    this.logger.info('Scheduler started', {
      dailyTime: this.dailyTime,
      nextRunAt: this.nextRun?.toISOString(),
      overlap: this.overlap,
    });

    if (this.runOnStart) {
      // trigger never rejects: failures come back as outcomes
      void this.trigger('startup');
    }
  }

  /**
   * Stop scheduling, abort the running cycle and wait for it to settle
   */
  async stop(): Promise<void> {
    this.stopping = true;
    this.started = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextRun = null;

    if (this.controller) {
      this.logger.info('Cancelling running cycle');
      this.controller.abort(new Error('Scheduler stopped'));
    }
    if (this.current) {
      await this.current;
    }
    if (this.queued) {
      await this.queued;
    }
    this.logger.info('Scheduler stopped');
  }

  /**
   * Run a cycle now, subject to the overlap policy
   */
  trigger(source: TriggerSource = 'manual'): Promise<TriggerOutcome> {
    if (this.stopping) {
      return Promise.resolve(this.reject(source, 'stopped'));
    }

    if (this.current) {
      if (this.overlap === 'reject') {
        return Promise.resolve(this.reject(source, 'cycle_in_progress'));
      }
      if (!this.queued) {
        this.logger.info('Cycle in progress, queueing trigger', { source });
        const previous = this.current;
        const queued: Promise<TriggerOutcome> = previous.then(() => {
          if (this.queued === queued) {
            this.queued = null;
          }
          return this.execute(source);
        });
        this.queued = queued;
      } else {
        this.logger.info('Trigger joined queued cycle', { source });
      }
      return this.queued;
    }

    return this.execute(source);
  }

  get nextRunAt(): Date | null {
    return this.nextRun;
  }

  get isRunning(): boolean {
    return this.current !== null;
  }

  get lastRun(): TriggerOutcome | null {
    return this.lastOutcome;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private reject(source: TriggerSource, reason: 'cycle_in_progress' | 'stopped'): TriggerOutcome {
    this.logger.warn('Trigger rejected', { source, reason });
    this.metrics.incrementCounter('scheduler.trigger.rejected', { source, reason });
    return { status: 'rejected', source, reason };
  }

  private execute(source: TriggerSource): Promise<TriggerOutcome> {
    if (this.stopping) {
      return Promise.resolve(this.reject(source, 'stopped'));
    }

    const controller = new AbortController();
    this.controller = controller;

    const run: Promise<TriggerOutcome> = this.runGuarded(source, controller.signal).then((outcome) => {
      if (this.current === run) {
        this.current = null;
        this.controller = null;
      }
      this.lastOutcome = outcome;
      return outcome;
    });
    this.current = run;
    return run;
  }

  private async runGuarded(source: TriggerSource, signal: AbortSignal): Promise<TriggerOutcome> {
    const startTime = Date.now();
    this.logger.info('Scan cycle triggered', { source });
    this.metrics.incrementCounter('scheduler.trigger', { source });

    try {
      const report = await this.runCycle(signal, source);
      this.metrics.recordDuration('scheduler.cycle.duration', Date.now() - startTime, { source });
      return { status: 'completed', source, report };
    } catch (error) {
      if (error instanceof CycleInProgressError) {
        this.logger.warn('Cycle lock held by another process', { source, owner: error.owner });
        return this.reject(source, 'cycle_in_progress');
      }
      this.metrics.incrementCounter('scheduler.cycle.failed', { source });
      this.logger.error('Scan cycle failed', { source, error: toErrorMessage(error) });
      return { status: 'failed', source, error: toErrorMessage(error) };
    }
  }

  private scheduleNext(from: Date): void {
    if (this.stopping) return;

    const next = computeNextRunAt(from, this.dailyTime);
    this.nextRun = next;
    const delay = Math.max(0, next.getTime() - this.clock().getTime());

    this.timer = setTimeout(() => {
      this.timer = null;
      // a timer that fires a little early must not reschedule for the same slot
      const now = this.clock();
      this.scheduleNext(isAfter(now, next) ? now : next);
      void this.trigger('schedule');
    }, delay);
  }
}
