/**
 * Unit tests for the Scan Scheduler
 */

import { jest, describe, it, expect, afterEach } from '@jest/globals';
import { emptyCounts, type CycleReport } from '../../src/cycle/index.js';
import { ConfigurationError, CycleInProgressError } from '../../src/errors/index.js';
import { ScanScheduler, computeNextRunAt, type CycleFn, type ScanSchedulerOptions } from '../../src/scheduler/index.js';
import { createMockLogger } from '../helpers.js';

// ============================================================================
// TEST FIXTURES
// ============================================================================

const makeReport = (): CycleReport => ({
  referenceDate: { year: 2024, month: 8, day: 15 },
  windowDays: 3,
  dryRun: false,
  startedAt: '2024-08-15T09:00:00.000Z',
  durationMs: 5,
  rosterSize: 0,
  occasions: [],
  planned: [],
  attempts: [],
  counts: emptyCounts(),
});

function deferred<T>() {
  let settle: (value: T) => void = () => undefined;
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: (value: T) => settle(value) };
}

describe('Scan Scheduler', () => {
  let scheduler: ScanScheduler | null = null;

  const createScheduler = (runCycle: CycleFn, overrides: Partial<ScanSchedulerOptions> = {}) => {
    scheduler = new ScanScheduler({ runCycle, dailyTime: '09:00', logger: createMockLogger(), ...overrides });
    return scheduler;
  };

  afterEach(async () => {
    await scheduler?.stop();
    scheduler = null;
    jest.useRealTimers();
  });

  describe('computeNextRunAt()', () => {
    it('picks later today when the time has not passed', () => {
      expect(computeNextRunAt(new Date(2024, 7, 15, 8, 30), '09:00')).toEqual(new Date(2024, 7, 15, 9, 0));
    });

    it('picks tomorrow once the time has passed', () => {
      expect(computeNextRunAt(new Date(2024, 7, 15, 9, 0, 0, 1), '09:00')).toEqual(new Date(2024, 7, 16, 9, 0));
      expect(computeNextRunAt(new Date(2024, 7, 31, 23, 59), '00:00')).toEqual(new Date(2024, 8, 1, 0, 0));
    });

    it('is strictly after now', () => {
      expect(computeNextRunAt(new Date(2024, 7, 15, 9, 0), '09:00')).toEqual(new Date(2024, 7, 16, 9, 0));
    });

    it.each(['9:00', '24:00', '12:60', 'noon'])('rejects %s', (value) => {
      expect(() => computeNextRunAt(new Date(2024, 7, 15), value)).toThrow(ConfigurationError);
    });
  });

  describe('trigger()', () => {
    it('rejects an invalid daily time up front', () => {
      expect(() => new ScanScheduler({ runCycle: jest.fn<CycleFn>(), dailyTime: '7am' })).toThrow(
        'Invalid daily check time: expected HH:MM, got "7am"'
      );
    });

    it('runs a cycle and reports it', async () => {
      const report = makeReport();
      const runCycle = jest.fn<CycleFn>().mockResolvedValue(report);
      const instance = createScheduler(runCycle);

      const outcome = await instance.trigger();

      expect(outcome).toEqual({ status: 'completed', source: 'manual', report });
      expect(runCycle).toHaveBeenCalledWith(expect.any(AbortSignal), 'manual');
      expect(instance.lastRun).toBe(outcome);
      expect(instance.isRunning).toBe(false);
    });

    it('turns a cycle failure into a failed outcome', async () => {
      const instance = createScheduler(jest.fn<CycleFn>().mockRejectedValue(new Error('ledger unreachable')));

      expect(await instance.trigger()).toEqual({ status: 'failed', source: 'manual', error: 'ledger unreachable' });
    });

    it('rejects a trigger when another process is running a cycle', async () => {
      const instance = createScheduler(
        jest.fn<CycleFn>().mockRejectedValue(new CycleInProgressError('pid 42 on host-a'))
      );

      expect(await instance.trigger()).toEqual({ status: 'rejected', source: 'manual', reason: 'cycle_in_progress' });
    });

    it('rejects an overlapping trigger by default', async () => {
      const gate = deferred<CycleReport>();
      const runCycle = jest.fn<CycleFn>().mockReturnValue(gate.promise);
      const instance = createScheduler(runCycle);

      const first = instance.trigger('schedule');
      expect(instance.isRunning).toBe(true);
      expect(await instance.trigger()).toEqual({ status: 'rejected', source: 'manual', reason: 'cycle_in_progress' });

      gate.resolve(makeReport());
      expect((await first).status).toBe('completed');
      expect(runCycle).toHaveBeenCalledTimes(1);
    });

    it('queues one follow-up run that later triggers join', async () => {
      const gate = deferred<CycleReport>();
      const runCycle = jest.fn<CycleFn>().mockReturnValueOnce(gate.promise).mockResolvedValue(makeReport());
      const instance = createScheduler(runCycle, { overlap: 'queue' });

      const first = instance.trigger('schedule');
      const second = instance.trigger('manual');
      const third = instance.trigger('manual');
      expect(third).toBe(second);

      gate.resolve(makeReport());
      await first;
      const queued = await second;

      expect(queued.status).toBe('completed');
      expect(runCycle.mock.calls.map((call) => call[1])).toEqual(['schedule', 'manual']);
    });
  });

  describe('stop()', () => {
    it('aborts the running cycle and refuses new triggers', async () => {
      const runCycle = jest.fn<CycleFn>().mockImplementation(
        (signal) =>
          new Promise<CycleReport>((_resolve, reject) => {
            signal.addEventListener('abort', () => reject(signal.reason));
          })
      );
      const instance = createScheduler(runCycle);

      const running = instance.trigger();
      await instance.stop();

      expect(await running).toEqual({ status: 'failed', source: 'manual', error: 'Scheduler stopped' });
      expect(runCycle.mock.calls[0]?.[0].aborted).toBe(true);
      expect(await instance.trigger()).toEqual({ status: 'rejected', source: 'manual', reason: 'stopped' });
    });
  });

  describe('start()', () => {
    it('runs at the daily time and schedules the next day', async () => {
      jest.useFakeTimers({ now: new Date(2024, 7, 15, 8, 30) });
      const runCycle = jest.fn<CycleFn>().mockResolvedValue(makeReport());
      const instance = createScheduler(runCycle);

      instance.start();
      expect(instance.nextRunAt).toEqual(new Date(2024, 7, 15, 9, 0));

      await jest.advanceTimersByTimeAsync(29 * 60 * 1000);
      expect(runCycle).not.toHaveBeenCalled();

      await jest.advanceTimersByTimeAsync(60 * 1000);
      expect(runCycle).toHaveBeenCalledWith(expect.any(AbortSignal), 'schedule');
      expect(instance.nextRunAt).toEqual(new Date(2024, 7, 16, 9, 0));
      expect(instance.lastRun?.status).toBe('completed');
    });

    it('keeps the schedule after a failed cycle', async () => {
      jest.useFakeTimers({ now: new Date(2024, 7, 15, 8, 59) });
      const runCycle = jest.fn<CycleFn>().mockRejectedValue(new Error('roster offline'));
      const instance = createScheduler(runCycle);

      instance.start();
      await jest.advanceTimersByTimeAsync(60 * 1000);

      expect(instance.lastRun).toEqual({ status: 'failed', source: 'schedule', error: 'roster offline' });
      expect(instance.nextRunAt).toEqual(new Date(2024, 7, 16, 9, 0));
    });

    it('runs immediately when asked to on startup', () => {
      jest.useFakeTimers({ now: new Date(2024, 7, 15, 8, 30) });
      const runCycle = jest.fn<CycleFn>().mockResolvedValue(makeReport());

      createScheduler(runCycle, { runOnStart: true }).start();

      expect(runCycle).toHaveBeenCalledWith(expect.any(AbortSignal), 'startup');
    });

    it('clears the schedule on stop', async () => {
      jest.useFakeTimers({ now: new Date(2024, 7, 15, 8, 30) });
      const runCycle = jest.fn<CycleFn>().mockResolvedValue(makeReport());
      const instance = createScheduler(runCycle);

      instance.start();
      await instance.stop();
      await jest.advanceTimersByTimeAsync(24 * 60 * 60 * 1000);

      expect(instance.nextRunAt).toBeNull();
      expect(runCycle).not.toHaveBeenCalled();
    });
  });
});
