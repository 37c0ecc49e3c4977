/**
 * Unit tests for the Pipeline Orchestrator
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { DEFAULT_ANNIVERSARY_SUBJECT, DEFAULT_BIRTHDAY_SUBJECT } from '../../src/config/index.js';
import { detect } from '../../src/detector/index.js';
import { LedgerUnavailableError } from '../../src/errors/index.js';
import { DeliveryLedger, INTERRUPTED_REASON } from '../../src/ledger/index.js';
import {
  CANCELLED_REASON,
  PipelineOrchestrator,
  toGreetingRequest,
  type OrchestratorOptions,
} from '../../src/orchestrator/index.js';
import { MemoryLedgerStore, type LedgerStore } from '../../src/storage/index.js';
import type { GeneratedText, StaffRecord } from '../../src/types/index.js';
import {
  createFakeAlerts,
  createFakeContent,
  createFakeImage,
  createFakeTransport,
  createMockLogger,
  createMockMetrics,
  fakeImage,
  makeStaff,
} from '../helpers.js';

// ============================================================================
// TEST FIXTURES
// ============================================================================

const TODAY = { year: 2024, month: 8, day: 15 };
const JANE = makeStaff();
const OMAR = makeStaff({ id: 'emp-2', name: 'Omar Haddad', alias: 'Omar', email: 'omar@example.com' });
const KEY = { subjectId: 'emp-1', kind: 'birthday' as const, year: 2024 };

const occasionsFor = (...staff: StaffRecord[]) => detect(staff, TODAY, 0);

describe('Pipeline Orchestrator', () => {
  let store: MemoryLedgerStore;
  let ledger: DeliveryLedger;
  let content: ReturnType<typeof createFakeContent>;
  let image: ReturnType<typeof createFakeImage>;
  let transport: ReturnType<typeof createFakeTransport>;
  let alerts: ReturnType<typeof createFakeAlerts>;
  let logger: ReturnType<typeof createMockLogger>;
  let metrics: ReturnType<typeof createMockMetrics>;

  const createOrchestrator = (overrides: Partial<OrchestratorOptions> = {}) =>
    new PipelineOrchestrator({
      ledger,
      content: content.generator,
      image: image.generator,
      transport: transport.transport,
      alerts: alerts.sink,
      subjects: { birthday: DEFAULT_BIRTHDAY_SUBJECT, anniversary: DEFAULT_ANNIVERSARY_SUBJECT },
      maxAttempts: 3,
      logger,
      metrics,
      ...overrides,
    });

  beforeEach(() => {
    store = new MemoryLedgerStore();
    ledger = new DeliveryLedger({ store, logger: createMockLogger(), metrics: createMockMetrics() });
    content = createFakeContent();
    image = createFakeImage();
    transport = createFakeTransport();
    alerts = createFakeAlerts();
    logger = createMockLogger();
    metrics = createMockMetrics();
  });

  describe('toGreetingRequest()', () => {
    it('uses the display name and copies interests', () => {
      const [occasion] = occasionsFor(makeStaff({ alias: 'JD', interests: ['chess'] }));
      expect(occasion).toBeDefined();
      if (!occasion) return;

      const request = toGreetingRequest(occasion);
      request.interests.push('mutated');

      expect(request).toEqual({
        subjectId: 'emp-1',
        subjectName: 'JD',
        kind: 'birthday',
        elapsedYears: 34,
        milestone: false,
        interests: ['chess', 'mutated'],
      });
      expect(occasion.subject.interests).toEqual(['chess']);
    });
  });

  describe('process()', () => {
    it('delivers a greeting and records it in the ledger', async () => {
      const orchestrator = createOrchestrator({ peerAddresses: ['hr@example.com'] });

      const [attempt] = await orchestrator.process(occasionsFor(JANE));

      expect(attempt?.outcome).toBe('delivered');
      expect(attempt?.confirmation?.messageId).toBe('msg-1');
      expect(attempt?.content?.body).toBe('Greetings, Jane Doe!');
      expect(attempt?.image).toEqual(fakeImage());
      expect(attempt?.record).toMatchObject({ status: 'delivered', retryCount: 0, messageId: 'msg-1' });

      expect(transport.send).toHaveBeenCalledTimes(1);
      const [to, cc, rendered, card] = transport.send.mock.calls[0] ?? [];
      expect(to).toBe('jane@example.com');
      expect(cc).toEqual(['hr@example.com']);
      expect(rendered?.subject).toBe('Happy Birthday, Jane Doe!');
      expect(card).toEqual(fakeImage());

      expect(await ledger.isDelivered(KEY)).toBe(true);
    });

    it('skips an occasion that was already delivered', async () => {
      const orchestrator = createOrchestrator();
      await orchestrator.process(occasionsFor(JANE));

      const [attempt] = await orchestrator.process(occasionsFor(JANE));

      expect(attempt?.outcome).toBe('skipped_delivered');
      expect(content.generate).toHaveBeenCalledTimes(1);
      expect(transport.send).toHaveBeenCalledTimes(1);
    });

    it('skips an occasion another worker holds', async () => {
      await ledger.claim(KEY, { maxAttempts: 3, pendingLeaseMs: 60_000 });

      const [attempt] = await createOrchestrator().process(occasionsFor(JANE));

      expect(attempt?.outcome).toBe('skipped_in_flight');
      expect(content.generate).not.toHaveBeenCalled();
    });

    it('records a content failure without sending', async () => {
      content.generate.mockRejectedValueOnce(new Error('model overloaded'));

      const [attempt] = await createOrchestrator().process(occasionsFor(JANE));

      expect(attempt?.outcome).toBe('failed');
      expect(attempt?.error).toBe('model overloaded');
      expect(attempt?.record).toMatchObject({ status: 'failed', retryCount: 1, lastError: 'model overloaded' });
      expect(image.generate).not.toHaveBeenCalled();
      expect(transport.send).not.toHaveBeenCalled();
    });

    it('sends without a card when image generation fails', async () => {
      image.generate.mockRejectedValueOnce(new Error('quota exceeded'));

      const [attempt] = await createOrchestrator().process(occasionsFor(JANE));

      expect(attempt?.outcome).toBe('delivered');
      expect(attempt?.image).toBeNull();
      expect(transport.send.mock.calls[0]?.[3]).toBeNull();
      expect(logger.logs.filter((l) => l.level === 'warn').map((l) => l.msg)).toEqual([
        'Image generation failed, sending without image',
      ]);
      expect(metrics.counters).toContain('orchestrator.image.degraded');
    });

    it('fails the attempt when the card is required', async () => {
      image.generate.mockRejectedValueOnce(new Error('quota exceeded'));

      const [attempt] = await createOrchestrator({ imageRequired: true }).process(occasionsFor(JANE));

      expect(attempt?.outcome).toBe('failed');
      expect(attempt?.content?.body).toBe('Greetings, Jane Doe!');
      expect(attempt?.record).toMatchObject({ status: 'failed', retryCount: 1, lastError: 'quota exceeded' });
      expect(transport.send).not.toHaveBeenCalled();
    });

    it('records a transport failure', async () => {
      transport.send.mockRejectedValueOnce(new Error('connection refused'));

      const [attempt] = await createOrchestrator().process(occasionsFor(JANE));

      expect(attempt?.outcome).toBe('failed');
      expect(attempt?.confirmation).toBeNull();
      expect(attempt?.record).toMatchObject({ status: 'failed', retryCount: 1, lastError: 'connection refused' });
      expect(await ledger.isDelivered(KEY)).toBe(false);
    });

    it('retries a failed occasion on the next run', async () => {
      transport.send.mockRejectedValueOnce(new Error('connection refused'));
      const orchestrator = createOrchestrator();
      await orchestrator.process(occasionsFor(JANE));

      const [attempt] = await orchestrator.process(occasionsFor(JANE));

      expect(attempt?.outcome).toBe('delivered');
      expect(attempt?.record).toMatchObject({ status: 'delivered', retryCount: 1, lastError: null });
    });

    it('alerts once when the attempt ceiling is reached', async () => {
      transport.send.mockRejectedValue(new Error('smtp down'));
      const orchestrator = createOrchestrator({ maxAttempts: 2 });

      await orchestrator.process(occasionsFor(JANE));
      expect(alerts.notify).not.toHaveBeenCalled();

      const [second] = await orchestrator.process(occasionsFor(JANE));
      const [third] = await orchestrator.process(occasionsFor(JANE));

      expect(second?.outcome).toBe('failed');
      expect(second?.record?.retryCount).toBe(2);
      expect(third?.outcome).toBe('skipped_exhausted');
      expect(transport.send).toHaveBeenCalledTimes(2);
      expect(alerts.notify).toHaveBeenCalledTimes(1);
      expect(alerts.notify).toHaveBeenCalledWith(KEY, 'smtp down', second?.record);
    });

    it('alerts when an abandoned attempt uses up the last retry', async () => {
      let now = new Date('2024-08-15T08:00:00.000Z');
      ledger = new DeliveryLedger({ store, logger: createMockLogger(), clock: () => now });
      await ledger.claim(KEY, { maxAttempts: 1, pendingLeaseMs: 60_000 });
      now = new Date('2024-08-15T09:00:00.000Z');

      const [attempt] = await createOrchestrator({ maxAttempts: 1, pendingLeaseMs: 60_000 }).process(
        occasionsFor(JANE)
      );

      expect(attempt?.outcome).toBe('skipped_exhausted');
      expect(attempt?.record).toMatchObject({ status: 'failed', retryCount: 1, lastError: INTERRUPTED_REASON });
      expect(alerts.notify).toHaveBeenCalledWith(KEY, INTERRUPTED_REASON, attempt?.record);
      expect(content.generate).not.toHaveBeenCalled();
    });

    it('logs an alert sink failure and carries on', async () => {
      transport.send.mockRejectedValue(new Error('smtp down'));
      alerts.notify.mockRejectedValue(new Error('webhook down'));

      const [attempt] = await createOrchestrator({ maxAttempts: 1 }).process(occasionsFor(JANE));

      expect(attempt?.outcome).toBe('failed');
      expect(logger.logs.find((l) => l.msg === 'Alert sink failed')?.meta).toEqual({
        key: 'emp-1:birthday:2024',
        sink: 'fake',
        error: 'webhook down',
      });
    });

    it('isolates failures and returns attempts in input order', async () => {
      content.generate.mockImplementation(async (request) => {
        if (request.subjectId === 'emp-1') {
          throw new Error('model overloaded');
        }
        return { body: 'Hi Omar', provider: 'fake', model: null, generatedAt: '2024-08-15T08:00:00.000Z' };
      });
      const occasions = occasionsFor(JANE, OMAR);

      const attempts = await createOrchestrator({ concurrency: 2 }).process(occasions);

      expect(attempts.map((a) => [a.key.subjectId, a.outcome])).toEqual([
        ['emp-1', 'failed'],
        ['emp-2', 'delivered'],
      ]);
      expect(attempts.map((a) => a.occasion)).toEqual(occasions);
      expect(transport.send.mock.calls[0]?.[0]).toBe('omar@example.com');
    });

    it('processes occasions of one subject one after another', async () => {
      const events: string[] = [];
      content.generate.mockImplementation(async (request) => {
        events.push(`start ${request.kind}`);
        await new Promise((resolve) => setImmediate(resolve));
        events.push(`end ${request.kind}`);
        return { body: 'Hi', provider: 'fake', model: null, generatedAt: '2024-08-15T08:00:00.000Z' };
      });
      const both = makeStaff({ startDate: { year: 2019, month: 8, day: 15 } });

      const attempts = await createOrchestrator({ concurrency: 4 }).process(occasionsFor(both));

      expect(attempts.map((a) => a.outcome)).toEqual(['delivered', 'delivered']);
      expect(events).toEqual(['start birthday', 'end birthday', 'start anniversary', 'end anniversary']);
    });

    it('cancels everything when aborted before starting', async () => {
      const controller = new AbortController();
      controller.abort();

      const attempts = await createOrchestrator().process(occasionsFor(JANE, OMAR), { signal: controller.signal });

      expect(attempts.map((a) => [a.outcome, a.error])).toEqual([
        ['cancelled', CANCELLED_REASON],
        ['cancelled', CANCELLED_REASON],
      ]);
      expect(store.size()).toBe(0);
    });

    it('stops before delivery when aborted mid-run without using a retry', async () => {
      const controller = new AbortController();
      content.generate.mockImplementationOnce(async () => {
        controller.abort();
        return { body: 'Hi', provider: 'fake', model: null, generatedAt: '2024-08-15T08:00:00.000Z' };
      });

      const attempts = await createOrchestrator({ concurrency: 1 }).process(occasionsFor(JANE, OMAR), {
        signal: controller.signal,
      });

      expect(attempts[0]?.outcome).toBe('failed');
      expect(attempts[0]?.record).toMatchObject({ status: 'failed', retryCount: 0, lastError: CANCELLED_REASON });
      expect(attempts[1]?.outcome).toBe('cancelled');
      expect(transport.send).not.toHaveBeenCalled();
      expect(store.keys()).toEqual(['emp-1:birthday:2024']);
    });

    it('times out a hung content provider', async () => {
      content.generate.mockImplementation(
        (_request, options) =>
          new Promise<GeneratedText>((_resolve, reject) => {
            options?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          })
      );

      const [attempt] = await createOrchestrator({ timeouts: { contentMs: 10 } }).process(occasionsFor(JANE));

      expect(attempt?.outcome).toBe('failed');
      expect(attempt?.error).toBe('content generation timed out after 10ms');
      expect(logger.logs.find((l) => l.msg === 'Delivery attempt failed')?.meta).toMatchObject({
        code: 'GENERATION_ERROR',
        provider: 'fake',
        timedOut: true,
      });
    });

    it('stops the run and rethrows when the ledger fails', async () => {
      const failingStore: LedgerStore = {
        name: 'failing',
        get: async () => null,
        put: async () => {
          throw new LedgerUnavailableError('disk full');
        },
        list: async () => [],
        ping: async () => undefined,
      };
      ledger = new DeliveryLedger({ store: failingStore, logger: createMockLogger() });

      await expect(createOrchestrator({ concurrency: 1 }).process(occasionsFor(JANE, OMAR))).rejects.toThrow(
        'disk full'
      );
      expect(content.generate).not.toHaveBeenCalled();
    });

    it('returns nothing for no occasions', async () => {
      expect(await createOrchestrator().process([])).toEqual([]);
    });
  });
});
