/**
 * Pipeline Orchestrator
 *
 * Pushes each qualifying occasion through content generation, image
 * generation and delivery, recording the outcome in the ledger.
 *
 * - Occasions are grouped per subject. Groups run on a bounded pool of
 *   workers; occasions inside a group run one after another.
 * - A per-occasion failure becomes a ledger transition and never stops the
 *   batch. Ledger failures do: no new work starts, running work settles, and
 *   the first ledger error is rethrown.
 * - The ledger only moves to delivered on a transport confirmation.
 */

import { occasionKey } from '../detector/index.js';
import {
  GenerationError,
  TransportError,
  toErrorMessage,
} from '../errors/index.js';
import type { AlertSink, DeliveryTransport } from '../adapters/index.js';
import type { ImageGenerator } from '../imagery/index.js';
import { formatDeliveryKey, type DeliveryLedger } from '../ledger/index.js';
import { defaultLogger, defaultMetrics, type Logger, type Metrics } from '../observability/index.js';
import { renderGreeting, type SubjectTemplates } from '../renderers/index.js';
import { displayName } from '../roster/index.js';
import type { ContentGenerator } from '../synthesizer/index.js';
import type {
  AttemptOutcome,
  DeliveryAttempt,
  DeliveryConfirmation,
  DeliveryKey,
  DeliveryRecord,
  GeneratedText,
  GreetingRequest,
  ImageHandle,
  Occasion,
} from '../types/index.js';
import { TimeoutError, withTimeout } from '../utils/index.js';

export const CANCELLED_REASON = 'cancelled';

const DEFAULT_CONCURRENCY = 4;
const DEFAULT_PENDING_LEASE_MS = 15 * 60 * 1000;
const DEFAULT_TIMEOUTS = {
  contentMs: 60_000,
  imageMs: 90_000,
  deliveryMs: 30_000,
};

export interface OrchestratorOptions {
  ledger: DeliveryLedger;
  content: ContentGenerator;
  image: ImageGenerator;
  transport: DeliveryTransport;
  alerts: AlertSink;
  subjects: SubjectTemplates;
  maxAttempts: number;
  concurrency?: number;
  pendingLeaseMs?: number;
  /** Fail the attempt instead of sending without a card */
  imageRequired?: boolean;
  /** Copied on every greeting */
  peerAddresses?: string[];
  timeouts?: Partial<typeof DEFAULT_TIMEOUTS>;
  logger?: Logger;
  metrics?: Metrics;
}

export interface ProcessOptions {
  /** Aborting stops new occasions from starting */
  signal?: AbortSignal;
}

/**
 * Greeting input for the content and image collaborators
 */
export function toGreetingRequest(occasion: Occasion): GreetingRequest {
  return {
    subjectId: occasion.subjectId,
    subjectName: displayName(occasion.subject),
    kind: occasion.kind,
    elapsedYears: occasion.elapsedYears,
    milestone: occasion.milestone,
    interests: [...occasion.subject.interests],
  };
}

/**
 * Group input positions by subject, keeping first-appearance order
 */
function groupBySubject(occasions: readonly Occasion[]): number[][] {
  const groups = new Map<string, number[]>();
  occasions.forEach((occasion, index) => {
    const group = groups.get(occasion.subjectId);
    if (group) {
      group.push(index);
    } else {
      groups.set(occasion.subjectId, [index]);
    }
  });
  return Array.from(groups.values());
}

function buildAttempt(
  occasion: Occasion,
  key: DeliveryKey,
  outcome: AttemptOutcome,
  fields: Partial<Omit<DeliveryAttempt, 'occasion' | 'key' | 'outcome'>> = {}
): DeliveryAttempt {
  return {
    occasion,
    key,
    outcome,
    content: fields.content ?? null,
    image: fields.image ?? null,
    confirmation: fields.confirmation ?? null,
    error: fields.error ?? null,
    record: fields.record ?? null,
  };
}

export class PipelineOrchestrator {
  private readonly options: OrchestratorOptions;
  private readonly concurrency: number;
  private readonly pendingLeaseMs: number;
  private readonly timeouts: typeof DEFAULT_TIMEOUTS;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(options: OrchestratorOptions) {
    this.options = options;
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
    this.pendingLeaseMs = options.pendingLeaseMs ?? DEFAULT_PENDING_LEASE_MS;
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts };
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  /**
   * Process occasions, returning one attempt per occasion in input order
   *
   * @throws the first ledger store error, after in-flight work has settled
   */
  async process(occasions: readonly Occasion[], options: ProcessOptions = {}): Promise<DeliveryAttempt[]> {
    const { signal } = options;
    const startTime = Date.now();
    const results: Array<DeliveryAttempt | undefined> = new Array(occasions.length);
    const groups = groupBySubject(occasions);
    let fatal: unknown = null;
    let nextGroup = 0;

    const worker = async (): Promise<void> => {
      while (nextGroup < groups.length) {
        const group = groups[nextGroup++];
        for (const index of group) {
          const occasion = occasions[index];
          if (fatal !== null || signal?.aborted) {
            results[index] = buildAttempt(occasion, occasionKey(occasion), 'cancelled', {
              error: fatal !== null ? 'ledger unavailable' : CANCELLED_REASON,
            });
            continue;
          }
          try {
            results[index] = await this.processOne(occasion, signal);
          } catch (error) {
            fatal ??= error;
            this.logger.error('Ledger failure, stopping cycle', {
              key: formatDeliveryKey(occasionKey(occasion)),
              error: toErrorMessage(error),
            });
            results[index] = buildAttempt(occasion, occasionKey(occasion), 'cancelled', {
              error: toErrorMessage(error),
            });
          }
        }
      }
    };

    const workerCount = Math.min(this.concurrency, groups.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    if (fatal !== null) {
      throw fatal;
    }

    const attempts = results.map(
      (attempt, index) => attempt ?? buildAttempt(occasions[index], occasionKey(occasions[index]), 'cancelled')
    );
    this.metrics.recordDuration('orchestrator.process.duration', Date.now() - startTime);
    return attempts;
  }

  // ==========================================================================
  // Per-occasion pipeline
  // ==========================================================================

  private async processOne(occasion: Occasion, signal: AbortSignal | undefined): Promise<DeliveryAttempt> {
    const { ledger, maxAttempts } = this.options;
    const key = occasionKey(occasion);
    const keyLabel = formatDeliveryKey(key);

    const claim = await ledger.claim(key, { maxAttempts, pendingLeaseMs: this.pendingLeaseMs });
    switch (claim.status) {
      case 'delivered':
        this.logger.debug('Already delivered, skipping', { key: keyLabel });
        return this.finish(buildAttempt(occasion, key, 'skipped_delivered', { record: claim.record }));
      case 'in_flight':
        this.logger.warn('Attempt already in flight, skipping', { key: keyLabel });
        return this.finish(buildAttempt(occasion, key, 'skipped_in_flight', { record: claim.record }));
      case 'exhausted':
        if (claim.expired && claim.record) {
          await this.raiseAlert(key, claim.record);
        }
        this.logger.debug('Retries exhausted, skipping', { key: keyLabel });
        return this.finish(buildAttempt(occasion, key, 'skipped_exhausted', { record: claim.record }));
      case 'claimed':
        break;
    }

    const request = toGreetingRequest(occasion);

    // content
    let content: GeneratedText;
    try {
      content = await withTimeout('content generation', this.timeouts.contentMs, (callSignal) =>
        this.options.content.generate(request, { signal: callSignal })
      );
    } catch (error) {
      const failure = this.asGenerationError(error, this.options.content.name);
      return this.recordFailure(occasion, key, failure, {});
    }

    if (signal?.aborted) {
      return this.recordInterrupted(occasion, key, { content });
    }

    // image
    let image: ImageHandle | null = null;
    try {
      image = await withTimeout('image generation', this.timeouts.imageMs, (callSignal) =>
        this.options.image.generate(request, { signal: callSignal })
      );
    } catch (error) {
      const failure = this.asGenerationError(error, this.options.image.name);
      if (this.options.imageRequired) {
        return this.recordFailure(occasion, key, failure, { content });
      }
      this.metrics.incrementCounter('orchestrator.image.degraded');
      this.logger.warn('Image generation failed, sending without image', {
        key: keyLabel,
        error: failure.message,
      });
    }

    if (signal?.aborted) {
      return this.recordInterrupted(occasion, key, { content, image });
    }

    // delivery
    const rendered = renderGreeting(request, content, image, this.options.subjects);
    let confirmation: DeliveryConfirmation;
    try {
      confirmation = await withTimeout('delivery', this.timeouts.deliveryMs, (callSignal) =>
        this.options.transport.send(
          occasion.subject.email,
          this.options.peerAddresses ?? [],
          rendered,
          image,
          { signal: callSignal }
        )
      );
    } catch (error) {
      const failure = this.asTransportError(error);
      return this.recordFailure(occasion, key, failure, { content, image });
    }

    const record = await ledger.recordAttempt(key, 'delivered', 0, { messageId: confirmation.messageId });
    this.logger.info('Greeting delivered', {
      key: keyLabel,
      messageId: confirmation.messageId,
      withImage: image !== null,
    });
    return this.finish(buildAttempt(occasion, key, 'delivered', { content, image, confirmation, record }));
  }

  private async recordFailure(
    occasion: Occasion,
    key: DeliveryKey,
    failure: GenerationError | TransportError,
    fields: { content?: GeneratedText; image?: ImageHandle | null }
  ): Promise<DeliveryAttempt> {
    const { ledger, maxAttempts } = this.options;
    const record = await ledger.recordAttempt(key, 'failed', 1, { error: failure.message });

    this.logger.warn('Delivery attempt failed', {
      key: formatDeliveryKey(key),
      code: failure.code,
      provider: failure.provider,
      timedOut: failure.timedOut,
      retryCount: record.retryCount,
      maxAttempts,
    });

    // claim only hands out keys below the ceiling, so this fires once per key
    if (record.status === 'failed' && record.retryCount >= maxAttempts) {
      await this.raiseAlert(key, record);
    }

    return this.finish(buildAttempt(occasion, key, 'failed', { ...fields, error: failure.message, record }));
  }

  /**
   * Cancelled before delivery: failed without consuming a retry
   */
  private async recordInterrupted(
    occasion: Occasion,
    key: DeliveryKey,
    fields: { content?: GeneratedText; image?: ImageHandle | null }
  ): Promise<DeliveryAttempt> {
    const record = await this.options.ledger.recordAttempt(key, 'failed', 0, { error: CANCELLED_REASON });
    this.logger.info('Attempt interrupted by cancellation', { key: formatDeliveryKey(key) });
    return this.finish(buildAttempt(occasion, key, 'failed', { ...fields, error: CANCELLED_REASON, record }));
  }

  private async raiseAlert(key: DeliveryKey, record: DeliveryRecord): Promise<void> {
    const reason = record.lastError ?? 'maximum attempts reached';
    this.metrics.incrementCounter('orchestrator.alert');
    try {
      await this.options.alerts.notify(key, reason, record);
    } catch (error) {
      this.logger.error('Alert sink failed', {
        key: formatDeliveryKey(key),
        sink: this.options.alerts.name,
        error: toErrorMessage(error),
      });
    }
  }

  private finish(attempt: DeliveryAttempt): DeliveryAttempt {
    this.metrics.incrementCounter('orchestrator.attempt', { outcome: attempt.outcome, kind: attempt.key.kind });
    return attempt;
  }

  private asGenerationError(error: unknown, provider: string): GenerationError {
    if (error instanceof GenerationError) {
      return error;
    }
    if (error instanceof TimeoutError) {
      return new GenerationError(error.message, { provider, timedOut: true, cause: error });
    }
    return new GenerationError(toErrorMessage(error), { provider, cause: error });
  }

  private asTransportError(error: unknown): TransportError {
    const provider = this.options.transport.name;
    if (error instanceof TransportError) {
      return error;
    }
    if (error instanceof TimeoutError) {
      return new TransportError(error.message, { provider, timedOut: true, cause: error });
    }
    return new TransportError(toErrorMessage(error), { provider, cause: error });
  }
}
