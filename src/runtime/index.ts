/**
 * Runtime wiring: builds every collaborator from an AppConfig
 */

import {
  CompositeAlertSink,
  LogAlertSink,
  LogTransport,
  SendGridTransport,
  WebhookAlertSink,
  type AlertSink,
  type DeliveryTransport,
} from '../adapters/index.js';
import type { AppConfig } from '../config/index.js';
import { CycleRunner } from '../cycle/index.js';
import { BedrockImageGenerator, NullImageGenerator, type ImageGenerator } from '../imagery/index.js';
import { DeliveryLedger } from '../ledger/index.js';
import { createLogger, defaultMetrics, type Logger, type Metrics } from '../observability/index.js';
import { PipelineOrchestrator } from '../orchestrator/index.js';
import { JsonFileRosterSource, type RosterStore } from '../roster/index.js';
import { ScanScheduler } from '../scheduler/index.js';
import { createCycleLock, createLedgerStore, type LedgerStore } from '../storage/index.js';
import { ClaudeContentGenerator, TemplateContentGenerator, type ContentGenerator } from '../synthesizer/index.js';

export interface Runtime {
  config: AppConfig;
  roster: RosterStore;
  store: LedgerStore;
  ledger: DeliveryLedger;
  content: ContentGenerator;
  image: ImageGenerator;
  transport: DeliveryTransport;
  alerts: AlertSink;
  orchestrator: PipelineOrchestrator;
  cycle: CycleRunner;
  scheduler: ScanScheduler;
  logger: Logger;
}

/**
 * Replacements for the configured collaborators (tests, previews)
 */
export type RuntimeOverrides = Partial<
  Pick<Runtime, 'roster' | 'store' | 'content' | 'image' | 'transport' | 'alerts'>
> & {
  metrics?: Metrics;
  clock?: () => Date;
};

export function createContentGenerator(config: AppConfig, logger: Logger): ContentGenerator {
  if (config.content.provider === 'template') {
    return new TemplateContentGenerator();
  }
  return new ClaudeContentGenerator(
    { apiKey: config.content.apiKey, model: config.content.model, maxTokens: config.content.maxTokens },
    { logger }
  );
}

export function createImageGenerator(config: AppConfig, logger: Logger): ImageGenerator {
  if (config.image.provider === 'none') {
    return new NullImageGenerator();
  }
  return new BedrockImageGenerator({ modelId: config.image.modelId, region: config.image.region }, { logger });
}

export function createTransport(config: AppConfig, logger: Logger): DeliveryTransport {
  const { email } = config;
  if (email.provider === 'log' || !email.apiKey) {
    return new LogTransport(logger);
  }
  return new SendGridTransport(
    { apiKey: email.apiKey, from: email.from, fromName: email.fromName, replyTo: email.replyTo },
    { logger }
  );
}

export function createAlertSink(config: AppConfig, logger: Logger): AlertSink {
  const logSink = new LogAlertSink(logger);
  if (!config.alertWebhookUrl) {
    return logSink;
  }
  return new CompositeAlertSink([logSink, new WebhookAlertSink({ url: config.alertWebhookUrl }, { logger })]);
}

/**
 * Assemble the full runtime
 */
export function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
  const logger = createLogger('staff-occasions', config.logLevel);
  const metrics = overrides.metrics ?? defaultMetrics;
  const clock = overrides.clock;

  const roster = overrides.roster ?? new JsonFileRosterSource(config.rosterPath, logger);
  const store = overrides.store ?? createLedgerStore(config.ledger);
  const ledger = new DeliveryLedger({ store, logger, metrics, ...(clock ? { clock } : {}) });
  const content = overrides.content ?? createContentGenerator(config, logger);
  const image = overrides.image ?? createImageGenerator(config, logger);
  const transport = overrides.transport ?? createTransport(config, logger);
  const alerts = overrides.alerts ?? createAlertSink(config, logger);

  const orchestrator = new PipelineOrchestrator({
    ledger,
    content,
    image,
    transport,
    alerts,
    subjects: config.email.subjects,
    maxAttempts: config.maxAttempts,
    concurrency: config.concurrency,
    pendingLeaseMs: config.pendingLeaseMs,
    imageRequired: config.imageRequired,
    peerAddresses: config.peerAddresses,
    timeouts: config.timeouts,
    logger,
    metrics,
  });

  const cycle = new CycleRunner({
    roster,
    ledger,
    orchestrator,
    lookaheadDays: config.lookaheadDays,
    maxAttempts: config.maxAttempts,
    detect: {
      milestones: config.milestones,
      leapDayPolicy: config.leapDayPolicy,
      anniversaryMilestonesOnly: config.anniversaryMilestonesOnly,
    },
    timeZone: config.timeZone,
    // an injected store brings its own coordination
    lock: overrides.store ? null : createCycleLock(config.ledger),
    ...(clock ? { clock } : {}),
    logger,
    metrics,
  });

  const scheduler = new ScanScheduler({
    runCycle: (signal) => cycle.runCycle({ signal }),
    dailyTime: config.dailyCheckTime,
    overlap: config.scanOverlap,
    runOnStart: config.checkOnStartup,
    ...(clock ? { clock } : {}),
    logger,
    metrics,
  });

  return {
    config,
    roster,
    store,
    ledger,
    content,
    image,
    transport,
    alerts,
    orchestrator,
    cycle,
    scheduler,
    logger,
  };
}
