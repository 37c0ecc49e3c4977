/**
 * Configuration Module
 *
 * Reads environment variables into a validated AppConfig. Every problem is
 * collected and reported at once through ConfigurationError.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import type { LogLevel } from '../observability/index.js';
import type { LedgerStoreConfig } from '../storage/index.js';
import type { LeapDayPolicy, MilestonePolicy } from '../types/index.js';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-20250514';
export const DEFAULT_BEDROCK_IMAGE_MODEL = 'amazon.nova-canvas-v1:0';
export const DEFAULT_BIRTHDAY_SUBJECT = 'Happy Birthday, {name}!';
export const DEFAULT_ANNIVERSARY_SUBJECT = 'Congratulations on your {years} Year Anniversary, {name}!';

export type ContentProviderConfig =
  | { provider: 'claude'; apiKey: string; model: string; maxTokens: number }
  | { provider: 'template' };

export type ImageProviderConfig =
  | { provider: 'bedrock'; modelId: string; region: string }
  | { provider: 'none' };

export interface EmailConfig {
  provider: 'sendgrid' | 'log';
  apiKey: string | null;
  from: string;
  fromName: string;
  replyTo: string | null;
  subjects: {
    birthday: string;
    anniversary: string;
  };
}

export interface AppConfig {
  rosterPath: string;
  ledger: LedgerStoreConfig;
  lookaheadDays: number;
  /** Daily scan time, HH:MM in local time */
  dailyCheckTime: string;
  checkOnStartup: boolean;
  /** IANA zone used to derive "today"; process local time when null */
  timeZone: string | null;
  scanOverlap: 'reject' | 'queue';
  maxAttempts: number;
  concurrency: number;
  pendingLeaseMs: number;
  timeouts: {
    contentMs: number;
    imageMs: number;
    deliveryMs: number;
  };
  imageRequired: boolean;
  peerAddresses: string[];
  milestones: MilestonePolicy;
  anniversaryMilestonesOnly: boolean;
  leapDayPolicy: LeapDayPolicy;
  content: ContentProviderConfig;
  image: ImageProviderConfig;
  email: EmailConfig;
  alertWebhookUrl: string | null;
  logLevel: LogLevel;
}

// ============================================================================
// Schema
// ============================================================================

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const commaList = z.string().transform((value) =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
);

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  ROSTER_PATH: z.string().default('data/roster.json'),
  LEDGER_BACKEND: z.enum(['file', 's3', 'memory']).default('file'),
  LEDGER_FILE_PATH: z.string().default('data/ledger.json'),
  LEDGER_S3_BUCKET: z.string().optional(),
  LEDGER_S3_PREFIX: z.string().default('ledger'),
  AWS_REGION: z.string().default('us-east-1'),
  S3_ENDPOINT: z.string().url().optional(),
  S3_FORCE_PATH_STYLE: booleanFlag.default('false'),
  LOOKAHEAD_DAYS: z.coerce.number().int().nonnegative().default(3),
  DAILY_CHECK_TIME: z
    .string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'must be HH:MM (24-hour)')
    .default('08:00'),
  CHECK_ON_STARTUP: booleanFlag.default('true'),
  TIME_ZONE: z
    .string()
    .refine(isValidTimeZone, 'must be an IANA time zone')
    .optional(),
  SCAN_OVERLAP: z.enum(['reject', 'queue']).default('reject'),
  MAX_ATTEMPTS: positiveInt.default(3),
  CONCURRENCY: positiveInt.default(4),
  PENDING_LEASE_MS: positiveInt.default(15 * 60 * 1000),
  CONTENT_TIMEOUT_MS: positiveInt.default(60_000),
  IMAGE_TIMEOUT_MS: positiveInt.default(90_000),
  DELIVERY_TIMEOUT_MS: positiveInt.default(30_000),
  IMAGE_REQUIRED: booleanFlag.default('false'),
  PEER_ADDRESSES: commaList.pipe(z.array(z.string().email())).default(''),
  MILESTONE_YEARS: commaList.pipe(z.array(positiveInt)).default('1'),
  MILESTONE_INTERVAL: z.coerce.number().int().nonnegative().default(5),
  ANNIVERSARY_MILESTONES_ONLY: booleanFlag.default('false'),
  LEAP_DAY_POLICY: z.enum(['feb28', 'mar1']).default('feb28'),
  CONTENT_PROVIDER: z.enum(['claude', 'template']).default('claude'),
  ANTHROPIC_API_KEY: z.string().optional(),
  ANTHROPIC_MODEL: z.string().default(DEFAULT_ANTHROPIC_MODEL),
  ANTHROPIC_MAX_TOKENS: positiveInt.default(1024),
  IMAGE_PROVIDER: z.enum(['bedrock', 'none']).default('bedrock'),
  BEDROCK_IMAGE_MODEL_ID: z.string().default(DEFAULT_BEDROCK_IMAGE_MODEL),
  EMAIL_PROVIDER: z.enum(['sendgrid', 'log']).default('sendgrid'),
  SENDGRID_API_KEY: z.string().optional(),
  EMAIL_FROM: z.string().email().default('noreply@example.com'),
  EMAIL_FROM_NAME: z.string().default('Staff Occasions'),
  EMAIL_REPLY_TO: z.string().email().optional(),
  EMAIL_SUBJECT_BIRTHDAY: z.string().default(DEFAULT_BIRTHDAY_SUBJECT),
  EMAIL_SUBJECT_ANNIVERSARY: z.string().default(DEFAULT_ANNIVERSARY_SUBJECT),
  ALERT_WEBHOOK_URL: z.string().url().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

type Env = z.infer<typeof EnvSchema>;

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

function crossFieldIssues(env: Env): string[] {
  const issues: string[] = [];
  if (env.LEDGER_BACKEND === 's3' && !env.LEDGER_S3_BUCKET) {
    issues.push('LEDGER_S3_BUCKET: required when LEDGER_BACKEND is s3');
  }
  if (env.CONTENT_PROVIDER === 'claude' && !env.ANTHROPIC_API_KEY) {
    issues.push('ANTHROPIC_API_KEY: required when CONTENT_PROVIDER is claude');
  }
  if (env.EMAIL_PROVIDER === 'sendgrid' && !env.SENDGRID_API_KEY) {
    issues.push('SENDGRID_API_KEY: required when EMAIL_PROVIDER is sendgrid');
  }
  if (env.IMAGE_REQUIRED && env.IMAGE_PROVIDER === 'none') {
    issues.push('IMAGE_REQUIRED: cannot be true when IMAGE_PROVIDER is none');
  }
  return issues;
}

function toLedgerConfig(env: Env): LedgerStoreConfig {
  switch (env.LEDGER_BACKEND) {
    case 'memory':
      return { type: 'memory' };
    case 'file':
      return { type: 'file', path: env.LEDGER_FILE_PATH };
    case 's3':
      return {
        type: 's3',
        bucket: env.LEDGER_S3_BUCKET ?? '',
        prefix: env.LEDGER_S3_PREFIX,
        region: env.AWS_REGION,
        ...(env.S3_ENDPOINT ? { endpoint: env.S3_ENDPOINT } : {}),
        forcePathStyle: env.S3_FORCE_PATH_STYLE,
      };
  }
}

// ============================================================================
// Loader
// ============================================================================

/**
 * Build the application config from environment variables.
 * Empty strings count as unset.
 *
 * @throws ConfigurationError listing every invalid or missing variable
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env: Record<string, string> = {};
  for (const [name, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== '') {
      env[name] = value.trim();
    }
  }

  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError('Invalid configuration', issues);
  }

  const values = parsed.data;
  const issues = crossFieldIssues(values);
  if (issues.length > 0) {
    throw new ConfigurationError('Invalid configuration', issues);
  }

  return {
    rosterPath: values.ROSTER_PATH,
    ledger: toLedgerConfig(values),
    lookaheadDays: values.LOOKAHEAD_DAYS,
    dailyCheckTime: values.DAILY_CHECK_TIME,
    checkOnStartup: values.CHECK_ON_STARTUP,
    timeZone: values.TIME_ZONE ?? null,
    scanOverlap: values.SCAN_OVERLAP,
    maxAttempts: values.MAX_ATTEMPTS,
    concurrency: values.CONCURRENCY,
    pendingLeaseMs: values.PENDING_LEASE_MS,
    timeouts: {
      contentMs: values.CONTENT_TIMEOUT_MS,
      imageMs: values.IMAGE_TIMEOUT_MS,
      deliveryMs: values.DELIVERY_TIMEOUT_MS,
    },
    imageRequired: values.IMAGE_REQUIRED,
    peerAddresses: values.PEER_ADDRESSES,
    milestones: {
      years: values.MILESTONE_YEARS,
      interval: values.MILESTONE_INTERVAL,
    },
    anniversaryMilestonesOnly: values.ANNIVERSARY_MILESTONES_ONLY,
    leapDayPolicy: values.LEAP_DAY_POLICY,
    content:
      values.CONTENT_PROVIDER === 'claude'
        ? {
            provider: 'claude',
            apiKey: values.ANTHROPIC_API_KEY ?? '',
            model: values.ANTHROPIC_MODEL,
            maxTokens: values.ANTHROPIC_MAX_TOKENS,
          }
        : { provider: 'template' },
    image:
      values.IMAGE_PROVIDER === 'bedrock'
        ? { provider: 'bedrock', modelId: values.BEDROCK_IMAGE_MODEL_ID, region: values.AWS_REGION }
        : { provider: 'none' },
    email: {
      provider: values.EMAIL_PROVIDER,
      apiKey: values.SENDGRID_API_KEY ?? null,
      from: values.EMAIL_FROM,
      fromName: values.EMAIL_FROM_NAME,
      replyTo: values.EMAIL_REPLY_TO ?? null,
      subjects: {
        birthday: values.EMAIL_SUBJECT_BIRTHDAY,
        anniversary: values.EMAIL_SUBJECT_ANNIVERSARY,
      },
    },
    alertWebhookUrl: values.ALERT_WEBHOOK_URL ?? null,
    logLevel: values.LOG_LEVEL,
  };
}
