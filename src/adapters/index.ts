/**
 * Delivery Adapters Module
 *
 * Delivery transports (SendGrid, log-only) and alert sinks (log, webhook).
 *
 * Transports fail with TransportError; the orchestrator turns that into a
 * ledger transition. Alert sinks are best effort: the orchestrator logs
 * their failures and moves on.
 */

import { randomUUID } from 'crypto';
import axios, { type AxiosInstance } from 'axios';
import { TransportError, toErrorMessage } from '../errors/index.js';
import { defaultLogger, type Logger } from '../observability/index.js';
import { INLINE_IMAGE_CONTENT_ID } from '../renderers/index.js';
import { formatDeliveryKey } from '../storage/index.js';
import type {
  CallOptions,
  DeliveryConfirmation,
  DeliveryKey,
  DeliveryRecord,
  ImageHandle,
  RenderedGreeting,
} from '../types/index.js';

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Delivery transport contract
 */
export interface DeliveryTransport {
  readonly name: string;
  /**
   * Send a rendered greeting to `recipient`, with `peers` in copy
   *
   * @throws TransportError when the message is not accepted
   */
  send(
    recipient: string,
    peers: string[],
    content: RenderedGreeting,
    image: ImageHandle | null,
    options?: CallOptions
  ): Promise<DeliveryConfirmation>;
}

/**
 * Receives terminal delivery failures for manual attention
 */
export interface AlertSink {
  readonly name: string;
  notify(key: DeliveryKey, reason: string, record: DeliveryRecord): Promise<void>;
}

/**
 * Peers minus the recipient and duplicates, compared case-insensitively
 */
export function copyList(recipient: string, peers: string[]): string[] {
  const seen = new Set<string>([recipient.toLowerCase()]);
  const result: string[] = [];
  for (const peer of peers) {
    const normalized = peer.toLowerCase();
    if (!seen.has(normalized)) {
      seen.add(normalized);
      result.push(peer);
    }
  }
  return result;
}

// ============================================================================
// SENDGRID TRANSPORT
// ============================================================================

export interface SendGridConfig {
  apiKey: string;
  from: string;
  fromName?: string;
  replyTo?: string | null;
  apiUrl?: string;
}

/**
 * SendGridTransport
 *
 * Sends mail through the SendGrid v3 API. The card image travels as an
 * inline attachment referenced by the HTML body.
 */
export class SendGridTransport implements DeliveryTransport {
  readonly name = 'sendgrid';
  private apiKey: string;
  private from: string;
  private fromName: string;
  private replyTo: string | null;
  private apiUrl: string;
  private fetchImpl: typeof fetch;
  private logger: Logger;

  constructor(config: SendGridConfig, deps: { fetch?: typeof fetch; logger?: Logger } = {}) {
    if (!config.apiKey) {
      throw new TransportError('SendGrid API key is required', { provider: 'sendgrid' });
    }
    this.apiKey = config.apiKey;
    this.from = config.from;
    this.fromName = config.fromName ?? 'Staff Occasions';
    this.replyTo = config.replyTo ?? null;
    this.apiUrl = config.apiUrl ?? 'https://api.sendgrid.com/v3/mail/send';
    this.fetchImpl = deps.fetch ?? fetch;
    this.logger = deps.logger ?? defaultLogger;
  }

  buildPayload(recipient: string, peers: string[], content: RenderedGreeting, image: ImageHandle | null) {
    const cc = copyList(recipient, peers);
    return {
      personalizations: [
        {
          to: [{ email: recipient }],
          ...(cc.length > 0 ? { cc: cc.map((email) => ({ email })) } : {}),
        },
      ],
      from: {
        email: this.from,
        name: this.fromName,
      },
      ...(this.replyTo ? { reply_to: { email: this.replyTo } } : {}),
      subject: content.subject,
      content: [
        { type: 'text/plain', value: content.bodyPlain },
        { type: 'text/html', value: content.bodyHtml },
      ],
      ...(image
        ? {
            attachments: [
              {
                content: image.base64,
                type: image.contentType,
                filename: image.fileName,
                disposition: 'inline',
                content_id: INLINE_IMAGE_CONTENT_ID,
              },
            ],
          }
        : {}),
    };
  }

  async send(
    recipient: string,
    peers: string[],
    content: RenderedGreeting,
    image: ImageHandle | null,
    options: CallOptions = {}
  ): Promise<DeliveryConfirmation> {
    const payload = this.buildPayload(recipient, peers, content, image);

    let response: Response;
    try {
      response = await this.fetchImpl(this.apiUrl, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(payload),
        ...(options.signal ? { signal: options.signal } : {}),
      });
    } catch (error) {
      this.logger.error('Failed to reach SendGrid', { recipient, error: toErrorMessage(error) });
      throw new TransportError(`SendGrid request failed: ${toErrorMessage(error)}`, {
        provider: this.name,
        timedOut: options.signal?.aborted ?? false,
        cause: error,
      });
    }

    if (!response.ok) {
      const errorBody = await response.text();
      this.logger.error('SendGrid rejected the message', { recipient, status: response.status });
      throw new TransportError(`SendGrid API error: ${response.status} - ${errorBody}`, {
        provider: this.name,
        status: response.status,
      });
    }

    const messageId = response.headers.get('X-Message-Id') ?? `sendgrid-${randomUUID()}`;
    this.logger.info('Email sent successfully', { recipient, messageId });

    return {
      messageId,
      provider: this.name,
      acceptedAt: new Date().toISOString(),
    };
  }
}

// ============================================================================
// LOG TRANSPORT
// ============================================================================

/**
 * LogTransport
 *
 * Development transport: logs the message instead of sending it.
 */
export class LogTransport implements DeliveryTransport {
  readonly name = 'log';
  private logger: Logger;

  constructor(logger: Logger = defaultLogger) {
    this.logger = logger;
  }

  async send(
    recipient: string,
    peers: string[],
    content: RenderedGreeting,
    image: ImageHandle | null
  ): Promise<DeliveryConfirmation> {
    const messageId = `log-${randomUUID()}`;
    this.logger.info('[DEV MODE] Would send email', {
      messageId,
      to: recipient,
      cc: copyList(recipient, peers),
      subject: content.subject,
      bodyPreview: content.bodyPlain.slice(0, 200),
      image: image?.fileName ?? null,
    });
    return {
      messageId,
      provider: this.name,
      acceptedAt: new Date().toISOString(),
    };
  }
}

// ============================================================================
// ALERT SINKS
// ============================================================================

/**
 * Structured log alert at error level
 */
export class LogAlertSink implements AlertSink {
  readonly name = 'log';
  private logger: Logger;

  constructor(logger: Logger = defaultLogger) {
    this.logger = logger;
  }

  async notify(key: DeliveryKey, reason: string, record: DeliveryRecord): Promise<void> {
    this.logger.error('Delivery permanently failed', {
      key: formatDeliveryKey(key),
      reason,
      retryCount: record.retryCount,
      updatedAt: record.updatedAt,
    });
  }
}

export interface WebhookAlertConfig {
  url: string;
  timeoutMs?: number;
}

/**
 * JSON webhook alert (chat incoming webhooks, incident tools)
 */
export class WebhookAlertSink implements AlertSink {
  readonly name = 'webhook';
  private client: AxiosInstance;
  private url: string;
  private logger: Logger;

  constructor(config: WebhookAlertConfig, deps: { client?: AxiosInstance; logger?: Logger } = {}) {
    this.url = config.url;
    this.client =
      deps.client ??
      axios.create({
        timeout: config.timeoutMs ?? 10000,
        headers: { 'Content-Type': 'application/json' },
      });
    this.logger = deps.logger ?? defaultLogger;
  }

  async notify(key: DeliveryKey, reason: string, record: DeliveryRecord): Promise<void> {
    const keyLabel = formatDeliveryKey(key);
    try {
      await this.client.post(this.url, {
        event: 'delivery.terminal_failure',
        key: keyLabel,
        subjectId: key.subjectId,
        kind: key.kind,
        year: key.year,
        reason,
        retryCount: record.retryCount,
        updatedAt: record.updatedAt,
        text: `Greeting delivery for ${keyLabel} failed permanently after ${record.retryCount} attempts: ${reason}`,
      });
    } catch (error) {
      throw new TransportError(`Alert webhook failed: ${toErrorMessage(error)}`, {
        provider: this.name,
        cause: error,
      });
    }
    this.logger.info('Alert webhook delivered', { key: keyLabel });
  }
}

/**
 * Fan an alert out to several sinks. Every sink is tried; the first failure
 * is rethrown after all have run.
 */
export class CompositeAlertSink implements AlertSink {
  readonly name = 'composite';
  private sinks: AlertSink[];

  constructor(sinks: AlertSink[]) {
    this.sinks = sinks;
  }

  async notify(key: DeliveryKey, reason: string, record: DeliveryRecord): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map((sink) => sink.notify(key, reason, record)));
    const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failure) {
      throw failure.reason;
    }
  }
}
