/**
 * Synthesizer Module
 *
 * Greeting text generation.
 *
 * Features:
 * - Claude API integration with @anthropic-ai/sdk
 * - Prompt template loading from prompts/greeting.md
 * - Rate-limit backoff that stops as soon as the call is aborted
 * - Deterministic template generator for development and as a fallback
 *
 * Usage:
 * ```typescript
 * const generator = new ClaudeContentGenerator({ apiKey: process.env.ANTHROPIC_API_KEY ?? '' });
 * const text = await generator.generate(request, { signal });
 * ```
 */

import Anthropic from '@anthropic-ai/sdk';
import type { MessageCreateParamsNonStreaming } from '@anthropic-ai/sdk/resources/messages';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { GenerationError, toErrorMessage } from '../errors/index.js';
import { defaultLogger, defaultMetrics, type Logger, type Metrics } from '../observability/index.js';
import type { CallOptions, GeneratedText, GreetingRequest } from '../types/index.js';
import { sleep } from '../utils/index.js';

// ============================================================================
// Contract
// ============================================================================

/**
 * Content generator contract. Fails with GenerationError.
 */
export interface ContentGenerator {
  readonly name: string;
  generate(request: GreetingRequest, options?: CallOptions): Promise<GeneratedText>;
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
const DEFAULT_MAX_TOKENS = 1024;
const DEFAULT_TEMPERATURE = 0.7;

/** Exponential backoff delays for rate limit handling */
const RATE_LIMIT_DELAYS_MS = [1000, 2000, 4000, 8000];

const SYSTEM_PROMPT =
  'You write short, warm workplace greetings. Reply with the greeting text only: no subject line, no signature, no markdown.';

const DEFAULT_PROMPT_PATH = join(__dirname, '..', '..', 'prompts', 'greeting.md');

// ============================================================================
// Prompt Building
// ============================================================================

function ordinal(n: number): string {
  const mod100 = n % 100;
  if (mod100 >= 11 && mod100 <= 13) return `${n}th`;
  switch (n % 10) {
    case 1:
      return `${n}st`;
    case 2:
      return `${n}nd`;
    case 3:
      return `${n}rd`;
    default:
      return `${n}th`;
  }
}

/**
 * Short description of the occasion, e.g. "5th work anniversary"
 */
export function describeOccasion(request: GreetingRequest): string {
  if (request.kind === 'birthday') {
    return request.elapsedYears === null ? 'birthday' : `${ordinal(request.elapsedYears)} birthday`;
  }
  return request.elapsedYears === null ? 'work anniversary' : `${ordinal(request.elapsedYears)} work anniversary`;
}

/**
 * Fill the prompt template. Placeholders use {{variable}} syntax.
 */
export function buildGreetingPrompt(template: string, request: GreetingRequest): string {
  const interests = request.interests.length > 0 ? request.interests.join(', ') : 'none listed';
  const milestone = request.milestone ? 'yes, this is a milestone year' : 'no';
  return template
    .replaceAll('{{name}}', request.subjectName)
    .replaceAll('{{occasion}}', describeOccasion(request))
    .replaceAll('{{kind}}', request.kind)
    .replaceAll('{{years}}', request.elapsedYears === null ? 'unknown' : String(request.elapsedYears))
    .replaceAll('{{milestone}}', milestone)
    .replaceAll('{{interests}}', interests);
}

/**
 * Load the prompt template from disk
 *
 * @throws GenerationError when the template cannot be read
 */
export async function loadPromptTemplate(path: string = DEFAULT_PROMPT_PATH): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    throw new GenerationError(`Failed to load prompt template: ${path}`, { provider: 'claude', cause: error });
  }
}

// ============================================================================
// Claude Generator
// ============================================================================

/**
 * Reply fields the generator reads from a Claude message
 */
export interface ClaudeReply {
  content: Array<{ type: string; text?: string }>;
  stop_reason?: string | null;
  usage?: { input_tokens: number; output_tokens: number };
}

/**
 * The slice of the Anthropic client the generator calls
 */
export interface ClaudeMessagesApi {
  create(body: MessageCreateParamsNonStreaming, options?: { signal?: AbortSignal }): Promise<ClaudeReply>;
}

export interface ClaudeGeneratorConfig {
  apiKey: string;
  /** Model ID (default: claude-sonnet-4-20250514) */
  model?: string;
  /** Maximum tokens for response (default: 1024) */
  maxTokens?: number;
  /** Temperature for generation (default: 0.7) */
  temperature?: number;
  /** Prompt template path (default: prompts/greeting.md) */
  promptPath?: string;
  rateLimitDelaysMs?: number[];
}

function isRateLimit(error: unknown): boolean {
  const message = toErrorMessage(error);
  return message.includes('rate_limit') || message.includes('429') || message.includes('overloaded');
}

export class ClaudeContentGenerator implements ContentGenerator {
  readonly name = 'claude';
  private readonly messages: ClaudeMessagesApi;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly promptPath: string | undefined;
  private readonly rateLimitDelaysMs: number[];
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private template: string | null = null;

  constructor(
    config: ClaudeGeneratorConfig,
    deps: { messages?: ClaudeMessagesApi; logger?: Logger; metrics?: Metrics } = {}
  ) {
    // retries are handled here so that they respect the caller's signal
    this.messages = deps.messages ?? new Anthropic({ apiKey: config.apiKey, maxRetries: 0 }).messages;
    this.model = config.model ?? DEFAULT_MODEL;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.temperature = config.temperature ?? DEFAULT_TEMPERATURE;
    this.promptPath = config.promptPath;
    this.rateLimitDelaysMs = config.rateLimitDelaysMs ?? RATE_LIMIT_DELAYS_MS;
    this.logger = deps.logger ?? defaultLogger;
    this.metrics = deps.metrics ?? defaultMetrics;
  }

  async generate(request: GreetingRequest, options: CallOptions = {}): Promise<GeneratedText> {
    const startTime = Date.now();
    const signal = options.signal;
    this.template ??= await loadPromptTemplate(this.promptPath);
    const prompt = buildGreetingPrompt(this.template, request);

    this.logger.info('Calling Claude API', {
      model: this.model,
      subjectId: request.subjectId,
      kind: request.kind,
      promptLength: prompt.length,
    });
    this.metrics.incrementCounter('synthesizer.claude.calls', { model: this.model });

    let lastError: unknown = null;

    for (let attempt = 0; attempt <= this.rateLimitDelaysMs.length; attempt++) {
      try {
        const response = await this.messages.create(
          {
            model: this.model,
            max_tokens: this.maxTokens,
            temperature: this.temperature,
            system: SYSTEM_PROMPT,
            messages: [{ role: 'user', content: prompt }],
          },
          signal ? { signal } : {}
        );

        const body = response.content
          .map((block) => (block.type === 'text' ? block.text ?? '' : ''))
          .join('')
          .trim();
        if (!body) {
          throw new GenerationError('Claude returned an empty greeting', { provider: this.name });
        }

        this.metrics.recordDuration('synthesizer.claude.duration', Date.now() - startTime, { model: this.model });
        this.logger.info('Claude API response received', {
          model: this.model,
          inputTokens: response.usage?.input_tokens,
          outputTokens: response.usage?.output_tokens,
          stopReason: response.stop_reason,
        });

        return {
          body,
          provider: this.name,
          model: this.model,
          generatedAt: new Date().toISOString(),
        };
      } catch (error) {
        lastError = error;
        if (error instanceof GenerationError || signal?.aborted) {
          break;
        }

        const delay = this.rateLimitDelaysMs[attempt];
        if (isRateLimit(error) && delay !== undefined) {
          this.logger.warn(`Rate limited, retrying in ${delay}ms`, {
            attempt: attempt + 1,
            error: toErrorMessage(error),
          });
          this.metrics.incrementCounter('synthesizer.claude.rate_limit', { model: this.model });
          try {
            await sleep(delay, signal);
          } catch {
            break;
          }
          continue;
        }
        break;
      }
    }

    this.metrics.incrementCounter('synthesizer.claude.errors', { model: this.model });
    this.logger.error('Claude API call failed', { error: toErrorMessage(lastError) });

    if (lastError instanceof GenerationError) {
      throw lastError;
    }
    throw new GenerationError(`Claude API call failed: ${toErrorMessage(lastError)}`, {
      provider: this.name,
      timedOut: signal?.aborted ?? false,
      cause: lastError,
    });
  }
}

// ============================================================================
// Template Generator
// ============================================================================

/**
 * Fixed greetings with no external calls
 */
export class TemplateContentGenerator implements ContentGenerator {
  readonly name = 'template';

  async generate(request: GreetingRequest): Promise<GeneratedText> {
    return {
      body: templateGreeting(request),
      provider: this.name,
      model: null,
      generatedAt: new Date().toISOString(),
    };
  }
}

export function templateGreeting(request: GreetingRequest): string {
  const name = request.subjectName;
  const interest = request.interests[0];

  if (request.kind === 'birthday') {
    const extra = interest ? ` We hope you find some time for ${interest} today.` : '';
    return `Happy birthday, ${name}! Wishing you a wonderful day and a great year ahead.${extra}`;
  }

  if (request.elapsedYears === 1) {
    return `Congratulations on your first work anniversary, ${name}! Thank you for a fantastic first year with the team.`;
  }
  const years = request.elapsedYears === null ? 'another year' : `${request.elapsedYears} years`;
  return `Congratulations on ${years} with the team, ${name}! Thank you for your dedication and everything you bring to work every day.`;
}
