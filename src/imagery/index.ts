/**
 * Imagery Module
 *
 * Greeting card images from Amazon Bedrock (Nova Canvas). Prompts are built
 * from the subject's interests (the first one leads) and, for anniversaries,
 * the tenure tier.
 */

import {
  BedrockRuntimeClient,
  InvokeModelCommand,
  type BedrockRuntimeClientConfig,
} from '@aws-sdk/client-bedrock-runtime';
import { z } from 'zod';
import { GenerationError, toErrorMessage } from '../errors/index.js';
import { defaultLogger, defaultMetrics, type Logger, type Metrics } from '../observability/index.js';
import type { CallOptions, GreetingRequest, ImageHandle } from '../types/index.js';

/**
 * Image generator contract. Fails with GenerationError.
 */
export interface ImageGenerator {
  readonly name: string;
  generate(request: GreetingRequest, options?: CallOptions): Promise<ImageHandle>;
}

/** Nova Canvas rejects longer prompts */
export const MAX_PROMPT_LENGTH = 1024;

const IMAGE_WIDTH = 1024;
const IMAGE_HEIGHT = 768;

// ============================================================================
// Prompt Building
// ============================================================================

function interestClause(interests: string[], extraCount: number): string {
  const [primary, ...others] = interests;
  if (!primary) {
    return '';
  }
  let clause = ` The design incorporates elements of ${primary}`;
  const extra = others.slice(0, extraCount);
  if (extra.length > 0) {
    clause += ` with subtle references to ${extra.join(', ')}`;
  }
  return `${clause}.`;
}

function anniversaryOpening(name: string, years: number): string {
  if (years === 1) {
    return `A congratulatory digital card celebrating ${name}'s first year work anniversary.`;
  }
  if (years === 5) {
    return `An elegant digital card celebrating ${name}'s 5-year work anniversary milestone.`;
  }
  if (years === 10) {
    return `A prestigious digital card celebrating ${name}'s impressive decade of service.`;
  }
  if (years >= 20) {
    return `A distinguished digital card celebrating ${name}'s remarkable ${years} years of dedicated service.`;
  }
  return `A professional digital card celebrating ${name}'s ${years}-year work anniversary.`;
}

function anniversaryStyle(years: number): string {
  if (years === 1) {
    return " The image has a fresh, optimistic feel with bright colors and a '1 Year' text prominently displayed.";
  }
  if (years <= 5) {
    return ` The image has a polished, professional look with vibrant colors and a '${years} Years' text prominently displayed.`;
  }
  if (years <= 10) {
    return ` The image has a distinguished look with rich colors and gold or silver accents, and a '${years} Years' text prominently displayed.`;
  }
  return ` The image has a prestigious look with elegant colors and gold accents, and a '${years} Years' text prominently displayed.`;
}

/**
 * Text-to-image prompt for a greeting card, at most MAX_PROMPT_LENGTH characters
 */
export function buildImagePrompt(request: GreetingRequest): string {
  const name = request.subjectName;
  let prompt: string;

  if (request.kind === 'birthday') {
    prompt =
      `A cheerful, professional digital birthday card for ${name}.` +
      interestClause(request.interests, 2) +
      " The image is colorful but suitable for the workplace, with balloons, cake or confetti and 'Happy Birthday' text prominently displayed.";
  } else {
    const years = request.elapsedYears ?? 1;
    prompt = anniversaryOpening(name, years) + interestClause(request.interests, 1) + anniversaryStyle(years);
  }

  return prompt.length > MAX_PROMPT_LENGTH ? prompt.slice(0, MAX_PROMPT_LENGTH) : prompt;
}

export function imageFileName(request: GreetingRequest): string {
  const suffix = request.kind === 'anniversary' && request.elapsedYears !== null ? `-${request.elapsedYears}yr` : '';
  const safeId = request.subjectId.replace(/[^A-Za-z0-9_-]/g, '_');
  return `${safeId}-${request.kind}${suffix}.png`;
}

// ============================================================================
// Bedrock Generator
// ============================================================================

const NovaCanvasResponseSchema = z.object({
  images: z.array(z.string()).optional(),
  error: z.string().nullish(),
});

/**
 * Sends one InvokeModel request; replaced in tests
 */
export type BedrockInvoke = (command: InvokeModelCommand, signal?: AbortSignal) => Promise<{ body?: Uint8Array }>;

export interface BedrockImageConfig {
  modelId: string;
  region?: string;
  endpoint?: string;
}

export class BedrockImageGenerator implements ImageGenerator {
  readonly name = 'bedrock';
  private readonly invoke: BedrockInvoke;
  private readonly modelId: string;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(
    config: BedrockImageConfig,
    deps: { invoke?: BedrockInvoke; logger?: Logger; metrics?: Metrics } = {}
  ) {
    this.modelId = config.modelId;
    this.logger = deps.logger ?? defaultLogger;
    this.metrics = deps.metrics ?? defaultMetrics;

    if (deps.invoke) {
      this.invoke = deps.invoke;
    } else {
      const clientConfig: BedrockRuntimeClientConfig = { region: config.region ?? 'us-east-1' };
      if (config.endpoint) {
        clientConfig.endpoint = config.endpoint;
      }
      const client = new BedrockRuntimeClient(clientConfig);
      this.invoke = (command, signal) => client.send(command, { abortSignal: signal });
    }
  }

  async generate(request: GreetingRequest, options: CallOptions = {}): Promise<ImageHandle> {
    const startTime = Date.now();
    const prompt = buildImagePrompt(request);

    this.logger.info('Generating greeting image', {
      modelId: this.modelId,
      subjectId: request.subjectId,
      kind: request.kind,
      promptLength: prompt.length,
    });
    this.metrics.incrementCounter('imagery.bedrock.calls', { model: this.modelId });

    const command = new InvokeModelCommand({
      modelId: this.modelId,
      contentType: 'application/json',
      accept: 'application/json',
      body: JSON.stringify({
        taskType: 'TEXT_IMAGE',
        textToImageParams: { text: prompt },
        imageGenerationConfig: {
          numberOfImages: 1,
          width: IMAGE_WIDTH,
          height: IMAGE_HEIGHT,
        },
      }),
    });

    let responseBody: Uint8Array | undefined;
    try {
      const response = await this.invoke(command, options.signal);
      responseBody = response.body;
    } catch (error) {
      this.metrics.incrementCounter('imagery.bedrock.errors', { model: this.modelId });
      throw new GenerationError(`Bedrock image generation failed: ${toErrorMessage(error)}`, {
        provider: this.name,
        timedOut: options.signal?.aborted ?? false,
        cause: error,
      });
    }

    const image = this.extractImage(responseBody);
    this.metrics.recordDuration('imagery.bedrock.duration', Date.now() - startTime, { model: this.modelId });

    return {
      base64: image,
      contentType: 'image/png',
      fileName: imageFileName(request),
      prompt,
      provider: this.name,
    };
  }

  private extractImage(body: Uint8Array | undefined): string {
    if (!body) {
      throw new GenerationError('Bedrock returned an empty response', { provider: this.name });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(Buffer.from(body).toString('utf-8'));
    } catch (error) {
      throw new GenerationError('Bedrock response is not valid JSON', { provider: this.name, cause: error });
    }

    const result = NovaCanvasResponseSchema.safeParse(parsed);
    if (!result.success) {
      throw new GenerationError('Unexpected Bedrock response shape', { provider: this.name });
    }
    if (result.data.error) {
      throw new GenerationError(`Bedrock rejected the request: ${result.data.error}`, { provider: this.name });
    }
    const image = result.data.images?.[0];
    if (!image) {
      throw new GenerationError('No image data in the Bedrock response', { provider: this.name });
    }
    return image;
  }
}

// ============================================================================
// Null Generator
// ============================================================================

/**
 * Used when image generation is switched off. Every call fails, so the
 * pipeline falls back to text-only delivery.
 */
export class NullImageGenerator implements ImageGenerator {
  readonly name = 'none';

  async generate(): Promise<ImageHandle> {
    throw new GenerationError('Image generation is disabled', { provider: this.name });
  }
}
