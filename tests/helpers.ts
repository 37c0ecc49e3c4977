/**
 * Shared test fixtures
 */

import { jest } from '@jest/globals';
import type { Logger, Metrics } from '../src/observability/index.js';
import type { AlertSink, DeliveryTransport } from '../src/adapters/index.js';
import type { ContentGenerator } from '../src/synthesizer/index.js';
import type { ImageGenerator } from '../src/imagery/index.js';
import type {
  DeliveryConfirmation,
  GeneratedText,
  GreetingRequest,
  ImageHandle,
  StaffRecord,
} from '../src/types/index.js';

export type LogEntry = { level: string; msg: string; meta?: Record<string, unknown> };

export const createMockLogger = (): Logger & { logs: LogEntry[] } => {
  const logs: LogEntry[] = [];
  return {
    logs,
    info: (msg, meta) => logs.push({ level: 'info', msg, meta }),
    warn: (msg, meta) => logs.push({ level: 'warn', msg, meta }),
    error: (msg, meta) => logs.push({ level: 'error', msg, meta }),
    debug: (msg, meta) => logs.push({ level: 'debug', msg, meta }),
  };
};

export const createMockMetrics = (): Metrics & { counters: string[] } => {
  const counters: string[] = [];
  return {
    counters,
    incrementCounter: (name) => counters.push(name),
    recordDuration: () => undefined,
    recordGauge: () => undefined,
  };
};

export const makeStaff = (overrides: Partial<StaffRecord> = {}): StaffRecord => ({
  id: 'emp-1',
  name: 'Jane Doe',
  alias: null,
  email: 'jane@example.com',
  birthDate: { year: 1990, month: 8, day: 15 },
  startDate: { year: 2020, month: 3, day: 1 },
  interests: [],
  ...overrides,
});

export const makeRequest = (overrides: Partial<GreetingRequest> = {}): GreetingRequest => ({
  subjectId: 'emp-1',
  subjectName: 'Jane',
  kind: 'birthday',
  elapsedYears: 34,
  milestone: false,
  interests: [],
  ...overrides,
});

export const fakeText = (body = 'Have a great day!'): GeneratedText => ({
  body,
  provider: 'fake',
  model: null,
  generatedAt: '2024-08-15T08:00:00.000Z',
});

export const fakeImage = (fileName = 'emp-1-birthday.png'): ImageHandle => ({
  base64: 'aW1hZ2U=',
  contentType: 'image/png',
  fileName,
  prompt: 'a card',
  provider: 'fake',
});

export const createFakeContent = () => {
  const generate = jest.fn<ContentGenerator['generate']>().mockImplementation(async (request) =>
    fakeText(`Greetings, ${request.subjectName}!`)
  );
  const generator: ContentGenerator = { name: 'fake', generate };
  return { generator, generate };
};

export const createFakeImage = () => {
  const generate = jest.fn<ImageGenerator['generate']>().mockImplementation(async () => fakeImage());
  const generator: ImageGenerator = { name: 'fake', generate };
  return { generator, generate };
};

export const createFakeTransport = () => {
  let sequence = 0;
  const send = jest.fn<DeliveryTransport['send']>().mockImplementation(async (): Promise<DeliveryConfirmation> => {
    sequence += 1;
    return { messageId: `msg-${sequence}`, provider: 'fake', acceptedAt: '2024-08-15T08:00:00.000Z' };
  });
  const transport: DeliveryTransport = { name: 'fake', send };
  return { transport, send };
};

export const createFakeAlerts = () => {
  const notify = jest.fn<AlertSink['notify']>().mockResolvedValue(undefined);
  const sink: AlertSink = { name: 'fake', notify };
  return { sink, notify };
};
