/**
 * Staff Occasions - Main Entry Point
 *
 * Detects upcoming birthdays and work anniversaries from a staff roster and
 * delivers one personalized greeting per occasion.
 *
 * Architecture:
 * - The scheduler triggers a scan cycle daily (and on demand)
 * - The detector is pure: roster + reference date -> occasions
 * - The ledger is the single source of truth for what has been delivered
 * - Content, image and delivery collaborators are swappable behind interfaces
 */

// Core Types
export type * from './types/index.js';

// Errors
export {
  OccasionError,
  GenerationError,
  TransportError,
  ConfigurationError,
  LedgerConflictError,
  LedgerUnavailableError,
  RosterError,
  CycleInProgressError,
  hasErrorCode,
  isOccasionError,
  toErrorMessage,
  type ErrorCode,
} from './errors/index.js';

// Observability
export {
  createLogger,
  defaultLogger,
  defaultMetrics,
  type Logger,
  type Metrics,
  type LogLevel,
} from './observability/index.js';

// Calendar arithmetic
export {
  DEFAULT_LEAP_DAY_POLICY,
  isValidCalendarDate,
  isValidMonthDay,
  compareCalendarDates,
  observedDate,
  isSameCalendarDay,
  nextOccurrence,
  daysUntilNextOccurrence,
  elapsedYears,
  isWithinWindow,
  addDaysToCalendarDate,
  parseCalendarDate,
  parseBirthDate,
  formatCalendarDate,
  formatDateDisplay,
  todayInTimeZone,
} from './dates/index.js';

// Occasion detection
export {
  DEFAULT_MILESTONE_POLICY,
  detect,
  isMilestone,
  occasionKey,
  compareOccasions,
  type DetectOptions,
} from './detector/index.js';

// Roster
export {
  JsonFileRosterSource,
  MemoryRosterSource,
  parseStaffRecord,
  displayName,
  formatBirthDate,
  toRawStaffRecord,
  type RosterSource,
  type RosterStore,
  type StaffFields,
  type ParseStaffResult,
} from './roster/index.js';

// Ledger storage
export {
  S3LedgerStore,
  FileLedgerStore,
  FileCycleLock,
  LockFile,
  MemoryLedgerStore,
  createCycleLock,
  createLedgerStore,
  formatDeliveryKey,
  type LedgerStore,
  type LedgerStoreConfig,
  type CycleLock,
  type CycleLockLease,
  type FileLedgerStoreOptions,
  type S3Config,
} from './storage/index.js';

// Delivery ledger
export {
  DeliveryLedger,
  INTERRUPTED_REASON,
  type ClaimStatus,
  type ClaimOptions,
  type ClaimResult,
  type AttemptDetails,
  type DeliveryLedgerOptions,
} from './ledger/index.js';

// Content generation
export {
  ClaudeContentGenerator,
  TemplateContentGenerator,
  buildGreetingPrompt,
  describeOccasion,
  templateGreeting,
  type ContentGenerator,
  type ClaudeGeneratorConfig,
} from './synthesizer/index.js';

// Image generation
export {
  BedrockImageGenerator,
  NullImageGenerator,
  buildImagePrompt,
  imageFileName,
  type ImageGenerator,
  type BedrockImageConfig,
} from './imagery/index.js';

// Rendering
export { renderGreeting, formatSubject, escapeHtml, type SubjectTemplates } from './renderers/index.js';

// Delivery and alerts
export {
  SendGridTransport,
  LogTransport,
  LogAlertSink,
  WebhookAlertSink,
  CompositeAlertSink,
  copyList,
  type DeliveryTransport,
  type AlertSink,
  type SendGridConfig,
  type WebhookAlertConfig,
} from './adapters/index.js';

// Pipeline
export {
  PipelineOrchestrator,
  CANCELLED_REASON,
  toGreetingRequest,
  type OrchestratorOptions,
  type ProcessOptions,
} from './orchestrator/index.js';

export { CycleRunner, emptyCounts, type CycleOptions, type CycleReport, type PlannedOccasion } from './cycle/index.js';

export {
  ScanScheduler,
  computeNextRunAt,
  type TriggerSource,
  type TriggerOutcome,
  type OverlapPolicy,
} from './scheduler/index.js';

// Configuration and wiring
export { loadConfig, type AppConfig } from './config/index.js';
export { createRuntime, type Runtime, type RuntimeOverrides } from './runtime/index.js';
