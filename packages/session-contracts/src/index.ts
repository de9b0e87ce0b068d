// ============================================
// Stream Session - Type Contracts
// ============================================

// Stream events
export type {
  FinishReason,
  StreamEvent,
  StreamEventType,
  StreamStartEvent,
  TextDeltaEvent,
  ReasoningStartEvent,
  ReasoningDeltaEvent,
  ReasoningEndEvent,
  ToolCallStartEvent,
  ToolCallInputEvent,
  ToolResultEvent,
  ToolErrorEvent,
  StreamFinishEvent,
  StreamErrorEvent,
} from './stream-events.js';
export { FinishReasonSchema, StreamEventSchema, parseStreamEvent } from './stream-events.js';

// Tool lifecycle
export type {
  JsonValue,
  ToolStatus,
  ToolState,
  PendingToolState,
  RunningToolState,
  CompletedToolState,
  ErrorToolState,
  TerminalToolState,
  ToolCallRecord,
} from './tool-state.js';

// Processor verdicts
export type {
  ProcessErrorCode,
  ProcessResult,
  ContinueResult,
  ToolCallRequiredResult,
  FinishedResult,
  CancelledResult,
  ErrorResult,
} from './process-result.js';

// Resource ledger
export type {
  TokenEstimate,
  ModelPricing,
  TokenLimitStatus,
  TokenUsage,
  ProcessorTokenUsage,
  OverflowInput,
} from './tokens.js';

// Logging
export type { ILogger, LogMeta, LogLevel } from './logger.js';

// Configuration
export type { SessionCoreConfig, SessionCoreConfigInput } from './config-schemas.js';
export { LogLevelSchema, SessionCoreConfigSchema } from './config-schemas.js';
