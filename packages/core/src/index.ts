// Messages
export type { MessageRole, Message, ToolCall } from './messages.js';

// Tool definitions
export type {
  JSONSchema,
  ToolSchema,
  ToolResult,
  ToolHandler,
  ToolSource,
} from './tools.js';

// Model client abstraction
export type {
  TokenUsage,
  WireToolCall,
  WireMessage,
  WireTool,
  ModelRequest,
  ModelResponse,
  CompleteOptions,
  ModelClient,
} from './model.js';

// Events & observers
export type {
  TerminationReason,
  KernelEvent,
  KernelEventOf,
  Observer,
} from './events.js';

// History
export type { HistoryStrategy } from './history.js';

// Errors
export {
  KernelError,
  SchemaError,
  ParseError,
  ToolExecutionError,
  TransportError,
  CancellationError,
  ConfigurationError,
  describeError,
  toKernelError,
} from './errors.js';
export type { ErrorKind } from './errors.js';

// Logging
export { createConsoleLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';

// Configuration
export { DEFAULT_KERNEL_CONFIG } from './config.js';
export type {
  GrammarStrategy,
  ModelFamilyName,
  ToolResultCorrelation,
  HistoryConfig,
  RetryConfig,
  KernelConfig,
  ModelEndpointConfig,
  GramloopConfig,
  LogLevel,
} from './config.js';

// Configuration validator
export {
  validateConfig,
  validateConfigObject,
  loadConfig,
  resolveKernelConfig,
} from './config-validator.js';
export type {
  ConfigValidationError,
  ConfigValidationResult,
} from './config-validator.js';

export { applyEnvOverrides } from './config-env-overlay.js';

// Utilities
export { generateCallId, isRecord, raceAbort, sleep, linkSignals } from './utils.js';
