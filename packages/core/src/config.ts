/** How tool calls are constrained at decode time. */
export type GrammarStrategy = 'tagged-text' | 'structural' | 'json-schema' | 'none';

/** Supported model families for message formatting and native parsing. */
export type ModelFamilyName = 'openai' | 'qwen' | 'function-gemma';

/** How tool results are correlated with the calls that produced them. */
export type ToolResultCorrelation = 'call-id' | 'name-response';

export type HistoryConfig =
  | { strategy: 'keep-all' }
  | { strategy: 'sliding-window'; maxMessages: number }
  | { strategy: 'token-budget'; contextWindow: number; maxHistoryShare?: number };

export interface RetryConfig {
  /** Total attempts, including the first. */
  maxAttempts: number;
  backoffMs: number;
}

/** Kernel configuration, consumed once at construction. */
export interface KernelConfig {
  /** Hard ceiling on turns. */
  maxTurns: number;
  /** Upper bound on concurrently executing tool calls within a turn. */
  toolConcurrencyLimit: number;
  grammarStrategy: GrammarStrategy;
  /** Strategy used instead when the configured one cannot express a tool. */
  schemaFallback: GrammarStrategy | null;
  allowParallelCalls: boolean;
  /** Tagged-text only: derive each tool's argument grammar from its parameter schema. */
  schemaAwareGrammar: boolean;
  history: HistoryConfig;
  runTimeoutMs?: number;
  modelTimeoutMs: number;
  retry: RetryConfig;
  modelFamily: ModelFamilyName;
  /** Overrides the family's default correlation convention. */
  toolResultCorrelation?: ToolResultCorrelation;
  /** Send tool descriptors to the API even when a constraint is attached. */
  sendToolsToApi: boolean;
  maxToolOutputChars: number;
}

/** Connection settings for an OpenAI-compatible inference endpoint. */
export interface ModelEndpointConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
  temperature?: number;
  maxTokens?: number;
}

/** Root of a configuration file. */
export interface GramloopConfig {
  kernel: KernelConfig;
  model: ModelEndpointConfig;
  logLevel: LogLevel;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const DEFAULT_KERNEL_CONFIG: Readonly<KernelConfig> = {
  maxTurns: 20,
  toolConcurrencyLimit: 10,
  grammarStrategy: 'none',
  schemaFallback: null,
  allowParallelCalls: true,
  schemaAwareGrammar: false,
  history: { strategy: 'sliding-window', maxMessages: 50 },
  modelTimeoutMs: 120_000,
  retry: { maxAttempts: 1, backoffMs: 500 },
  modelFamily: 'openai',
  sendToolsToApi: false,
  maxToolOutputChars: 50_000,
};
