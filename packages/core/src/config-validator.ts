import JSON5 from 'json5';
import { readFileSync } from 'node:fs';
import type {
  GrammarStrategy,
  GramloopConfig,
  HistoryConfig,
  KernelConfig,
  LogLevel,
  ModelEndpointConfig,
  ModelFamilyName,
  RetryConfig,
  ToolResultCorrelation,
} from './config.js';
import { DEFAULT_KERNEL_CONFIG } from './config.js';
import { applyEnvOverrides } from './config-env-overlay.js';
import { ConfigurationError } from './errors.js';
import { isRecord } from './utils.js';

const REQUIRED_SECTIONS = ['model'] as const;

/** All valid top-level keys (required + optional). */
const VALID_TOP_LEVEL_KEYS = new Set<string>([...REQUIRED_SECTIONS, 'kernel', 'logLevel']);

const KERNEL_KEYS = new Set<string>([
  'maxTurns',
  'toolConcurrencyLimit',
  'grammarStrategy',
  'schemaFallback',
  'allowParallelCalls',
  'schemaAwareGrammar',
  'history',
  'runTimeoutMs',
  'modelTimeoutMs',
  'retry',
  'modelFamily',
  'toolResultCorrelation',
  'sendToolsToApi',
  'maxToolOutputChars',
]);

const MODEL_KEYS = ['baseUrl', 'model', 'apiKey', 'temperature', 'maxTokens'];
const NESTED_KEYS = ['strategy', 'maxMessages', 'contextWindow', 'maxHistoryShare', 'maxAttempts', 'backoffMs'];

/** Every key name an env override may address. */
const ENV_KEYS = [...VALID_TOP_LEVEL_KEYS, ...KERNEL_KEYS, ...MODEL_KEYS, ...NESTED_KEYS];

const STRATEGIES: readonly GrammarStrategy[] = ['tagged-text', 'structural', 'json-schema', 'none'];
const FAMILIES: readonly ModelFamilyName[] = ['openai', 'qwen', 'function-gemma'];
const CORRELATIONS: readonly ToolResultCorrelation[] = ['call-id', 'name-response'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface ConfigValidationError {
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  config?: GramloopConfig;
}

/** Collects errors while reading typed fields out of an untyped section. */
class SectionReader {
  constructor(
    private readonly section: Record<string, unknown>,
    private readonly prefix: string,
    private readonly errors: ConfigValidationError[],
  ) {}

  private path(key: string): string {
    return this.prefix ? `${this.prefix}.${key}` : key;
  }

  private fail(key: string, message: string): undefined {
    this.errors.push({ path: this.path(key), message });
    return undefined;
  }

  int(key: string, min: number): number | undefined {
    const value = this.section[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
      return this.fail(key, `Expected an integer >= ${min}`);
    }
    return value;
  }

  number(key: string): number | undefined {
    const value = this.section[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      return this.fail(key, 'Expected a number');
    }
    return value;
  }

  bool(key: string): boolean | undefined {
    const value = this.section[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'boolean') return this.fail(key, 'Expected a boolean');
    return value;
  }

  string(key: string): string | undefined {
    const value = this.section[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string' || value.length === 0) {
      return this.fail(key, 'Expected a non-empty string');
    }
    return value;
  }

  oneOf<T extends string>(key: string, options: readonly T[]): T | undefined {
    const value = this.section[key];
    if (value === undefined) return undefined;
    const match = options.find((option) => option === value);
    if (match === undefined) {
      return this.fail(key, `Expected one of: ${options.join(', ')}`);
    }
    return match;
  }

  record(key: string): SectionReader | undefined {
    const value = this.section[key];
    if (value === undefined) return undefined;
    if (!isRecord(value)) return this.fail(key, 'Expected an object');
    return new SectionReader(value, this.path(key), this.errors);
  }

  /** Record an error unless `key` is present. */
  require(key: string): boolean {
    if (this.has(key)) return true;
    this.fail(key, `Missing required option: "${key}"`);
    return false;
  }

  has(key: string): boolean {
    return this.section[key] !== undefined;
  }
}

function readHistory(reader: SectionReader | undefined): HistoryConfig | undefined {
  if (!reader || !reader.require('strategy')) return undefined;
  const strategy = reader.oneOf('strategy', ['keep-all', 'sliding-window', 'token-budget'] as const);
  switch (strategy) {
    case 'keep-all':
      return { strategy };
    case 'sliding-window':
      return { strategy, maxMessages: reader.int('maxMessages', 2) ?? 50 };
    case 'token-budget': {
      const contextWindow = reader.require('contextWindow') ? reader.int('contextWindow', 1) : undefined;
      const maxHistoryShare = reader.number('maxHistoryShare');
      if (contextWindow === undefined) return undefined;
      return maxHistoryShare === undefined
        ? { strategy, contextWindow }
        : { strategy, contextWindow, maxHistoryShare };
    }
    default:
      return undefined;
  }
}

function readKernelSection(
  section: Record<string, unknown>,
  prefix: string,
  errors: ConfigValidationError[],
): KernelConfig {
  const reader = new SectionReader(section, prefix, errors);
  const at = (key: string) => (prefix ? `${prefix}.${key}` : key);

  for (const key of Object.keys(section)) {
    if (!KERNEL_KEYS.has(key)) {
      errors.push({ path: at(key), message: `Unknown kernel option: "${key}"` });
    }
  }

  const retryReader = reader.record('retry');
  const retry: RetryConfig = {
    maxAttempts: retryReader?.int('maxAttempts', 1) ?? DEFAULT_KERNEL_CONFIG.retry.maxAttempts,
    backoffMs: retryReader?.int('backoffMs', 0) ?? DEFAULT_KERNEL_CONFIG.retry.backoffMs,
  };

  const schemaFallback =
    section['schemaFallback'] === null
      ? null
      : reader.oneOf('schemaFallback', STRATEGIES) ?? DEFAULT_KERNEL_CONFIG.schemaFallback;

  const config: KernelConfig = {
    maxTurns: reader.int('maxTurns', 1) ?? DEFAULT_KERNEL_CONFIG.maxTurns,
    toolConcurrencyLimit:
      reader.int('toolConcurrencyLimit', 1) ?? DEFAULT_KERNEL_CONFIG.toolConcurrencyLimit,
    grammarStrategy: reader.oneOf('grammarStrategy', STRATEGIES) ?? DEFAULT_KERNEL_CONFIG.grammarStrategy,
    schemaFallback,
    allowParallelCalls: reader.bool('allowParallelCalls') ?? DEFAULT_KERNEL_CONFIG.allowParallelCalls,
    schemaAwareGrammar: reader.bool('schemaAwareGrammar') ?? DEFAULT_KERNEL_CONFIG.schemaAwareGrammar,
    history: readHistory(reader.record('history')) ?? DEFAULT_KERNEL_CONFIG.history,
    modelTimeoutMs: reader.int('modelTimeoutMs', 1) ?? DEFAULT_KERNEL_CONFIG.modelTimeoutMs,
    retry,
    modelFamily: reader.oneOf('modelFamily', FAMILIES) ?? DEFAULT_KERNEL_CONFIG.modelFamily,
    sendToolsToApi: reader.bool('sendToolsToApi') ?? DEFAULT_KERNEL_CONFIG.sendToolsToApi,
    maxToolOutputChars: reader.int('maxToolOutputChars', 1) ?? DEFAULT_KERNEL_CONFIG.maxToolOutputChars,
  };

  const runTimeoutMs = reader.int('runTimeoutMs', 1);
  if (runTimeoutMs !== undefined) config.runTimeoutMs = runTimeoutMs;

  const correlation = reader.oneOf('toolResultCorrelation', CORRELATIONS);
  if (correlation !== undefined) config.toolResultCorrelation = correlation;

  if (config.schemaFallback !== null && config.schemaFallback === config.grammarStrategy) {
    errors.push({
      path: at('schemaFallback'),
      message: 'schemaFallback must differ from grammarStrategy',
    });
  }

  return config;
}

function readModelSection(
  section: Record<string, unknown>,
  errors: ConfigValidationError[],
): ModelEndpointConfig | undefined {
  const reader = new SectionReader(section, 'model', errors);
  const baseUrl = reader.require('baseUrl') ? reader.string('baseUrl') : undefined;
  const model = reader.require('model') ? reader.string('model') : undefined;
  if (baseUrl === undefined || model === undefined) return undefined;

  const endpoint: ModelEndpointConfig = { baseUrl, model };
  const apiKey = reader.string('apiKey');
  if (apiKey !== undefined) endpoint.apiKey = apiKey;
  const temperature = reader.number('temperature');
  if (temperature !== undefined) endpoint.temperature = temperature;
  const maxTokens = reader.int('maxTokens', 1);
  if (maxTokens !== undefined) endpoint.maxTokens = maxTokens;
  return endpoint;
}

/**
 * Validate an already-parsed config object and fill kernel defaults.
 * Rejects unknown top-level keys (strict mode).
 */
export function validateConfigObject(parsed: unknown): ConfigValidationResult {
  const errors: ConfigValidationError[] = [];

  if (!isRecord(parsed)) {
    return {
      valid: false,
      errors: [{ path: '', message: 'Config must be an object' }],
    };
  }

  for (const key of Object.keys(parsed)) {
    if (!VALID_TOP_LEVEL_KEYS.has(key)) {
      errors.push({ path: key, message: `Unknown top-level key: "${key}"` });
    }
  }

  for (const section of REQUIRED_SECTIONS) {
    if (!(section in parsed)) {
      errors.push({ path: section, message: `Missing required section: "${section}"` });
    } else if (!isRecord(parsed[section])) {
      errors.push({ path: section, message: `Section "${section}" must be an object` });
    }
  }

  const kernelRaw = parsed['kernel'] ?? {};
  let kernel: KernelConfig = { ...DEFAULT_KERNEL_CONFIG };
  if (isRecord(kernelRaw)) {
    kernel = readKernelSection(kernelRaw, 'kernel', errors);
  } else {
    errors.push({ path: 'kernel', message: 'Section "kernel" must be an object' });
  }

  const modelRaw = parsed['model'];
  const model = isRecord(modelRaw) ? readModelSection(modelRaw, errors) : undefined;

  const root = new SectionReader(parsed, '', errors);
  const logLevel = root.oneOf('logLevel', LOG_LEVELS) ?? 'info';

  if (errors.length > 0 || !model) {
    return { valid: false, errors };
  }
  return { valid: true, errors, config: { kernel, model, logLevel } };
}

/**
 * Parse and validate a JSON5 config string.
 * When `env` is given, `GRAMLOOP_*` overrides are applied before validation.
 */
export function validateConfig(
  json5String: string,
  env?: Record<string, string | undefined>,
): ConfigValidationResult {
  let parsed: unknown;
  try {
    parsed = JSON5.parse(json5String);
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Invalid JSON5: ${String(err)}` }],
    };
  }
  if (env && isRecord(parsed)) applyEnvOverrides(parsed, env, ENV_KEYS);
  return validateConfigObject(parsed);
}

/**
 * Load and validate a JSON5 config file from disk.
 */
export function loadConfig(
  filePath: string,
  env?: Record<string, string | undefined>,
): ConfigValidationResult {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Cannot read config file: ${String(err)}` }],
    };
  }
  return validateConfig(content, env);
}

/**
 * Merge programmatic overrides onto the kernel defaults.
 * Throws ConfigurationError listing every invalid option.
 */
export function resolveKernelConfig(overrides: Partial<KernelConfig> = {}): KernelConfig {
  const errors: ConfigValidationError[] = [];
  const section: Record<string, unknown> = { ...overrides };
  const config = readKernelSection(section, '', errors);
  if (errors.length > 0) {
    throw new ConfigurationError(
      `Invalid kernel config: ${errors.map((e) => `${e.path}: ${e.message}`).join('; ')}`,
    );
  }
  return config;
}
