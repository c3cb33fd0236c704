/** Discriminator shared by every kernel error. */
export type ErrorKind =
  | 'schema'
  | 'parse'
  | 'tool_execution'
  | 'transport'
  | 'cancellation'
  | 'configuration'
  | 'internal';

/** Base class for all errors raised by the kernel and its components. */
export class KernelError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    cause?: unknown,
  ) {
    super(message);
    this.name = 'KernelError';
    if (cause !== undefined) this.cause = cause;
  }
}

/** A tool's parameter schema uses a construct the grammar strategy cannot express. */
export class SchemaError extends KernelError {
  constructor(
    public readonly toolName: string,
    public readonly path: string,
    detail: string,
  ) {
    super('schema', `Tool "${toolName}" cannot be constrained at ${path || '<root>'}: ${detail}`);
    this.name = 'SchemaError';
  }
}

/** A single malformed tool call in a model response. */
export class ParseError extends KernelError {
  constructor(
    message: string,
    /** Id assigned to the malformed call so its error result can be correlated. */
    public readonly callId: string,
    public readonly raw: string,
    public readonly toolName?: string,
  ) {
    super('parse', message);
    this.name = 'ParseError';
  }
}

/** A tool raised during execution. */
export class ToolExecutionError extends KernelError {
  constructor(
    public readonly toolName: string,
    public readonly callId: string,
    cause: unknown,
  ) {
    super('tool_execution', `Tool "${toolName}" failed: ${describeError(cause)}`, cause);
    this.name = 'ToolExecutionError';
  }
}

/** The model client failed to produce a response. */
export class TransportError extends KernelError {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly retryable = true,
    cause?: unknown,
  ) {
    super('transport', message, cause);
    this.name = 'TransportError';
  }
}

/** The run was aborted by its caller or hit its timeout. */
export class CancellationError extends KernelError {
  constructor(public readonly reason: 'aborted' | 'timeout') {
    super('cancellation', reason === 'timeout' ? 'Run timed out' : 'Run cancelled');
    this.name = 'CancellationError';
  }
}

/** Invalid construction-time configuration. */
export class ConfigurationError extends KernelError {
  constructor(message: string) {
    super('configuration', message);
    this.name = 'ConfigurationError';
  }
}

/** Render an unknown throwable as a message string. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Normalise any throwable into a KernelError. */
export function toKernelError(err: unknown): KernelError {
  if (err instanceof KernelError) return err;
  return new KernelError('internal', describeError(err), err);
}
