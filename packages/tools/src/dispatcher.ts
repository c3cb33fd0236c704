import {
  ConfigurationError,
  ToolExecutionError,
  describeError,
  raceAbort,
  silentLogger,
} from '@gramloop/core';
import type { Logger, ToolCall, ToolResult, ToolSource } from '@gramloop/core';

/** Output recorded for calls interrupted by cancellation. */
export const CANCELLED_OUTPUT = 'cancelled';

export interface DispatchOptions {
  /** Maximum calls in flight at once. Integer >= 1. */
  concurrencyLimit: number;
  signal?: AbortSignal;
  /** Fires for each call, in issuance order, before any executes. */
  onCallIssued?: (call: ToolCall) => void;
  /** Fires for each result, in completion order. */
  onResult?: (result: ToolResult) => void;
  logger?: Logger;
}

class Cancelled {}

function elapsed(start: number): number {
  return Math.round(performance.now() - start);
}

function errorResult(call: ToolCall, output: string, durationMs: number): ToolResult {
  return Object.freeze({ callId: call.id, toolName: call.name, output, isError: true, durationMs });
}

async function executeOne(call: ToolCall, source: ToolSource, signal: AbortSignal, logger: Logger): Promise<ToolResult> {
  const start = performance.now();
  if (signal.aborted) return errorResult(call, CANCELLED_OUTPUT, 0);

  try {
    const output = await raceAbort(source.execute(call, signal), signal, () => new Cancelled());
    return Object.freeze({
      callId: call.id,
      toolName: call.name,
      output,
      isError: false,
      durationMs: elapsed(start),
    });
  } catch (err) {
    if (err instanceof Cancelled || signal.aborted) {
      return errorResult(call, CANCELLED_OUTPUT, elapsed(start));
    }
    const failure = new ToolExecutionError(call.name, call.id, err);
    logger.debug(failure.message);
    return errorResult(call, failure.message, elapsed(start));
  }
}

/**
 * Execute a batch of tool calls with at most `concurrencyLimit` in flight.
 *
 * Results come back in the same order as `calls`. Unknown tools, failed
 * lookups and thrown errors become error results; nothing here rejects once validation passes.
 */
export async function dispatchToolCalls(
  calls: readonly ToolCall[],
  source: ToolSource,
  options: DispatchOptions,
): Promise<ToolResult[]> {
  const { concurrencyLimit } = options;
  if (!Number.isInteger(concurrencyLimit) || concurrencyLimit < 1) {
    throw new ConfigurationError(`concurrencyLimit must be an integer >= 1, got ${concurrencyLimit}`);
  }

  const logger = options.logger ?? silentLogger;
  const signal = options.signal ?? new AbortController().signal;
  const results = new Map<number, ToolResult>();

  const notify = <T>(listener: ((value: T) => void) | undefined, value: T): void => {
    if (!listener) return;
    try {
      listener(value);
    } catch (err) {
      logger.warn('Dispatch listener threw', err);
    }
  };

  const settle = (index: number, result: ToolResult): void => {
    results.set(index, result);
    notify(options.onResult, result);
  };

  const runnable: number[] = [];
  const unresolved = new Map<number, string>();
  calls.forEach((call, index) => {
    notify(options.onCallIssued, call);
    try {
      if (source.resolve(call.name)) runnable.push(index);
      else unresolved.set(index, `Unknown tool: ${call.name}`);
    } catch (err) {
      logger.warn(`Resolving tool ${call.name} failed: ${describeError(err)}`);
      unresolved.set(index, `Failed to resolve tool ${call.name}: ${describeError(err)}`);
    }
  });

  for (const [index, output] of unresolved) {
    const call = calls[index];
    if (call) settle(index, errorResult(call, output, 0));
  }

  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < runnable.length) {
      const index = runnable[next++];
      const call = index === undefined ? undefined : calls[index];
      if (index === undefined || !call) continue;
      settle(index, await executeOne(call, source, signal, logger));
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrencyLimit, runnable.length) }, worker));

  return calls.map(
    (call, index) => results.get(index) ?? errorResult(call, CANCELLED_OUTPUT, 0),
  );
}
