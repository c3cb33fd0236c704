import {
  CancellationError,
  ConfigurationError,
  KernelError,
  ParseError,
  TransportError,
  describeError,
  linkSignals,
  raceAbort,
  resolveKernelConfig,
  silentLogger,
  sleep,
  toKernelError,
} from '@gramloop/core';
import type {
  GrammarStrategy,
  HistoryStrategy,
  KernelConfig,
  KernelEvent,
  Logger,
  Message,
  ModelClient,
  ModelRequest,
  ModelResponse,
  Observer,
  TerminationReason,
  TokenUsage,
  ToolCall,
  ToolResult,
  ToolSchema,
  ToolSource,
} from '@gramloop/core';
import { ConstraintPipeline } from '@gramloop/grammar';
import type { GrammarArtifact } from '@gramloop/grammar';
import { dispatchToolCalls } from '@gramloop/tools';
import { createHistoryStrategy } from './history.js';
import { MessageCodec, encodeToolOutput, serializeToolOutput } from './message-codec.js';
import { getModelFamily } from './model-families.js';
import { NullObserver, notifyObserver } from './observers.js';

const OUTPUT_PREVIEW_CHARS = 200;

/** `source`, but an output that cannot be encoded for the transcript fails its call. */
function withEncodableOutputs(source: ToolSource): ToolSource {
  return {
    listTools: () => source.listTools(),
    resolve: (name) => source.resolve(name),
    execute: async (call, signal) => {
      const output = await source.execute(call, signal);
      try {
        encodeToolOutput(output);
      } catch (err) {
        throw new Error(`Output cannot be serialized: ${describeError(err)}`);
      }
      return output;
    },
  };
}

export interface AgentKernelOptions {
  client: ModelClient;
  tools: ToolSource;
  /** Merged over the defaults and validated at construction. */
  config?: Partial<KernelConfig>;
  observer?: Observer;
  /** Overrides the strategy named by `config.history`. */
  history?: HistoryStrategy;
  logger?: Logger;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface RunResult {
  turns: number;
  /** Full append-only transcript, initial messages included. */
  history: readonly Message[];
  usage: TokenUsage;
  durationMs: number;
  terminationReason: TerminationReason;
  /** Set when `terminationReason` is `fatal_error`. */
  error?: KernelError;
  /** Last assistant message, if the model produced one. */
  finalMessage?: Message;
}

/** Per-run mutable state. Never shared between runs. */
interface RunState {
  turn: number;
  transcript: Message[];
  usage: TokenUsage;
  signal: AbortSignal;
  cancellation: () => CancellationError;
}

/** A ToolCall standing in for a malformed call so its error result can be correlated. */
function placeholderCall(error: ParseError): ToolCall {
  return Object.freeze({ id: error.callId, name: error.toolName ?? 'unknown', arguments: Object.freeze({}) });
}

function elapsed(start: number): number {
  return Math.round(performance.now() - start);
}

/**
 * Drives the turn loop: request, parse, dispatch, append, repeat until the
 * model stops calling tools or the turn budget runs out.
 *
 * A kernel holds no per-run state, so one instance may serve several runs.
 */
export class AgentKernel {
  readonly config: Readonly<KernelConfig>;
  private readonly client: ModelClient;
  private readonly tools: ToolSource;
  private readonly observer: Observer;
  private readonly history: HistoryStrategy;
  private readonly logger: Logger;
  private readonly pipeline: ConstraintPipeline;
  private readonly codec: MessageCodec;

  constructor(options: AgentKernelOptions) {
    this.config = Object.freeze(resolveKernelConfig(options.config));
    const { grammarStrategy, schemaFallback } = this.config;
    const constrained = grammarStrategy !== 'none' || (schemaFallback !== null && schemaFallback !== 'none');
    if (constrained && !options.client.acceptsConstraints) {
      throw new ConfigurationError(
        `Client "${options.client.id}" does not accept constraint payloads; grammar strategy must be "none"`,
      );
    }

    this.client = options.client;
    this.tools = options.tools;
    this.observer = options.observer ?? new NullObserver();
    this.history = options.history ?? createHistoryStrategy(this.config.history);
    this.logger = options.logger ?? silentLogger;

    const family = getModelFamily(this.config.modelFamily);
    this.pipeline = new ConstraintPipeline({
      markers: family.markers,
      allowParallelCalls: this.config.allowParallelCalls,
      schemaAwareGrammar: this.config.schemaAwareGrammar,
    });
    this.codec = new MessageCodec(family, this.pipeline, {
      toolResultCorrelation: this.config.toolResultCorrelation,
      sendToolsToApi: this.config.sendToolsToApi,
      maxToolOutputChars: this.config.maxToolOutputChars,
    });
  }

  /** Run to completion. Never rejects: failures end up in `RunResult.error`. */
  async run(initialMessages: readonly Message[], options: RunOptions = {}): Promise<RunResult> {
    const start = performance.now();
    const link = linkSignals([options.signal], this.config.runTimeoutMs);
    const state: RunState = {
      turn: 0,
      transcript: initialMessages.map((msg) => Object.freeze({ ...msg })),
      usage: { input: 0, output: 0, total: 0 },
      signal: link.signal,
      cancellation: () => new CancellationError(link.timedOut() ? 'timeout' : 'aborted'),
    };

    this.emit({
      type: 'run_started',
      maxTurns: this.config.maxTurns,
      toolCount: this.safeToolCount(),
      initialMessageCount: initialMessages.length,
    });

    let terminationReason: TerminationReason;
    let error: KernelError | undefined;
    try {
      terminationReason = await this.loop(state);
    } catch (err) {
      error = err instanceof KernelError ? err : state.signal.aborted ? state.cancellation() : toKernelError(err);
      terminationReason = 'fatal_error';
      this.logger.error(`Run failed on turn ${state.turn}: ${error.message}`);
      this.emit({ type: 'error', turn: state.turn, kind: error.kind, message: error.message });
    } finally {
      link.dispose();
    }

    const durationMs = elapsed(start);
    const usage = { ...state.usage };
    this.emit({ type: 'run_ended', turns: state.turn, terminationReason, durationMs, usage });

    const history = Object.freeze([...state.transcript]);
    const finalMessage = [...history].reverse().find((msg) => msg.role === 'assistant');
    const result: RunResult = { turns: state.turn, history, usage, durationMs, terminationReason };
    if (error) result.error = error;
    if (finalMessage) result.finalMessage = finalMessage;
    return result;
  }

  private async loop(state: RunState): Promise<TerminationReason> {
    for (;;) {
      if (state.signal.aborted) throw state.cancellation();

      state.turn++;
      const turn = state.turn;
      const tools: readonly ToolSchema[] = Object.freeze([...this.tools.listTools()]);
      const { artifact, strategy } = this.buildArtifact(tools, turn);

      const request = this.codec.formatRequest(this.history.trim(state.transcript), tools, artifact);
      this.logger.debug(`Turn ${turn}: ${request.messages.length} messages, ${tools.length} tools [${strategy}]`);
      this.emit({
        type: 'request_issued',
        turn,
        messageCount: request.messages.length,
        toolCount: tools.length,
        strategy,
      });

      const requestStart = performance.now();
      const response = await this.completeWithRetry(request, state);
      if (response.usage) {
        state.usage.input += response.usage.input;
        state.usage.output += response.usage.output;
        state.usage.total += response.usage.total;
      }

      const parsed = this.codec.parseResponse(response, artifact);
      const parseErrors = parsed.items.filter((item): item is ParseError => item instanceof ParseError);
      const calls = parsed.items.map((item) => (item instanceof ParseError ? placeholderCall(item) : item));

      this.append(
        state,
        calls.length > 0
          ? { role: 'assistant', content: parsed.text, toolCalls: Object.freeze(calls) }
          : { role: 'assistant', content: parsed.text },
      );
      this.emit({
        type: 'response_received',
        turn,
        durationMs: elapsed(requestStart),
        text: parsed.text,
        toolCallCount: calls.length - parseErrors.length,
        parseErrorCount: parseErrors.length,
        usage: response.usage,
      });
      for (const err of parseErrors) {
        this.logger.warn(`Turn ${turn}: malformed tool call: ${err.message}`);
        this.emit({ type: 'error', turn, kind: err.kind, message: err.message });
      }

      if (calls.length === 0) return 'no_tool_calls';

      const results = await this.executeCalls(calls, parseErrors, state);
      for (const result of results) this.append(state, this.codec.formatToolResult(result));
      this.emit({
        type: 'turn_complete',
        turn,
        toolCallCount: calls.length,
        errorCount: results.filter((r) => r.isError).length,
      });

      if (state.signal.aborted) throw state.cancellation();
      if (turn >= this.config.maxTurns) return 'max_turns';
    }
  }

  private buildArtifact(
    tools: readonly ToolSchema[],
    turn: number,
  ): { artifact: GrammarArtifact | null; strategy: GrammarStrategy } {
    let strategy = this.config.grammarStrategy;
    const artifact = this.pipeline.buildWithFallback(tools, strategy, this.config.schemaFallback, (err, fallback) => {
      this.logger.warn(`Turn ${turn}: ${err.message}; falling back to "${fallback}"`);
      strategy = fallback;
    });
    return { artifact, strategy };
  }

  /** Dispatch well-formed calls; malformed ones get an error result without executing. */
  private async executeCalls(
    calls: readonly ToolCall[],
    parseErrors: readonly ParseError[],
    state: RunState,
  ): Promise<ToolResult[]> {
    const turn = state.turn;
    const failedIds = new Map(parseErrors.map((err) => [err.callId, err]));

    for (const call of calls) {
      this.emit({ type: 'tool_call_issued', turn, callId: call.id, toolName: call.name, arguments: call.arguments });
    }

    const onResult = (result: ToolResult) => {
      this.emit({
        type: 'tool_result_received',
        turn,
        callId: result.callId,
        toolName: result.toolName,
        isError: result.isError,
        durationMs: result.durationMs,
        outputPreview: serializeToolOutput(result.output).slice(0, OUTPUT_PREVIEW_CHARS),
      });
    };

    const rejected = new Map<string, ToolResult>();
    for (const call of calls) {
      const err = failedIds.get(call.id);
      if (!err) continue;
      const result = Object.freeze({
        callId: call.id,
        toolName: call.name,
        output: `Invalid tool call: ${err.message}`,
        isError: true,
        durationMs: 0,
      });
      rejected.set(call.id, result);
      onResult(result);
    }

    const runnable = calls.filter((call) => !failedIds.has(call.id));
    const dispatched = await dispatchToolCalls(runnable, withEncodableOutputs(this.tools), {
      concurrencyLimit: this.config.toolConcurrencyLimit,
      signal: state.signal,
      onResult,
      logger: this.logger,
    });

    const byId = new Map(dispatched.map((result) => [result.callId, result]));
    return calls.map((call) => {
      const result = rejected.get(call.id) ?? byId.get(call.id);
      if (!result) throw new KernelError('internal', `No result for tool call ${call.id}`);
      return result;
    });
  }

  private async completeWithRetry(request: ModelRequest, state: RunState): Promise<ModelResponse> {
    const { maxAttempts, backoffMs } = this.config.retry;
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.completeOnce(request, state);
      } catch (err) {
        if (!(err instanceof TransportError) || !err.retryable || attempt >= maxAttempts) throw err;
        const delay = backoffMs * 2 ** (attempt - 1);
        this.logger.warn(
          `Turn ${state.turn}: model call failed (attempt ${attempt}/${maxAttempts}): ${err.message}; retrying in ${delay}ms`,
        );
        await sleep(delay, state.signal, state.cancellation);
      }
    }
  }

  /**
   * One model call under the per-call timeout. Raced against the signal so
   * a client that ignores it is still interrupted.
   */
  private async completeOnce(request: ModelRequest, state: RunState): Promise<ModelResponse> {
    const timeoutMs = this.config.modelTimeoutMs;
    const call = linkSignals([state.signal], timeoutMs);
    const interrupted = () =>
      state.signal.aborted
        ? state.cancellation()
        : new TransportError(`Model call timed out after ${timeoutMs}ms`, undefined, true);

    try {
      return await raceAbort(this.client.complete(request, { timeoutMs, signal: call.signal }), call.signal, interrupted);
    } catch (err) {
      if (err instanceof KernelError) throw err;
      if (call.signal.aborted) throw interrupted();
      throw new TransportError(`Model call failed: ${describeError(err)}`, undefined, false, err);
    } finally {
      call.dispose();
    }
  }

  private append(state: RunState, message: Message): void {
    state.transcript.push(Object.freeze(message));
  }

  private safeToolCount(): number {
    try {
      return this.tools.listTools().length;
    } catch (err) {
      this.logger.warn(`Could not list tools: ${describeError(err)}`);
      return 0;
    }
  }

  private emit(event: KernelEvent): void {
    notifyObserver(this.observer, Object.freeze(event), this.logger);
  }
}
