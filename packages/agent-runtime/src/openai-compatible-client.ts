import { TransportError, describeError, isRecord, linkSignals } from '@gramloop/core';
import type {
  CompleteOptions,
  ModelClient,
  ModelEndpointConfig,
  ModelRequest,
  ModelResponse,
  TokenUsage,
  WireToolCall,
} from '@gramloop/core';

export interface OpenAICompatibleClientOptions extends ModelEndpointConfig {
  id?: string;
  /** Injected for tests. Defaults to the global fetch. */
  fetch?: typeof fetch;
}

/** Statuses worth retrying: rate limits, timeouts and server faults. */
function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function readUsage(raw: unknown): TokenUsage | undefined {
  if (!isRecord(raw)) return undefined;
  const input = typeof raw['prompt_tokens'] === 'number' ? raw['prompt_tokens'] : 0;
  const output = typeof raw['completion_tokens'] === 'number' ? raw['completion_tokens'] : 0;
  const total = typeof raw['total_tokens'] === 'number' ? raw['total_tokens'] : input + output;
  return { input, output, total };
}

function readToolCalls(raw: unknown): WireToolCall[] | undefined {
  if (!Array.isArray(raw) || raw.length === 0) return undefined;
  const calls: WireToolCall[] = [];
  for (const entry of raw) {
    if (!isRecord(entry) || !isRecord(entry['function'])) continue;
    const fn = entry['function'];
    if (typeof fn['name'] !== 'string') continue;
    const args = fn['arguments'];
    calls.push({
      id: typeof entry['id'] === 'string' ? entry['id'] : '',
      type: 'function',
      function: {
        name: fn['name'],
        arguments: typeof args === 'string' ? args : JSON.stringify(args ?? {}),
      },
    });
  }
  return calls.length > 0 ? calls : undefined;
}

/** Decode a chat-completions body, rejecting anything without a first choice message. */
export function readCompletion(data: unknown): ModelResponse {
  const choices = isRecord(data) ? data['choices'] : undefined;
  const first: unknown = Array.isArray(choices) ? choices[0] : undefined;
  if (!isRecord(first) || !isRecord(first['message'])) {
    throw new TransportError('Malformed completion response: missing choices[0].message', undefined, false);
  }

  const message = first['message'];
  const response: ModelResponse = {
    text: typeof message['content'] === 'string' ? message['content'] : '',
  };
  const toolCalls = readToolCalls(message['tool_calls']);
  if (toolCalls) response.nativeToolCalls = toolCalls;
  const usage = readUsage(isRecord(data) ? data['usage'] : undefined);
  if (usage) response.usage = usage;
  if (typeof first['finish_reason'] === 'string') response.finishReason = first['finish_reason'];
  return response;
}

/**
 * Client for OpenAI-compatible `/chat/completions` endpoints (vLLM, SGLang,
 * llama.cpp server). Constraint payloads are merged into the request body.
 */
export class OpenAICompatibleClient implements ModelClient {
  readonly id: string;
  readonly acceptsConstraints = true;

  private readonly options: OpenAICompatibleClientOptions;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenAICompatibleClientOptions) {
    this.options = options;
    this.id = options.id ?? `openai-compatible:${options.model}`;
    this.fetchImpl = options.fetch ?? fetch;
  }

  get endpoint(): string {
    return `${this.options.baseUrl.replace(/\/+$/, '')}/chat/completions`;
  }

  buildBody(request: ModelRequest): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: this.options.model,
      messages: request.messages,
    };
    if (request.tools && request.tools.length > 0) {
      body['tools'] = request.tools;
      body['tool_choice'] = 'auto';
    }
    if (this.options.temperature !== undefined) body['temperature'] = this.options.temperature;
    if (this.options.maxTokens !== undefined) body['max_tokens'] = this.options.maxTokens;
    return { ...body, ...request.constraint };
  }

  async complete(request: ModelRequest, options: CompleteOptions = {}): Promise<ModelResponse> {
    const link = linkSignals([options.signal], options.timeoutMs);
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) headers['Authorization'] = `Bearer ${this.options.apiKey}`;

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(this.endpoint, {
          method: 'POST',
          headers,
          body: JSON.stringify(this.buildBody(request)),
          signal: link.signal,
        });
      } catch (err) {
        if (link.timedOut()) {
          throw new TransportError(`Request timed out after ${options.timeoutMs}ms`, 408, true, err);
        }
        if (link.signal.aborted) throw new TransportError('Request aborted', undefined, false, err);
        throw new TransportError(`Network error: ${describeError(err)}`, undefined, true, err);
      }

      if (!response.ok) {
        const detail = await response.text().catch((err: unknown) => describeError(err));
        throw new TransportError(
          `Endpoint returned ${response.status} ${response.statusText}${detail ? `: ${detail.slice(0, 500)}` : ''}`,
          response.status,
          isRetryableStatus(response.status),
        );
      }

      let data: unknown;
      try {
        data = await response.json();
      } catch (err) {
        throw new TransportError(`Invalid JSON in response: ${describeError(err)}`, response.status, false, err);
      }
      return readCompletion(data);
    } finally {
      link.dispose();
    }
  }
}
