import { TransportError, describeError, isRecord, linkSignals } from '@gramloop/core';
import type {
  CompleteOptions,
  ModelClient,
  ModelRequest,
  ModelResponse,
  WireMessage,
  WireToolCall,
} from '@gramloop/core';
import { stream } from '@mariozechner/pi-ai';
import type {
  Api,
  AssistantMessage as PiAssistantMessage,
  Context as PiContext,
  Model,
  Tool as PiTool,
  ToolCall as PiToolCall,
  ToolResultMessage as PiToolResultMessage,
  UserMessage as PiUserMessage,
} from '@mariozechner/pi-ai';
import { Type } from '@sinclair/typebox';

type PiMessage = PiUserMessage | PiAssistantMessage | PiToolResultMessage;

export interface PiAiClientOptions {
  model: Model<Api>;
  id?: string;
  apiKey?: string;
  temperature?: number;
  maxTokens?: number;
}

/** Map pi-ai stop reasons to chat-completions finish reasons. */
function mapStopReason(reason: string): string {
  switch (reason) {
    case 'toolUse':
      return 'tool_calls';
    default:
      return reason;
  }
}

function parseArguments(raw: string): Record<string, unknown> {
  try {
    const value: unknown = JSON.parse(raw);
    return isRecord(value) ? value : {};
  } catch {
    return {};
  }
}

/**
 * ModelClient over pi-ai's `stream()`, for hosted providers with native tool
 * calling. Constraint payloads have no pi-ai counterpart and are refused.
 */
export class PiAiClient implements ModelClient {
  readonly id: string;
  readonly acceptsConstraints = false;

  private readonly options: PiAiClientOptions;

  constructor(options: PiAiClientOptions) {
    this.options = options;
    this.id = options.id ?? `pi-ai:${options.model.provider}/${options.model.id}`;
  }

  async complete(request: ModelRequest, options: CompleteOptions = {}): Promise<ModelResponse> {
    if (request.constraint) {
      throw new TransportError(`Client "${this.id}" does not accept constraint payloads`, undefined, false);
    }

    const link = linkSignals([options.signal], options.timeoutMs);
    let text = '';
    const toolCalls: WireToolCall[] = [];
    const response: ModelResponse = { text: '' };

    try {
      const events = stream(this.options.model, this.buildContext(request), {
        temperature: this.options.temperature,
        maxTokens: this.options.maxTokens,
        apiKey: this.options.apiKey,
        signal: link.signal,
      });

      for await (const event of events) {
        if (event.type === 'text_delta') {
          text += event.delta;
        } else if (event.type === 'toolcall_end') {
          toolCalls.push({
            id: event.toolCall.id,
            type: 'function',
            function: { name: event.toolCall.name, arguments: JSON.stringify(event.toolCall.arguments) },
          });
        } else if (event.type === 'done') {
          const usage = event.message.usage;
          response.usage = { input: usage.input, output: usage.output, total: usage.input + usage.output };
          response.finishReason = mapStopReason(event.reason);
        } else if (event.type === 'error') {
          const message = event.error.errorMessage ?? event.reason;
          if (link.timedOut()) throw new TransportError(`Request timed out after ${options.timeoutMs}ms`, 408, true);
          throw new TransportError(`Provider error: ${message}`, undefined, event.reason !== 'aborted');
        }
        // Ignore: start, text_start, text_end, thinking_*, toolcall_start, toolcall_delta
      }
    } catch (err) {
      if (err instanceof TransportError) throw err;
      throw new TransportError(`Provider error: ${describeError(err)}`, undefined, true, err);
    } finally {
      link.dispose();
    }

    response.text = text;
    if (toolCalls.length > 0) response.nativeToolCalls = toolCalls;
    return response;
  }

  /** Convert wire messages and tools into a pi-ai Context. */
  buildContext(request: ModelRequest): PiContext {
    const instructions: string[] = [];
    const messages: PiMessage[] = [];

    for (const msg of request.messages) {
      if (msg.role === 'system' || msg.role === 'developer') {
        instructions.push(msg.content);
      } else if (msg.role === 'user') {
        messages.push({ role: 'user', content: [{ type: 'text', text: msg.content }], timestamp: Date.now() });
      } else if (msg.role === 'assistant') {
        messages.push(this.convertAssistantMessage(msg));
      } else if (msg.role === 'tool') {
        messages.push(this.convertToolResultMessage(msg, messages));
      }
    }

    const context: PiContext = { messages };
    if (instructions.length > 0) context.systemPrompt = instructions.join('\n\n');
    if (request.tools && request.tools.length > 0) {
      context.tools = request.tools.map(
        (t): PiTool => ({
          name: t.function.name,
          description: t.function.description,
          parameters: Type.Unsafe(t.function.parameters),
        }),
      );
    }
    return context;
  }

  private convertAssistantMessage(msg: WireMessage): PiAssistantMessage {
    const content: ({ type: 'text'; text: string } | PiToolCall)[] = [];
    if (msg.content) content.push({ type: 'text', text: msg.content });
    for (const tc of msg.tool_calls ?? []) {
      content.push({
        type: 'toolCall',
        id: tc.id,
        name: tc.function.name,
        arguments: parseArguments(tc.function.arguments),
      });
    }

    return {
      role: 'assistant',
      content,
      api: this.options.model.api,
      provider: this.options.model.provider,
      model: this.options.model.id,
      usage: {
        input: 0,
        output: 0,
        cacheRead: 0,
        cacheWrite: 0,
        totalTokens: 0,
        cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0, total: 0 },
      },
      stopReason: msg.tool_calls && msg.tool_calls.length > 0 ? 'toolUse' : 'stop',
      timestamp: Date.now(),
    };
  }

  /** Tool name comes from the message, else from the assistant call it answers. */
  private convertToolResultMessage(msg: WireMessage, preceding: readonly PiMessage[]): PiToolResultMessage {
    const toolCallId = msg.tool_call_id ?? '';
    let toolName = msg.name;
    for (let i = preceding.length - 1; i >= 0 && !toolName; i--) {
      const prev = preceding[i];
      if (prev?.role !== 'assistant') continue;
      for (const block of prev.content) {
        if (block.type === 'toolCall' && block.id === toolCallId) toolName = block.name;
      }
      break;
    }

    return {
      role: 'toolResult',
      toolCallId,
      toolName: toolName ?? 'unknown',
      content: [{ type: 'text', text: msg.content }],
      isError: false,
      timestamp: Date.now(),
    };
  }
}
