import type {
  Message,
  ModelRequest,
  ModelResponse,
  ToolCall,
  ToolResult,
  ToolResultCorrelation,
  ToolSchema,
  WireMessage,
  WireTool,
  WireToolCall,
} from '@gramloop/core';
import type { ConstraintPipeline, GrammarArtifact, ParsedResponse } from '@gramloop/grammar';
import type { ModelFamily } from './model-families.js';

export const DEFAULT_MAX_TOOL_OUTPUT_CHARS = 50_000;

export interface MessageCodecOptions {
  /** Overrides the family's default correlation convention. */
  toolResultCorrelation?: ToolResultCorrelation;
  /** Send tool descriptors to the API even when a constraint is attached. */
  sendToolsToApi?: boolean;
  maxToolOutputChars?: number;
}

/** Strings pass through; anything else is JSON-encoded. Throws on BigInt or cycles. */
export function encodeToolOutput(output: unknown): string {
  return typeof output === 'string' ? output : JSON.stringify(output) ?? 'null';
}

/** Like {@link encodeToolOutput}, falling back to `String(output)` when JSON cannot encode it. */
export function serializeToolOutput(output: unknown): string {
  try {
    return encodeToolOutput(output);
  } catch {
    return String(output);
  }
}

/** Serialize a tool output, truncating with a marker past `maxChars`. */
export function truncateToolOutput(output: unknown, maxChars: number): string {
  const text = serializeToolOutput(output);
  if (text.length <= maxChars) return text;
  return text.slice(0, maxChars) + `\n[truncated: ${text.length} chars, showing first ${maxChars}]`;
}

function toWireCall(call: ToolCall): WireToolCall {
  return {
    id: call.id,
    type: 'function',
    function: { name: call.name, arguments: JSON.stringify(call.arguments) },
  };
}

function toWireTool(tool: ToolSchema): WireTool {
  return {
    type: 'function',
    function: { name: tool.name, description: tool.description, parameters: tool.parameters },
  };
}

/** One declaration per line, for families that read tools from the prompt. */
export function formatInlineTools(tools: readonly ToolSchema[]): string {
  return tools
    .map((t) => JSON.stringify({ name: t.name, description: t.description, parameters: t.parameters }))
    .join('\n');
}

function decodeResponse(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch {
    return content;
  }
}

/**
 * Converts between the kernel's messages and one model family's wire
 * format, in both directions.
 */
export class MessageCodec {
  readonly correlation: ToolResultCorrelation;
  private readonly sendToolsToApi: boolean;
  private readonly maxToolOutputChars: number;

  constructor(
    readonly family: ModelFamily,
    private readonly pipeline: ConstraintPipeline,
    options: MessageCodecOptions = {},
  ) {
    this.correlation = options.toolResultCorrelation ?? family.toolResultCorrelation;
    this.sendToolsToApi = options.sendToolsToApi ?? false;
    this.maxToolOutputChars = options.maxToolOutputChars ?? DEFAULT_MAX_TOOL_OUTPUT_CHARS;
  }

  formatRequest(
    messages: readonly Message[],
    tools: readonly ToolSchema[],
    artifact: GrammarArtifact | null,
  ): ModelRequest {
    const apiTools =
      tools.length > 0 &&
      this.family.toolDescriptors === 'api' &&
      (artifact === null || this.sendToolsToApi);
    const inlineTools =
      tools.length > 0 &&
      (this.family.toolDescriptors === 'inline' || (artifact !== null && !this.sendToolsToApi));

    const wire = this.withInstruction(messages, inlineTools ? formatInlineTools(tools) : '').map((msg) =>
      this.toWireMessage(msg, artifact),
    );

    const request: ModelRequest = { messages: wire };
    if (apiTools) request.tools = tools.map(toWireTool);
    if (artifact) request.constraint = artifact.payload;
    return request;
  }

  /** Parse with the artifact's parser, else the family's native parser. */
  parseResponse(response: ModelResponse, artifact: GrammarArtifact | null): ParsedResponse {
    if (!artifact) return this.family.parseNative(response);

    const parsed = this.pipeline.parse(artifact, response.text);
    // Endpoints with a server-side tool parser may return structured calls even under a grammar.
    if (parsed.items.length === 0 && response.nativeToolCalls && response.nativeToolCalls.length > 0) {
      return this.family.parseNative(response);
    }
    return parsed;
  }

  /** The tool message recording `result`. */
  formatToolResult(result: ToolResult): Message {
    return {
      role: 'tool',
      content: truncateToolOutput(result.output, this.maxToolOutputChars),
      toolCallId: result.callId,
      toolName: result.toolName,
    };
  }

  /** Merge the family's required instruction and inline tool docs into a leading instruction message. */
  private withInstruction(messages: readonly Message[], toolDocs: string): readonly Message[] {
    const required = this.family.requiredInstruction ?? '';
    if (!required && !toolDocs) return messages;

    const [first, ...rest] = messages;
    const hasLead = first !== undefined && (first.role === 'system' || first.role === 'developer');
    const content = [required, hasLead ? first.content : '', toolDocs].filter((part) => part.length > 0).join('\n\n');
    const lead: Message = { role: hasLead ? first.role : 'system', content };

    return hasLead ? [lead, ...rest] : [lead, ...messages];
  }

  private toWireMessage(msg: Message, artifact: GrammarArtifact | null): WireMessage {
    const role = this.family.roleMap[msg.role];

    if (msg.role === 'assistant' && msg.toolCalls && msg.toolCalls.length > 0) {
      if (artifact) {
        const rendered = this.pipeline.render(artifact, msg.toolCalls);
        return { role, content: [msg.content, rendered].filter((part) => part.length > 0).join('\n') };
      }
      return { role, content: msg.content, tool_calls: msg.toolCalls.map(toWireCall) };
    }

    if (msg.role === 'tool') {
      const name = msg.toolName ?? 'unknown';
      if (this.correlation === 'name-response') {
        return { role, name, content: JSON.stringify({ name, response: decodeResponse(msg.content) }) };
      }
      return { role, content: msg.content, tool_call_id: msg.toolCallId ?? '' };
    }

    return { role, content: msg.content };
  }
}
