/** Role in a conversation message. */
export type MessageRole = 'system' | 'developer' | 'user' | 'assistant' | 'tool';

/**
 * A tool invocation extracted from a model response.
 * Frozen once created; `id` is unique within a run.
 */
export interface ToolCall {
  readonly id: string;
  readonly name: string;
  readonly arguments: Readonly<Record<string, unknown>>;
}

/** A single conversation message. */
export interface Message {
  readonly role: MessageRole;
  readonly content: string;
  /** Present on assistant messages that requested tools. */
  readonly toolCalls?: readonly ToolCall[];
  /** Present on tool-result messages. */
  readonly toolCallId?: string;
  readonly toolName?: string;
}
