import type { ToolCall } from './messages.js';

/** JSON Schema type for tool parameter definitions. */
export type JSONSchema = Record<string, unknown>;

/** Tool description owned by a tool source. Read-only to the kernel. */
export interface ToolSchema {
  readonly name: string;
  readonly description: string;
  readonly parameters: JSONSchema;
}

/** Result of executing (or refusing to execute) a single tool call. */
export interface ToolResult {
  readonly callId: string;
  readonly toolName: string;
  readonly output: unknown;
  readonly isError: boolean;
  readonly durationMs: number;
}

/** A function that handles a tool invocation. */
export type ToolHandler = (
  args: Readonly<Record<string, unknown>>,
  signal: AbortSignal,
) => Promise<unknown>;

/**
 * Collaborator owning tool schema resolution and execution.
 * Shared across turns and concurrent executions, so implementations
 * must tolerate concurrent `execute` calls.
 */
export interface ToolSource {
  /** Current tool set. The kernel snapshots it once per turn. */
  listTools(): readonly ToolSchema[];
  resolve(name: string): ToolSchema | undefined;
  /** Runs the call. Rejects when the tool fails. */
  execute(call: ToolCall, signal: AbortSignal): Promise<unknown>;
}
