import type { ToolCall, ToolHandler, ToolSchema, ToolSource } from '@gramloop/core';
import { ToolConflictError, ToolNotFoundError } from './errors.js';

export interface ToolRegistryEntry {
  readonly schema: ToolSchema;
  readonly handler: ToolHandler;
}

/**
 * In-memory tool source. Handlers are keyed by tool name; the listing
 * order is registration order.
 */
export class ToolRegistry implements ToolSource {
  private readonly entries = new Map<string, ToolRegistryEntry>();

  /** Register a tool. Throws ToolConflictError on duplicate name. */
  register(schema: ToolSchema, handler: ToolHandler): this {
    if (this.entries.has(schema.name)) {
      throw new ToolConflictError(schema.name);
    }
    this.entries.set(schema.name, {
      schema: Object.freeze({ ...schema }),
      handler,
    });
    return this;
  }

  /** Remove a tool by name. Returns true if it existed. */
  unregister(name: string): boolean {
    return this.entries.delete(name);
  }

  get(name: string): ToolRegistryEntry | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** Snapshot of the registered schemas; later registrations do not affect it. */
  listTools(): readonly ToolSchema[] {
    return Object.freeze([...this.entries.values()].map((e) => e.schema));
  }

  resolve(name: string): ToolSchema | undefined {
    return this.entries.get(name)?.schema;
  }

  async execute(call: ToolCall, signal: AbortSignal): Promise<unknown> {
    const entry = this.entries.get(call.name);
    if (!entry) throw new ToolNotFoundError(call.name);
    return entry.handler(call.arguments, signal);
  }

  /** Remove all entries. */
  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
