import { KernelError } from '@gramloop/core';

/** Thrown when registering a tool with a name that already exists. */
export class ToolConflictError extends KernelError {
  constructor(name: string) {
    super('configuration', `Tool already registered: ${name}`);
    this.name = 'ToolConflictError';
  }
}

/** Thrown when a requested tool is not found in the registry. */
export class ToolNotFoundError extends KernelError {
  constructor(name: string) {
    super('tool_execution', `Tool not found: ${name}`);
    this.name = 'ToolNotFoundError';
  }
}
