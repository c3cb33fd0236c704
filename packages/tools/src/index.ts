export { ToolRegistry } from './registry.js';
export type { ToolRegistryEntry } from './registry.js';
export { ToolConflictError, ToolNotFoundError } from './errors.js';
export { dispatchToolCalls, CANCELLED_OUTPUT } from './dispatcher.js';
export type { DispatchOptions } from './dispatcher.js';
