import type { ToolCall, ToolSchema } from '@gramloop/core';
import type { CallMarkers } from '../src/types.js';

export const GEMMA_MARKERS: CallMarkers = {
  prefix: '<start_function_call>call:',
  nameSuffix: '',
  suffix: '<end_function_call>',
};

export const QWEN_MARKERS: CallMarkers = {
  prefix: '<function=',
  nameSuffix: '>',
  suffix: '</function>',
};

export const OPENAI_MARKERS: CallMarkers = {
  prefix: '<tool_call>',
  nameSuffix: '\n',
  suffix: '</tool_call>',
};

export const ADD_PARAMS = {
  type: 'object',
  properties: {
    a: { type: 'number' },
    b: { type: 'number' },
  },
  required: ['a', 'b'],
};

export function tool(name: string, parameters: Record<string, unknown> = ADD_PARAMS): ToolSchema {
  return { name, description: `The ${name} tool`, parameters };
}

export function call(name: string, args: Record<string, unknown>, id = `call_${name}`): ToolCall {
  return { id, name, arguments: args };
}

/** Strip ids so parsed calls can be compared by content. */
export function content(items: readonly unknown[]): unknown[] {
  return items.map((item) =>
    item instanceof Error
      ? { error: item.message }
      : typeof item === 'object' && item !== null && 'name' in item && 'arguments' in item
        ? { name: item.name, arguments: item.arguments }
        : item,
  );
}
