import type { MessageRole, ModelFamilyName, ModelResponse, ToolResultCorrelation } from '@gramloop/core';
import type { CallMarkers, ParsedResponse } from '@gramloop/grammar';
import { parseFunctionGemmaNative, parseOpenAINative, parseQwenNative } from './native-parsers.js';

/** Where tool descriptors go when the family is unconstrained. */
export type ToolDescriptorStyle = 'api' | 'inline';

/**
 * Wire conventions of one model family. Families are a closed set,
 * selected by name at kernel construction.
 */
export interface ModelFamily {
  readonly name: ModelFamilyName;
  readonly markers: CallMarkers;
  readonly roleMap: Readonly<Record<MessageRole, string>>;
  /** Text the leading instruction must start with, for families that require one. */
  readonly requiredInstruction?: string;
  readonly toolResultCorrelation: ToolResultCorrelation;
  readonly toolDescriptors: ToolDescriptorStyle;
  parseNative(response: ModelResponse): ParsedResponse;
}

const OPENAI: ModelFamily = {
  name: 'openai',
  markers: { prefix: '<tool_call>', nameSuffix: '\n', suffix: '</tool_call>' },
  roleMap: { system: 'system', developer: 'system', user: 'user', assistant: 'assistant', tool: 'tool' },
  toolResultCorrelation: 'call-id',
  toolDescriptors: 'api',
  parseNative: parseOpenAINative,
};

const QWEN: ModelFamily = {
  name: 'qwen',
  markers: { prefix: '<function=', nameSuffix: '>', suffix: '</function>' },
  roleMap: { system: 'system', developer: 'system', user: 'user', assistant: 'assistant', tool: 'tool' },
  toolResultCorrelation: 'call-id',
  toolDescriptors: 'api',
  parseNative: parseQwenNative,
};

const FUNCTION_GEMMA: ModelFamily = {
  name: 'function-gemma',
  markers: { prefix: '<start_function_call>call:', nameSuffix: '', suffix: '<end_function_call>' },
  roleMap: { system: 'developer', developer: 'developer', user: 'user', assistant: 'assistant', tool: 'tool' },
  requiredInstruction: 'You are a model that can do function calling with the following functions',
  toolResultCorrelation: 'name-response',
  toolDescriptors: 'inline',
  parseNative: parseFunctionGemmaNative,
};

export const MODEL_FAMILIES: Readonly<Record<ModelFamilyName, ModelFamily>> = {
  openai: OPENAI,
  qwen: QWEN,
  'function-gemma': FUNCTION_GEMMA,
};

export function getModelFamily(name: ModelFamilyName): ModelFamily {
  return MODEL_FAMILIES[name];
}
