import { ParseError, generateCallId, isRecord } from '@gramloop/core';
import type { JSONSchema, ToolCall, ToolSchema } from '@gramloop/core';
import { scanJsonValue, tryParseJson } from './json-scan.js';
import { assertJsonSchemaSupported, normalizeParameters } from './schema-support.js';
import { formatValidationErrors, validateToolArgs } from './schema-validator.js';
import type { JsonSchemaArtifact, ParsedItem, ParsedResponse, PipelineOptions } from './types.js';

function callVariant(name: string, parameters: JSONSchema): JSONSchema {
  return {
    type: 'object',
    properties: {
      name: { type: 'string', const: name },
      arguments: parameters,
    },
    required: ['name', 'arguments'],
    additionalProperties: false,
  };
}

/**
 * A discriminated union of `{ name, arguments }` objects, one variant per
 * tool. With parallel calls the root is an array of the union; an empty
 * array means the model is done.
 */
export function buildJsonSchema(tools: readonly ToolSchema[], options: PipelineOptions): JsonSchemaArtifact {
  const schemas = new Map<string, JSONSchema>();
  const variants: JSONSchema[] = [];

  for (const tool of tools) {
    assertJsonSchemaSupported(tool);
    const parameters = normalizeParameters(tool.parameters);
    schemas.set(tool.name, parameters);
    variants.push(callVariant(tool.name, parameters));
  }

  const [only] = variants;
  const union: JSONSchema = variants.length === 1 && only ? only : { anyOf: variants };
  const schema: JSONSchema = options.allowParallelCalls ? { type: 'array', items: union } : union;

  return {
    strategy: 'json-schema',
    schema,
    allowParallelCalls: options.allowParallelCalls,
    schemas,
    payload: { structured_outputs: { type: 'json', json: schema } },
  };
}

function toItem(artifact: JsonSchemaArtifact, element: unknown): ParsedItem {
  const raw = JSON.stringify(element) ?? '';
  if (!isRecord(element) || typeof element['name'] !== 'string') {
    return new ParseError('Call must be an object with a string "name"', generateCallId(), raw);
  }

  const name = element['name'];
  const args = element['arguments'] ?? {};
  if (!isRecord(args)) {
    return new ParseError('Arguments must be a JSON object', generateCallId(), raw, name);
  }

  const schema = artifact.schemas.get(name);
  if (schema) {
    const result = validateToolArgs(args, schema);
    if (!result.valid) {
      return new ParseError(formatValidationErrors(result.errors, schema), generateCallId(), raw, name);
    }
  }

  const call: ToolCall = Object.freeze({ id: generateCallId(), name, arguments: Object.freeze(args) });
  return call;
}

/**
 * Read one JSON value from the start of the response and fan it out into
 * calls. Text that does not open with `{` or `[` is a plain answer.
 */
export function parseJsonSchema(artifact: JsonSchemaArtifact, text: string): ParsedResponse {
  const trimmed = text.trim();
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) {
    return { text: trimmed, items: [] };
  }

  const end = scanJsonValue(trimmed, 0);
  const decoded = end === -1 ? undefined : tryParseJson(trimmed.slice(0, end));
  if (!decoded) {
    return {
      text: '',
      items: [new ParseError('Response is not valid JSON', generateCallId(), trimmed)],
    };
  }

  const elements = Array.isArray(decoded.value) ? decoded.value : [decoded.value];
  return {
    text: trimmed.slice(end).trim(),
    items: elements.map((element: unknown) => toItem(artifact, element)),
  };
}

/** The exact JSON the json-schema parser reads back as `calls`. */
export function renderJsonCalls(artifact: JsonSchemaArtifact, calls: readonly ToolCall[]): string {
  const objects = calls.map((call) => ({ name: call.name, arguments: call.arguments }));
  const [single] = objects;
  if (!artifact.allowParallelCalls && objects.length === 1 && single) return JSON.stringify(single);
  return JSON.stringify(objects);
}
