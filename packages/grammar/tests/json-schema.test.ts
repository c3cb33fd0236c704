import { describe, it, expect } from 'vitest';
import { SchemaError } from '@gramloop/core';
import { buildJsonSchema, parseJsonSchema, renderJsonCalls } from '../src/json-schema.js';
import { ADD_PARAMS, GEMMA_MARKERS, call, content, tool } from './helpers.js';

const parallel = { markers: GEMMA_MARKERS, allowParallelCalls: true };
const single = { markers: GEMMA_MARKERS, allowParallelCalls: false };

const addVariant = {
  type: 'object',
  properties: { name: { type: 'string', const: 'add' }, arguments: ADD_PARAMS },
  required: ['name', 'arguments'],
  additionalProperties: false,
};

describe('buildJsonSchema', () => {
  it('uses the bare variant for one tool without parallel calls', () => {
    const artifact = buildJsonSchema([tool('add')], single);
    expect(artifact.schema).toEqual(addVariant);
    expect(artifact.payload).toEqual({ structured_outputs: { type: 'json', json: addVariant } });
  });

  it('wraps a union of tools in an array for parallel calls', () => {
    const artifact = buildJsonSchema([tool('add'), tool('multiply')], parallel);
    expect(artifact.schema['type']).toBe('array');
    const items = artifact.schema['items'];
    expect(items).toEqual({
      anyOf: [
        addVariant,
        { ...addVariant, properties: { name: { type: 'string', const: 'multiply' }, arguments: ADD_PARAMS } },
      ],
    });
  });

  it('accepts anyOf inside parameters', () => {
    const params = { type: 'object', properties: { v: { anyOf: [{ type: 'string' }, { type: 'number' }] } } };
    expect(() => buildJsonSchema([tool('lookup', params)], parallel)).not.toThrow();
  });

  it('rejects $ref', () => {
    const params = { type: 'object', properties: { v: { $ref: '#/$defs/v' } } };
    expect(() => buildJsonSchema([tool('lookup', params)], parallel)).toThrow(SchemaError);
  });
});

describe('parseJsonSchema', () => {
  const artifact = buildJsonSchema([tool('add'), tool('multiply')], parallel);

  it('fans an array out into calls', () => {
    const parsed = parseJsonSchema(
      artifact,
      '[{"name":"add","arguments":{"a":1,"b":2}},{"name":"multiply","arguments":{"a":3,"b":4}}]',
    );
    expect(parsed.text).toBe('');
    expect(content(parsed.items)).toEqual([
      { name: 'add', arguments: { a: 1, b: 2 } },
      { name: 'multiply', arguments: { a: 3, b: 4 } },
    ]);
  });

  it('reads a single object as one call', () => {
    const parsed = parseJsonSchema(artifact, ' {"name":"add","arguments":{"a":5,"b":6}} ');
    expect(content(parsed.items)).toEqual([{ name: 'add', arguments: { a: 5, b: 6 } }]);
  });

  it('treats an empty array as no calls', () => {
    expect(parseJsonSchema(artifact, '[]')).toEqual({ text: '', items: [] });
  });

  it('treats text that is not JSON as a plain answer', () => {
    expect(parseJsonSchema(artifact, 'The result is 11.')).toEqual({ text: 'The result is 11.', items: [] });
  });

  it('reports truncated JSON', () => {
    const parsed = parseJsonSchema(artifact, '[{"name":"add","arguments":{"a":1');
    expect(content(parsed.items)).toEqual([{ error: 'Response is not valid JSON' }]);
  });

  it('isolates bad elements', () => {
    const parsed = parseJsonSchema(
      artifact,
      '[{"arguments":{}},{"name":"add","arguments":{"a":1,"b":2}},{"name":"add","arguments":"a=1"},{"name":"add","arguments":{"a":1}}]',
    );
    expect(content(parsed.items)).toEqual([
      { error: 'Call must be an object with a string "name"' },
      { name: 'add', arguments: { a: 1, b: 2 } },
      { error: 'Arguments must be a JSON object' },
      {
        error: [
          'Argument validation failed:',
          '  - b: Missing required field: b',
          '',
          'Schema properties:',
          '  - a: number (required)',
          '  - b: number (required)',
        ].join('\n'),
      },
    ]);
  });

  it('passes unknown tool names through as calls', () => {
    const parsed = parseJsonSchema(artifact, '[{"name":"divide","arguments":{"a":1}}]');
    expect(content(parsed.items)).toEqual([{ name: 'divide', arguments: { a: 1 } }]);
  });
});

describe('renderJsonCalls', () => {
  it('renders an array for parallel artifacts and round-trips', () => {
    const artifact = buildJsonSchema([tool('add')], parallel);
    const calls = [call('add', { a: 1, b: 2 })];
    const text = renderJsonCalls(artifact, calls);
    expect(text).toBe('[{"name":"add","arguments":{"a":1,"b":2}}]');
    expect(content(parseJsonSchema(artifact, text).items)).toEqual([{ name: 'add', arguments: { a: 1, b: 2 } }]);
  });

  it('renders a single object when parallel calls are off', () => {
    const artifact = buildJsonSchema([tool('add')], single);
    expect(renderJsonCalls(artifact, [call('add', { a: 1, b: 2 })])).toBe('{"name":"add","arguments":{"a":1,"b":2}}');
  });
});
