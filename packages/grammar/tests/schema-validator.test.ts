import { describe, it, expect } from 'vitest';
import { validateToolArgs, formatValidationErrors } from '../src/schema-validator.js';
import { escapeGrammarLiteral, unescapeGrammarLiteral } from '../src/escape.js';
import { scanJsonValue } from '../src/json-scan.js';

const exampleSchema: Record<string, unknown> = {
  type: 'object',
  properties: {
    name: { type: 'string', description: 'The name' },
    count: { type: 'integer', description: 'A count value' },
    mode: { type: 'string', enum: ['fast', 'slow'] },
    point: {
      type: 'object',
      properties: { x: { type: 'number' }, y: { type: 'number' } },
      required: ['x', 'y'],
    },
    tags: { type: 'array', items: { type: 'string' } },
  },
  required: ['name', 'count'],
};

describe('validateToolArgs', () => {
  it('passes validation for valid arguments', () => {
    const result = validateToolArgs(
      { name: 'test', count: 42, mode: 'fast', point: { x: 1, y: 2 }, tags: ['a'] },
      exampleSchema,
    );
    expect(result).toEqual({ valid: true, errors: [] });
  });

  it('fails when a required field is missing', () => {
    const result = validateToolArgs({ name: 'test' }, exampleSchema);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([{ path: 'count', message: 'Missing required field: count' }]);
  });

  it('rejects fractional numbers for integer fields', () => {
    const result = validateToolArgs({ name: 'test', count: 1.5 }, exampleSchema);
    expect(result.errors).toEqual([
      { path: 'count', message: 'Expected integer, got fractional number', expected: 'integer' },
    ]);
  });

  it('checks enum membership', () => {
    const result = validateToolArgs({ name: 'test', count: 1, mode: 'medium' }, exampleSchema);
    expect(result.errors).toEqual([{ path: 'mode', message: 'Expected one of: "fast", "slow"' }]);
  });

  it('reports nested paths', () => {
    const result = validateToolArgs(
      { name: 'test', count: 1, point: { x: 'left' }, tags: ['ok', 3] },
      exampleSchema,
    );
    expect(result.errors).toEqual([
      { path: 'point.y', message: 'Missing required field: y' },
      { path: 'point.x', message: 'Expected number, got string', expected: 'number' },
      { path: 'tags[1]', message: 'Expected string, got number', expected: 'string' },
    ]);
  });

  it('rejects null where a type is declared', () => {
    const result = validateToolArgs({ name: null, count: 1 }, exampleSchema);
    expect(result.errors).toEqual([{ path: 'name', message: 'Expected string, got null', expected: 'string' }]);
  });

  it('allows unknown extra fields without error', () => {
    const result = validateToolArgs({ name: 'test', count: 5, extraField: 'ignored' }, exampleSchema);
    expect(result.valid).toBe(true);
  });
});

describe('formatValidationErrors', () => {
  it('lists errors followed by property hints', () => {
    const schema = {
      type: 'object',
      properties: { path: { type: 'string', description: 'File to read' } },
      required: ['path'],
    };
    const text = formatValidationErrors([{ path: 'path', message: 'Missing required field: path' }], schema);
    expect(text).toBe(
      [
        'Argument validation failed:',
        '  - path: Missing required field: path',
        '',
        'Schema properties:',
        '  - path: string (required): File to read',
      ].join('\n'),
    );
  });
});

describe('grammar literal escaping', () => {
  it.each(['plain', 'quote"d', 'back\\slash', 'line\nbreak', 'tab\there', '\\"'])('round-trips %j', (value) => {
    expect(unescapeGrammarLiteral(escapeGrammarLiteral(value))).toBe(value);
  });

  it('escapes backslash before quote', () => {
    expect(escapeGrammarLiteral('a"b\\c')).toBe('a\\"b\\\\c');
  });
});

describe('scanJsonValue', () => {
  it('finds the end of nested values', () => {
    const text = 'x{"a":[1,{"b":"}"}]}rest';
    expect(text.slice(1, scanJsonValue(text, 1))).toBe('{"a":[1,{"b":"}"}]}');
  });

  it('returns -1 for unbalanced or mismatched brackets', () => {
    expect(scanJsonValue('{"a":[1}', 0)).toBe(-1);
    expect(scanJsonValue('{"a":1', 0)).toBe(-1);
    expect(scanJsonValue('"a"', 0)).toBe(-1);
  });

  it('skips escaped quotes inside strings', () => {
    const text = '{"a":"say \\"}\\" now"}';
    expect(scanJsonValue(text, 0)).toBe(text.length);
  });
});
