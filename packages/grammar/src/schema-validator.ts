import { isRecord } from '@gramloop/core';
import type { JSONSchema } from '@gramloop/core';

/** A single validation error with location and description. */
export interface ValidationError {
  path: string;
  message: string;
  expected?: string;
}

/** Result of validating tool arguments against a JSON Schema. */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

/** Known JSON Schema type strings. */
type SchemaType = 'string' | 'number' | 'integer' | 'boolean' | 'object' | 'array' | 'null';

const SCHEMA_TYPES: readonly SchemaType[] = ['string', 'number', 'integer', 'boolean', 'object', 'array', 'null'];

function asSchemaType(value: unknown): SchemaType | undefined {
  return SCHEMA_TYPES.find((t) => t === value);
}

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function childPath(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

/**
 * Lightweight JSON Schema validator for parsed tool arguments.
 * Checks `type`, `enum`, `const`, `required`, nested `properties` and
 * array `items`. Unknown extra fields pass.
 */
export function validateToolArgs(
  args: Readonly<Record<string, unknown>>,
  schema: JSONSchema,
): ValidationResult {
  const errors: ValidationError[] = [];
  validateValue(args, schema, '', errors);
  return { valid: errors.length === 0, errors };
}

function validateValue(value: unknown, schema: JSONSchema, path: string, errors: ValidationError[]): void {
  const expected = asSchemaType(schema['type']);
  if (expected) {
    const typeError = checkType(value, expected);
    if (typeError) {
      errors.push({ path: path || '<root>', message: typeError, expected });
      return;
    }
  }

  const allowed = schema['enum'];
  if (Array.isArray(allowed) && !allowed.some((option) => option === value)) {
    errors.push({
      path: path || '<root>',
      message: `Expected one of: ${allowed.map((o) => JSON.stringify(o)).join(', ')}`,
    });
  }

  if ('const' in schema && schema['const'] !== value) {
    errors.push({ path: path || '<root>', message: `Expected ${JSON.stringify(schema['const'])}` });
  }

  if (isRecord(value)) validateObject(value, schema, path, errors);

  const items = schema['items'];
  if (Array.isArray(value) && isRecord(items)) {
    value.forEach((item, i) => validateValue(item, items, `${path}[${i}]`, errors));
  }
}

function validateObject(
  value: Record<string, unknown>,
  schema: JSONSchema,
  path: string,
  errors: ValidationError[],
): void {
  const required = schema['required'];
  if (Array.isArray(required)) {
    for (const key of required) {
      if (typeof key === 'string' && value[key] === undefined) {
        errors.push({
          path: childPath(path, key),
          message: `Missing required field: ${key}`,
        });
      }
    }
  }

  const properties = schema['properties'];
  if (!isRecord(properties)) return;

  for (const [key, child] of Object.entries(value)) {
    const propSchema = properties[key];
    if (!isRecord(propSchema) || child === undefined) continue;
    validateValue(child, propSchema, childPath(path, key), errors);
  }
}

/** Check whether a value matches the expected JSON Schema type. */
function checkType(value: unknown, expected: SchemaType): string | null {
  switch (expected) {
    case 'string':
    case 'boolean':
      return typeof value === expected ? null : `Expected ${expected}, got ${typeName(value)}`;

    case 'number':
      return typeof value === 'number' ? null : `Expected number, got ${typeName(value)}`;

    case 'integer':
      return typeof value === 'number' && Number.isInteger(value)
        ? null
        : `Expected integer, got ${typeof value === 'number' ? 'fractional number' : typeName(value)}`;

    case 'object':
      return isRecord(value) ? null : `Expected object, got ${typeName(value)}`;

    case 'array':
      return Array.isArray(value) ? null : `Expected array, got ${typeName(value)}`;

    case 'null':
      return value === null ? null : `Expected null, got ${typeName(value)}`;
  }
}

/**
 * Format validation errors into a readable string the model can use to
 * correct its next call. Includes the schema's top-level properties as hints.
 */
export function formatValidationErrors(errors: readonly ValidationError[], schema: JSONSchema): string {
  const lines: string[] = ['Argument validation failed:'];

  for (const err of errors) {
    const suffix = err.expected ? ` (expected: ${err.expected})` : '';
    lines.push(`  - ${err.path}: ${err.message}${suffix}`);
  }

  const properties = schema['properties'];
  const required = Array.isArray(schema['required']) ? schema['required'] : [];

  if (isRecord(properties)) {
    lines.push('');
    lines.push('Schema properties:');
    for (const [name, prop] of Object.entries(properties)) {
      const type = isRecord(prop) && typeof prop['type'] === 'string' ? prop['type'] : 'unknown';
      const desc = isRecord(prop) && typeof prop['description'] === 'string' ? prop['description'] : '';
      const reqMark = required.includes(name) ? ' (required)' : '';
      lines.push(`  - ${name}: ${type}${reqMark}${desc ? `: ${desc}` : ''}`);
    }
  }

  return lines.join('\n');
}
