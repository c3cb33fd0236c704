import { SchemaError, isRecord } from '@gramloop/core';
import type { JSONSchema, ToolSchema } from '@gramloop/core';

const STRUCTURAL_UNSUPPORTED = ['anyOf', 'oneOf', 'allOf', 'not', '$ref', 'if', 'then', 'else'] as const;

/** Keywords whose values are nested schemas keyed by property name. */
const SCHEMA_MAPS = ['properties', 'patternProperties', '$defs', 'definitions'] as const;

/** Keywords whose values are a single nested schema. */
const SCHEMA_SLOTS = ['items', 'additionalProperties', 'contains'] as const;

type NodeCheck = (node: JSONSchema, path: string) => string | undefined;

function join(path: string, key: string): string {
  return path ? `${path}.${key}` : key;
}

/** Depth-first walk over every subschema; the first failing check throws. */
function walkSchema(toolName: string, node: JSONSchema, path: string, check: NodeCheck): void {
  const detail = check(node, path);
  if (detail !== undefined) throw new SchemaError(toolName, path, detail);

  for (const key of SCHEMA_MAPS) {
    const map = node[key];
    if (!isRecord(map)) continue;
    for (const [name, child] of Object.entries(map)) {
      if (isRecord(child)) walkSchema(toolName, child, join(join(path, key), name), check);
    }
  }

  for (const key of SCHEMA_SLOTS) {
    const child = node[key];
    if (isRecord(child)) {
      walkSchema(toolName, child, join(path, key), check);
    } else if (Array.isArray(child)) {
      child.forEach((item, i) => {
        if (isRecord(item)) walkSchema(toolName, item, `${join(path, key)}[${i}]`, check);
      });
    }
  }

  const prefixItems = node['prefixItems'];
  if (Array.isArray(prefixItems)) {
    prefixItems.forEach((item, i) => {
      if (isRecord(item)) walkSchema(toolName, item, `${join(path, 'prefixItems')}[${i}]`, check);
    });
  }
}

/** Tool parameters must describe an object (or leave `type` out). */
export function assertObjectRoot(tool: ToolSchema): void {
  const type = tool.parameters['type'];
  if (type !== undefined && type !== 'object') {
    throw new SchemaError(tool.name, '', 'parameters must be an object schema');
  }
}

/** Reject constructs a per-tool structural tag cannot express. */
export function assertStructuralSupported(tool: ToolSchema): void {
  assertObjectRoot(tool);
  walkSchema(tool.name, tool.parameters, '', (node) => {
    for (const keyword of STRUCTURAL_UNSUPPORTED) {
      if (node[keyword] !== undefined) return `"${keyword}" is not supported`;
    }
    if (Array.isArray(node['type'])) return 'type lists are not supported';
    return undefined;
  });
}

/** Reject `$ref`, which cannot be inlined into the union schema. */
export function assertJsonSchemaSupported(tool: ToolSchema): void {
  assertObjectRoot(tool);
  walkSchema(tool.name, tool.parameters, '', (node) =>
    node['$ref'] !== undefined ? '"$ref" is not supported' : undefined,
  );
}

/** Parameters with an explicit object root. */
export function normalizeParameters(parameters: JSONSchema): JSONSchema {
  return parameters['type'] === undefined ? { type: 'object', ...parameters } : parameters;
}
