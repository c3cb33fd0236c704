import type { JSONSchema, ToolSchema } from '@gramloop/core';
import { assertStructuralSupported, normalizeParameters } from './schema-support.js';
import { formatValidationErrors, validateToolArgs } from './schema-validator.js';
import { skipWhitespace } from './json-scan.js';
import { matchLongest, scanTaggedCalls } from './tag-scanner.js';
import type { ParsedResponse, PipelineOptions, StructuralArtifact, StructuralTag } from './types.js';

/**
 * One structural tag per tool: the decoder is free until it emits a
 * trigger, then must complete one of the tags with schema-valid JSON.
 */
export function buildStructural(tools: readonly ToolSchema[], options: PipelineOptions): StructuralArtifact {
  const { markers } = options;
  const schemas = new Map<string, JSONSchema>();
  const structures: StructuralTag[] = [];

  for (const tool of tools) {
    assertStructuralSupported(tool);
    const schema = normalizeParameters(tool.parameters);
    schemas.set(tool.name, schema);
    structures.push({ begin: `${markers.prefix}${tool.name}${markers.nameSuffix}`, schema, end: markers.suffix });
  }

  const triggers = [markers.prefix];
  const structuralTag = JSON.stringify({ type: 'structural_tag', structures, triggers });

  return {
    strategy: 'structural',
    structures,
    triggers,
    markers: { ...markers },
    schemas,
    payload: { structured_outputs: { type: 'structural_tag', structural_tag: structuralTag } },
  };
}

export function parseStructural(artifact: StructuralArtifact, text: string): ParsedResponse {
  const { prefix, nameSuffix, suffix } = artifact.markers;
  const names = [...artifact.schemas.keys()];
  const heads = names.map((name) => name + nameSuffix);

  return scanTaggedCalls(text, {
    trigger: prefix,
    end: suffix,
    matchHead: (source, cursor) => {
      const head = matchLongest(source, cursor, heads);
      const bodyStart = head === undefined ? -1 : cursor + head.length;
      // With an empty separator the name must be followed by the arguments.
      if (head === undefined || (!nameSuffix && source[skipWhitespace(source, bodyStart)] !== '{')) {
        return { ok: false, message: 'No structural tag matches the call' };
      }
      return { ok: true, name: head.slice(0, head.length - nameSuffix.length), bodyStart };
    },
    validate: (name, args) => {
      const schema = artifact.schemas.get(name);
      if (!schema) return undefined;
      const result = validateToolArgs(args, schema);
      return result.valid ? undefined : formatValidationErrors(result.errors, schema);
    },
  });
}
