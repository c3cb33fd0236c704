import type { JSONSchema, ParseError, ToolCall } from '@gramloop/core';

/** Literals that frame one tool call in generated text. */
export interface CallMarkers {
  /** Opens a call, before the tool name. */
  prefix: string;
  /** Separates the tool name from the JSON arguments. May be empty. */
  nameSuffix: string;
  /** Closes a call. */
  suffix: string;
}

export interface PipelineOptions {
  markers: CallMarkers;
  allowParallelCalls: boolean;
  /** Tagged-text: one argument rule per tool, derived from its parameters. */
  schemaAwareGrammar?: boolean;
}

/** vLLM-style `structured_outputs` request fragment. */
export type ConstraintPayload = Record<string, unknown>;

export interface TaggedTextArtifact {
  readonly strategy: 'tagged-text';
  readonly grammar: string;
  readonly markers: CallMarkers;
  /** Tool names as they appear (escaped) in the grammar's name alternation. */
  readonly nameLiterals: readonly string[];
  readonly allowParallelCalls: boolean;
  readonly payload: ConstraintPayload;
}

export interface StructuralTag {
  readonly begin: string;
  readonly schema: JSONSchema;
  readonly end: string;
}

export interface StructuralArtifact {
  readonly strategy: 'structural';
  readonly structures: readonly StructuralTag[];
  readonly triggers: readonly string[];
  readonly markers: CallMarkers;
  /** Parameter schema per tool name, for validating parsed arguments. */
  readonly schemas: ReadonlyMap<string, JSONSchema>;
  readonly payload: ConstraintPayload;
}

export interface JsonSchemaArtifact {
  readonly strategy: 'json-schema';
  readonly schema: JSONSchema;
  readonly allowParallelCalls: boolean;
  readonly schemas: ReadonlyMap<string, JSONSchema>;
  readonly payload: ConstraintPayload;
}

/** Constraint built for one turn's tool snapshot. */
export type GrammarArtifact = TaggedTextArtifact | StructuralArtifact | JsonSchemaArtifact;

/** One call attempt: a well-formed call or the error for a malformed one. */
export type ParsedItem = ToolCall | ParseError;

export interface ParsedResponse {
  /** Text outside any call, trimmed. */
  text: string;
  /** Call attempts in the order they appear. */
  items: ParsedItem[];
}
