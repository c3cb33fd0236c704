export { ConstraintPipeline } from './pipeline.js';
export type {
  CallMarkers,
  PipelineOptions,
  ConstraintPayload,
  GrammarArtifact,
  TaggedTextArtifact,
  StructuralArtifact,
  StructuralTag,
  JsonSchemaArtifact,
  ParsedItem,
  ParsedResponse,
} from './types.js';

export { buildTaggedText, parseTaggedText, renderTaggedCalls } from './tagged-text.js';
export { buildStructural, parseStructural } from './structural.js';
export { buildJsonSchema, parseJsonSchema, renderJsonCalls } from './json-schema.js';

export { SchemaGrammarEmitter, TYPED_VALUE_RULES } from './schema-grammar.js';
export { escapeGrammarLiteral, unescapeGrammarLiteral, quoteGrammarLiteral } from './escape.js';
export { scanJsonValue } from './json-scan.js';
export {
  assertObjectRoot,
  assertStructuralSupported,
  assertJsonSchemaSupported,
} from './schema-support.js';
export { validateToolArgs, formatValidationErrors } from './schema-validator.js';
export type { ValidationError, ValidationResult } from './schema-validator.js';
