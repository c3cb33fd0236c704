import { SchemaError } from '@gramloop/core';
import type { GrammarStrategy, ToolCall, ToolSchema } from '@gramloop/core';
import { buildJsonSchema, parseJsonSchema, renderJsonCalls } from './json-schema.js';
import { buildStructural, parseStructural } from './structural.js';
import { buildTaggedText, parseTaggedText, renderTaggedCalls } from './tagged-text.js';
import type { GrammarArtifact, ParsedResponse, PipelineOptions } from './types.js';

/**
 * Builds decode-time constraints for a tool snapshot and parses the text a
 * model produced under them. Artifacts are pure functions of
 * (tools, strategy, options) and are rebuilt every turn.
 */
export class ConstraintPipeline {
  private readonly options: PipelineOptions;

  constructor(options: PipelineOptions) {
    this.options = { ...options, markers: { ...options.markers } };
  }

  /**
   * Build the artifact for `strategy`. Returns null for `none` or an empty
   * tool set. Throws SchemaError when a tool cannot be expressed.
   */
  build(tools: readonly ToolSchema[], strategy: GrammarStrategy): GrammarArtifact | null {
    if (tools.length === 0) return null;
    switch (strategy) {
      case 'tagged-text':
        return buildTaggedText(tools, this.options);
      case 'structural':
        return buildStructural(tools, this.options);
      case 'json-schema':
        return buildJsonSchema(tools, this.options);
      case 'none':
        return null;
    }
  }

  /** Like {@link build}, retrying with `fallback` when the primary strategy raises SchemaError. */
  buildWithFallback(
    tools: readonly ToolSchema[],
    strategy: GrammarStrategy,
    fallback: GrammarStrategy | null,
    onFallback?: (error: SchemaError, fallback: GrammarStrategy) => void,
  ): GrammarArtifact | null {
    try {
      return this.build(tools, strategy);
    } catch (err) {
      if (!(err instanceof SchemaError) || fallback === null || fallback === strategy) throw err;
      onFallback?.(err, fallback);
      return this.build(tools, fallback);
    }
  }

  parse(artifact: GrammarArtifact, text: string): ParsedResponse {
    switch (artifact.strategy) {
      case 'tagged-text':
        return parseTaggedText(artifact, text);
      case 'structural':
        return parseStructural(artifact, text);
      case 'json-schema':
        return parseJsonSchema(artifact, text);
    }
  }

  /** Text that {@link parse} reads back as `calls` under `artifact`. */
  render(artifact: GrammarArtifact, calls: readonly ToolCall[]): string {
    switch (artifact.strategy) {
      case 'tagged-text':
      case 'structural':
        return renderTaggedCalls(artifact.markers, calls);
      case 'json-schema':
        return renderJsonCalls(artifact, calls);
    }
  }
}
