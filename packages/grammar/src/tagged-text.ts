import type { ToolCall, ToolSchema } from '@gramloop/core';
import { escapeGrammarLiteral, quoteGrammarLiteral, unescapeGrammarLiteral } from './escape.js';
import { skipWhitespace } from './json-scan.js';
import { SchemaGrammarEmitter, TYPED_VALUE_RULES } from './schema-grammar.js';
import { assertObjectRoot } from './schema-support.js';
import { matchLongest, scanTaggedCalls } from './tag-scanner.js';
import type { HeadMatch } from './tag-scanner.js';
import type { CallMarkers, ParsedResponse, PipelineOptions, TaggedTextArtifact } from './types.js';

/** JSON argument rules shared by every tagged-text grammar. */
const JSON_RULES = [
  String.raw`json_object ::= "{" ws ( json_pair ( ws "," ws json_pair )* )? ws "}"`,
  String.raw`json_pair ::= json_string ws ":" ws json_value`,
  String.raw`json_value ::= json_object | json_array | json_string | json_number | "true" | "false" | "null"`,
  String.raw`json_array ::= "[" ws ( json_value ( ws "," ws json_value )* )? ws "]"`,
  String.raw`json_string ::= "\"" ( [^"\\\x00-\x1f] | "\\" ( ["\\/bfnrt] | "u" [0-9a-fA-F] [0-9a-fA-F] [0-9a-fA-F] [0-9a-fA-F] ) )* "\""`,
  String.raw`json_number ::= "-"? ( "0" | [1-9] [0-9]* ) ( "." [0-9]+ )? ( [eE] [-+]? [0-9]+ )?`,
  String.raw`ws ::= [ \t\n]*`,
];

function callSequence(markers: CallMarkers, name: string, args: string): string {
  const parts = [quoteGrammarLiteral(markers.prefix), name];
  if (markers.nameSuffix) parts.push(quoteGrammarLiteral(markers.nameSuffix));
  parts.push(args, quoteGrammarLiteral(markers.suffix));
  return parts.join(' ');
}

/** One call rule per tool, each with arguments shaped by the tool's schema. */
function schemaAwareRules(tools: readonly ToolSchema[], markers: CallMarkers): string[] {
  const emitter = new SchemaGrammarEmitter();
  const calls = tools.map((tool) =>
    emitter.define(`call_${tool.name}`, callSequence(markers, quoteGrammarLiteral(tool.name), emitter.argumentsRule(tool))),
  );
  return [`function_call ::= ${calls.join(' | ')}`, ...emitter.rules, ...JSON_RULES, ...TYPED_VALUE_RULES];
}

/**
 * Build an EBNF grammar whose root is one call (or a whitespace-separated
 * run of calls) framed by the family's markers.
 */
export function buildTaggedText(tools: readonly ToolSchema[], options: PipelineOptions): TaggedTextArtifact {
  for (const tool of tools) assertObjectRoot(tool);

  const nameLiterals = tools.map((t) => escapeGrammarLiteral(t.name));
  const rules = options.schemaAwareGrammar
    ? schemaAwareRules(tools, options.markers)
    : [
        `function_call ::= ${callSequence(options.markers, 'tool_name', 'json_object')}`,
        `tool_name ::= ${nameLiterals.map((n) => `"${n}"`).join(' | ')}`,
        ...JSON_RULES,
      ];
  const grammar = [
    options.allowParallelCalls ? 'root ::= function_call ( ws function_call )*' : 'root ::= function_call',
    ...rules,
  ].join('\n');

  return {
    strategy: 'tagged-text',
    grammar,
    markers: { ...options.markers },
    nameLiterals,
    allowParallelCalls: options.allowParallelCalls,
    payload: { structured_outputs: { type: 'grammar', grammar } },
  };
}

/** Best-effort name for a call whose name is not in the grammar. */
function readUnknownName(text: string, cursor: number, nameSuffix: string): HeadMatch {
  const stops = [nameSuffix ? text.indexOf(nameSuffix, cursor) : -1, text.indexOf('{', cursor)].filter(
    (i) => i !== -1,
  );
  if (stops.length === 0) return { ok: false, message: 'Unterminated tool call' };

  const stop = Math.min(...stops);
  const name = text.slice(cursor, stop).trim();
  if (!name) return { ok: false, message: 'Missing tool name' };

  const bodyStart = nameSuffix && text.startsWith(nameSuffix, stop) ? stop + nameSuffix.length : stop;
  return { ok: true, name, bodyStart };
}

export function parseTaggedText(artifact: TaggedTextArtifact, text: string): ParsedResponse {
  const { prefix, nameSuffix, suffix } = artifact.markers;
  const names = artifact.nameLiterals.map(unescapeGrammarLiteral);
  const heads = names.map((name) => name + nameSuffix);

  return scanTaggedCalls(text, {
    trigger: prefix,
    end: suffix,
    matchHead: (source, cursor) => {
      const head = matchLongest(source, cursor, heads);
      // Without a separator, "add" must not match the start of "addition{".
      const bodyStart = head === undefined ? -1 : cursor + head.length;
      if (head === undefined || (!nameSuffix && source[skipWhitespace(source, bodyStart)] !== '{')) {
        return readUnknownName(source, cursor, nameSuffix);
      }
      return { ok: true, name: head.slice(0, head.length - nameSuffix.length), bodyStart };
    },
  });
}

/** The exact text the tagged-text parser reads back as `calls`. */
export function renderTaggedCalls(markers: CallMarkers, calls: readonly ToolCall[]): string {
  return calls
    .map((call) => `${markers.prefix}${call.name}${markers.nameSuffix}${JSON.stringify(call.arguments)}${markers.suffix}`)
    .join('\n');
}
