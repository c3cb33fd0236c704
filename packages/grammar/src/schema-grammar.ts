import { isRecord } from '@gramloop/core';
import type { JSONSchema, ToolSchema } from '@gramloop/core';
import { quoteGrammarLiteral } from './escape.js';

/** Typed value rules used alongside the shared JSON rules. */
export const TYPED_VALUE_RULES = [
  String.raw`json_integer ::= "-"? ( "0" | [1-9] [0-9]* )`,
  String.raw`json_boolean ::= "true" | "false"`,
];

const SEPARATOR = 'ws "," ws';

/** Grammar literal matching the JSON encoding of `value`. */
function jsonLiteral(value: unknown): string {
  return quoteGrammarLiteral(JSON.stringify(value));
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/**
 * Emits argument rules derived from parameter schemas.
 *
 * Required properties come first in declaration order, then each optional
 * one may follow. Enum and const values become literal alternatives.
 * Keywords with no typed rule (`anyOf`, `$ref`, type lists) accept any
 * JSON value.
 */
export class SchemaGrammarEmitter {
  readonly rules: string[] = [];
  private counter = 0;

  /** Add `name ::= body` under a fresh name derived from `hint`. */
  define(hint: string, body: string): string {
    this.counter++;
    const name = `${hint.replace(/[^a-zA-Z0-9_]/g, '_')}_${this.counter}`;
    this.rules.push(`${name} ::= ${body}`);
    return name;
  }

  /** Rule matching the whole argument object of `tool`. */
  argumentsRule(tool: ToolSchema): string {
    return this.objectRule(tool.parameters, `${tool.name}_args`);
  }

  private objectRule(schema: JSONSchema, hint: string): string {
    const properties = schema['properties'];
    if (!isRecord(properties)) return 'json_object';

    const names = Object.keys(properties);
    const requiredNames = new Set(stringList(schema['required']));

    const pair = (name: string): string => {
      const child = properties[name];
      const value = isRecord(child) ? this.valueRule(child, `${hint}_${name}`) : 'json_value';
      return this.define(`${hint}_${name}_pair`, `${jsonLiteral(name)} ws ":" ws ${value}`);
    };
    const required = names.filter((n) => requiredNames.has(n)).map(pair);
    const optional = names.filter((n) => !requiredNames.has(n)).map(pair);
    const tail = (pairs: readonly string[]): string => pairs.map((p) => ` ( ${SEPARATOR} ${p} )?`).join('');

    if (required.length > 0) {
      return this.define(hint, `"{" ws ${required.join(` ${SEPARATOR} `)}${tail(optional)} ws "}"`);
    }
    if (optional.length > 0) {
      const alternatives = optional.map((p, i) => `${p}${tail(optional.slice(i + 1))}`);
      return this.define(hint, `"{" ws ( ${alternatives.join(' | ')} )? ws "}"`);
    }
    return this.define(hint, '"{" ws "}"');
  }

  private valueRule(schema: JSONSchema, hint: string): string {
    const values = schema['enum'];
    if (Array.isArray(values) && values.length > 0) {
      return this.define(`${hint}_enum`, values.map(jsonLiteral).join(' | '));
    }
    if ('const' in schema) return jsonLiteral(schema['const']);

    switch (schema['type']) {
      case 'string':
        return 'json_string';
      case 'integer':
        return 'json_integer';
      case 'number':
        return 'json_number';
      case 'boolean':
        return 'json_boolean';
      case 'null':
        return '"null"';
      case 'array': {
        const items = schema['items'];
        const item = isRecord(items) ? this.valueRule(items, `${hint}_item`) : 'json_value';
        return this.define(`${hint}_array`, `"[" ws ( ${item} ( ${SEPARATOR} ${item} )* )? ws "]"`);
      }
      case 'object':
        return this.objectRule(schema, hint);
      case undefined:
        return isRecord(schema['properties']) ? this.objectRule(schema, hint) : 'json_value';
      default:
        return 'json_value';
    }
  }
}
