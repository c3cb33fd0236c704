import { ParseError, generateCallId, isRecord } from '@gramloop/core';
import type { ToolCall } from '@gramloop/core';
import { scanJsonValue, skipWhitespace, tryParseJson } from './json-scan.js';
import type { ParsedItem, ParsedResponse } from './types.js';

/** Outcome of reading the call head (name and separator) after a trigger. */
export type HeadMatch =
  | { ok: true; name: string; bodyStart: number }
  | { ok: false; message: string; toolName?: string };

export interface TagScanOptions {
  trigger: string;
  end: string;
  /** Read the head starting right after the trigger. */
  matchHead(text: string, cursor: number): HeadMatch;
  /** Extra check on decoded arguments; returns an error message or undefined. */
  validate?(name: string, args: Record<string, unknown>): string | undefined;
}

/**
 * Scan `text` for `trigger … end` framed calls with JSON-object bodies.
 * A malformed call becomes a ParseError; scanning resumes after it.
 */
export function scanTaggedCalls(text: string, options: TagScanOptions): ParsedResponse {
  const { trigger, end } = options;
  const items: ParsedItem[] = [];
  const outside: string[] = [];
  let pos = 0;

  const resumeAfterEnd = (from: number): number => {
    const next = text.indexOf(end, from);
    return next === -1 ? text.length : next + end.length;
  };

  while (pos < text.length) {
    const start = text.indexOf(trigger, pos);
    if (start === -1) {
      outside.push(text.slice(pos));
      break;
    }
    outside.push(text.slice(pos, start));

    const fail = (message: string, resumeAt: number, toolName?: string): void => {
      const raw = text.slice(start, resumeAt);
      items.push(new ParseError(message, generateCallId(), raw, toolName));
      pos = resumeAt;
    };

    const head = options.matchHead(text, start + trigger.length);
    if (!head.ok) {
      fail(head.message, resumeAfterEnd(start + trigger.length), head.toolName);
      continue;
    }

    const bodyStart = skipWhitespace(text, head.bodyStart);
    if (text[bodyStart] !== '{') {
      fail('Expected a JSON object of arguments', resumeAfterEnd(bodyStart), head.name);
      continue;
    }

    const bodyEnd = scanJsonValue(text, bodyStart);
    if (bodyEnd === -1) {
      fail('Unbalanced JSON arguments', resumeAfterEnd(bodyStart), head.name);
      continue;
    }

    const closeAt = skipWhitespace(text, bodyEnd);
    if (!text.startsWith(end, closeAt)) {
      fail(`Missing closing marker ${JSON.stringify(end)}`, resumeAfterEnd(bodyEnd), head.name);
      continue;
    }
    const resumeAt = closeAt + end.length;

    const decoded = tryParseJson(text.slice(bodyStart, bodyEnd));
    if (!decoded) {
      fail('Arguments are not valid JSON', resumeAt, head.name);
      continue;
    }
    if (!isRecord(decoded.value)) {
      fail('Arguments must be a JSON object', resumeAt, head.name);
      continue;
    }

    const invalid = options.validate?.(head.name, decoded.value);
    if (invalid !== undefined) {
      fail(invalid, resumeAt, head.name);
      continue;
    }

    const call: ToolCall = Object.freeze({
      id: generateCallId(),
      name: head.name,
      arguments: Object.freeze(decoded.value),
    });
    items.push(call);
    pos = resumeAt;
  }

  return { text: outside.join('').trim(), items };
}

/** First candidate (longest first) that `text` continues with at `cursor`. */
export function matchLongest(text: string, cursor: number, candidates: readonly string[]): string | undefined {
  return [...candidates]
    .sort((a, b) => b.length - a.length)
    .find((candidate) => text.startsWith(candidate, cursor));
}
