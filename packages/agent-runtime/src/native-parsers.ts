import { ParseError, generateCallId, isRecord } from '@gramloop/core';
import type { ModelResponse, ToolCall, WireToolCall } from '@gramloop/core';
import { scanJsonValue } from '@gramloop/grammar';
import type { ParsedItem, ParsedResponse } from '@gramloop/grammar';

function makeCall(name: string, args: Record<string, unknown>): ToolCall {
  return Object.freeze({ id: generateCallId(), name, arguments: Object.freeze(args) });
}

function decodeObject(raw: string): Record<string, unknown> | undefined {
  try {
    const value: unknown = JSON.parse(raw);
    return isRecord(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Convert the endpoint's structured call list. Ids are reassigned so they
 * stay unique across the run.
 */
export function parseWireToolCalls(calls: readonly WireToolCall[]): ParsedItem[] {
  return calls.map((wire) => {
    const raw = wire.function.arguments.trim() || '{}';
    const args = decodeObject(raw);
    if (!args) {
      return new ParseError('Arguments must be a JSON object', generateCallId(), raw, wire.function.name);
    }
    return makeCall(wire.function.name, args);
  });
}

/**
 * Scan `open … close` blocks, handing each body to `readBody`.
 * Text outside blocks is returned trimmed.
 */
function scanBlocks(
  text: string,
  open: string,
  close: string,
  readBody: (body: string) => ParsedItem,
): ParsedResponse {
  const items: ParsedItem[] = [];
  const outside: string[] = [];
  let pos = 0;

  while (pos < text.length) {
    const start = text.indexOf(open, pos);
    if (start === -1) {
      outside.push(text.slice(pos));
      break;
    }
    outside.push(text.slice(pos, start));

    const bodyStart = start + open.length;
    const end = text.indexOf(close, bodyStart);
    if (end === -1) {
      items.push(new ParseError(`Missing closing marker ${JSON.stringify(close)}`, generateCallId(), text.slice(start)));
      break;
    }
    items.push(readBody(text.slice(bodyStart, end)));
    pos = end + close.length;
  }

  return { text: outside.join('').trim(), items };
}

function structuredOr(response: ModelResponse, fallback: (text: string) => ParsedResponse): ParsedResponse {
  if (response.nativeToolCalls && response.nativeToolCalls.length > 0) {
    return { text: response.text.trim(), items: parseWireToolCalls(response.nativeToolCalls) };
  }
  return fallback(response.text);
}

// ── openai ──────────────────────────────────────────────────────────

export function parseOpenAINative(response: ModelResponse): ParsedResponse {
  return structuredOr(response, (text) => ({ text: text.trim(), items: [] }));
}

// ── qwen ────────────────────────────────────────────────────────────

function readHermesCall(body: string): ParsedItem {
  const trimmed = body.trim();
  const end = trimmed.startsWith('{') ? scanJsonValue(trimmed, 0) : -1;
  const value = end === -1 ? undefined : decodeObject(trimmed.slice(0, end));
  if (!value || typeof value['name'] !== 'string') {
    return new ParseError('Tool call must be a JSON object with a string "name"', generateCallId(), body);
  }

  const name = value['name'];
  const rawArgs = value['arguments'] ?? value['parameters'] ?? {};
  const args = typeof rawArgs === 'string' ? decodeObject(rawArgs) : isRecord(rawArgs) ? rawArgs : undefined;
  if (!args) {
    return new ParseError('Arguments must be a JSON object', generateCallId(), body, name);
  }
  return makeCall(name, args);
}

/** Structured calls, or `<tool_call>{"name", "arguments"}</tool_call>` blocks. */
export function parseQwenNative(response: ModelResponse): ParsedResponse {
  return structuredOr(response, (text) => scanBlocks(text, '<tool_call>', '</tool_call>', readHermesCall));
}

// ── function-gemma ──────────────────────────────────────────────────

const ESCAPE = '<escape>';

/** Reader for FunctionGemma's `{key:<escape>text<escape>,n:1}` argument syntax. */
class GemmaArgsReader {
  private pos = 0;

  constructor(private readonly src: string) {}

  readAll(): Record<string, unknown> {
    this.skipWs();
    const value = this.readObject();
    this.skipWs();
    if (this.pos !== this.src.length) this.fail('Unexpected trailing characters');
    return value;
  }

  private fail(message: string): never {
    throw new Error(`${message} at offset ${this.pos}`);
  }

  private skipWs(): void {
    while (this.pos < this.src.length && /\s/.test(this.src[this.pos] ?? '')) this.pos++;
  }

  private expect(ch: string): void {
    this.skipWs();
    if (this.src[this.pos] !== ch) this.fail(`Expected "${ch}"`);
    this.pos++;
  }

  private readObject(): Record<string, unknown> {
    this.expect('{');
    const result: Record<string, unknown> = {};
    this.skipWs();
    if (this.src[this.pos] === '}') {
      this.pos++;
      return result;
    }
    for (;;) {
      const key = this.readKey();
      this.expect(':');
      result[key] = this.readValue();
      this.skipWs();
      const ch = this.src[this.pos];
      this.pos++;
      if (ch === '}') return result;
      if (ch !== ',') this.fail('Expected "," or "}"');
    }
  }

  private readArray(): unknown[] {
    this.expect('[');
    const result: unknown[] = [];
    this.skipWs();
    if (this.src[this.pos] === ']') {
      this.pos++;
      return result;
    }
    for (;;) {
      result.push(this.readValue());
      this.skipWs();
      const ch = this.src[this.pos];
      this.pos++;
      if (ch === ']') return result;
      if (ch !== ',') this.fail('Expected "," or "]"');
    }
  }

  private readKey(): string {
    this.skipWs();
    if (this.src.startsWith(ESCAPE, this.pos)) return this.readEscaped();
    if (this.src[this.pos] === '"') return this.readJsonString();
    const end = this.src.indexOf(':', this.pos);
    if (end === -1) this.fail('Expected a key');
    const key = this.src.slice(this.pos, end).trim();
    if (!key) this.fail('Empty key');
    this.pos = end;
    return key;
  }

  private readEscaped(): string {
    const start = this.pos + ESCAPE.length;
    const end = this.src.indexOf(ESCAPE, start);
    if (end === -1) this.fail('Unterminated <escape> string');
    this.pos = end + ESCAPE.length;
    return this.src.slice(start, end);
  }

  private readValue(): unknown {
    this.skipWs();
    if (this.src.startsWith(ESCAPE, this.pos)) return this.readEscaped();
    const ch = this.src[this.pos];
    if (ch === '{') return this.readObject();
    if (ch === '[') return this.readArray();
    if (ch === '"') return this.readJsonString();
    return this.readBare();
  }

  private readJsonString(): string {
    let i = this.pos + 1;
    while (i < this.src.length && this.src[i] !== '"') {
      if (this.src[i] === '\\') i++;
      i++;
    }
    if (i >= this.src.length) this.fail('Unterminated string');
    const raw = this.src.slice(this.pos, i + 1);
    this.pos = i + 1;
    const value: unknown = JSON.parse(raw);
    return typeof value === 'string' ? value : raw;
  }

  private readBare(): unknown {
    const start = this.pos;
    while (this.pos < this.src.length && !',}]'.includes(this.src[this.pos] ?? '')) this.pos++;
    const token = this.src.slice(start, this.pos).trim();
    if (!token) this.fail('Expected a value');
    if (token === 'true') return true;
    if (token === 'false') return false;
    if (token === 'null') return null;
    if (/^-?\d+(\.\d+)?([eE][-+]?\d+)?$/.test(token)) return Number(token);
    return token;
  }
}

/** Parse a FunctionGemma argument body (including its braces). */
export function parseGemmaArgs(body: string): Record<string, unknown> {
  return new GemmaArgsReader(body).readAll();
}

function readGemmaCall(body: string): ParsedItem {
  const trimmed = body.trim();
  if (!trimmed.startsWith('call:')) {
    return new ParseError('Function call must start with "call:"', generateCallId(), body);
  }
  const braceAt = trimmed.indexOf('{');
  if (braceAt === -1) {
    return new ParseError('Missing argument object', generateCallId(), body);
  }
  const name = trimmed.slice('call:'.length, braceAt).trim();
  if (!name) {
    return new ParseError('Missing tool name', generateCallId(), body);
  }
  try {
    return makeCall(name, parseGemmaArgs(trimmed.slice(braceAt)));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return new ParseError(`Invalid arguments: ${message}`, generateCallId(), body, name);
  }
}

/** Structured calls, or `<start_function_call>call:name{…}<end_function_call>` blocks. */
export function parseFunctionGemmaNative(response: ModelResponse): ParsedResponse {
  return structuredOr(response, (text) =>
    scanBlocks(text, '<start_function_call>', '<end_function_call>', readGemmaCall),
  );
}
