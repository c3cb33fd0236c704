const CLOSERS: Record<string, string> = { '{': '}', '[': ']' };

/**
 * Find the end of the JSON object or array starting at `start`.
 * Brackets inside strings are ignored. Returns the index just past the
 * closing bracket, or -1 if `start` does not open a balanced value.
 */
export function scanJsonValue(text: string, start: number): number {
  const opener = text[start];
  if (opener === undefined || CLOSERS[opener] === undefined) return -1;

  const stack: string[] = [];
  let inString = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '{' || ch === '[') {
      stack.push(CLOSERS[ch] ?? '');
    } else if (ch === '}' || ch === ']') {
      if (stack.pop() !== ch) return -1;
      if (stack.length === 0) return i + 1;
    }
  }
  return -1;
}

/** Index of the first non-whitespace character at or after `from`. */
export function skipWhitespace(text: string, from: number): number {
  let i = from;
  while (i < text.length && /\s/.test(text[i] ?? '')) i++;
  return i;
}

/** Parse JSON, returning undefined instead of throwing. */
export function tryParseJson(raw: string): { value: unknown } | undefined {
  try {
    return { value: JSON.parse(raw) };
  } catch {
    return undefined;
  }
}
