const ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '"': '\\"',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

const UNESCAPES: Record<string, string> = {
  '\\': '\\',
  '"': '"',
  n: '\n',
  r: '\r',
  t: '\t',
};

/** Escape a value for use inside a double-quoted grammar literal. */
export function escapeGrammarLiteral(value: string): string {
  return value.replace(/[\\"\n\r\t]/g, (ch) => ESCAPES[ch] ?? ch);
}

/** Inverse of {@link escapeGrammarLiteral}. */
export function unescapeGrammarLiteral(literal: string): string {
  return literal.replace(/\\([\\"nrt])/g, (_, ch: string) => UNESCAPES[ch] ?? ch);
}

/** Render a double-quoted grammar literal. */
export function quoteGrammarLiteral(value: string): string {
  return `"${escapeGrammarLiteral(value)}"`;
}
