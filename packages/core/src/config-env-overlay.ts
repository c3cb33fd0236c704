import { isRecord } from './utils.js';

const PREFIX = 'GRAMLOOP_';
const SEPARATOR = '__';

/**
 * Coerce a string value to a number, boolean, or leave as string.
 */
function coerce(value: string): string | number | boolean | null {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value === 'null') return null;

  if (/^-?\d+(\.\d+)?$/.test(value)) {
    const num = Number(value);
    if (Number.isFinite(num)) return num;
  }

  return value;
}

/**
 * Apply environment variable overrides to a config object.
 *
 * Variables must be prefixed with `GRAMLOOP_`. Nesting is expressed
 * with double-underscore (`__`). Segments match existing keys
 * case-insensitively, so camelCase keys can be overridden from
 * upper-case variable names. Segments with no existing key are matched
 * against `knownKeys` before falling back to the lower-cased segment.
 * Values are coerced to numbers/booleans where possible.
 *
 * Example: `GRAMLOOP_KERNEL__MAXTURNS=5`
 *   → `config.kernel.maxTurns = 5`
 *
 * @param config The config object to mutate in-place.
 * @param env    Optional env map (defaults to `process.env`).
 * @param knownKeys Canonical key names used to restore camelCase.
 * @returns The mutated config (same reference).
 */
export function applyEnvOverrides<T extends Record<string, unknown>>(
  config: T,
  env: Record<string, string | undefined> = process.env,
  knownKeys: Iterable<string> = [],
): T {
  const canonical = new Map<string, string>();
  for (const key of knownKeys) canonical.set(key.toLowerCase(), key);

  for (const [key, rawValue] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || rawValue === undefined) continue;

    const path = key
      .slice(PREFIX.length)
      .toLowerCase()
      .split(SEPARATOR);

    if (path.length === 0 || path[0] === '') continue;

    setNested(config, path, coerce(rawValue), canonical);
  }

  return config;
}

/** Find the existing key matching `segment` ignoring case, or a known one. */
function matchKey(
  obj: Record<string, unknown>,
  segment: string,
  canonical: ReadonlyMap<string, string>,
): string {
  return (
    Object.keys(obj).find((k) => k.toLowerCase() === segment) ?? canonical.get(segment) ?? segment
  );
}

function setNested(
  obj: Record<string, unknown>,
  path: string[],
  value: unknown,
  canonical: ReadonlyMap<string, string>,
): void {
  let current: Record<string, unknown> = obj;

  for (const segment of path.slice(0, -1)) {
    const key = matchKey(current, segment, canonical);
    const next = current[key];

    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  const last = path[path.length - 1];
  if (last !== undefined) current[matchKey(current, last, canonical)] = value;
}
