import { isPlainObject } from './template.js';

const SEGMENT = /^([^[.]+)(?:\[(\d+)\])?$/;

/**
 * Resolve a small JSONPath subset (`$.a.b[0].c`) against a parsed JSON value.
 * Returns undefined when any segment is missing.
 */
export function jsonPathGet(payload: unknown, path: string): unknown {
  if (payload === null || payload === undefined) return undefined;
  let trimmed = path.trim();
  if (!trimmed) return undefined;
  if (trimmed.startsWith('$.')) trimmed = trimmed.slice(2);
  else if (trimmed.startsWith('$')) trimmed = trimmed.slice(1);
  if (!trimmed) return payload;

  let current: unknown = payload;
  for (const raw of trimmed.split('.')) {
    const part = raw.trim();
    if (!part) continue;
    const match = SEGMENT.exec(part);
    if (!match) return undefined;

    if (!isPlainObject(current) || !Object.hasOwn(current, match[1])) return undefined;
    current = current[match[1]];

    if (match[2] !== undefined) {
      if (!Array.isArray(current)) return undefined;
      const idx = Number(match[2]);
      if (idx >= current.length) return undefined;
      current = current[idx];
    }
  }
  return current;
}
