import type { StepDefinition } from '../types/index.js';
import type { VariableSource } from '../scenario/template.js';
import { isPlainObject, resolveTemplate, resolveValue, stringifyVariable } from '../scenario/template.js';

/** Falsy in the scenario-file sense: absent, empty, zero or false. */
export function isBlank(value: unknown): boolean {
  if (value === null || value === undefined || value === false || value === 0 || value === '') return true;
  if (Array.isArray(value)) return value.length === 0;
  if (isPlainObject(value)) return Object.keys(value).length === 0;
  return false;
}

/** First non-blank field among `keys`, in order. */
export function pickField(step: StepDefinition, ...keys: string[]): unknown {
  for (const key of keys) {
    if (!isBlank(step[key])) return step[key];
  }
  return undefined;
}

/** First field among `keys` that is present at all (null and undefined skipped). */
export function pickDefined(step: StepDefinition, ...keys: string[]): unknown {
  for (const key of keys) {
    const value = step[key];
    if (value !== null && value !== undefined) return value;
  }
  return undefined;
}

export function textField(step: StepDefinition, ...keys: string[]): string {
  return stringifyVariable(pickField(step, ...keys));
}

export function templateField(step: StepDefinition, vars: VariableSource, ...keys: string[]): string {
  return resolveTemplate(textField(step, ...keys), vars);
}

export function numberOrNull(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function integerOrNull(value: unknown): number | null {
  const parsed = numberOrNull(value);
  return parsed === null ? null : Math.trunc(parsed);
}

const FALSE_WORDS = new Set(['', 'false', '0', 'no', 'off']);

export function booleanField(value: unknown, fallback: boolean): boolean {
  if (value === null || value === undefined) return fallback;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return !FALSE_WORDS.has(value.trim().toLowerCase());
  return true;
}

export function booleanOrNull(value: unknown): boolean | null {
  return value === null || value === undefined ? null : booleanField(value, false);
}

/**
 * Accept either an object or a JSON string (templated first) that parses to
 * one. Anything else yields null.
 */
export function parseJsonObject(raw: unknown, vars: VariableSource): Record<string, unknown> | null {
  if (isPlainObject(raw)) return raw;
  if (typeof raw !== 'string') return null;
  const rendered = resolveTemplate(raw, vars).trim();
  if (!rendered) return null;
  try {
    const parsed: unknown = JSON.parse(rendered);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/** Template every value and coerce the result to a flat string map. */
export function stringRecord(raw: unknown, vars: VariableSource): Record<string, string> | null {
  const source = parseJsonObject(raw, vars) ?? raw;
  const resolved = resolveValue(source, vars);
  if (!isPlainObject(resolved)) return null;
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(resolved)) {
    result[key] = stringifyVariable(value);
  }
  return result;
}
