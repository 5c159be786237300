export interface VariableSource {
  get(name: string): unknown;
}

/** Names are letters, digits, `_`, `.` and `-` in any script. */
const PLACEHOLDER = /\{\{\s*([\p{L}\p{N}\p{M}_.-]+)\s*\}\}/gu;

export function stringifyVariable(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.map((item) => stringifyVariable(item)).join('\n');
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/**
 * Replace every `{{name}}` with the variable's value. Single pass: text that
 * comes out of a substitution is never scanned again.
 */
export function resolveTemplate(template: string, vars: VariableSource): string {
  return template.replace(PLACEHOLDER, (_, key: string) => stringifyVariable(vars.get(key)));
}

export function resolveValue(value: unknown, vars: VariableSource): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === 'string') {
    return resolveTemplate(value, vars);
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveValue(item, vars));
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      result[resolveTemplate(k, vars)] = resolveValue(v, vars);
    }
    return result;
  }
  return value;
}

/** True when some string inside `value` contains `{{` and mentions `name`. */
export function mentionsVariable(value: unknown, name: string): boolean {
  if (typeof value === 'string') {
    const lowered = value.toLowerCase();
    return lowered.includes('{{') && lowered.includes(name.toLowerCase());
  }
  if (Array.isArray(value)) {
    return value.some((item) => mentionsVariable(item, name));
  }
  if (isPlainObject(value)) {
    return Object.values(value).some((item) => mentionsVariable(item, name));
  }
  return false;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
