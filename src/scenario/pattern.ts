export interface CompiledPattern {
  names: string[];
  regex: RegExp;
}

const PATTERN_PLACEHOLDER = /\{\{\s*([^}]+?)\s*\}\}/g;

function escapeLiteral(literal: string): string {
  return literal
    .split(/(\s+)/)
    .filter((chunk) => chunk.length > 0)
    .map((chunk) => (/^\s+$/.test(chunk) ? '\\s*' : chunk.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')))
    .join('');
}

/** `"group:login"` → `"login"`; the prefix only documents where a value came from. */
export function normalizePlaceholderName(name: string): string {
  const parts = name.split(':');
  const cleaned = parts[parts.length - 1].trim();
  return cleaned || name.trim();
}

/**
 * Compile a targets template such as `{{login}};{{password}}` into an anchored
 * regex with one lazy capture group per placeholder. Returns null when the
 * template has no placeholders.
 */
export function compileTargetsPattern(template: string): CompiledPattern | null {
  const names: string[] = [];
  const parts: string[] = [];
  let last = 0;

  for (const match of template.matchAll(PATTERN_PLACEHOLDER)) {
    const start = match.index ?? 0;
    parts.push(escapeLiteral(template.slice(last, start)));
    parts.push('(.*?)');
    names.push(match[1].trim());
    last = start + match[0].length;
  }
  parts.push(escapeLiteral(template.slice(last)));

  if (names.length === 0) return null;
  return { names, regex: new RegExp(`^${parts.join('')}$`) };
}

/**
 * Match `source` (trimmed) against a compiled pattern. Returns the extracted,
 * trimmed values keyed by normalized placeholder name, or null on no match.
 */
export function matchTargets(pattern: CompiledPattern, source: string): Record<string, string> | null {
  const match = pattern.regex.exec(source.trim());
  if (!match) return null;

  const extracted: Record<string, string> = {};
  pattern.names.forEach((name, idx) => {
    const normalized = normalizePlaceholderName(name);
    if (!normalized) return;
    extracted[normalized] = (match[idx + 1] ?? '').trim();
  });
  return extracted;
}
