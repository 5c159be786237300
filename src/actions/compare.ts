export type CompareOperator =
  | 'equals'
  | 'not_equals'
  | 'contains'
  | 'not_contains'
  | 'startswith'
  | 'endswith'
  | 'regex'
  | 'is_empty'
  | 'not_empty'
  | 'gt'
  | 'gte'
  | 'lt'
  | 'lte';

const OPERATOR_ALIASES: Record<string, CompareOperator> = {
  equals: 'equals',
  eq: 'equals',
  '==': 'equals',
  not_equals: 'not_equals',
  ne: 'not_equals',
  '!=': 'not_equals',
  contains: 'contains',
  not_contains: 'not_contains',
  startswith: 'startswith',
  endswith: 'endswith',
  regex: 'regex',
  re: 'regex',
  match: 'regex',
  is_empty: 'is_empty',
  empty: 'is_empty',
  not_empty: 'not_empty',
  has_value: 'not_empty',
  gt: 'gt',
  '>': 'gt',
  gte: 'gte',
  '>=': 'gte',
  lt: 'lt',
  '<': 'lt',
  lte: 'lte',
  '<=': 'lte',
};

export function resolveOperator(raw: string): CompareOperator | null {
  return OPERATOR_ALIASES[raw.trim().toLowerCase()] ?? null;
}

const NUMBER = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?$/i;
const SPECIAL_NUMBER = /^([+-]?)(inf|infinity|nan)$/i;

/** Parse a decimal number; throws for anything else. */
export function parseNumber(raw: string): number {
  const text = raw.trim();
  if (NUMBER.test(text)) return Number(text);
  const special = SPECIAL_NUMBER.exec(text);
  if (special) {
    if (special[2].toLowerCase() === 'nan') return Number.NaN;
    return special[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  throw new Error(`"${raw}" is not a number`);
}

/**
 * Evaluate `left <op> right`. Numeric operators throw when either side is
 * not a number; `regex` throws for an invalid expression.
 */
export function evaluateComparison(op: CompareOperator, left: string, right: string, caseSensitive: boolean): boolean {
  const a = caseSensitive ? left : left.toLowerCase();
  const b = caseSensitive ? right : right.toLowerCase();

  switch (op) {
    case 'is_empty':
      return left.trim() === '';
    case 'not_empty':
      return left.trim() !== '';
    case 'equals':
      return a === b;
    case 'not_equals':
      return a !== b;
    case 'contains':
      return a.includes(b);
    case 'not_contains':
      return !a.includes(b);
    case 'startswith':
      return a.startsWith(b);
    case 'endswith':
      return a.endsWith(b);
    case 'regex':
      return new RegExp(right, caseSensitive ? '' : 'i').test(left);
    case 'gt':
      return parseNumber(left) > parseNumber(right);
    case 'gte':
      return parseNumber(left) >= parseNumber(right);
    case 'lt':
      return parseNumber(left) < parseNumber(right);
    case 'lte':
      return parseNumber(left) <= parseNumber(right);
  }
}
