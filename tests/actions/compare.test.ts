import { describe, it, expect } from 'vitest';
import { evaluateComparison, parseNumber, resolveOperator } from '../../src/actions/compare.js';

describe('resolveOperator', () => {
  it('resolves names and symbols', () => {
    expect(resolveOperator('==')).toBe('equals');
    expect(resolveOperator(' GTE ')).toBe('gte');
    expect(resolveOperator('has_value')).toBe('not_empty');
    expect(resolveOperator('approx')).toBeNull();
  });
});

describe('evaluateComparison', () => {
  it('compares text case-insensitively unless asked', () => {
    expect(evaluateComparison('equals', 'Abc', 'aBC', false)).toBe(true);
    expect(evaluateComparison('equals', 'Abc', 'aBC', true)).toBe(false);
    expect(evaluateComparison('contains', 'Hello World', 'WORLD', false)).toBe(true);
    expect(evaluateComparison('not_contains', 'Hello', 'x', false)).toBe(true);
    expect(evaluateComparison('startswith', 'Hello', 'he', false)).toBe(true);
    expect(evaluateComparison('endswith', 'Hello', 'LO', true)).toBe(false);
  });

  it('matches regular expressions', () => {
    expect(evaluateComparison('regex', 'Order 42', '^order \\d+$', false)).toBe(true);
    expect(evaluateComparison('regex', 'Order 42', '^order \\d+$', true)).toBe(false);
    expect(() => evaluateComparison('regex', 'x', '(', false)).toThrow();
  });

  it('checks emptiness on the left value only', () => {
    expect(evaluateComparison('is_empty', '  ', 'ignored', false)).toBe(true);
    expect(evaluateComparison('not_empty', 'a', '', false)).toBe(true);
  });

  it('compares numbers numerically', () => {
    expect(evaluateComparison('gt', '10', '9', false)).toBe(true);
    expect(evaluateComparison('lte', '1e2', '100', false)).toBe(true);
    expect(evaluateComparison('lt', '-inf', '0', false)).toBe(true);
    expect(() => evaluateComparison('gt', 'abc', '1', false)).toThrow('"abc" is not a number');
  });
});

describe('parseNumber', () => {
  it('accepts decimals and special values', () => {
    expect(parseNumber(' .5 ')).toBe(0.5);
    expect(parseNumber('+3')).toBe(3);
    expect(parseNumber('Infinity')).toBe(Number.POSITIVE_INFINITY);
    expect(Number.isNaN(parseNumber('nan'))).toBe(true);
    expect(() => parseNumber('12px')).toThrow('"12px" is not a number');
  });
});
