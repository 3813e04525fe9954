/**
 * Tokenizer Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { tokenize, type Token } from './Tokenizer.js';

function tokens(source: string, start = 0): Token[] {
  const result = tokenize(source, start);
  if (!result.ok) throw new Error(result.error.message);
  return result.value;
}

describe('tokenize', () => {
  it('should tokenize a function call over a range', () => {
    expect(tokens('=SUM(A1:B2)', 1)).toEqual([
      { type: 'identifier', name: 'SUM', position: 1 },
      { type: 'lparen', position: 4 },
      { type: 'cell', name: 'A1', address: { row: 0, col: 0 }, position: 5 },
      { type: 'colon', position: 7 },
      { type: 'cell', name: 'B2', address: { row: 1, col: 1 }, position: 8 },
      { type: 'rparen', position: 10 },
      { type: 'eof', position: 11 },
    ]);
  });

  it('should upper-case identifiers and references', () => {
    const [fn, , cell] = tokens('len(b3)');
    expect(fn).toEqual({ type: 'identifier', name: 'LEN', position: 0 });
    expect(cell).toEqual({ type: 'cell', name: 'B3', address: { row: 2, col: 1 }, position: 4 });
  });

  it('should read integers and decimals', () => {
    expect(tokens('12 3.25').slice(0, 2)).toEqual([
      { type: 'number', value: 12, position: 0 },
      { type: 'number', value: 3.25, position: 3 },
    ]);
  });

  it('should reject a decimal point without digits', () => {
    expect(tokenize('1.+2')).toEqual({
      ok: false,
      error: { type: 'parse', position: 2, message: 'Expected digit after decimal point' },
    });
  });

  it('should unescape doubled quotes in strings', () => {
    expect(tokens('"Quote""Test"')[0]).toEqual({ type: 'string', value: 'Quote"Test', position: 0 });
  });

  it('should report unterminated strings at the opening quote', () => {
    expect(tokenize('1&"abc')).toEqual({
      ok: false,
      error: { type: 'parse', position: 2, message: 'Unterminated string literal' },
    });
  });

  it('should treat ^ and ** as the same operator', () => {
    const ops = [...tokens('2^3'), ...tokens('2**3')]
      .filter((t) => t.type === 'operator')
      .map((t) => (t.type === 'operator' ? t.op : null));
    expect(ops).toEqual(['**', '**']);
  });

  it('should read two-character comparison operators', () => {
    const ops = tokens('1<=2<>3>=4<5>6=7')
      .flatMap((t) => (t.type === 'operator' ? [t.op] : []));
    expect(ops).toEqual(['<=', '<>', '>=', '<', '>', '=']);
  });

  it('should keep out-of-range looking references with a null address', () => {
    expect(tokens('A0')[0]).toEqual({ type: 'cell', name: 'A0', address: null, position: 0 });
  });

  it('should reject unexpected characters', () => {
    expect(tokenize('=A1$', 1)).toEqual({
      ok: false,
      error: { type: 'parse', position: 3, message: "Unexpected character '$'" },
    });
  });
});
