/**
 * Parser Unit Tests
 *
 * Tests precedence and associativity, call and range syntax, and
 * positioned parse errors.
 */

import { describe, it, expect } from 'vitest';
import { isFormulaText, parseFormula } from './Parser.js';
import type { FormulaAst } from './ast.js';

function ast(text: string): FormulaAst {
  const result = parseFormula(text);
  if (!result.ok) throw new Error(result.error.message);
  return result.ast;
}

function errorOf(text: string, maxDepth?: number): { position: number; message: string } {
  const result = parseFormula(text, { maxDepth });
  if (result.ok) throw new Error(`expected ${text} to fail`);
  return { position: result.error.position, message: result.error.message };
}

describe('parseFormula', () => {
  // ===========================================================================
  // Precedence
  // ===========================================================================

  describe('precedence', () => {
    it('should bind multiplication tighter than addition', () => {
      expect(ast('=1+2*3')).toMatchObject({
        type: 'binary',
        op: '+',
        left: { type: 'number', value: 1 },
        right: { type: 'binary', op: '*' },
      });
    });

    it('should group subtraction to the left', () => {
      expect(ast('=1-2-3')).toMatchObject({
        op: '-',
        left: { op: '-', left: { value: 1 }, right: { value: 2 } },
        right: { value: 3 },
      });
    });

    it('should group power to the right', () => {
      expect(ast('=2**3**2')).toMatchObject({
        op: '**',
        left: { value: 2 },
        right: { op: '**', left: { value: 3 }, right: { value: 2 } },
      });
    });

    it('should bind concatenation tighter than addition', () => {
      expect(ast('=1+2&3')).toMatchObject({
        op: '+',
        right: { op: '&', left: { value: 2 }, right: { value: 3 } },
      });
    });

    it('should put equality below comparison', () => {
      expect(ast('=1<2=1')).toMatchObject({
        op: '=',
        left: { op: '<' },
        right: { value: 1 },
      });
    });

    it('should parse unary minus and parentheses', () => {
      expect(ast('=-(A1+1)')).toMatchObject({
        type: 'unary',
        op: '-',
        operand: { type: 'binary', op: '+', left: { type: 'cell', address: { row: 0, col: 0 } } },
      });
    });
  });

  // ===========================================================================
  // Calls & Ranges
  // ===========================================================================

  describe('calls and ranges', () => {
    it('should parse a range argument', () => {
      expect(ast('=SUM(A1:B2)')).toEqual({
        type: 'call',
        name: 'SUM',
        position: 1,
        args: [{ type: 'range', start: { row: 0, col: 0 }, end: { row: 1, col: 1 }, position: 5 }],
      });
    });

    it('should parse calls with no arguments', () => {
      expect(ast('=NOW()')).toEqual({ type: 'call', name: 'NOW', args: [], position: 1 });
    });

    it('should parse nested calls and string arguments', () => {
      expect(ast('=IF(A1>0,"yes",LEN("no"))')).toMatchObject({
        name: 'IF',
        args: [
          { type: 'binary', op: '>' },
          { type: 'string', value: 'yes' },
          { type: 'call', name: 'LEN', args: [{ type: 'string', value: 'no' }] },
        ],
      });
    });

    it('should accept text without the leading "="', () => {
      expect(ast('1+1')).toMatchObject({ type: 'binary', op: '+' });
    });
  });

  // ===========================================================================
  // Errors
  // ===========================================================================

  describe('errors', () => {
    it('should report an unexpected end of formula', () => {
      expect(errorOf('=1+')).toEqual({ position: 3, message: 'Unexpected end of formula' });
      expect(errorOf('=(1')).toEqual({ position: 3, message: 'Unexpected end of formula' });
      expect(errorOf('=')).toEqual({ position: 1, message: 'Unexpected end of formula' });
    });

    it('should reject bare identifiers', () => {
      expect(errorOf('=FOO+1')).toEqual({ position: 1, message: "Unknown identifier 'FOO'" });
    });

    it('should reject trailing tokens', () => {
      expect(errorOf('=1 2')).toEqual({ position: 3, message: 'Unexpected number 2' });
    });

    it('should reject malformed ranges', () => {
      expect(errorOf('=A1:5')).toEqual({ position: 4, message: "Expected cell reference after ':'" });
    });

    it('should reject row zero references', () => {
      expect(errorOf('=A0')).toEqual({ position: 1, message: "Invalid cell reference 'A0'" });
    });

    it('should pass tokenizer errors through', () => {
      expect(errorOf('=SUM(1;2)')).toEqual({ position: 6, message: "Unexpected character ';'" });
    });

    it('should require separators between arguments', () => {
      expect(errorOf('=SUM(1 2)')).toEqual({
        position: 7,
        message: "Expected ',' or ')' in call to SUM",
      });
    });
  });

  // ===========================================================================
  // Nesting
  // ===========================================================================

  describe('nesting limit', () => {
    it('should count groups, signs, calls and chained operators', () => {
      expect(errorOf('=((((1))))', 3)).toEqual({ position: 4, message: 'Formula nesting exceeds 3 levels' });
      expect(errorOf('=---1', 2)).toEqual({ position: 3, message: 'Formula nesting exceeds 2 levels' });
      expect(errorOf('=ABS(ABS(ABS(1)))', 2)).toEqual({
        position: 9,
        message: 'Formula nesting exceeds 2 levels',
      });
      expect(errorOf('=1+2+3+4', 2)).toEqual({ position: 6, message: 'Formula nesting exceeds 2 levels' });
    });

    it('should accept nesting up to the limit', () => {
      expect(ast('=((1))')).toEqual({ type: 'number', value: 1, position: 3 });
      expect(parseFormula('=((1))', { maxDepth: 2 }).ok).toBe(true);
      expect(parseFormula('=' + '('.repeat(256) + '1' + ')'.repeat(256)).ok).toBe(true);
    });

    it('should fail deep input with an error instead of overflowing the stack', () => {
      const parens = '=' + '('.repeat(20000) + '1' + ')'.repeat(20000);
      expect(errorOf(parens)).toEqual({ position: 257, message: 'Formula nesting exceeds 256 levels' });

      const signs = '=' + '-'.repeat(20000) + '1';
      expect(errorOf(signs)).toEqual({ position: 257, message: 'Formula nesting exceeds 256 levels' });

      const chain = '=' + new Array<string>(20000).fill('1').join('+');
      expect(errorOf(chain)).toEqual({ position: 514, message: 'Formula nesting exceeds 256 levels' });
    });
  });
});

describe('isFormulaText', () => {
  it('should detect the leading "="', () => {
    expect(isFormulaText('=A1')).toBe(true);
    expect(isFormulaText(' =A1')).toBe(false);
    expect(isFormulaText('42')).toBe(false);
  });
});
