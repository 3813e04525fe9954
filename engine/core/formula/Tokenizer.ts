/**
 * GridCalc Engine - Formula Tokenizer
 */

import { parseAddress, type Address } from '../types/index.js';
import { parseError, type ParseError, type Result } from './errors.js';

export type OperatorSymbol =
  | '+' | '-' | '*' | '/' | '**' | '%' | '&'
  | '<' | '>' | '<=' | '>=' | '=' | '<>';

export type Token =
  | { type: 'number'; value: number; position: number }
  | { type: 'string'; value: string; position: number }
  | { type: 'identifier'; name: string; position: number }
  | { type: 'cell'; name: string; address: Address | null; position: number }
  | { type: 'operator'; op: OperatorSymbol; position: number }
  | { type: 'lparen'; position: number }
  | { type: 'rparen'; position: number }
  | { type: 'comma'; position: number }
  | { type: 'colon'; position: number }
  | { type: 'eof'; position: number };

const isDigit = (ch: string | undefined): boolean => ch !== undefined && ch >= '0' && ch <= '9';
const isAlpha = (ch: string | undefined): boolean => ch !== undefined && /[A-Za-z]/.test(ch);
const isIdentifierChar = (ch: string | undefined): boolean =>
  ch !== undefined && /[A-Za-z0-9_]/.test(ch);

const CELL_PATTERN = /^[A-Z]+[0-9]+$/;

/**
 * Split formula text into tokens, starting at `start` (1 skips a leading "=").
 * Positions are offsets into `source`.
 */
export function tokenize(source: string, start = 0): Result<Token[], ParseError> {
  const tokens: Token[] = [];
  let i = start;

  while (i < source.length) {
    const ch = source[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (isDigit(ch)) {
      let j = i;
      while (isDigit(source[j])) j++;
      if (source[j] === '.') {
        j++;
        if (!isDigit(source[j])) {
          return { ok: false, error: parseError(j, 'Expected digit after decimal point') };
        }
        while (isDigit(source[j])) j++;
      }
      tokens.push({ type: 'number', value: Number(source.slice(i, j)), position: i });
      i = j;
      continue;
    }

    if (ch === '"') {
      let j = i + 1;
      let text = '';
      let closed = false;
      while (j < source.length) {
        if (source[j] === '"') {
          if (source[j + 1] === '"') {
            text += '"';
            j += 2;
            continue;
          }
          closed = true;
          j++;
          break;
        }
        text += source[j];
        j++;
      }
      if (!closed) {
        return { ok: false, error: parseError(i, 'Unterminated string literal') };
      }
      tokens.push({ type: 'string', value: text, position: i });
      i = j;
      continue;
    }

    if (isAlpha(ch)) {
      let j = i + 1;
      while (isIdentifierChar(source[j])) j++;
      const name = source.slice(i, j).toUpperCase();
      if (CELL_PATTERN.test(name)) {
        tokens.push({ type: 'cell', name, address: parseAddress(name), position: i });
      } else {
        tokens.push({ type: 'identifier', name, position: i });
      }
      i = j;
      continue;
    }

    const next = source[i + 1];
    switch (ch) {
      case '*':
        if (next === '*') {
          tokens.push({ type: 'operator', op: '**', position: i });
          i += 2;
        } else {
          tokens.push({ type: 'operator', op: '*', position: i });
          i++;
        }
        continue;
      case '^':
        tokens.push({ type: 'operator', op: '**', position: i });
        i++;
        continue;
      case '<':
        if (next === '=' || next === '>') {
          tokens.push({ type: 'operator', op: next === '=' ? '<=' : '<>', position: i });
          i += 2;
        } else {
          tokens.push({ type: 'operator', op: '<', position: i });
          i++;
        }
        continue;
      case '>':
        if (next === '=') {
          tokens.push({ type: 'operator', op: '>=', position: i });
          i += 2;
        } else {
          tokens.push({ type: 'operator', op: '>', position: i });
          i++;
        }
        continue;
      case '+':
      case '-':
      case '/':
      case '%':
      case '&':
      case '=':
        tokens.push({ type: 'operator', op: ch, position: i });
        i++;
        continue;
      case '(':
        tokens.push({ type: 'lparen', position: i });
        i++;
        continue;
      case ')':
        tokens.push({ type: 'rparen', position: i });
        i++;
        continue;
      case ',':
        tokens.push({ type: 'comma', position: i });
        i++;
        continue;
      case ':':
        tokens.push({ type: 'colon', position: i });
        i++;
        continue;
      default:
        return { ok: false, error: parseError(i, `Unexpected character '${ch}'`) };
    }
  }

  tokens.push({ type: 'eof', position: source.length });
  return { ok: true, value: tokens };
}

export function describeToken(token: Token): string {
  switch (token.type) {
    case 'number':
      return `number ${token.value}`;
    case 'string':
      return 'string literal';
    case 'identifier':
    case 'cell':
      return `'${token.name}'`;
    case 'operator':
      return `'${token.op}'`;
    case 'lparen':
      return "'('";
    case 'rparen':
      return "')'";
    case 'comma':
      return "','";
    case 'colon':
      return "':'";
    case 'eof':
      return 'end of formula';
  }
}
