/**
 * GridCalc Engine - Formula Parser
 *
 * Recursive descent over the token stream. Precedence, lowest first:
 *   equality     = | <>
 *   comparison   < > <= >=
 *   additive     + -
 *   concatenation &
 *   multiplicative * / %
 *   power        ** (right-associative)
 *   unary        + -
 *   primary      number, string, cell, range, ( expr ), NAME(args)
 *
 * Groups, calls, unary signs, power operands and each link of a binary
 * chain count as one nesting level; past `maxDepth` the parse fails.
 */

import { DEFAULT_MAX_EVALUATION_DEPTH, type Address } from '../types/index.js';
import type { BinaryOperator, FormulaAst } from './ast.js';
import { parseError, type ParseError } from './errors.js';
import { describeToken, tokenize, type OperatorSymbol, type Token } from './Tokenizer.js';

export type ParseResult =
  | { ok: true; ast: FormulaAst }
  | { ok: false; error: ParseError };

export interface ParseOptions {
  /** Deepest nesting accepted */
  maxDepth?: number;
}

/** Thrown internally to unwind the descent; never escapes parseFormula */
class ParseFailure extends Error {
  constructor(readonly error: ParseError) {
    super(error.message);
  }
}

const EQUALITY_OPS: readonly OperatorSymbol[] = ['=', '<>'];
const COMPARISON_OPS: readonly OperatorSymbol[] = ['<', '>', '<=', '>='];
const ADDITIVE_OPS: readonly OperatorSymbol[] = ['+', '-'];
const CONCAT_OPS: readonly OperatorSymbol[] = ['&'];
const MULTIPLICATIVE_OPS: readonly OperatorSymbol[] = ['*', '/', '%'];

class Parser {
  private index = 0;
  private depth = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly maxDepth: number
  ) {}

  parse(): FormulaAst {
    const ast = this.parseEquality();
    const trailing = this.peek();
    if (trailing.type !== 'eof') {
      this.fail(trailing, `Unexpected ${describeToken(trailing)}`);
    }
    return ast;
  }

  // ==========================================================================
  // Binary levels
  // ==========================================================================

  private parseEquality(): FormulaAst {
    return this.parseLeftAssociative(EQUALITY_OPS, () => this.parseComparison());
  }

  private parseComparison(): FormulaAst {
    return this.parseLeftAssociative(COMPARISON_OPS, () => this.parseAdditive());
  }

  private parseAdditive(): FormulaAst {
    return this.parseLeftAssociative(ADDITIVE_OPS, () => this.parseConcatenation());
  }

  private parseConcatenation(): FormulaAst {
    return this.parseLeftAssociative(CONCAT_OPS, () => this.parseMultiplicative());
  }

  private parseMultiplicative(): FormulaAst {
    return this.parseLeftAssociative(MULTIPLICATIVE_OPS, () => this.parsePower());
  }

  private parsePower(): FormulaAst {
    const base = this.parseUnary();
    const token = this.peek();
    if (token.type === 'operator' && token.op === '**') {
      this.index++;
      this.enter(token);
      const exponent = this.parsePower();
      this.leave(1);
      return { type: 'binary', op: '**', left: base, right: exponent, position: token.position };
    }
    return base;
  }

  private parseLeftAssociative(
    ops: readonly OperatorSymbol[],
    next: () => FormulaAst
  ): FormulaAst {
    let left = next();
    let links = 0;
    for (;;) {
      const token = this.peek();
      if (token.type !== 'operator' || !ops.includes(token.op)) break;
      this.index++;
      this.enter(token);
      links++;
      const right = next();
      const op: BinaryOperator = token.op;
      left = { type: 'binary', op, left, right, position: token.position };
    }
    this.leave(links);
    return left;
  }

  // ==========================================================================
  // Unary & primary
  // ==========================================================================

  private parseUnary(): FormulaAst {
    const token = this.peek();
    if (token.type === 'operator' && (token.op === '-' || token.op === '+')) {
      this.index++;
      this.enter(token);
      const operand = this.parseUnary();
      this.leave(1);
      return { type: 'unary', op: token.op, operand, position: token.position };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): FormulaAst {
    const token = this.advance();

    switch (token.type) {
      case 'number':
        return { type: 'number', value: token.value, position: token.position };

      case 'string':
        return { type: 'string', value: token.value, position: token.position };

      case 'lparen': {
        this.enter(token);
        const inner = this.parseEquality();
        this.expect('rparen', "Expected ')'");
        this.leave(1);
        return inner;
      }

      case 'identifier':
        if (this.peek().type === 'lparen') {
          return this.parseCall(token);
        }
        return this.fail(token, `Unknown identifier '${token.name}'`);

      case 'cell': {
        if (this.peek().type === 'lparen') {
          return this.parseCall(token);
        }
        const start = this.requireAddress(token);
        if (this.peek().type !== 'colon') {
          return { type: 'cell', address: start, position: token.position };
        }
        this.index++;
        const endToken = this.advance();
        if (endToken.type !== 'cell') {
          return this.fail(endToken, 'Expected cell reference after \':\'');
        }
        const end = this.requireAddress(endToken);
        return { type: 'range', start, end, position: token.position };
      }

      default:
        return this.fail(token, `Unexpected ${describeToken(token)}`);
    }
  }

  private parseCall(nameToken: Extract<Token, { type: 'identifier' | 'cell' }>): FormulaAst {
    const { name, position } = nameToken;
    this.expect('lparen', "Expected '('");
    this.enter(nameToken);
    const args: FormulaAst[] = [];

    if (this.peek().type === 'rparen') {
      this.index++;
      this.leave(1);
      return { type: 'call', name, args, position };
    }

    for (;;) {
      args.push(this.parseEquality());
      const token = this.advance();
      if (token.type === 'rparen') break;
      if (token.type !== 'comma') {
        this.fail(token, `Expected ',' or ')' in call to ${name}`);
      }
    }

    this.leave(1);
    return { type: 'call', name, args, position };
  }

  // ==========================================================================
  // Nesting
  // ==========================================================================

  private enter(token: Token): void {
    this.depth++;
    if (this.depth > this.maxDepth) {
      this.fail(token, `Formula nesting exceeds ${this.maxDepth} levels`);
    }
  }

  private leave(levels: number): void {
    this.depth -= levels;
  }

  // ==========================================================================
  // Token helpers
  // ==========================================================================

  private requireAddress(token: Extract<Token, { type: 'cell' }>): Address {
    return token.address ?? this.fail(token, `Invalid cell reference '${token.name}'`);
  }

  private peek(): Token {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== 'eof') this.index++;
    return token;
  }

  private expect(type: Token['type'], message: string): Token {
    const token = this.advance();
    if (token.type !== type) this.fail(token, message);
    return token;
  }

  private fail(token: Token, message: string): never {
    const text = token.type === 'eof' ? 'Unexpected end of formula' : message;
    throw new ParseFailure(parseError(token.position, text));
  }
}

/**
 * Parse formula text, with or without the leading "=".
 * Error positions are offsets into `text` as given.
 */
export function parseFormula(text: string, options: ParseOptions = {}): ParseResult {
  const start = text.startsWith('=') ? 1 : 0;
  const tokens = tokenize(text, start);
  if (!tokens.ok) return { ok: false, error: tokens.error };

  try {
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_EVALUATION_DEPTH;
    return { ok: true, ast: new Parser(tokens.value, maxDepth).parse() };
  } catch (err) {
    if (err instanceof ParseFailure) return { ok: false, error: err.error };
    throw err;
  }
}

export function isFormulaText(raw: string): boolean {
  return raw.startsWith('=');
}
