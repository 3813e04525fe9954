/**
 * GridCalc Engine - AST Evaluator
 *
 * Walks a parsed formula against a cell resolver. The resolver returns
 * cached values only, so evaluation never parses or recurses into other
 * cells. Every failure is returned as an EvaluationError.
 */

import {
  Address,
  DEFAULT_MAX_EVALUATION_DEPTH,
  formatAddress,
} from '../types/index.js';
import type { BinaryOperator, FormulaAst } from './ast.js';
import { expandRange } from './ast.js';
import { evaluationError, ok, type EvaluationError, type Result } from './errors.js';
import type { FunctionRegistry, FunctionResult, LazyArgument } from './FunctionRegistry.js';
import {
  CellValue,
  booleanValue,
  compareValues,
  concatValues,
  numberValue,
  toNumber,
  valuesEqual,
} from './Value.js';

/** Returns the cached value of a cell, or null when the address is off the grid */
export type CellResolver = (address: Address) => CellValue | null;

export interface EvaluatorOptions {
  /** Deepest AST nesting evaluated before failing with a depth error */
  maxDepth?: number;
}

export class Evaluator {
  private readonly maxDepth: number;

  constructor(
    private readonly registry: FunctionRegistry,
    options: EvaluatorOptions = {}
  ) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_EVALUATION_DEPTH;
  }

  get functions(): FunctionRegistry {
    return this.registry;
  }

  evaluate(ast: FormulaAst, resolve: CellResolver): Result<CellValue, EvaluationError> {
    return this.evaluateNode(ast, resolve, 1);
  }

  // ===========================================================================
  // Nodes
  // ===========================================================================

  private evaluateNode(node: FormulaAst, resolve: CellResolver, depth: number): FunctionResult {
    if (depth > this.maxDepth) {
      return evaluationError('depth', `Formula nesting exceeds ${this.maxDepth} levels`);
    }

    switch (node.type) {
      case 'number':
        return ok(numberValue(node.value));

      case 'string':
        return ok({ kind: 'text', value: node.value });

      case 'cell':
        return this.resolveCell(node.address, resolve);

      case 'range':
        return evaluationError(
          'type',
          `Range ${formatAddress(node.start)}:${formatAddress(node.end)} cannot be used as a single value`
        );

      case 'unary': {
        const operand = this.evaluateNode(node.operand, resolve, depth + 1);
        if (!operand.ok) return operand;
        const n = toNumber(operand.value);
        return ok(numberValue(node.op === '-' ? -n : n));
      }

      case 'binary': {
        const left = this.evaluateNode(node.left, resolve, depth + 1);
        if (!left.ok) return left;
        const right = this.evaluateNode(node.right, resolve, depth + 1);
        if (!right.ok) return right;
        return applyBinary(node.op, left.value, right.value);
      }

      case 'call':
        return this.evaluateCall(node, resolve, depth);
    }
  }

  private resolveCell(address: Address, resolve: CellResolver): FunctionResult {
    const value = resolve(address);
    if (value === null) {
      return evaluationError('reference', `${formatAddress(address)} is outside the grid`);
    }
    return ok(value);
  }

  private evaluateCall(
    node: Extract<FormulaAst, { type: 'call' }>,
    resolve: CellResolver,
    depth: number
  ): FunctionResult {
    const definition = this.registry.get(node.name);
    if (!definition) {
      return evaluationError('unknownFunction', `Unknown function ${node.name}`);
    }

    if (definition.kind === 'lazy') {
      const arityError = checkArity(definition.name, node.args.length, definition);
      if (arityError) return arityError;
      const thunks: LazyArgument[] = node.args.map(
        (arg) => () => this.evaluateNode(arg, resolve, depth + 1)
      );
      return definition.callLazy(thunks);
    }

    const values: CellValue[] = [];
    for (const arg of node.args) {
      if (arg.type === 'range') {
        for (const address of expandRange(arg.start, arg.end)) {
          const member = this.resolveCell(address, resolve);
          if (!member.ok) return member;
          values.push(member.value);
        }
        continue;
      }
      const value = this.evaluateNode(arg, resolve, depth + 1);
      if (!value.ok) return value;
      values.push(value.value);
    }

    const arityError = checkArity(definition.name, values.length, definition);
    if (arityError) return arityError;
    return definition.call(values);
  }
}

// =============================================================================
// Operators
// =============================================================================

function checkArity(
  name: string,
  count: number,
  limits: { minArgs: number; maxArgs: number }
): FunctionResult | null {
  if (count >= limits.minArgs && count <= limits.maxArgs) return null;

  let expected: string;
  if (limits.minArgs === limits.maxArgs) {
    expected = `exactly ${limits.minArgs}`;
  } else if (limits.maxArgs === Infinity) {
    expected = `at least ${limits.minArgs}`;
  } else {
    expected = `${limits.minArgs} to ${limits.maxArgs}`;
  }
  const singular = limits.maxArgs === 1 || (limits.maxArgs === Infinity && limits.minArgs === 1);
  const noun = singular ? 'argument' : 'arguments';
  return evaluationError('arity', `${name} takes ${expected} ${noun}, got ${count}`);
}

function arithmetic(result: number, op: BinaryOperator): FunctionResult {
  if (!Number.isFinite(result)) {
    return evaluationError('domain', `Result of '${op}' is not a finite number`);
  }
  return ok(numberValue(result));
}

export function applyBinary(op: BinaryOperator, left: CellValue, right: CellValue): FunctionResult {
  switch (op) {
    case '+':
      return arithmetic(toNumber(left) + toNumber(right), op);
    case '-':
      return arithmetic(toNumber(left) - toNumber(right), op);
    case '*':
      return arithmetic(toNumber(left) * toNumber(right), op);
    case '/': {
      const divisor = toNumber(right);
      if (divisor === 0) return evaluationError('divisionByZero', 'Division by zero');
      return arithmetic(toNumber(left) / divisor, op);
    }
    case '%': {
      const divisor = toNumber(right);
      if (divisor === 0) return evaluationError('divisionByZero', 'Modulo by zero');
      return arithmetic(toNumber(left) % divisor, op);
    }
    case '**':
      return arithmetic(toNumber(left) ** toNumber(right), op);
    case '&':
      return ok(concatValues(left, right));
    case '=':
      return ok(booleanValue(valuesEqual(left, right)));
    case '<>':
      return ok(booleanValue(!valuesEqual(left, right)));
    case '<':
      return ok(booleanValue(compareValues(left, right) < 0));
    case '>':
      return ok(booleanValue(compareValues(left, right) > 0));
    case '<=':
      return ok(booleanValue(compareValues(left, right) <= 0));
    case '>=':
      return ok(booleanValue(compareValues(left, right) >= 0));
  }
}
