/**
 * GridCalc Engine - Function Registry
 *
 * Immutable, case-insensitive table of callable functions. A registry is
 * built once and handed to the Evaluator; nothing looks functions up
 * through global state.
 */

import type { CellValue } from './Value.js';
import type { EvaluationError, Result } from './errors.js';

export type FunctionResult = Result<CellValue, EvaluationError>;

/** Deferred argument for lazy functions; evaluates on call */
export type LazyArgument = () => FunctionResult;

export type FunctionCategory =
  | 'aggregate'
  | 'numeric'
  | 'string'
  | 'extraction'
  | 'concatenation'
  | 'logical'
  | 'web';

interface FunctionInfo {
  name: string;
  category: FunctionCategory;
  minArgs: number;
  /** Infinity for variadic functions */
  maxArgs: number;
  syntax: string;
  description: string;
}

/**
 * Receives fully evaluated arguments, with ranges flattened row-major.
 * Arity is checked against the flattened list.
 */
export interface EagerFunctionDefinition extends FunctionInfo {
  kind: 'eager';
  call(args: CellValue[]): FunctionResult;
}

/**
 * Receives one thunk per written argument and decides which to evaluate.
 */
export interface LazyFunctionDefinition extends FunctionInfo {
  kind: 'lazy';
  callLazy(args: LazyArgument[]): FunctionResult;
}

export type FunctionDefinition = EagerFunctionDefinition | LazyFunctionDefinition;

export class FunctionRegistry {
  private readonly functions: ReadonlyMap<string, FunctionDefinition>;

  constructor(definitions: Iterable<FunctionDefinition>) {
    const table = new Map<string, FunctionDefinition>();
    for (const definition of definitions) {
      table.set(definition.name.toUpperCase(), definition);
    }
    this.functions = table;
  }

  get(name: string): FunctionDefinition | undefined {
    return this.functions.get(name.toUpperCase());
  }

  has(name: string): boolean {
    return this.functions.has(name.toUpperCase());
  }

  get size(): number {
    return this.functions.size;
  }

  /**
   * Definitions sorted by name.
   */
  list(): FunctionDefinition[] {
    return [...this.functions.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * New registry with extra or replacing definitions; this one is unchanged.
   */
  extend(definitions: Iterable<FunctionDefinition>): FunctionRegistry {
    return new FunctionRegistry([...this.functions.values(), ...definitions]);
  }
}
