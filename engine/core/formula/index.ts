/**
 * GridCalc Engine - Formula Module Exports
 */

// Values & errors
export {
  ERROR_SENTINEL,
  EMPTY_TEXT,
  ERROR_VALUE,
  numberValue,
  textValue,
  parseNumber,
  toNumber,
  formatNumber,
  toText,
  isTruthy,
  valuesEqual,
  compareValues,
  concatValues,
  booleanValue,
  literalValue,
  sameValue,
} from './Value.js';
export type { CellValue } from './Value.js';

export { ok, evaluationError, parseError } from './errors.js';
export type {
  ParseError,
  CircularReferenceError,
  InvalidReferenceError,
  EvaluationErrorCode,
  EvaluationError,
  EditError,
  ErrorKind,
  Result,
} from './errors.js';

// Parsing
export { tokenize, describeToken } from './Tokenizer.js';
export type { Token, OperatorSymbol } from './Tokenizer.js';
export { parseFormula, isFormulaText } from './Parser.js';
export type { ParseResult, ParseOptions } from './Parser.js';
export {
  expandRange,
  findReferenceOutside,
  extractReferences,
  astDepth,
  formatFormula,
  shiftReferences,
} from './ast.js';
export type { FormulaAst, BinaryOperator, UnaryOperator } from './ast.js';

// Functions & evaluation
export { FunctionRegistry } from './FunctionRegistry.js';
export type {
  FunctionDefinition,
  EagerFunctionDefinition,
  LazyFunctionDefinition,
  FunctionCategory,
  FunctionResult,
  LazyArgument,
} from './FunctionRegistry.js';
export { builtinFunctions, createFunctionRegistry, roundHalfAwayFromZero } from './BuiltinFunctions.js';
export type { BuiltinFunctionOptions } from './BuiltinFunctions.js';
export { ProcessHttpClient, isHttpUrl } from './HttpClient.js';
export type { HttpClient, ProcessHttpClientOptions, SpawnSyncFn } from './HttpClient.js';
export { Evaluator, applyBinary } from './Evaluator.js';
export type { CellResolver, EvaluatorOptions } from './Evaluator.js';

// Dependencies & recalculation
export { DependencyGraph } from './DependencyGraph.js';
export type { CalculationOrder, DependencyGraphStats } from './DependencyGraph.js';
export { FormulaEngine } from './FormulaEngine.js';
export type {
  CalculationResult,
  CellCalculationError,
  CommitResult,
  RebuildResult,
} from './FormulaEngine.js';
