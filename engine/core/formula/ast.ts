/**
 * GridCalc Engine - Formula AST
 *
 * Node shapes produced by the parser plus the utilities that walk them:
 * reference extraction, canonical printing and relative reference shifting.
 */

import {
  Address,
  CellRange,
  addressKey,
  compareAddresses,
  formatAddress,
  normalizeRange,
  rangeAddresses,
} from '../types/index.js';
import { formatNumber } from './Value.js';

export type UnaryOperator = '+' | '-';

export type BinaryOperator =
  | '+' | '-' | '*' | '/' | '**' | '%' | '&'
  | '<' | '>' | '<=' | '>=' | '=' | '<>';

export type FormulaAst =
  | { type: 'number'; value: number; position: number }
  | { type: 'string'; value: string; position: number }
  | { type: 'cell'; address: Address; position: number }
  | { type: 'range'; start: Address; end: Address; position: number }
  | { type: 'unary'; op: UnaryOperator; operand: FormulaAst; position: number }
  | { type: 'binary'; op: BinaryOperator; left: FormulaAst; right: FormulaAst; position: number }
  | { type: 'call'; name: string; args: FormulaAst[]; position: number };

// ============================================================================
// References
// ============================================================================

/**
 * Rectangle covered by a range node; corners may be in any orientation.
 */
export function expandRange(start: Address, end: Address): Address[] {
  return rangeAddresses(normalizeRange(start, end));
}

/**
 * First address, row-major, that a formula reads outside a `rows` x `cols`
 * grid, or null. Ranges are judged by their corners and never expanded.
 */
export function findReferenceOutside(ast: FormulaAst, rows: number, cols: number): Address | null {
  switch (ast.type) {
    case 'number':
    case 'string':
      return null;
    case 'cell':
      return ast.address.row >= rows || ast.address.col >= cols ? ast.address : null;
    case 'range':
      return firstOutside(normalizeRange(ast.start, ast.end), rows, cols);
    case 'unary':
      return findReferenceOutside(ast.operand, rows, cols);
    case 'binary':
      return earliest(
        findReferenceOutside(ast.left, rows, cols),
        findReferenceOutside(ast.right, rows, cols)
      );
    case 'call':
      return ast.args.reduce<Address | null>(
        (first, arg) => earliest(first, findReferenceOutside(arg, rows, cols)),
        null
      );
  }
}

function earliest(a: Address | null, b: Address | null): Address | null {
  if (!a) return b;
  if (!b) return a;
  return compareAddresses(a, b) <= 0 ? a : b;
}

function firstOutside(range: CellRange, rows: number, cols: number): Address | null {
  if (range.startRow >= rows || range.startCol >= cols) {
    return { row: range.startRow, col: range.startCol };
  }
  if (range.endCol >= cols) return { row: range.startRow, col: cols };
  if (range.endRow >= rows) return { row: rows, col: range.startCol };
  return null;
}

/**
 * Every address a formula reads: cell refs plus range members,
 * de-duplicated and sorted row-major.
 */
export function extractReferences(ast: FormulaAst): Address[] {
  const seen = new Map<string, Address>();

  const visit = (node: FormulaAst): void => {
    switch (node.type) {
      case 'number':
      case 'string':
        return;
      case 'cell':
        seen.set(addressKey(node.address), node.address);
        return;
      case 'range':
        for (const address of expandRange(node.start, node.end)) {
          seen.set(addressKey(address), address);
        }
        return;
      case 'unary':
        visit(node.operand);
        return;
      case 'binary':
        visit(node.left);
        visit(node.right);
        return;
      case 'call':
        node.args.forEach(visit);
        return;
    }
  };

  visit(ast);
  return [...seen.values()].sort(compareAddresses);
}

/**
 * Greatest nesting depth of the tree (a lone literal is 1).
 */
export function astDepth(ast: FormulaAst): number {
  switch (ast.type) {
    case 'unary':
      return 1 + astDepth(ast.operand);
    case 'binary':
      return 1 + Math.max(astDepth(ast.left), astDepth(ast.right));
    case 'call':
      return 1 + ast.args.reduce((max, arg) => Math.max(max, astDepth(arg)), 0);
    default:
      return 1;
  }
}

// ============================================================================
// Printing
// ============================================================================

const PRECEDENCE: Record<BinaryOperator, number> = {
  '=': 1,
  '<>': 1,
  '<': 2,
  '>': 2,
  '<=': 2,
  '>=': 2,
  '+': 3,
  '-': 3,
  '&': 4,
  '*': 5,
  '/': 5,
  '%': 5,
  '**': 6,
};

const UNARY_PRECEDENCE = 7;

function nodePrecedence(node: FormulaAst): number {
  switch (node.type) {
    case 'binary':
      return PRECEDENCE[node.op];
    case 'unary':
      return UNARY_PRECEDENCE;
    default:
      return 8;
  }
}

function quoteString(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

function printNode(node: FormulaAst): string {
  switch (node.type) {
    case 'number':
      return formatNumber(node.value);
    case 'string':
      return quoteString(node.value);
    case 'cell':
      return formatAddress(node.address);
    case 'range':
      return `${formatAddress(node.start)}:${formatAddress(node.end)}`;
    case 'unary': {
      const operand = printNode(node.operand);
      return nodePrecedence(node.operand) < UNARY_PRECEDENCE
        ? `${node.op}(${operand})`
        : `${node.op}${operand}`;
    }
    case 'binary': {
      const own = PRECEDENCE[node.op];
      // Power groups to the right, everything else to the left
      const rightAssoc = node.op === '**';
      const leftNeedsParens = rightAssoc
        ? nodePrecedence(node.left) <= own
        : nodePrecedence(node.left) < own;
      const rightNeedsParens = rightAssoc
        ? nodePrecedence(node.right) < own
        : nodePrecedence(node.right) <= own;
      const left = leftNeedsParens ? `(${printNode(node.left)})` : printNode(node.left);
      const right = rightNeedsParens ? `(${printNode(node.right)})` : printNode(node.right);
      return `${left}${node.op}${right}`;
    }
    case 'call':
      return `${node.name}(${node.args.map(printNode).join(',')})`;
  }
}

/**
 * Canonical formula text, including the leading "=".
 */
export function formatFormula(ast: FormulaAst): string {
  return `=${printNode(ast)}`;
}

// ============================================================================
// Shifting
// ============================================================================

function shiftAddress(address: Address, dRow: number, dCol: number): Address {
  return {
    row: Math.max(0, address.row + dRow),
    col: Math.max(0, address.col + dCol),
  };
}

/**
 * Move every reference by (dRow, dCol), clamping at row/column 0.
 * Returns a new tree; the input is untouched.
 */
export function shiftReferences(ast: FormulaAst, dRow: number, dCol: number): FormulaAst {
  switch (ast.type) {
    case 'number':
    case 'string':
      return ast;
    case 'cell':
      return { ...ast, address: shiftAddress(ast.address, dRow, dCol) };
    case 'range':
      return {
        ...ast,
        start: shiftAddress(ast.start, dRow, dCol),
        end: shiftAddress(ast.end, dRow, dCol),
      };
    case 'unary':
      return { ...ast, operand: shiftReferences(ast.operand, dRow, dCol) };
    case 'binary':
      return {
        ...ast,
        left: shiftReferences(ast.left, dRow, dCol),
        right: shiftReferences(ast.right, dRow, dCol),
      };
    case 'call':
      return { ...ast, args: ast.args.map((arg) => shiftReferences(arg, dRow, dCol)) };
  }
}
