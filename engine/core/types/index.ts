/**
 * GridCalc Engine - Core Type Definitions
 *
 * Addresses, ranges, cell records and A1-notation helpers shared by every module.
 */

import type { FormulaAst } from '../formula/ast.js';
import type { EvaluationError } from '../formula/errors.js';
import type { CellValue } from '../formula/Value.js';

// ============================================================================
// Cell Reference Types
// ============================================================================

/** Zero-based cell identity */
export interface Address {
  row: number;
  col: number;
}

export interface CellRange {
  startRow: number;
  startCol: number;
  endRow: number;
  endCol: number;
}

/** Map key for an address: "row_col" */
export type CellKey = string;

export function cellKey(row: number, col: number): CellKey {
  return `${row}_${col}`;
}

export function addressKey(address: Address): CellKey {
  return cellKey(address.row, address.col);
}

export function parseKey(key: CellKey): Address {
  const [row, col] = key.split('_').map(Number);
  return { row, col };
}

/**
 * Row-major ordering: row first, then column.
 */
export function compareAddresses(a: Address, b: Address): number {
  return a.row !== b.row ? a.row - b.row : a.col - b.col;
}

export function compareKeys(a: CellKey, b: CellKey): number {
  return compareAddresses(parseKey(a), parseKey(b));
}

/**
 * Build a range from two corners given in any orientation.
 */
export function normalizeRange(a: Address, b: Address): CellRange {
  return {
    startRow: Math.min(a.row, b.row),
    startCol: Math.min(a.col, b.col),
    endRow: Math.max(a.row, b.row),
    endCol: Math.max(a.col, b.col),
  };
}

/**
 * Addresses of a range in row-major order.
 */
export function rangeAddresses(range: CellRange): Address[] {
  const result: Address[] = [];
  for (let row = range.startRow; row <= range.endRow; row++) {
    for (let col = range.startCol; col <= range.endCol; col++) {
      result.push({ row, col });
    }
  }
  return result;
}

// ============================================================================
// Cell Data
// ============================================================================

/**
 * Stored state of one cell. `rawInput` is null only for cells never written;
 * `formula` is null for literals.
 */
export interface CellData {
  rawInput: string | null;
  formula: FormulaAst | null;
  /** Last computed value; the error sentinel text when `error` is set */
  value: CellValue;
  error: EvaluationError | null;
}

// ============================================================================
// A1 Notation
// ============================================================================

/**
 * Convert a zero-based column index to letters (0 → A, 25 → Z, 26 → AA).
 */
export function columnToLetters(col: number): string {
  let letters = '';
  let c = col + 1;

  while (c > 0) {
    const remainder = (c - 1) % 26;
    letters = String.fromCharCode(65 + remainder) + letters;
    c = Math.floor((c - 1) / 26);
  }

  return letters;
}

/**
 * Convert column letters to a zero-based index. Case-insensitive.
 * Returns null when the input contains anything but A-Z.
 */
export function lettersToColumn(letters: string): number | null {
  if (!/^[A-Z]+$/i.test(letters)) return null;

  const upper = letters.toUpperCase();
  let col = 0;
  for (let i = 0; i < upper.length; i++) {
    col = col * 26 + (upper.charCodeAt(i) - 64);
  }
  return col - 1;
}

export function formatAddress(address: Address): string {
  return columnToLetters(address.col) + (address.row + 1);
}

/**
 * Parse "A1", "b2", "AA123". Row numbers start at 1; "A0" is invalid.
 */
export function parseAddress(ref: string): Address | null {
  const match = /^([A-Z]+)(\d+)$/i.exec(ref);
  if (!match) return null;

  const col = lettersToColumn(match[1]);
  const rowNumber = parseInt(match[2], 10);
  if (col === null || rowNumber < 1) return null;

  return { row: rowNumber - 1, col };
}

export function formatRange(range: CellRange): string {
  const start = formatAddress({ row: range.startRow, col: range.startCol });
  const end = formatAddress({ row: range.endRow, col: range.endCol });
  return start === end ? start : `${start}:${end}`;
}

/**
 * Parse "A1:C3" (or a single "B2") into a normalized range.
 */
export function parseRange(text: string): CellRange | null {
  const parts = text.split(':');
  if (parts.length === 1) {
    const single = parseAddress(parts[0]);
    return single ? normalizeRange(single, single) : null;
  }
  if (parts.length !== 2) return null;

  const start = parseAddress(parts[0]);
  const end = parseAddress(parts[1]);
  if (!start || !end) return null;
  return normalizeRange(start, end);
}

// ============================================================================
// Grid Constants
// ============================================================================

export const DEFAULT_ROWS = 100;
export const DEFAULT_COLS = 26;
export const DEFAULT_COLUMN_WIDTH = 8;
export const DEFAULT_MAX_EVALUATION_DEPTH = 256;
