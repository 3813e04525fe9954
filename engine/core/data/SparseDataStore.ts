/**
 * GridCalc Engine - Sparse Data Store
 *
 * Bounded grid storage that only holds cells that were written.
 * Unwritten cells read as the empty literal.
 *
 * Key features:
 * - O(1) cell access via Map
 * - Row index for ordered iteration
 * - Used range over non-blank cells
 * - Column width overrides
 */

import {
  CellData,
  CellKey,
  CellRange,
  DEFAULT_COLS,
  DEFAULT_COLUMN_WIDTH,
  DEFAULT_ROWS,
  cellKey,
  compareKeys,
  parseKey,
} from '../types/index.js';
import { EMPTY_TEXT, type CellValue } from '../formula/Value.js';

export interface DataStoreConfig {
  rows?: number;
  cols?: number;
  defaultColumnWidth?: number;
}

export interface DataStoreStats {
  cellCount: number;
  /** Cells holding non-empty input */
  nonBlankCount: number;
  formulaCount: number;
  usedRows: number;
  usedCols: number;
}

export interface CellEntry {
  row: number;
  col: number;
  cell: CellData;
}

export function emptyCell(): CellData {
  return { rawInput: null, formula: null, value: EMPTY_TEXT, error: null };
}

export function isBlank(cell: CellData): boolean {
  return cell.rawInput === null || cell.rawInput === '';
}

const EMPTY_RANGE: CellRange = { startRow: 0, startCol: 0, endRow: -1, endCol: -1 };

export class SparseDataStore {
  private _rows: number;
  private _cols: number;
  private _defaultColumnWidth: number;

  /** Main cell storage: Map<"row_col", CellData> */
  private cells: Map<CellKey, CellData> = new Map();

  /** Row index: Map<row, Set<col>> for ordered iteration */
  private rowIndex: Map<number, Set<number>> = new Map();

  /** Custom column widths (only stores non-default) */
  private columnWidths: Map<number, number> = new Map();

  private _usedRange: CellRange = { ...EMPTY_RANGE };

  /** Whether bounds need recalculation */
  private _boundsDirty: boolean = false;

  constructor(config: DataStoreConfig = {}) {
    this._rows = config.rows ?? DEFAULT_ROWS;
    this._cols = config.cols ?? DEFAULT_COLS;
    this._defaultColumnWidth = config.defaultColumnWidth ?? DEFAULT_COLUMN_WIDTH;
  }

  // ===========================================================================
  // Bounds
  // ===========================================================================

  get rows(): number {
    return this._rows;
  }

  get cols(): number {
    return this._cols;
  }

  isInBounds(row: number, col: number): boolean {
    return Number.isInteger(row) && Number.isInteger(col) &&
           row >= 0 && row < this.rows &&
           col >= 0 && col < this.cols;
  }

  getBounds(): CellRange {
    return { startRow: 0, startCol: 0, endRow: this.rows - 1, endCol: this.cols - 1 };
  }

  // ===========================================================================
  // Cell Operations
  // ===========================================================================

  /**
   * Stored cell, or null if never written
   */
  getCell(row: number, col: number): CellData | null {
    return this.cells.get(cellKey(row, col)) ?? null;
  }

  /**
   * Cached value; unwritten cells read as empty text
   */
  getValue(row: number, col: number): CellValue {
    return this.cells.get(cellKey(row, col))?.value ?? EMPTY_TEXT;
  }

  setCell(row: number, col: number, cell: CellData): void {
    this.cells.set(cellKey(row, col), cell);

    let cols = this.rowIndex.get(row);
    if (!cols) {
      cols = new Set();
      this.rowIndex.set(row, cols);
    }
    cols.add(col);

    this._boundsDirty = true;
  }

  /**
   * Update the computed part of a stored cell in place
   */
  setComputed(row: number, col: number, value: CellValue, error: CellData['error']): void {
    const cell = this.cells.get(cellKey(row, col));
    if (!cell) return;
    cell.value = value;
    cell.error = error;
  }

  hasCell(row: number, col: number): boolean {
    return this.cells.has(cellKey(row, col));
  }

  /**
   * All stored cells, row-major
   */
  entries(): CellEntry[] {
    const result: CellEntry[] = [];
    const rows = [...this.rowIndex.keys()].sort((a, b) => a - b);
    for (const row of rows) {
      const cols = [...(this.rowIndex.get(row) ?? [])].sort((a, b) => a - b);
      for (const col of cols) {
        const cell = this.cells.get(cellKey(row, col));
        if (cell) result.push({ row, col, cell });
      }
    }
    return result;
  }

  /**
   * Addresses of stored formula cells, row-major
   */
  formulaKeys(): CellKey[] {
    const keys: CellKey[] = [];
    for (const [key, cell] of this.cells) {
      if (cell.formula) keys.push(key);
    }
    return keys.sort(compareKeys);
  }

  // ===========================================================================
  // Column Widths
  // ===========================================================================

  get defaultColumnWidth(): number {
    return this._defaultColumnWidth;
  }

  getColumnWidth(col: number): number {
    return this.columnWidths.get(col) ?? this._defaultColumnWidth;
  }

  setColumnWidth(col: number, width: number): void {
    if (width === this._defaultColumnWidth) {
      this.columnWidths.delete(col);
    } else {
      this.columnWidths.set(col, width);
    }
  }

  /**
   * Non-default widths by column index
   */
  getColumnWidths(): Map<number, number> {
    return new Map(this.columnWidths);
  }

  // ===========================================================================
  // Used Range
  // ===========================================================================

  /**
   * Smallest range covering every non-blank cell; endRow is -1 when there are none
   */
  getUsedRange(): CellRange {
    if (this._boundsDirty) {
      this.recalculateBounds();
    }
    return { ...this._usedRange };
  }

  private recalculateBounds(): void {
    let minRow = Infinity;
    let maxRow = -1;
    let minCol = Infinity;
    let maxCol = -1;

    for (const [key, cell] of this.cells) {
      if (isBlank(cell)) continue;
      const { row, col } = parseKey(key);
      if (row < minRow) minRow = row;
      if (row > maxRow) maxRow = row;
      if (col < minCol) minCol = col;
      if (col > maxCol) maxCol = col;
    }

    this._usedRange = maxRow < 0
      ? { ...EMPTY_RANGE }
      : { startRow: minRow, startCol: minCol, endRow: maxRow, endCol: maxCol };
    this._boundsDirty = false;
  }

  // ===========================================================================
  // Statistics & Utilities
  // ===========================================================================

  getStats(): DataStoreStats {
    const usedRange = this.getUsedRange();
    let nonBlankCount = 0;
    let formulaCount = 0;
    for (const cell of this.cells.values()) {
      if (!isBlank(cell)) nonBlankCount++;
      if (cell.formula) formulaCount++;
    }

    return {
      cellCount: this.cells.size,
      nonBlankCount,
      formulaCount,
      usedRows: usedRange.endRow >= 0 ? usedRange.endRow - usedRange.startRow + 1 : 0,
      usedCols: usedRange.endCol >= 0 ? usedRange.endCol - usedRange.startCol + 1 : 0,
    };
  }

  /**
   * Remove every cell and width override
   */
  clear(): void {
    this.cells.clear();
    this.rowIndex.clear();
    this.columnWidths.clear();
    this._usedRange = { ...EMPTY_RANGE };
    this._boundsDirty = false;
  }

  /**
   * Clear everything and adopt new dimensions; omitted fields keep their value
   */
  reset(config: DataStoreConfig = {}): void {
    this.clear();
    this._rows = config.rows ?? this._rows;
    this._cols = config.cols ?? this._cols;
    this._defaultColumnWidth = config.defaultColumnWidth ?? this._defaultColumnWidth;
  }

  get cellCount(): number {
    return this.cells.size;
  }
}
