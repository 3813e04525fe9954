/**
 * GridCalc Engine - Main Spreadsheet Engine
 *
 * The only mutation entry point for a sheet. Ties together:
 * - SparseDataStore for bounded cell storage
 * - FormulaEngine for dependency tracking and recalculation
 * - Evaluator and FunctionRegistry for formula evaluation
 * - FillSeries for auto-fill
 *
 * Every edit is parse → bounds check → graph update → cycle check →
 * recalculation, and either commits completely or changes nothing.
 */

import {
  Address,
  CellData,
  CellKey,
  CellRange,
  DEFAULT_COLS,
  DEFAULT_COLUMN_WIDTH,
  DEFAULT_MAX_EVALUATION_DEPTH,
  DEFAULT_ROWS,
  formatAddress,
} from './types/index.js';
import { SparseDataStore, emptyCell, type DataStoreStats } from './data/SparseDataStore.js';
import {
  FormulaEngine,
  type CalculationResult,
  type CellCalculationError,
  type RebuildResult,
} from './formula/FormulaEngine.js';
import type { DependencyGraphStats } from './formula/DependencyGraph.js';
import { Evaluator } from './formula/Evaluator.js';
import { createFunctionRegistry } from './formula/BuiltinFunctions.js';
import type { FunctionDefinition, FunctionRegistry } from './formula/FunctionRegistry.js';
import { ProcessHttpClient, type HttpClient } from './formula/HttpClient.js';
import { findReferenceOutside, formatFormula, shiftReferences } from './formula/ast.js';
import { isFormulaText, parseFormula } from './formula/Parser.js';
import type { EditError, InvalidReferenceError, ParseError } from './formula/errors.js';
import {
  ERROR_SENTINEL,
  EMPTY_TEXT,
  literalValue,
  toText,
  type CellValue,
} from './formula/Value.js';
import {
  describePattern,
  detectPattern,
  generateSeries,
  type FillDirection,
} from './clipboard/FillSeries.js';
import { createLogger, type Logger } from './logging/logger.js';

export interface SpreadsheetEngineConfig {
  rows?: number;
  cols?: number;
  defaultColumnWidth?: number;
  /** Deepest formula nesting evaluated */
  maxEvaluationDepth?: number;
  /** Function table; defaults to the built-ins wired to `httpClient` */
  functions?: FunctionRegistry;
  /** Transport for GET() */
  httpClient?: HttpClient;
  /** Timeout for the default HTTP client; 0 disables it */
  httpTimeoutMs?: number;
  logger?: Logger;
}

export interface SpreadsheetEngineEvents {
  /** Called for every cell whose stored data or value changed */
  onCellChange?: (address: Address, cell: Readonly<CellData>) => void;
  /** Called after each recalculation pass */
  onCalculationComplete?: (result: CalculationResult) => void;
}

export type EditResult =
  | {
      ok: true;
      /** Cells recalculated, in evaluation order */
      affected: Address[];
      /** Cells left with an evaluation error */
      errors: CellCalculationError[];
    }
  | { ok: false; error: EditError };

/**
 * Everything needed to put a cell back exactly as it was.
 */
export interface CellSnapshot {
  address: Address;
  cell: Readonly<CellData>;
  precedents: CellKey[];
}

/** One persisted cell: raw value text and optional formula text */
export interface CellInput {
  row: number;
  col: number;
  value: string;
  formula?: string | null;
}

export interface SheetContents {
  rows?: number;
  cols?: number;
  defaultColumnWidth?: number;
  columnWidths?: Iterable<[number, number]>;
  cells: Iterable<CellInput>;
}

export interface LoadResult {
  loaded: number;
  skipped: Array<{ address: Address; error: ParseError | InvalidReferenceError }>;
  rebuild: RebuildResult;
  calculation: CalculationResult;
}

export type FillResult =
  | { ok: true; written: Address[]; patterns: string[] }
  | { ok: false; error: EditError; written: Address[] };

export interface EngineStats {
  rows: number;
  cols: number;
  dataStats: DataStoreStats;
  graphStats: DependencyGraphStats;
  functionCount: number;
}

type ResolvedConfig = Required<SpreadsheetEngineConfig>;

export class SpreadsheetEngine {
  private dataStore: SparseDataStore;
  private formulaEngine: FormulaEngine;
  private evaluator: Evaluator;

  // Configuration
  private config: ResolvedConfig;
  private logger: Logger;

  // Event callbacks
  private events: SpreadsheetEngineEvents = {};

  constructor(config: SpreadsheetEngineConfig = {}) {
    const logger = config.logger ?? createLogger();
    const httpTimeoutMs = config.httpTimeoutMs ?? 0;
    const httpClient = config.httpClient ?? new ProcessHttpClient({
      timeoutMs: httpTimeoutMs,
      logger: logger.child({ component: 'http' }),
    });

    // Merge with defaults
    this.config = {
      rows: config.rows ?? DEFAULT_ROWS,
      cols: config.cols ?? DEFAULT_COLS,
      defaultColumnWidth: config.defaultColumnWidth ?? DEFAULT_COLUMN_WIDTH,
      maxEvaluationDepth: config.maxEvaluationDepth ?? DEFAULT_MAX_EVALUATION_DEPTH,
      functions: config.functions ?? createFunctionRegistry({ httpClient }),
      httpClient,
      httpTimeoutMs,
      logger,
    };
    this.logger = logger.child({ component: 'spreadsheet-engine' });

    this.dataStore = new SparseDataStore({
      rows: this.config.rows,
      cols: this.config.cols,
      defaultColumnWidth: this.config.defaultColumnWidth,
    });
    this.evaluator = new Evaluator(this.config.functions, {
      maxDepth: this.config.maxEvaluationDepth,
    });
    this.formulaEngine = new FormulaEngine(
      this.dataStore,
      this.evaluator,
      logger.child({ component: 'formula-engine' })
    );
  }

  /**
   * Set event handlers
   */
  setEventHandlers(events: SpreadsheetEngineEvents): void {
    this.events = { ...this.events, ...events };
  }

  // ===========================================================================
  // Dimensions
  // ===========================================================================

  get rows(): number {
    return this.dataStore.rows;
  }

  get cols(): number {
    return this.dataStore.cols;
  }

  isInBounds(address: Address): boolean {
    return this.dataStore.isInBounds(address.row, address.col);
  }

  private outOfBounds(address: Address): InvalidReferenceError {
    return {
      type: 'reference',
      address,
      message: `${formatAddress(address)} is outside the ${this.rows}x${this.cols} grid`,
    };
  }

  // ===========================================================================
  // Cell Operations
  // ===========================================================================

  /**
   * Replace a cell's raw input. Text starting with "=" is a formula;
   * anything else is a literal, numeric when it parses as a number.
   */
  setCell(address: Address, rawText: string): EditResult {
    const prepared = this.prepareCell(address, rawText);
    if (!prepared.ok) return this.reject(address, prepared.error);

    const committed = this.formulaEngine.commit(address, prepared.cell);
    if (!committed.ok) return this.reject(address, committed.error);

    return this.finish(committed.calculation);
  }

  /**
   * Same as setting the empty literal
   */
  clearCell(address: Address): EditResult {
    return this.setCell(address, '');
  }

  private prepareCell(
    address: Address,
    rawText: string
  ): { ok: true; cell: CellData } | { ok: false; error: EditError } {
    if (!this.isInBounds(address)) {
      return { ok: false, error: this.outOfBounds(address) };
    }

    if (!isFormulaText(rawText)) {
      return {
        ok: true,
        cell: { rawInput: rawText, formula: null, value: literalValue(rawText), error: null },
      };
    }

    const parsed = parseFormula(rawText, { maxDepth: this.config.maxEvaluationDepth });
    if (!parsed.ok) return parsed;

    const outside = findReferenceOutside(parsed.ast, this.rows, this.cols);
    if (outside) {
      return { ok: false, error: this.outOfBounds(outside) };
    }

    return {
      ok: true,
      cell: { rawInput: rawText, formula: parsed.ast, value: EMPTY_TEXT, error: null },
    };
  }

  private reject(address: Address, error: EditError): EditResult {
    this.logger.warn(
      { cell: formatAddress(address), errorType: error.type, reason: error.message },
      'edit_rejected'
    );
    return { ok: false, error };
  }

  private finish(calculation: CalculationResult): EditResult {
    for (const address of calculation.order) {
      this.events.onCellChange?.(address, this.getCell(address));
    }
    this.events.onCalculationComplete?.(calculation);
    return { ok: true, affected: calculation.order, errors: calculation.errors };
  }

  /**
   * Stored cell data; unwritten cells read as the empty literal
   */
  getCell(address: Address): Readonly<CellData> {
    return this.dataStore.getCell(address.row, address.col) ?? emptyCell();
  }

  getValue(address: Address): CellValue {
    return this.getCell(address).value;
  }

  /**
   * Text shown to users: the error sentinel for failed cells
   */
  getDisplayValue(address: Address): string {
    const cell = this.getCell(address);
    return cell.error ? ERROR_SENTINEL : toText(cell.value);
  }

  /**
   * Formula text as entered, or null for literals
   */
  getFormulaText(address: Address): string | null {
    const cell = this.getCell(address);
    return cell.formula ? cell.rawInput : null;
  }

  getRawInput(address: Address): string {
    return this.getCell(address).rawInput ?? '';
  }

  getPrecedents(address: Address): Address[] {
    return this.formulaEngine.getPrecedents(address);
  }

  getDependents(address: Address): Address[] {
    return this.formulaEngine.getDependents(address);
  }

  // ===========================================================================
  // Snapshot Hooks
  // ===========================================================================

  snapshotCell(address: Address): CellSnapshot {
    const cell = this.getCell(address);
    return {
      address: { ...address },
      cell: { ...cell },
      precedents: this.formulaEngine.getPrecedentKeys(address),
    };
  }

  /**
   * Put a cell back verbatim, then recalculate its dependents.
   */
  restoreCell(snapshot: CellSnapshot): EditResult {
    const { address } = snapshot;
    if (!this.isInBounds(address)) {
      return this.reject(address, this.outOfBounds(address));
    }

    const restored = this.formulaEngine.restore(address, { ...snapshot.cell }, snapshot.precedents);
    if (!restored.ok) return this.reject(address, restored.error);

    this.events.onCellChange?.(address, this.getCell(address));
    return this.finish(restored.calculation);
  }

  // ===========================================================================
  // Bulk Load
  // ===========================================================================

  /**
   * Replace the whole sheet with raw (value, formula) pairs, rebuild the
   * dependency graph and recalculate every formula.
   */
  loadCells(contents: SheetContents): LoadResult {
    this.dataStore.reset({
      rows: contents.rows,
      cols: contents.cols,
      defaultColumnWidth: contents.defaultColumnWidth,
    });
    this.formulaEngine.clear();

    for (const [col, width] of contents.columnWidths ?? []) {
      this.dataStore.setColumnWidth(col, width);
    }

    const skipped: LoadResult['skipped'] = [];
    let loaded = 0;

    for (const input of contents.cells) {
      const address = { row: input.row, col: input.col };
      const cell = this.cellFromInput(address, input);
      if ('type' in cell) {
        skipped.push({ address, error: cell });
        continue;
      }
      this.dataStore.setCell(address.row, address.col, cell);
      loaded++;
    }

    const rebuild = this.formulaEngine.rebuildDependencies();
    const calculation = this.formulaEngine.recalculateAll();
    this.events.onCalculationComplete?.(calculation);

    if (skipped.length > 0) {
      this.logger.warn({ skipped: skipped.length }, 'load_skipped_cells');
    }
    return { loaded, skipped, rebuild, calculation };
  }

  private cellFromInput(
    address: Address,
    input: CellInput
  ): CellData | ParseError | InvalidReferenceError {
    if (!this.isInBounds(address)) return this.outOfBounds(address);

    const formulaText = input.formula ?? null;
    if (formulaText === null || formulaText === '') {
      return { rawInput: input.value, formula: null, value: literalValue(input.value), error: null };
    }

    const parsed = parseFormula(formulaText, { maxDepth: this.config.maxEvaluationDepth });
    if (!parsed.ok) return parsed.error;
    const outside = findReferenceOutside(parsed.ast, this.rows, this.cols);
    if (outside) return this.outOfBounds(outside);
    const rawInput = isFormulaText(formulaText) ? formulaText : `=${formulaText}`;
    return { rawInput, formula: parsed.ast, value: EMPTY_TEXT, error: null };
  }

  /**
   * Re-derive every dependency edge from the stored formulas
   */
  rebuildDependencies(): RebuildResult {
    return this.formulaEngine.rebuildDependencies();
  }

  recalculateAll(): CalculationResult {
    const result = this.formulaEngine.recalculateAll();
    this.events.onCalculationComplete?.(result);
    return result;
  }

  // ===========================================================================
  // Copy & Fill
  // ===========================================================================

  /**
   * Raw input `source` would have if written at `target`: formula
   * references move by the offset, literals are unchanged.
   */
  translateInput(source: Address, target: Address): string {
    const cell = this.getCell(source);
    if (!cell.formula) return cell.rawInput ?? '';
    return formatFormula(
      shiftReferences(cell.formula, target.row - source.row, target.col - source.col)
    );
  }

  copyCell(from: Address, to: Address): EditResult {
    return this.setCell(to, this.translateInput(from, to));
  }

  /**
   * Cells `fill` would write, strip by strip. Each strip pairs its sources
   * (in fill order) with its targets.
   */
  fillTargets(
    source: CellRange,
    direction: FillDirection,
    count: number
  ): Array<{ sources: Address[]; targets: Address[] }> {
    const strips: Array<{ sources: Address[]; targets: Address[] }> = [];
    const vertical = direction === 'down' || direction === 'up';
    const forward = direction === 'down' || direction === 'right';

    const laneStart = vertical ? source.startCol : source.startRow;
    const laneEnd = vertical ? source.endCol : source.endRow;
    const first = vertical ? source.startRow : source.startCol;
    const last = vertical ? source.endRow : source.endCol;
    const at = (lane: number, pos: number): Address =>
      vertical ? { row: pos, col: lane } : { row: lane, col: pos };

    for (let lane = laneStart; lane <= laneEnd; lane++) {
      const sources: Address[] = [];
      const targets: Address[] = [];
      if (forward) {
        for (let pos = first; pos <= last; pos++) sources.push(at(lane, pos));
        for (let i = 1; i <= count; i++) targets.push(at(lane, last + i));
      } else {
        for (let pos = last; pos >= first; pos--) sources.push(at(lane, pos));
        for (let i = 1; i <= count; i++) targets.push(at(lane, first - i));
      }
      strips.push({ sources, targets });
    }
    return strips;
  }

  /**
   * Extend `source` by `count` cells in `direction`. Literal strips continue
   * their detected pattern; strips holding formulas repeat their sources
   * with shifted references.
   */
  fill(source: CellRange, direction: FillDirection, count: number): FillResult {
    const strips = this.fillTargets(source, direction, count);

    for (const { targets } of strips) {
      const outside = targets.find((target) => !this.isInBounds(target));
      if (outside) {
        const error = this.outOfBounds(outside);
        this.reject(outside, error);
        return { ok: false, error, written: [] };
      }
    }

    const written: Address[] = [];
    const patterns: string[] = [];

    for (const { sources, targets } of strips) {
      const values = this.fillValues(sources, targets);
      patterns.push(values.description);

      for (let i = 0; i < targets.length; i++) {
        const result = this.setCell(targets[i], values.inputs[i]);
        if (!result.ok) return { ok: false, error: result.error, written };
        written.push(targets[i]);
      }
    }

    return { ok: true, written, patterns };
  }

  private fillValues(
    sources: Address[],
    targets: Address[]
  ): { inputs: string[]; description: string } {
    const hasFormula = sources.some((address) => this.getCell(address).formula !== null);

    if (hasFormula) {
      return {
        inputs: targets.map((target, i) => this.translateInput(sources[i % sources.length], target)),
        description: 'formula copy',
      };
    }

    const pattern = detectPattern(sources.map((address) => this.getRawInput(address)));
    return {
      inputs: generateSeries(pattern, sources.length, targets.length),
      description: describePattern(pattern),
    };
  }

  // ===========================================================================
  // Data Access
  // ===========================================================================

  /**
   * Stored cells, row-major
   */
  entries(): Array<{ address: Address; cell: Readonly<CellData> }> {
    return this.dataStore.entries().map(({ row, col, cell }) => ({ address: { row, col }, cell }));
  }

  getUsedRange(): CellRange {
    return this.dataStore.getUsedRange();
  }

  /**
   * Display values over a range, one array per row
   */
  getDisplayGrid(range: CellRange): string[][] {
    const grid: string[][] = [];
    for (let row = range.startRow; row <= range.endRow; row++) {
      const line: string[] = [];
      for (let col = range.startCol; col <= range.endCol; col++) {
        line.push(this.getDisplayValue({ row, col }));
      }
      grid.push(line);
    }
    return grid;
  }

  getColumnWidth(col: number): number {
    return this.dataStore.getColumnWidth(col);
  }

  setColumnWidth(col: number, width: number): void {
    this.dataStore.setColumnWidth(col, width);
  }

  getColumnWidths(): Map<number, number> {
    return this.dataStore.getColumnWidths();
  }

  get defaultColumnWidth(): number {
    return this.dataStore.defaultColumnWidth;
  }

  getFunctions(): FunctionDefinition[] {
    return this.config.functions.list();
  }

  // ===========================================================================
  // Utilities
  // ===========================================================================

  /**
   * Clear all data, keeping the grid size
   */
  clear(): void {
    this.dataStore.clear();
    this.formulaEngine.clear();
  }

  getStats(): EngineStats {
    return {
      rows: this.rows,
      cols: this.cols,
      dataStats: this.dataStore.getStats(),
      graphStats: this.formulaEngine.graph.getStats(),
      functionCount: this.config.functions.size,
    };
  }

  getLogger(): Logger {
    return this.config.logger;
  }
}
