/**
 * GridCalc Engine - Recalculation Engine
 *
 * Commits cell edits through the dependency graph and recomputes exactly
 * the affected cells:
 * - Tentative precedent update with rollback on a cycle
 * - Affected set = edited cell plus transitive dependents
 * - Topological evaluation with row-major tie-breaks
 * - Evaluation errors recorded per cell, never aborting the pass
 */

import {
  Address,
  CellData,
  CellKey,
  addressKey,
  formatAddress,
  parseKey,
} from '../types/index.js';
import type { SparseDataStore } from '../data/SparseDataStore.js';
import type { Logger } from '../logging/logger.js';
import { extractReferences } from './ast.js';
import { DependencyGraph } from './DependencyGraph.js';
import type { CircularReferenceError, EvaluationError } from './errors.js';
import type { Evaluator } from './Evaluator.js';
import { ERROR_VALUE } from './Value.js';

export interface CellCalculationError {
  address: Address;
  error: EvaluationError;
}

export interface CalculationResult {
  calculatedCount: number;
  /** Cells in the order they were evaluated */
  order: Address[];
  /** Cells that finished this pass with an evaluation error */
  errors: CellCalculationError[];
  /** Milliseconds */
  duration: number;
}

export interface RebuildResult {
  formulaCount: number;
  edgeCount: number;
  /** Formula cells that sit on or behind a dependency cycle */
  cyclic: Address[];
}

export type CommitResult =
  | { ok: true; calculation: CalculationResult }
  | { ok: false; error: CircularReferenceError };

export class FormulaEngine {
  private dataStore: SparseDataStore;
  private evaluator: Evaluator;
  private dependencyGraph: DependencyGraph;
  private logger: Logger | undefined;

  constructor(dataStore: SparseDataStore, evaluator: Evaluator, logger?: Logger) {
    this.dataStore = dataStore;
    this.evaluator = evaluator;
    this.dependencyGraph = new DependencyGraph();
    this.logger = logger;
  }

  get graph(): DependencyGraph {
    return this.dependencyGraph;
  }

  // ===========================================================================
  // Edits
  // ===========================================================================

  /**
   * Store `cell` at `address` and recalculate it with its dependents.
   * A cycle rolls the graph back and leaves the store untouched.
   */
  commit(address: Address, cell: CellData): CommitResult {
    const precedents = cell.formula ? extractReferences(cell.formula).map(addressKey) : [];
    const linked = this.link(address, precedents);
    if (!linked.ok) return linked;

    this.dataStore.setCell(address.row, address.col, cell);
    const calculation = this.recalculateFrom(address, true);
    this.logger?.debug(
      { cell: formatAddress(address), affected: calculation.calculatedCount },
      'edit_committed'
    );
    return { ok: true, calculation };
  }

  /**
   * Put back a cell exactly as captured, including its cached value and
   * precedent set, then recalculate only its dependents.
   */
  restore(address: Address, cell: CellData, precedents: Iterable<CellKey>): CommitResult {
    const linked = this.link(address, precedents);
    if (!linked.ok) return linked;

    this.dataStore.setCell(address.row, address.col, cell);
    return { ok: true, calculation: this.recalculateFrom(address, false) };
  }

  /**
   * Tentatively replace precedents; roll back if the cell now reaches itself.
   */
  private link(
    address: Address,
    precedents: Iterable<CellKey>
  ): { ok: true } | { ok: false; error: CircularReferenceError } {
    const key = addressKey(address);
    const previous = this.dependencyGraph.setPrecedents(key, precedents);

    const cycle = this.dependencyGraph.findCycle(key);
    if (cycle) {
      this.dependencyGraph.setPrecedents(key, previous);
      const cells = cycle.map(parseKey);
      return {
        ok: false,
        error: {
          type: 'circular',
          cells,
          message: `Circular reference: ${[...cells, address].map(formatAddress).join(' -> ')}`,
        },
      };
    }
    return { ok: true };
  }

  private recalculateFrom(address: Address, includeSelf: boolean): CalculationResult {
    const key = addressKey(address);
    const affected = this.dependencyGraph.getAllDependents(key);
    return this.recalculate(includeSelf ? [key, ...affected] : affected);
  }

  // ===========================================================================
  // Calculation
  // ===========================================================================

  /**
   * Evaluate `cells` in dependency order. Cells that cannot be ordered get a
   * circular evaluation error.
   */
  recalculate(cells: Iterable<CellKey>): CalculationResult {
    const startTime = performance.now();
    const { order, cyclic } = this.dependencyGraph.getCalculationOrder(cells);
    const errors: CellCalculationError[] = [];

    for (const key of order) {
      const address = parseKey(key);
      const error = this.evaluateCell(address);
      if (error) errors.push({ address, error });
    }

    for (const key of cyclic) {
      const address = parseKey(key);
      const error: EvaluationError = {
        type: 'evaluation',
        code: 'circular',
        message: `${formatAddress(address)} is part of a circular reference`,
      };
      this.dataStore.setComputed(address.row, address.col, ERROR_VALUE, error);
      errors.push({ address, error });
    }

    return {
      calculatedCount: order.length + cyclic.length,
      order: [...order, ...cyclic].map(parseKey),
      errors,
      duration: performance.now() - startTime,
    };
  }

  /**
   * Re-evaluate every formula cell
   */
  recalculateAll(): CalculationResult {
    return this.recalculate(this.dataStore.formulaKeys());
  }

  private evaluateCell(address: Address): EvaluationError | null {
    const cell = this.dataStore.getCell(address.row, address.col);
    if (!cell?.formula) return null;

    const result = this.evaluator.evaluate(cell.formula, (ref) =>
      this.dataStore.isInBounds(ref.row, ref.col)
        ? this.dataStore.getValue(ref.row, ref.col)
        : null
    );

    if (result.ok) {
      this.dataStore.setComputed(address.row, address.col, result.value, null);
      return null;
    }
    this.dataStore.setComputed(address.row, address.col, ERROR_VALUE, result.error);
    return result.error;
  }

  // ===========================================================================
  // Rebuild
  // ===========================================================================

  /**
   * Clear the graph and re-derive every edge from the stored formulas.
   */
  rebuildDependencies(): RebuildResult {
    this.dependencyGraph.clear();
    const formulaKeys = this.dataStore.formulaKeys();

    for (const key of formulaKeys) {
      const { row, col } = parseKey(key);
      const formula = this.dataStore.getCell(row, col)?.formula;
      if (formula) {
        this.dependencyGraph.setPrecedents(key, extractReferences(formula).map(addressKey));
      }
    }

    const { cyclic } = this.dependencyGraph.getCalculationOrder(formulaKeys);
    const stats = this.dependencyGraph.getStats();
    if (cyclic.length > 0) {
      this.logger?.warn({ cells: cyclic.map((k) => formatAddress(parseKey(k))) }, 'cycle_after_rebuild');
    }

    return {
      formulaCount: formulaKeys.length,
      edgeCount: stats.totalEdges,
      cyclic: cyclic.map(parseKey),
    };
  }

  getPrecedents(address: Address): Address[] {
    return this.dependencyGraph.getPrecedents(addressKey(address)).map(parseKey);
  }

  getDependents(address: Address): Address[] {
    return this.dependencyGraph.getDependents(addressKey(address)).map(parseKey);
  }

  getPrecedentKeys(address: Address): CellKey[] {
    return this.dependencyGraph.getPrecedents(addressKey(address));
  }

  clear(): void {
    this.dependencyGraph.clear();
  }
}
