/**
 * GridCalc Engine - Formula Dependency Graph
 *
 * Address-keyed precedent/dependent maps. `dependents` is kept as the exact
 * inverse of `precedents`; nodes with no edges are dropped from both.
 *
 * Key features:
 * - Diff-based precedent updates with the previous set returned for rollback
 * - Cycle detection by forward reachability from the edited cell
 * - Topological calculation order with row-major tie-breaks
 */

import { CellKey, compareKeys } from '../types/index.js';

export interface CalculationOrder {
  /** Cells whose precedents (within the set) all come earlier */
  order: CellKey[];
  /** Cells that could not be ordered because they sit on or behind a cycle */
  cyclic: CellKey[];
}

export interface DependencyGraphStats {
  /** Cells with at least one edge */
  totalCells: number;
  totalEdges: number;
  /** Cells that read at least one other cell */
  formulaCells: number;
}

const EMPTY: ReadonlySet<CellKey> = new Set();

/**
 * Insert into an array kept in row-major order.
 */
function insertSorted(list: CellKey[], key: CellKey): void {
  let low = 0;
  let high = list.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (compareKeys(list[mid], key) < 0) low = mid + 1;
    else high = mid;
  }
  list.splice(low, 0, key);
}

export class DependencyGraph {
  /** Cell -> cells its formula reads */
  private precedents: Map<CellKey, Set<CellKey>> = new Map();

  /** Cell -> cells whose formulas read it */
  private dependents: Map<CellKey, Set<CellKey>> = new Map();

  // ===========================================================================
  // Dependency Management
  // ===========================================================================

  /**
   * Replace a cell's precedent set, updating the inverse map by diff.
   * @returns The previous precedent set, for rollback
   */
  setPrecedents(cell: CellKey, next: Iterable<CellKey>): Set<CellKey> {
    const previous = this.precedents.get(cell) ?? new Set<CellKey>();
    const updated = new Set(next);

    for (const old of previous) {
      if (!updated.has(old)) this.unlink(old, cell);
    }
    for (const added of updated) {
      if (!previous.has(added)) this.link(added, cell);
    }

    if (updated.size > 0) {
      this.precedents.set(cell, updated);
    } else {
      this.precedents.delete(cell);
    }

    return new Set(previous);
  }

  private link(precedent: CellKey, dependent: CellKey): void {
    let set = this.dependents.get(precedent);
    if (!set) {
      set = new Set();
      this.dependents.set(precedent, set);
    }
    set.add(dependent);
  }

  private unlink(precedent: CellKey, dependent: CellKey): void {
    const set = this.dependents.get(precedent);
    if (!set) return;
    set.delete(dependent);
    if (set.size === 0) this.dependents.delete(precedent);
  }

  /**
   * Direct precedents (cells this cell references), row-major
   */
  getPrecedents(cell: CellKey): CellKey[] {
    return [...(this.precedents.get(cell) ?? EMPTY)].sort(compareKeys);
  }

  /**
   * Direct dependents (cells that reference this cell), row-major
   */
  getDependents(cell: CellKey): CellKey[] {
    return [...(this.dependents.get(cell) ?? EMPTY)].sort(compareKeys);
  }

  /**
   * Transitive dependents, row-major. Excludes `cell` unless it sits on a cycle.
   */
  getAllDependents(cell: CellKey): CellKey[] {
    const visited = new Set<CellKey>();
    const queue = [...(this.dependents.get(cell) ?? EMPTY)];

    while (queue.length > 0) {
      const current = queue.pop();
      if (current === undefined || visited.has(current)) continue;
      visited.add(current);
      for (const next of this.dependents.get(current) ?? EMPTY) {
        if (!visited.has(next)) queue.push(next);
      }
    }

    return [...visited].sort(compareKeys);
  }

  // ===========================================================================
  // Circular Reference Detection
  // ===========================================================================

  /**
   * Depth-first search along dependents for a path leading back to `start`.
   * Iterative, so chain length is bounded only by the grid.
   * @returns The cycle starting at `start`, or null
   */
  findCycle(start: CellKey): CellKey[] | null {
    const visited = new Set<CellKey>([start]);
    const path: Array<{ cell: CellKey; dependents: CellKey[]; next: number }> = [
      { cell: start, dependents: this.getDependents(start), next: 0 },
    ];

    while (path.length > 0) {
      const frame = path[path.length - 1];
      if (frame.next >= frame.dependents.length) {
        path.pop();
        continue;
      }

      const dependent = frame.dependents[frame.next++];
      if (dependent === start) return path.map((step) => step.cell);
      if (!visited.has(dependent)) {
        visited.add(dependent);
        path.push({ cell: dependent, dependents: this.getDependents(dependent), next: 0 });
      }
    }

    return null;
  }

  // ===========================================================================
  // Calculation Order
  // ===========================================================================

  /**
   * Kahn's algorithm over `cells`, counting only precedents inside the set.
   * Among ready cells the smallest address (row-major) goes first.
   */
  getCalculationOrder(cells: Iterable<CellKey>): CalculationOrder {
    const members = new Set(cells);
    const inDegree = new Map<CellKey, number>();
    const ready: CellKey[] = [];

    for (const cell of members) {
      let count = 0;
      for (const precedent of this.precedents.get(cell) ?? EMPTY) {
        if (members.has(precedent)) count++;
      }
      inDegree.set(cell, count);
      if (count === 0) insertSorted(ready, cell);
    }

    const order: CellKey[] = [];
    while (ready.length > 0) {
      const cell = ready.shift();
      if (cell === undefined) break;
      order.push(cell);

      for (const dependent of this.dependents.get(cell) ?? EMPTY) {
        const degree = inDegree.get(dependent);
        if (degree === undefined) continue;
        inDegree.set(dependent, degree - 1);
        if (degree - 1 === 0) insertSorted(ready, dependent);
      }
    }

    const cyclic = [...members]
      .filter((cell) => (inDegree.get(cell) ?? 0) > 0)
      .sort(compareKeys);

    return { order, cyclic };
  }

  // ===========================================================================
  // Utilities
  // ===========================================================================

  clear(): void {
    this.precedents.clear();
    this.dependents.clear();
  }

  getStats(): DependencyGraphStats {
    const cells = new Set<CellKey>([...this.precedents.keys(), ...this.dependents.keys()]);
    let totalEdges = 0;
    for (const set of this.precedents.values()) {
      totalEdges += set.size;
    }

    return {
      totalCells: cells.size,
      totalEdges,
      formulaCells: this.precedents.size,
    };
  }
}
