/**
 * GridCalc Engine
 *
 * A formula-driven grid calculator: literal and formula cells, incremental
 * dependency-tracked recalculation and cycle rejection.
 *
 * @example
 * ```typescript
 * import { SpreadsheetEngine } from '@gridcalc/engine';
 *
 * const engine = new SpreadsheetEngine({ rows: 50, cols: 10 });
 *
 * engine.setCell({ row: 0, col: 0 }, '2');
 * engine.setCell({ row: 0, col: 1 }, '=A1*21');
 *
 * console.log(engine.getDisplayValue({ row: 0, col: 1 })); // "42"
 * ```
 */

export * from './core/index.js';
