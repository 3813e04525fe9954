/**
 * GridCalc Engine - Sheet Serializer
 *
 * Converts between a SpreadsheetEngine and its persisted document.
 */

import type { CellInput, LoadResult, SpreadsheetEngine } from '../SpreadsheetEngine.js';
import { isBlank } from '../data/SparseDataStore.js';
import { SheetDocumentSchema, formatIssues, type SheetDocument } from './SheetDocument.js';

export type DeserializeResult =
  | { ok: true; load: LoadResult }
  | { ok: false; error: string };

export function serializeSheet(engine: SpreadsheetEngine): SheetDocument {
  const cells: SheetDocument['cells'] = [];

  for (const { address, cell } of engine.entries()) {
    if (isBlank(cell)) continue;
    if (cell.formula) {
      cells.push([address.row, address.col, {
        value: engine.getDisplayValue(address),
        formula: cell.rawInput,
      }]);
    } else {
      cells.push([address.row, address.col, { value: cell.rawInput ?? '' }]);
    }
  }

  const columnWidths: Record<string, number> = {};
  for (const [col, width] of engine.getColumnWidths()) {
    columnWidths[String(col)] = width;
  }

  return {
    cells,
    rows: engine.rows,
    cols: engine.cols,
    column_widths: columnWidths,
    default_column_width: engine.defaultColumnWidth,
  };
}

/**
 * Validate `json` and replace the engine's sheet with it. Nothing changes
 * when validation fails.
 */
export function deserializeSheet(engine: SpreadsheetEngine, json: unknown): DeserializeResult {
  const parsed = SheetDocumentSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, error: `Invalid file format - ${formatIssues(parsed.error)}` };
  }

  const document = parsed.data;
  const cells: CellInput[] = document.cells.map(([row, col, cell]) => ({
    row,
    col,
    value: cell.value,
    formula: cell.formula ?? null,
  }));
  const columnWidths = Object.entries(document.column_widths).map(
    ([col, width]): [number, number] => [Number(col), width]
  );

  const load = engine.loadCells({
    rows: document.rows,
    cols: document.cols,
    defaultColumnWidth: document.default_column_width,
    columnWidths,
    cells,
  });
  return { ok: true, load };
}
