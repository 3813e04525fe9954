/**
 * GridCalc Engine - CSV Import/Export
 *
 * Parsing follows RFC 4180 with a few extensions:
 * - any field may be quoted; quoted fields can contain newlines and commas
 * - two double-quotes inside a quoted field escape a double quote
 * - bare CR is ignored, so CRLF and LF files read the same
 * - records may have different lengths
 */

import type { LoadResult, SpreadsheetEngine, CellInput } from '../SpreadsheetEngine.js';
import { isFormulaText } from '../formula/Parser.js';

enum ParseState {
  default = 0,
  quoted = 1,
}

export interface CsvImportResult {
  /** Non-empty fields read from the file */
  fields: number;
  formulas: number;
  load: LoadResult;
}

/** Extra rows and columns added past the imported data */
const IMPORT_ROW_MARGIN = 10;
const IMPORT_COL_MARGIN = 5;

export function parseCsv(text: string, delimiter = ','): string[][] {
  if (delimiter.length !== 1 || /[\r\n"]/.test(delimiter)) {
    throw new Error(`Invalid CSV delimiter '${delimiter}'`);
  }

  let state: ParseState = ParseState.default;
  let record: string[] = [];
  let field = '';
  const records: string[][] = [];

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (state === ParseState.quoted) {
      if (char !== '"') {
        field += char;
      } else if (text[i + 1] === '"') {
        field += '"';
        i++;
      } else {
        state = ParseState.default;
      }
      continue;
    }

    switch (char) {
      case delimiter:
        record.push(field);
        field = '';
        break;
      case '\r':
        break;
      case '\n':
        record.push(field);
        records.push(record);
        field = '';
        record = [];
        break;
      case '"':
        // Quotes only open a quoted field at its start
        if (field.length === 0) {
          state = ParseState.quoted;
        } else {
          field += char;
        }
        break;
      default:
        field += char;
    }
  }

  // A trailing newline does not start another record
  if (record.length > 0 || field.length > 0) {
    record.push(field);
    records.push(record);
  }

  return records;
}

export function quoteCsvField(value: string, delimiter = ','): string {
  if (value.includes(delimiter) || /["\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Display values from A1 to the end of the used range, one line per row.
 * Returns null for a sheet with no data.
 */
export function exportCsv(engine: SpreadsheetEngine, delimiter = ','): string | null {
  const used = engine.getUsedRange();
  if (used.endRow < 0 || used.endCol < 0) return null;

  const grid = engine.getDisplayGrid({
    startRow: 0,
    startCol: 0,
    endRow: used.endRow,
    endCol: used.endCol,
  });
  return grid
    .map((line) => line.map((value) => quoteCsvField(value, delimiter)).join(delimiter))
    .join('\n') + '\n';
}

/**
 * Replace the sheet with the CSV contents, starting at A1. Empty fields
 * stay blank; fields starting with "=" are loaded as formulas. The grid
 * grows to fit the data plus a margin and never shrinks.
 */
export function importCsv(engine: SpreadsheetEngine, text: string, delimiter = ','): CsvImportResult {
  const records = parseCsv(text, delimiter);
  const cells: CellInput[] = [];
  let maxRow = 0;
  let maxCol = 0;
  let formulas = 0;

  records.forEach((record, row) => {
    record.forEach((field, col) => {
      if (field === '') return;
      const formula = isFormulaText(field);
      if (formula) formulas++;
      cells.push({ row, col, value: formula ? '' : field, formula: formula ? field : null });
      maxRow = Math.max(maxRow, row);
      maxCol = Math.max(maxCol, col);
    });
  });

  const load = engine.loadCells({
    rows: Math.max(engine.rows, maxRow + IMPORT_ROW_MARGIN),
    cols: Math.max(engine.cols, maxCol + IMPORT_COL_MARGIN),
    defaultColumnWidth: engine.defaultColumnWidth,
    cells,
  });

  return { fields: cells.length, formulas, load };
}
