/**
 * GridCalc Engine - File Repository
 *
 * Reads and writes sheet documents and CSV files. I/O failures come back
 * as `{ ok: false, error }` with the system message.
 */

import { readFile, writeFile } from 'node:fs/promises';
import type { SpreadsheetEngine } from '../SpreadsheetEngine.js';
import type { Logger } from '../logging/logger.js';
import { deserializeSheet, serializeSheet, type DeserializeResult } from './SheetSerializer.js';
import { exportCsv, importCsv, type CsvImportResult } from './Csv.js';

export type SaveResult = { ok: true; path: string } | { ok: false; error: string };

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function saveSheet(
  engine: SpreadsheetEngine,
  path: string,
  logger?: Logger
): Promise<SaveResult> {
  const json = JSON.stringify(serializeSheet(engine), null, 2);
  try {
    await writeFile(path, json, 'utf8');
  } catch (err) {
    logger?.warn({ path, err }, 'sheet_save_failed');
    return { ok: false, error: describe(err) };
  }
  logger?.debug({ path }, 'sheet_saved');
  return { ok: true, path };
}

export async function loadSheet(
  engine: SpreadsheetEngine,
  path: string,
  logger?: Logger
): Promise<DeserializeResult> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    logger?.warn({ path, err }, 'sheet_load_failed');
    return { ok: false, error: describe(err) };
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    return { ok: false, error: `Invalid file format - ${describe(err)}` };
  }

  const result = deserializeSheet(engine, json);
  if (result.ok) {
    logger?.debug({ path, cells: result.load.loaded }, 'sheet_loaded');
  }
  return result;
}

export async function saveCsv(
  engine: SpreadsheetEngine,
  path: string,
  logger?: Logger
): Promise<SaveResult> {
  const csv = exportCsv(engine);
  if (csv === null) return { ok: false, error: 'No data to export' };
  try {
    await writeFile(path, csv, 'utf8');
  } catch (err) {
    logger?.warn({ path, err }, 'csv_export_failed');
    return { ok: false, error: describe(err) };
  }
  return { ok: true, path };
}

export async function loadCsv(
  engine: SpreadsheetEngine,
  path: string,
  logger?: Logger
): Promise<{ ok: true; result: CsvImportResult } | { ok: false; error: string }> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    logger?.warn({ path, err }, 'csv_import_failed');
    return { ok: false, error: describe(err) };
  }
  return { ok: true, result: importCsv(engine, text) };
}
