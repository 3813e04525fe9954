/**
 * GridCalc Headless Harness - Types
 *
 * Command protocol and output types for driving the engine over
 * stdin/stdout.
 */

import { DEFAULT_COLS, DEFAULT_ROWS, type Address, type CellRange } from '../core/types/index.js';
import type { FillDirection } from '../core/clipboard/FillSeries.js';
import type { ErrorKind } from '../core/formula/errors.js';

// =============================================================================
// Command Types
// =============================================================================

export type CommandType =
  // Cell operations
  | 'SET'        // SET A1 100 | SET A1 =SUM(B1:B10)
  | 'GET'        // GET A1
  | 'CLEAR'      // CLEAR A1
  | 'DEPS'       // DEPS A1 (precedents and dependents)

  // Range operations
  | 'DUMP'       // DUMP A1:C5 | DUMP (used range)
  | 'COPY'       // COPY A1 B2
  | 'FILL'       // FILL A1:A2 down 5

  // History
  | 'UNDO'
  | 'REDO'

  // Files
  | 'SAVE'       // SAVE sheet.json
  | 'LOAD'       // LOAD sheet.json
  | 'EXPORT_CSV' // EXPORT_CSV out.csv
  | 'IMPORT_CSV' // IMPORT_CSV in.csv

  // Inspection
  | 'FUNCTIONS'
  | 'STATS'
  | 'HELP';

export type CommandBody =
  | { type: 'SET'; address: Address; input: string }
  | { type: 'GET' | 'CLEAR' | 'DEPS'; address: Address }
  /** Null range dumps the used range */
  | { type: 'DUMP'; range: CellRange | null }
  | { type: 'COPY'; from: Address; to: Address }
  | { type: 'FILL'; range: CellRange; direction: FillDirection; count: number }
  | { type: 'SAVE' | 'LOAD' | 'EXPORT_CSV' | 'IMPORT_CSV'; path: string }
  | { type: 'UNDO' | 'REDO' | 'FUNCTIONS' | 'STATS' | 'HELP' };

export type ParsedCommand = CommandBody & {
  /** Line as written, trimmed */
  raw: string;
  lineNumber: number;
};

// =============================================================================
// Output Types
// =============================================================================

export type OutputType =
  | 'result' // Mutation outcome
  | 'value'  // Single cell
  | 'table'  // Range or listing
  | 'error'  // Failed command
  | 'info';  // Informational text

export interface OutputBase {
  type: OutputType;
  command?: string;
  lineNumber?: number;
}

export interface ResultOutput extends OutputBase {
  type: 'result';
  success: true;
  message: string;
  /** Cells whose value changed, as A1 references */
  affected?: string[];
}

export interface ValueOutput extends OutputBase {
  type: 'value';
  cell: string;
  /** Display text; "#ERROR" for failed cells */
  value: string;
  kind: 'number' | 'text';
  formula: string | null;
  error: string | null;
}

export interface TableOutput extends OutputBase {
  type: 'table';
  headers: string[];
  rows: string[][];
}

export interface ErrorOutput extends OutputBase {
  type: 'error';
  /** Engine error kind, or where a harness-level failure came from */
  errorType: ErrorKind | 'command' | 'io' | 'history';
  message: string;
}

export interface InfoOutput extends OutputBase {
  type: 'info';
  message: string;
  data?: Record<string, unknown>;
}

export type Output = ResultOutput | ValueOutput | TableOutput | ErrorOutput | InfoOutput;

export type OutputFormat = 'json' | 'pretty';

// =============================================================================
// Harness Configuration
// =============================================================================

export interface HarnessConfig {
  /** 'json' (one object per line) or 'pretty' (human readable) */
  outputFormat: OutputFormat;
  /** Stop a script at the first error */
  stopOnError: boolean;
  /** Print each command before its output */
  echoCommands: boolean;
  rows: number;
  cols: number;
}

export const DEFAULT_CONFIG: HarnessConfig = {
  outputFormat: 'json',
  stopOnError: false,
  echoCommands: false,
  rows: DEFAULT_ROWS,
  cols: DEFAULT_COLS,
};
