/**
 * GridCalc Headless Harness - Runner
 *
 * Executes parsed commands against a SpreadsheetEngine and produces
 * structured output. Cell edits, copies and fills go through the undo
 * history; loading a file starts a fresh history.
 */

import {
  DEFAULT_CONFIG,
  type ErrorOutput,
  type HarnessConfig,
  type InfoOutput,
  type Output,
  type ParsedCommand,
  type ResultOutput,
  type TableOutput,
  type ValueOutput,
} from './types.js';
import { CommandParseError, CommandParser } from './CommandParser.js';
import { formatEcho, formatOutput } from './OutputFormatter.js';
import { SpreadsheetEngine, type EditResult } from '../core/SpreadsheetEngine.js';
import { UndoRedoManager, recordCopy, recordEdit, recordFill } from '../core/history/UndoRedoManager.js';
import { loadCsv, loadSheet, saveCsv, saveSheet } from '../core/persistence/FileRepository.js';
import { columnToLetters, formatAddress, type Address, type CellRange } from '../core/types/index.js';
import type { EditError } from '../core/formula/errors.js';
import type { Logger } from '../core/logging/logger.js';

export const HELP_TEXT = [
  'Commands:',
  '  SET <ref> <input>                      set a literal or =formula',
  '  GET <ref>                              show value, formula and error',
  '  CLEAR <ref>                            clear a cell',
  '  DEPS <ref>                             show precedents and dependents',
  '  DUMP [range]                           show display values',
  '  COPY <from> <to>                       copy a cell, shifting references',
  '  FILL <range> <down|up|right|left> <n>  auto-fill n cells',
  '  UNDO | REDO',
  '  SAVE <path> | LOAD <path>              JSON sheet document',
  '  EXPORT_CSV <path> | IMPORT_CSV <path>',
  '  FUNCTIONS | STATS | HELP',
  'Lines starting with # are ignored.',
].join('\n');

export interface HarnessRunnerOptions {
  /** Engine to drive; by default one sized from the config */
  engine?: SpreadsheetEngine;
  logger?: Logger;
  /** Receives each formatted output line; defaults to stdout */
  write?: (line: string) => void;
}

// =============================================================================
// Harness Runner
// =============================================================================

export class HarnessRunner {
  private config: HarnessConfig;
  private engine: SpreadsheetEngine;
  private history = new UndoRedoManager();
  private parser = new CommandParser();
  private logger: Logger;
  private persistenceLogger: Logger;
  private write: (line: string) => void;

  constructor(config: Partial<HarnessConfig> = {}, options: HarnessRunnerOptions = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.engine = options.engine ?? new SpreadsheetEngine({
      rows: this.config.rows,
      cols: this.config.cols,
      logger: options.logger,
    });
    const baseLogger = options.logger ?? this.engine.getLogger();
    this.logger = baseLogger.child({ component: 'harness' });
    this.persistenceLogger = baseLogger.child({ component: 'persistence' });
    this.write = options.write ?? ((line) => process.stdout.write(`${line}\n`));
  }

  getEngine(): SpreadsheetEngine {
    return this.engine;
  }

  getHistory(): UndoRedoManager {
    return this.history;
  }

  // ===========================================================================
  // Line & Script Execution
  // ===========================================================================

  /**
   * Parse, run and print one line. Returns null for blank lines and
   * comments.
   */
  async executeLine(line: string, lineNumber: number = 0): Promise<Output | null> {
    const parsed = this.parser.parse(line, lineNumber);
    if (parsed === null) return null;

    if (this.config.echoCommands) {
      this.write(formatEcho(line.trim(), this.config.outputFormat));
    }

    const output = parsed instanceof CommandParseError
      ? this.parseFailure(parsed)
      : await this.execute(parsed);
    this.write(formatOutput(output, this.config.outputFormat));
    return output;
  }

  /**
   * Run every line in order. With stopOnError, stops after the first
   * error output.
   */
  async executeScript(script: string): Promise<Output[]> {
    const outputs: Output[] = [];
    const lines = script.split('\n');

    for (let i = 0; i < lines.length; i++) {
      const output = await this.executeLine(lines[i], i + 1);
      if (output === null) continue;
      outputs.push(output);
      if (output.type === 'error' && this.config.stopOnError) break;
    }
    return outputs;
  }

  // ===========================================================================
  // Command Execution
  // ===========================================================================

  async execute(cmd: ParsedCommand): Promise<Output> {
    const output = await this.executeCommand(cmd);
    this.logger.debug(
      { command: cmd.type, lineNumber: cmd.lineNumber, output: output.type },
      'command_executed'
    );
    return output;
  }

  private async executeCommand(cmd: ParsedCommand): Promise<Output> {
    switch (cmd.type) {
      case 'SET': {
        const { address } = cmd;
        return this.editOutput(
          recordEdit(this.history, this.engine, address, cmd.input),
          cmd,
          () => `${formatAddress(address)} = ${this.engine.getDisplayValue(address)}`
        );
      }
      case 'CLEAR': {
        const { address } = cmd;
        return this.editOutput(
          recordEdit(this.history, this.engine, address, ''),
          cmd,
          () => `Cleared ${formatAddress(address)}`
        );
      }
      case 'GET':
        return this.cmdGet(cmd, cmd.address);
      case 'DEPS':
        return this.cmdDeps(cmd, cmd.address);
      case 'DUMP':
        return this.cmdDump(cmd, cmd.range);
      case 'COPY': {
        const { from, to } = cmd;
        return this.editOutput(
          recordCopy(this.history, this.engine, from, to),
          cmd,
          () => `Copied ${formatAddress(from)} to ${formatAddress(to)}`
        );
      }
      case 'FILL':
        return this.cmdFill(cmd);
      case 'UNDO':
      case 'REDO':
        return this.cmdHistory(cmd);
      case 'SAVE':
      case 'LOAD':
      case 'EXPORT_CSV':
      case 'IMPORT_CSV':
        return this.cmdFile(cmd);
      case 'FUNCTIONS':
        return this.cmdFunctions(cmd);
      case 'STATS':
        return this.cmdStats(cmd);
      case 'HELP':
        return this.createInfo(HELP_TEXT, cmd);
    }
  }

  // ===========================================================================
  // Cell Commands
  // ===========================================================================

  /**
   * `describe` runs after a successful edit so it sees committed values.
   */
  private editOutput(result: EditResult, cmd: ParsedCommand, describe: () => string): Output {
    if (!result.ok) return this.editError(result.error, cmd);
    return this.createResult(describe(), cmd, result.affected.map(formatAddress));
  }

  private cmdGet(cmd: ParsedCommand, address: Address): ValueOutput {
    const cell = this.engine.getCell(address);
    return {
      type: 'value',
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      cell: formatAddress(address),
      value: this.engine.getDisplayValue(address),
      kind: cell.value.kind,
      formula: this.engine.getFormulaText(address),
      error: cell.error?.message ?? null,
    };
  }

  private cmdDeps(cmd: ParsedCommand, address: Address): InfoOutput {
    const precedents = this.engine.getPrecedents(address).map(formatAddress);
    const dependents = this.engine.getDependents(address).map(formatAddress);
    const list = (refs: string[]) => (refs.length > 0 ? refs.join(', ') : '(none)');
    return this.createInfo(
      `${formatAddress(address)} precedents: ${list(precedents)}; dependents: ${list(dependents)}`,
      cmd,
      { precedents, dependents }
    );
  }

  private cmdDump(cmd: ParsedCommand, requested: CellRange | null): Output {
    let range = requested;
    if (range === null) {
      const used = this.engine.getUsedRange();
      if (used.endRow < 0) return this.createInfo('Sheet is empty', cmd);
      range = { startRow: 0, startCol: 0, endRow: used.endRow, endCol: used.endCol };
    }

    const headers = [''];
    for (let col = range.startCol; col <= range.endCol; col++) {
      headers.push(columnToLetters(col));
    }
    const rows = this.engine
      .getDisplayGrid(range)
      .map((line, i) => [String(range.startRow + i + 1), ...line]);

    const output: TableOutput = {
      type: 'table',
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      headers,
      rows,
    };
    return output;
  }

  private cmdFill(cmd: Extract<ParsedCommand, { type: 'FILL' }>): Output {
    const result = recordFill(this.history, this.engine, cmd.range, cmd.direction, cmd.count);
    if (!result.ok) {
      const output = this.editError(result.error, cmd);
      if (result.written.length > 0) {
        output.message += ` (stopped after ${result.written.length} cells)`;
      }
      return output;
    }
    return this.createResult(
      `Filled ${result.written.length} cells ${cmd.direction} (${result.patterns.join('; ')})`,
      cmd,
      result.written.map(formatAddress)
    );
  }

  // ===========================================================================
  // History Commands
  // ===========================================================================

  private cmdHistory(cmd: ParsedCommand): Output {
    const undo = cmd.type === 'UNDO';
    const result = undo ? this.history.undo() : this.history.redo();
    if (result.ok) {
      return this.createResult(`${undo ? 'Undid' : 'Redid'} ${result.command.description}`, cmd);
    }
    if (result.error === null) {
      return this.createError('history', `Nothing to ${undo ? 'undo' : 'redo'}`, cmd);
    }
    return this.editError(result.error, cmd);
  }

  // ===========================================================================
  // File Commands
  // ===========================================================================

  private async cmdFile(
    cmd: Extract<ParsedCommand, { type: 'SAVE' | 'LOAD' | 'EXPORT_CSV' | 'IMPORT_CSV' }>
  ): Promise<Output> {
    const logger = this.persistenceLogger;

    switch (cmd.type) {
      case 'SAVE': {
        const saved = await saveSheet(this.engine, cmd.path, logger);
        return saved.ok
          ? this.createResult(`Saved ${cmd.path}`, cmd)
          : this.createError('io', saved.error, cmd);
      }
      case 'EXPORT_CSV': {
        const saved = await saveCsv(this.engine, cmd.path, logger);
        return saved.ok
          ? this.createResult(`Exported ${cmd.path}`, cmd)
          : this.createError('io', saved.error, cmd);
      }
      case 'LOAD': {
        const loaded = await loadSheet(this.engine, cmd.path, logger);
        if (!loaded.ok) return this.createError('io', loaded.error, cmd);
        this.history.clear();
        const { load } = loaded;
        const skipped = load.skipped.length > 0 ? `, skipped ${load.skipped.length}` : '';
        return this.createResult(`Loaded ${load.loaded} cells from ${cmd.path}${skipped}`, cmd);
      }
      case 'IMPORT_CSV': {
        const imported = await loadCsv(this.engine, cmd.path, logger);
        if (!imported.ok) return this.createError('io', imported.error, cmd);
        this.history.clear();
        return this.createResult(
          `Imported ${imported.result.fields} cells from ${cmd.path}`,
          cmd
        );
      }
    }
  }

  // ===========================================================================
  // Inspection Commands
  // ===========================================================================

  private cmdFunctions(cmd: ParsedCommand): TableOutput {
    return {
      type: 'table',
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      headers: ['Name', 'Category', 'Syntax', 'Description'],
      rows: this.engine
        .getFunctions()
        .map((fn) => [fn.name, fn.category, fn.syntax, fn.description]),
    };
  }

  private cmdStats(cmd: ParsedCommand): InfoOutput {
    const stats = this.engine.getStats();
    const undo = this.history.getState();
    const data = {
      rows: stats.rows,
      cols: stats.cols,
      cells: stats.dataStats.nonBlankCount,
      formulas: stats.dataStats.formulaCount,
      edges: stats.graphStats.totalEdges,
      undoCount: undo.undoCount,
      redoCount: undo.redoCount,
    };
    return this.createInfo(
      `${data.rows}x${data.cols} grid, ${data.cells} cells, ${data.formulas} formulas, ${data.edges} dependencies`,
      cmd,
      data
    );
  }

  // ===========================================================================
  // Output Helpers
  // ===========================================================================

  private createResult(message: string, cmd: ParsedCommand, affected?: string[]): ResultOutput {
    const output: ResultOutput = {
      type: 'result',
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      success: true,
      message,
    };
    if (affected !== undefined) {
      output.affected = affected;
    }
    return output;
  }

  private createError(errorType: ErrorOutput['errorType'], message: string, cmd: ParsedCommand): ErrorOutput {
    return {
      type: 'error',
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      errorType,
      message,
    };
  }

  private editError(error: EditError, cmd: ParsedCommand): ErrorOutput {
    return this.createError(error.type, error.message, cmd);
  }

  private createInfo(message: string, cmd: ParsedCommand, data?: Record<string, unknown>): InfoOutput {
    const output: InfoOutput = {
      type: 'info',
      command: cmd.raw,
      lineNumber: cmd.lineNumber,
      message,
    };
    if (data !== undefined) output.data = data;
    return output;
  }

  private parseFailure(error: CommandParseError): ErrorOutput {
    return {
      type: 'error',
      command: error.line,
      lineNumber: error.lineNumber,
      errorType: 'command',
      message: error.message,
    };
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createHarnessRunner(
  config?: Partial<HarnessConfig>,
  options?: HarnessRunnerOptions
): HarnessRunner {
  return new HarnessRunner(config, options);
}
