/**
 * Harness Runner Tests
 *
 * Drives the runner line by line and checks the printed output.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { HELP_TEXT, HarnessRunner } from './HarnessRunner.js';
import type { HarnessConfig } from './types.js';
import { SpreadsheetEngine } from '../core/SpreadsheetEngine.js';
import { createSilentLogger } from '../core/logging/logger.js';

describe('HarnessRunner', () => {
  let lines: string[];

  function createRunner(config: Partial<HarnessConfig> = {}): HarnessRunner {
    const logger = createSilentLogger();
    const engine = new SpreadsheetEngine({
      rows: 10,
      cols: 5,
      logger,
      httpClient: { getText: () => ({ ok: false, error: 'offline' }) },
    });
    return new HarnessRunner(
      { outputFormat: 'pretty', ...config },
      { engine, logger, write: (line) => lines.push(line) }
    );
  }

  async function run(runner: HarnessRunner, ...commands: string[]): Promise<string[]> {
    lines = [];
    for (const command of commands) {
      await runner.executeLine(command);
    }
    return lines;
  }

  beforeEach(() => {
    lines = [];
  });

  // ===========================================================================
  // Cell Commands
  // ===========================================================================

  describe('cell commands', () => {
    it('should set cells and show recalculated values', async () => {
      const runner = createRunner();
      expect(await run(runner, 'SET A1 5', 'SET B1 =A1*2', 'SET A1 7', 'GET B1')).toEqual([
        'OK A1 = 5',
        'OK B1 = 10',
        'OK A1 = 7',
        'B1 = 14 [=A1*2]',
      ]);
    });

    it('should report affected cells on the result', async () => {
      const runner = createRunner();
      await run(runner, 'SET A1 1', 'SET B1 =A1');
      expect(await runner.executeLine('SET A1 2')).toMatchObject({
        type: 'result',
        success: true,
        message: 'A1 = 2',
        affected: ['A1', 'B1'],
      });
    });

    it('should show evaluation errors on GET', async () => {
      const runner = createRunner();
      expect(await run(runner, 'SET A1 =1/0', 'GET A1')).toEqual([
        'OK A1 = #ERROR',
        'A1 = #ERROR [=1/0] (Division by zero)',
      ]);
    });

    it('should reject bad formulas and cycles', async () => {
      const runner = createRunner();
      expect(await run(runner, 'SET A1 =1+', 'SET B1 =B1', 'SET A1 =Z99')).toEqual([
        'ERROR (parse): Unexpected end of formula',
        'ERROR (circular): Circular reference: B1 -> B1',
        'ERROR (reference): Z99 is outside the 10x5 grid',
      ]);
    });

    it('should clear cells and list dependencies', async () => {
      const runner = createRunner();
      expect(await run(runner, 'SET A1 5', 'SET B1 =A1+A2', 'CLEAR A1', 'DEPS A1', 'DEPS B1')).toEqual([
        'OK A1 = 5',
        'OK B1 = 5',
        'OK Cleared A1',
        'INFO: A1 precedents: (none); dependents: B1',
        'INFO: B1 precedents: A1, A2; dependents: (none)',
      ]);
    });
  });

  // ===========================================================================
  // Range Commands
  // ===========================================================================

  describe('range commands', () => {
    it('should dump the used area as a table', async () => {
      const runner = createRunner();
      await run(runner, 'SET A1 5', 'SET B1 =A1*2');
      expect(await run(runner, 'DUMP')).toEqual([
        ['   | A | B  ', '---+---+----', ' 1 | 5 | 10 '].join('\n'),
      ]);
    });

    it('should report an empty sheet', async () => {
      expect(await run(createRunner(), 'DUMP')).toEqual(['INFO: Sheet is empty']);
    });

    it('should copy and fill', async () => {
      const runner = createRunner();
      expect(
        await run(runner, 'SET A1 1', 'SET A2 2', 'FILL A1:A2 down 2', 'SET B1 =A1*10', 'COPY B1 B4', 'GET B4')
      ).toEqual([
        'OK A1 = 1',
        'OK A2 = 2',
        'OK Filled 2 cells down (arithmetic sequence (+1))',
        'OK B1 = 10',
        'OK Copied B1 to B4',
        'B4 = 40 [=A4*10]',
      ]);
    });

    it('should reject fills past the grid', async () => {
      const runner = createRunner();
      expect(await run(runner, 'FILL A10 down 1')).toEqual([
        'ERROR (reference): A11 is outside the 10x5 grid',
      ]);
    });
  });

  // ===========================================================================
  // History
  // ===========================================================================

  describe('history', () => {
    it('should undo and redo edits', async () => {
      const runner = createRunner();
      expect(
        await run(runner, 'SET A1 1', 'SET B1 =A1+1', 'SET A1 5', 'UNDO', 'GET B1', 'REDO', 'GET B1')
      ).toEqual([
        'OK A1 = 1',
        'OK B1 = 2',
        'OK A1 = 5',
        'OK Undid Edit A1',
        'B1 = 2 [=A1+1]',
        'OK Redid Edit A1',
        'B1 = 6 [=A1+1]',
      ]);
    });

    it('should undo a fill as one step', async () => {
      const runner = createRunner();
      expect(await run(runner, 'SET A1 1', 'SET A2 2', 'FILL A1:A2 down 3', 'UNDO', 'GET A5')).toEqual([
        'OK A1 = 1',
        'OK A2 = 2',
        'OK Filled 3 cells down (arithmetic sequence (+1))',
        'OK Undid Fill down 3',
        'A5 = ',
      ]);
    });

    it('should report an empty history', async () => {
      expect(await run(createRunner(), 'UNDO', 'REDO')).toEqual([
        'ERROR (history): Nothing to undo',
        'ERROR (history): Nothing to redo',
      ]);
    });
  });

  // ===========================================================================
  // File Commands
  // ===========================================================================

  describe('file commands', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'gridcalc-harness-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should save and load a sheet and reset history', async () => {
      const runner = createRunner();
      const path = join(dir, 'sheet.json');

      expect(
        await run(runner, 'SET A1 5', 'SET B1 =A1*2', `SAVE ${path}`, 'SET A1 9', `LOAD ${path}`, 'GET B1', 'UNDO')
      ).toEqual([
        'OK A1 = 5',
        'OK B1 = 10',
        `OK Saved ${path}`,
        'OK A1 = 9',
        `OK Loaded 2 cells from ${path}`,
        'B1 = 10 [=A1*2]',
        'ERROR (history): Nothing to undo',
      ]);
    });

    it('should import and export CSV', async () => {
      const runner = createRunner();
      const input = join(dir, 'in.csv');
      const output = join(dir, 'out.csv');
      await writeFile(input, 'a,b\n1,=A2+1\n', 'utf8');

      expect(await run(runner, `IMPORT_CSV ${input}`, 'GET B2', `EXPORT_CSV ${output}`)).toEqual([
        `OK Imported 4 cells from ${input}`,
        'B2 = 2 [=A2+1]',
        `OK Exported ${output}`,
      ]);
    });

    it('should report I/O failures', async () => {
      const runner = createRunner();
      await run(runner, `EXPORT_CSV ${join(dir, 'empty.csv')}`, `LOAD ${join(dir, 'missing.json')}`);

      expect(lines[0]).toBe('ERROR (io): No data to export');
      expect(lines[1].startsWith('ERROR (io): ENOENT')).toBe(true);
    });
  });

  // ===========================================================================
  // Inspection & Output
  // ===========================================================================

  describe('inspection', () => {
    it('should list functions', async () => {
      const output = await createRunner().executeLine('FUNCTIONS');
      expect(output?.type).toBe('table');
      if (output?.type === 'table') {
        expect(output.headers).toEqual(['Name', 'Category', 'Syntax', 'Description']);
        expect(output.rows).toHaveLength(21);
        expect(output.rows[0]).toEqual(['ABS', 'numeric', 'ABS(number)', 'Absolute value']);
      }
    });

    it('should summarize the sheet', async () => {
      const runner = createRunner();
      await run(runner, 'SET A1 1', 'SET B1 =A1+A2');
      expect(await run(runner, 'STATS')).toEqual(['INFO: 10x5 grid, 2 cells, 1 formulas, 2 dependencies']);
    });

    it('should print help', async () => {
      expect(await run(createRunner(), 'HELP')).toEqual([`INFO: ${HELP_TEXT}`]);
    });

    it('should report unknown commands', async () => {
      expect(await run(createRunner(), 'FROB', '# comment', '')).toEqual([
        'ERROR (command): Unknown command: FROB',
      ]);
    });
  });

  describe('output modes', () => {
    it('should print one JSON object per output', async () => {
      const runner = createRunner({ outputFormat: 'json' });
      await run(runner, 'GET A1');

      expect(JSON.parse(lines[0])).toEqual({
        type: 'value',
        command: 'GET A1',
        lineNumber: 0,
        cell: 'A1',
        value: '',
        kind: 'text',
        formula: null,
        error: null,
      });
    });

    it('should echo commands', async () => {
      const runner = createRunner({ echoCommands: true });
      expect(await run(runner, '  SET A1 1  ')).toEqual(['> SET A1 1', 'OK A1 = 1']);
    });
  });

  describe('executeScript', () => {
    const script = 'SET A1 1\nBAD\nSET A2 2';

    it('should keep going after errors by default', async () => {
      const runner = createRunner();
      const outputs = await runner.executeScript(script);

      expect(outputs.map((o) => o.type)).toEqual(['result', 'error', 'result']);
      expect(outputs[1].lineNumber).toBe(2);
    });

    it('should stop at the first error when asked', async () => {
      const runner = createRunner({ stopOnError: true });
      const outputs = await runner.executeScript(script);

      expect(outputs).toHaveLength(2);
      expect(runner.getEngine().getRawInput({ row: 1, col: 0 })).toBe('');
    });
  });
});
