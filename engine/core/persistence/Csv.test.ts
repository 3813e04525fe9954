/**
 * CSV Parser and Import/Export Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { exportCsv, importCsv, parseCsv, quoteCsvField } from './Csv.js';
import { SpreadsheetEngine } from '../SpreadsheetEngine.js';
import { createSilentLogger } from '../logging/logger.js';
import { parseAddress, type Address } from '../types/index.js';

function at(ref: string): Address {
  const address = parseAddress(ref);
  if (!address) throw new Error(`bad test reference ${ref}`);
  return address;
}

describe('parseCsv', () => {
  it('should split records and fields', () => {
    expect(parseCsv('a,b\n1,2\n')).toEqual([
      ['a', 'b'],
      ['1', '2'],
    ]);
  });

  it('should unquote fields with delimiters, quotes and newlines', () => {
    expect(parseCsv('"x,y","say ""hi"""\r\nz')).toEqual([['x,y', 'say "hi"'], ['z']]);
    expect(parseCsv('"multi\nline",b')).toEqual([['multi\nline', 'b']]);
  });

  it('should keep empty fields and blank lines', () => {
    expect(parseCsv('a,,c')).toEqual([['a', '', 'c']]);
    expect(parseCsv('a\n\nb')).toEqual([['a'], [''], ['b']]);
    expect(parseCsv('')).toEqual([]);
  });

  it('should treat quotes inside a bare field as text', () => {
    expect(parseCsv('5" pipe,x')).toEqual([['5" pipe', 'x']]);
  });

  it('should accept other delimiters', () => {
    expect(parseCsv('a;b', ';')).toEqual([['a', 'b']]);
    expect(() => parseCsv('a', '\n')).toThrow('Invalid CSV delimiter');
  });
});

describe('quoteCsvField', () => {
  it('should quote only when needed', () => {
    expect(quoteCsvField('plain')).toBe('plain');
    expect(quoteCsvField('a,b')).toBe('"a,b"');
    expect(quoteCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(quoteCsvField('two\nlines')).toBe('"two\nlines"');
  });
});

describe('CSV import/export', () => {
  let engine: SpreadsheetEngine;

  beforeEach(() => {
    engine = new SpreadsheetEngine({
      rows: 10,
      cols: 5,
      logger: createSilentLogger(),
      httpClient: { getText: () => ({ ok: false, error: 'offline' }) },
    });
  });

  it('should export display values from A1 to the used end', () => {
    engine.setCell(at('A1'), '3');
    engine.setCell(at('B2'), '=A1*2');
    engine.setCell(at('C1'), 'x,y');

    expect(exportCsv(engine)).toBe('3,,"x,y"\n,6,\n');
  });

  it('should return null for an empty sheet', () => {
    expect(exportCsv(engine)).toBeNull();
  });

  it('should import values and formulas and grow the grid', () => {
    const result = importCsv(engine, 'a,b\n=A1&B1,3\n');

    expect(result.fields).toBe(4);
    expect(result.formulas).toBe(1);
    expect(result.load.loaded).toBe(4);
    expect(engine.rows).toBe(11);
    expect(engine.cols).toBe(6);
    expect(engine.getDisplayValue(at('A2'))).toBe('ab');
    expect(engine.getFormulaText(at('A2'))).toBe('=A1&B1');
  });

  it('should never shrink the grid', () => {
    importCsv(engine, 'x');
    expect(engine.rows).toBe(10);
    expect(engine.cols).toBe(5);
  });

  it('should replace existing contents', () => {
    engine.setCell(at('E5'), 'old');
    importCsv(engine, 'new');

    expect(engine.getRawInput(at('E5'))).toBe('');
    expect(engine.getRawInput(at('A1'))).toBe('new');
  });
});
