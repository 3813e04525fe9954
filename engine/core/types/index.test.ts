/**
 * A1 Notation Tests
 */

import { describe, it, expect } from 'vitest';
import {
  columnToLetters,
  formatAddress,
  formatRange,
  lettersToColumn,
  normalizeRange,
  parseAddress,
  parseRange,
  rangeAddresses,
} from './index.js';

describe('A1 notation', () => {
  it('should convert columns to base-26 letters', () => {
    expect(columnToLetters(0)).toBe('A');
    expect(columnToLetters(25)).toBe('Z');
    expect(columnToLetters(26)).toBe('AA');
    expect(columnToLetters(701)).toBe('ZZ');
    expect(columnToLetters(702)).toBe('AAA');
  });

  it('should convert letters back to columns', () => {
    expect(lettersToColumn('a')).toBe(0);
    expect(lettersToColumn('AB')).toBe(27);
    expect(lettersToColumn('A1')).toBeNull();
  });

  it('should parse and format addresses', () => {
    expect(parseAddress('b3')).toEqual({ row: 2, col: 1 });
    expect(parseAddress('AA10')).toEqual({ row: 9, col: 26 });
    expect(parseAddress('A0')).toBeNull();
    expect(parseAddress('3B')).toBeNull();
    expect(formatAddress({ row: 9, col: 26 })).toBe('AA10');
  });

  it('should normalize ranges given in any orientation', () => {
    expect(parseRange('C3:A1')).toEqual({ startRow: 0, startCol: 0, endRow: 2, endCol: 2 });
    expect(parseRange('B2')).toEqual({ startRow: 1, startCol: 1, endRow: 1, endCol: 1 });
    expect(parseRange('A1:B2:C3')).toBeNull();
    expect(formatRange(normalizeRange({ row: 1, col: 1 }, { row: 0, col: 0 }))).toBe('A1:B2');
  });

  it('should expand ranges row-major', () => {
    expect(rangeAddresses(normalizeRange({ row: 1, col: 1 }, { row: 0, col: 0 }))).toEqual([
      { row: 0, col: 0 },
      { row: 0, col: 1 },
      { row: 1, col: 0 },
      { row: 1, col: 1 },
    ]);
  });
});
