/**
 * FillSeries Unit Tests
 *
 * Covers:
 * - Arithmetic sequences
 * - Day, month and quarter names with case following the source
 * - Text with an embedded number
 * - Copy fallback
 */

import { describe, it, expect } from 'vitest';
import {
  describePattern,
  detectPattern,
  formatFillNumber,
  generateSeries,
  splitPrefixedNumber,
} from './FillSeries.js';

function continueSeries(values: string[], count: number): string[] {
  return generateSeries(detectPattern(values), values.length, count);
}

describe('FillSeries', () => {
  // ===========================================================================
  // Numeric
  // ===========================================================================

  describe('arithmetic sequences', () => {
    it('should continue a constant step', () => {
      expect(continueSeries(['1', '3'], 2)).toEqual(['5', '7']);
      expect(continueSeries(['10', '8', '6'], 2)).toEqual(['4', '2']);
    });

    it('should handle fractional steps', () => {
      expect(continueSeries(['1.5', '2'], 2)).toEqual(['2.5', '3']);
    });

    it('should fall back to copy when steps differ', () => {
      expect(detectPattern(['1', '2', '4'])).toEqual({ type: 'copy', values: ['1', '2', '4'] });
    });
  });

  // ===========================================================================
  // Known sequences
  // ===========================================================================

  describe('known sequences', () => {
    it('should wrap day names', () => {
      expect(continueSeries(['Sat', 'Sun'], 2)).toEqual(['Mon', 'Tue']);
    });

    it('should follow the case of the first source value', () => {
      expect(continueSeries(['mon', 'tue'], 1)).toEqual(['wed']);
      expect(continueSeries(['MAY', 'JUN'], 1)).toEqual(['JUL']);
    });

    it('should recognize full month names and quarters', () => {
      expect(continueSeries(['November', 'December'], 1)).toEqual(['January']);
      expect(continueSeries(['Q3', 'Q4'], 2)).toEqual(['Q1', 'Q2']);
    });

    it('should name the sequence', () => {
      expect(describePattern(detectPattern(['Mon', 'Tue']))).toBe('days sequence');
    });
  });

  // ===========================================================================
  // Text with number
  // ===========================================================================

  describe('prefixed numbers', () => {
    it('should step the embedded number', () => {
      expect(continueSeries(['Item1', 'Item3'], 2)).toEqual(['Item5', 'Item7']);
      expect(continueSeries(['Row_5_data', 'Row_6_data'], 1)).toEqual(['Row_7_data']);
    });

    it('should require a shared prefix and suffix', () => {
      expect(detectPattern(['A1', 'B2']).type).toBe('copy');
    });

    it('should split around the first number', () => {
      expect(splitPrefixedNumber('Row_5_data')).toEqual({ prefix: 'Row_', number: 5, suffix: '_data' });
      expect(splitPrefixedNumber('none')).toBeNull();
    });

    it('should describe the prefix and step', () => {
      expect(describePattern(detectPattern(['Item1', 'Item3']))).toBe('"Item..." sequence (+2)');
    });
  });

  // ===========================================================================
  // Copy
  // ===========================================================================

  describe('copy', () => {
    it('should repeat a single value', () => {
      expect(continueSeries(['5'], 3)).toEqual(['5', '5', '5']);
    });

    it('should cycle through all sources', () => {
      expect(continueSeries(['a', 'b'], 3)).toEqual(['a', 'b', 'a']);
    });

    it('should repeat empty text with no sources', () => {
      expect(continueSeries([], 2)).toEqual(['', '']);
    });
  });

  it('should format numbers for fill output', () => {
    expect(formatFillNumber(4)).toBe('4');
    expect(formatFillNumber(-0)).toBe('0');
    expect(formatFillNumber(2.25)).toBe('2.25');
    expect(describePattern(detectPattern(['3', '1']))).toBe('arithmetic sequence (-2)');
  });
});
