/**
 * Command Parser Tests
 */

import { describe, it, expect } from 'vitest';
import { CommandParseError, CommandParser } from './CommandParser.js';
import type { ParsedCommand } from './types.js';

const parser = new CommandParser();

function command(line: string): ParsedCommand {
  const parsed = parser.parse(line);
  if (parsed === null || parsed instanceof CommandParseError) {
    throw new Error(`expected ${line} to parse`);
  }
  return parsed;
}

function failure(line: string): string {
  const parsed = parser.parse(line);
  if (!(parsed instanceof CommandParseError)) throw new Error(`expected ${line} to fail`);
  return parsed.message;
}

describe('CommandParser', () => {
  // ===========================================================================
  // Cell Commands
  // ===========================================================================

  describe('SET', () => {
    it('should take the rest of the line as input', () => {
      expect(parser.parse('SET A1 =SUM(B1:B2)', 3)).toEqual({
        type: 'SET',
        address: { row: 0, col: 0 },
        input: '=SUM(B1:B2)',
        raw: 'SET A1 =SUM(B1:B2)',
        lineNumber: 3,
      });
    });

    it('should be case-insensitive and keep inner spaces', () => {
      expect(command('set b2 hello   world')).toMatchObject({
        type: 'SET',
        address: { row: 1, col: 1 },
        input: 'hello   world',
      });
    });

    it('should allow empty input', () => {
      expect(command('SET A1')).toMatchObject({ type: 'SET', input: '' });
    });

    it('should require a reference', () => {
      expect(failure('SET')).toBe('SET requires a cell reference');
      expect(failure('SET A0 1')).toBe('Invalid cell reference: A0');
    });
  });

  describe('single-cell commands', () => {
    it('should parse GET, CLEAR and DEPS', () => {
      expect(command('GET C3')).toMatchObject({ type: 'GET', address: { row: 2, col: 2 } });
      expect(command('clear A1')).toMatchObject({ type: 'CLEAR' });
      expect(command('DEPS Z9')).toMatchObject({ type: 'DEPS', address: { row: 8, col: 25 } });
    });

    it('should check arity', () => {
      expect(failure('GET A1 B1')).toBe('GET takes exactly 1 argument, got 2');
      expect(failure('DEPS')).toBe('DEPS takes exactly 1 argument, got 0');
      expect(failure('UNDO now')).toBe('UNDO takes no arguments, got 1');
    });
  });

  // ===========================================================================
  // Range Commands
  // ===========================================================================

  describe('range commands', () => {
    it('should parse DUMP with and without a range', () => {
      expect(command('DUMP')).toMatchObject({ type: 'DUMP', range: null });
      expect(command('DUMP B2:A1')).toMatchObject({
        range: { startRow: 0, startCol: 0, endRow: 1, endCol: 1 },
      });
      expect(failure('DUMP A1:')).toBe('Invalid range: A1:');
    });

    it('should parse COPY', () => {
      expect(command('COPY A1 B2')).toMatchObject({
        type: 'COPY',
        from: { row: 0, col: 0 },
        to: { row: 1, col: 1 },
      });
      expect(failure('COPY A1')).toBe('COPY takes exactly 2 arguments, got 1');
    });

    it('should parse FILL', () => {
      expect(command('FILL A1:A2 DOWN 3')).toMatchObject({
        type: 'FILL',
        range: { startRow: 0, startCol: 0, endRow: 1, endCol: 0 },
        direction: 'down',
        count: 3,
      });
    });

    it('should reject bad fill arguments', () => {
      expect(failure('FILL A1 sideways 2')).toBe(
        'Invalid fill direction: sideways (expected down, up, right, left)'
      );
      expect(failure('FILL A1 down 0')).toBe('Invalid fill count: 0');
      expect(failure('FILL A1 down 2.5')).toBe('Invalid fill count: 2.5');
    });
  });

  // ===========================================================================
  // File Commands
  // ===========================================================================

  describe('file commands', () => {
    it('should take the rest of the line as the path', () => {
      expect(command('SAVE /tmp/my sheet.json')).toMatchObject({
        type: 'SAVE',
        path: '/tmp/my sheet.json',
      });
      expect(command('EXPORT_CSV "out.csv"')).toMatchObject({ type: 'EXPORT_CSV', path: 'out.csv' });
    });

    it('should require a path', () => {
      expect(failure('LOAD')).toBe('LOAD requires a file path');
    });
  });

  // ===========================================================================
  // Lines & Scripts
  // ===========================================================================

  it('should ignore blank lines and comments', () => {
    expect(parser.parse('')).toBeNull();
    expect(parser.parse('   ')).toBeNull();
    expect(parser.parse('# SET A1 1')).toBeNull();
  });

  it('should report unknown commands', () => {
    const parsed = parser.parse('  FROB A1  ', 7);
    expect(parsed).toBeInstanceOf(CommandParseError);
    expect(parsed).toMatchObject({ message: 'Unknown command: FROB', lineNumber: 7, line: 'FROB A1' });
  });

  it('should number script lines from 1', () => {
    const commands = parser.parseScript('SET A1 1\n\n# note\nBAD');

    expect(commands).toHaveLength(2);
    expect(commands[0]).toMatchObject({ type: 'SET', lineNumber: 1 });
    expect(commands[1]).toBeInstanceOf(CommandParseError);
    expect(commands[1]).toMatchObject({ lineNumber: 4 });
  });
});
