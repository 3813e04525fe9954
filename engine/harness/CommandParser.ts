/**
 * GridCalc Headless Harness - Command Parser
 *
 * Parses text commands into structured command objects.
 *
 * Command syntax:
 *   COMMAND [args...]
 *
 * Cell Operations:
 *   SET A1 100                 - Set a literal
 *   SET A1 =SUM(B1:B10)        - Set a formula (rest of line, verbatim)
 *   GET A1                     - Value, formula and error of a cell
 *   CLEAR A1                   - Clear a cell
 *   DEPS A1                    - Precedents and dependents
 *
 * Range Operations:
 *   DUMP [A1:C5]               - Display values as a table
 *   COPY A1 B2                 - Copy with reference shifting
 *   FILL A1:A2 down 5          - Auto-fill
 *
 * History:
 *   UNDO / REDO
 *
 * Files:
 *   SAVE <path> / LOAD <path> / EXPORT_CSV <path> / IMPORT_CSV <path>
 *
 * Inspection:
 *   FUNCTIONS / STATS / HELP
 *
 * Lines starting with # are comments.
 */

import { parseAddress, parseRange, type Address, type CellRange } from '../core/types/index.js';
import { FILL_DIRECTIONS, type FillDirection } from '../core/clipboard/FillSeries.js';
import type { CommandBody, CommandType, ParsedCommand } from './types.js';

export const COMMAND_TYPES: readonly CommandType[] = [
  'SET', 'GET', 'CLEAR', 'DEPS',
  'DUMP', 'COPY', 'FILL',
  'UNDO', 'REDO',
  'SAVE', 'LOAD', 'EXPORT_CSV', 'IMPORT_CSV',
  'FUNCTIONS', 'STATS', 'HELP',
];

function isCommandType(name: string): name is CommandType {
  return COMMAND_TYPES.some((type) => type === name);
}

// =============================================================================
// Parse Error
// =============================================================================

export class CommandParseError extends Error {
  readonly lineNumber: number;
  readonly line: string;

  constructor(message: string, lineNumber: number, line: string) {
    super(message);
    this.name = 'CommandParseError';
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

// =============================================================================
// Command Parser
// =============================================================================

/** Split off the first whitespace-delimited word */
function splitWord(text: string): [string, string] {
  const space = text.search(/\s/);
  if (space === -1) return [text, ''];
  return [text.slice(0, space), text.slice(space).trimStart()];
}

function unquote(text: string): string {
  if (text.length >= 2 && (text[0] === '"' || text[0] === "'") && text.endsWith(text[0])) {
    return text.slice(1, -1);
  }
  return text;
}

export class CommandParser {
  /**
   * Parse one line. Blank lines and comments give null; malformed
   * commands give a CommandParseError.
   */
  parse(line: string, lineNumber: number = 0): ParsedCommand | CommandParseError | null {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) return null;

    const [word, rest] = splitWord(trimmed);
    const name = word.toUpperCase();
    if (!isCommandType(name)) {
      return new CommandParseError(`Unknown command: ${word}`, lineNumber, trimmed);
    }

    try {
      return { ...this.parseBody(name, rest), raw: trimmed, lineNumber };
    } catch (err) {
      if (err instanceof CommandSyntaxError) {
        return new CommandParseError(err.message, lineNumber, trimmed);
      }
      throw err;
    }
  }

  /**
   * Parse a script; line numbers start at 1.
   */
  parseScript(script: string): Array<ParsedCommand | CommandParseError> {
    const commands: Array<ParsedCommand | CommandParseError> = [];
    script.split('\n').forEach((line, i) => {
      const command = this.parse(line, i + 1);
      if (command) commands.push(command);
    });
    return commands;
  }

  private parseBody(type: CommandType, rest: string): CommandBody {
    switch (type) {
      case 'SET': {
        const [ref, input] = splitWord(rest);
        if (ref === '') throw new CommandSyntaxError('SET requires a cell reference');
        return { type, address: this.address(ref), input };
      }

      case 'GET':
      case 'CLEAR':
      case 'DEPS': {
        const [ref] = this.args(type, rest, 1);
        return { type, address: this.address(ref) };
      }

      case 'DUMP': {
        const args = rest === '' ? [] : this.args(type, rest, 1);
        return { type, range: args.length === 0 ? null : this.range(args[0]) };
      }

      case 'COPY': {
        const [from, to] = this.args(type, rest, 2);
        return { type, from: this.address(from), to: this.address(to) };
      }

      case 'FILL': {
        const [range, direction, count] = this.args(type, rest, 3);
        return {
          type,
          range: this.range(range),
          direction: this.direction(direction),
          count: this.count(count),
        };
      }

      case 'SAVE':
      case 'LOAD':
      case 'EXPORT_CSV':
      case 'IMPORT_CSV': {
        const path = unquote(rest);
        if (path === '') throw new CommandSyntaxError(`${type} requires a file path`);
        return { type, path };
      }

      case 'UNDO':
      case 'REDO':
      case 'FUNCTIONS':
      case 'STATS':
      case 'HELP':
        this.args(type, rest, 0);
        return { type };
    }
  }

  private args(type: CommandType, rest: string, count: number): string[] {
    const args = rest === '' ? [] : rest.split(/\s+/);
    if (args.length !== count) {
      const expected = count === 0
        ? 'no arguments'
        : `exactly ${count} argument${count === 1 ? '' : 's'}`;
      throw new CommandSyntaxError(`${type} takes ${expected}, got ${args.length}`);
    }
    return args;
  }

  private address(ref: string): Address {
    const address = parseAddress(ref);
    if (!address) throw new CommandSyntaxError(`Invalid cell reference: ${ref}`);
    return address;
  }

  private range(ref: string): CellRange {
    const range = parseRange(ref);
    if (!range) throw new CommandSyntaxError(`Invalid range: ${ref}`);
    return range;
  }

  private direction(text: string): FillDirection {
    const direction = FILL_DIRECTIONS.find((d) => d === text.toLowerCase());
    if (!direction) {
      throw new CommandSyntaxError(
        `Invalid fill direction: ${text} (expected ${FILL_DIRECTIONS.join(', ')})`
      );
    }
    return direction;
  }

  private count(text: string): number {
    const count = /^\d+$/.test(text) ? parseInt(text, 10) : 0;
    if (count < 1) throw new CommandSyntaxError(`Invalid fill count: ${text}`);
    return count;
  }
}

/** Internal: unwinds parseBody to parse(), which turns it into a value */
class CommandSyntaxError extends Error {}
