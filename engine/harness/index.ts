/**
 * GridCalc Headless Harness - Module Exports
 *
 * A line-oriented command runner for driving the engine from scripts
 * and stdin.
 */

export { CommandParser, CommandParseError, COMMAND_TYPES } from './CommandParser.js';
export { HarnessRunner, createHarnessRunner, HELP_TEXT } from './HarnessRunner.js';
export { formatOutput, formatTable, formatEcho } from './OutputFormatter.js';

export type { HarnessRunnerOptions } from './HarnessRunner.js';
export type {
  CommandType,
  CommandBody,
  ParsedCommand,
  OutputType,
  OutputFormat,
  Output,
  OutputBase,
  ResultOutput,
  ValueOutput,
  TableOutput,
  ErrorOutput,
  InfoOutput,
  HarnessConfig,
} from './types.js';

export { DEFAULT_CONFIG } from './types.js';
