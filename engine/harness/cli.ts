#!/usr/bin/env node
/**
 * GridCalc Headless Harness - CLI Entry Point
 *
 * Usage:
 *   node dist/engine/harness/cli.js [options]            # REPL on a TTY
 *   node dist/engine/harness/cli.js [options] < script.txt
 *   echo "SET A1 100" | node dist/engine/harness/cli.js --pretty
 *
 * Options:
 *   --pretty        Human-readable output (default: JSON lines)
 *   --json          JSON lines output
 *   --echo          Echo commands before their output
 *   --stop-on-error Stop at the first error (exit code 1)
 *   --rows N        Grid rows (default 100)
 *   --cols N        Grid columns (default 26)
 *   --help          Show help message
 *
 * Logs go to stderr; set LOG_LEVEL (e.g. debug) to see them.
 */

import * as readline from 'node:readline';
import pino from 'pino';
import { createHarnessRunner, HELP_TEXT } from './HarnessRunner.js';
import { DEFAULT_CONFIG, type HarnessConfig } from './types.js';
import { createLogger } from '../core/logging/logger.js';

// =============================================================================
// CLI Argument Parsing
// =============================================================================

type CLIArgs =
  | { ok: true; config: HarnessConfig; help: boolean }
  | { ok: false; error: string };

function parseDimension(flag: string, value: string | undefined): number | string {
  if (value === undefined || !/^\d+$/.test(value) || parseInt(value, 10) < 1) {
    return `${flag} needs a positive integer`;
  }
  return parseInt(value, 10);
}

function parseArgs(args: string[]): CLIArgs {
  const config: HarnessConfig = { ...DEFAULT_CONFIG };
  let help = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--pretty':
        config.outputFormat = 'pretty';
        break;
      case '--json':
        config.outputFormat = 'json';
        break;
      case '--echo':
        config.echoCommands = true;
        break;
      case '--stop-on-error':
        config.stopOnError = true;
        break;
      case '--rows':
      case '--cols': {
        const value = parseDimension(arg, args[++i]);
        if (typeof value === 'string') return { ok: false, error: value };
        if (arg === '--rows') config.rows = value;
        else config.cols = value;
        break;
      }
      case '--help':
      case '-h':
        help = true;
        break;
      default:
        return { ok: false, error: `Unknown option: ${arg}` };
    }
  }

  return { ok: true, config, help };
}

const USAGE = `
GridCalc headless harness

USAGE:
  node dist/engine/harness/cli.js [--pretty|--json] [--echo] [--stop-on-error]
                                  [--rows N] [--cols N]

Reads commands from stdin, one per line, and prints one output per command.

${HELP_TEXT}
`;

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<void> {
  const cliArgs = parseArgs(process.argv.slice(2));
  if (!cliArgs.ok) {
    console.error(cliArgs.error);
    console.error('Run with --help for usage.');
    process.exitCode = 2;
    return;
  }
  if (cliArgs.help) {
    console.log(USAGE);
    return;
  }

  const { config } = cliArgs;
  const logger = createLogger({ name: 'harness', destination: pino.destination(2) });
  const runner = createHarnessRunner(config, { logger });

  const interactive = process.stdin.isTTY === true;
  const rl = readline.createInterface({
    input: process.stdin,
    output: interactive ? process.stdout : undefined,
    prompt: 'grid> ',
    terminal: interactive,
  });

  if (interactive) rl.prompt();

  let lineNumber = 0;
  for await (const line of rl) {
    lineNumber++;
    const output = await runner.executeLine(line, lineNumber);

    if (output?.type === 'error' && config.stopOnError) {
      process.exitCode = 1;
      break;
    }
    if (interactive) rl.prompt();
  }
  rl.close();
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exitCode = 1;
});
