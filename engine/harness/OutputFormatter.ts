/**
 * GridCalc Headless Harness - Output Formatting
 */

import type { Output, OutputFormat } from './types.js';

export function formatTable(headers: string[], rows: string[][]): string {
  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, i) =>
    Math.max(...allRows.map((row) => (row[i] ?? '').length))
  );

  const separator = colWidths.map((w) => '-'.repeat(w + 2)).join('+');
  const formatRow = (row: string[]) =>
    row.map((cell, i) => ` ${cell.padEnd(colWidths[i])} `).join('|');

  return [formatRow(headers), separator, ...rows.map(formatRow)].join('\n');
}

/**
 * One line per output in json mode; pretty mode may span lines (tables).
 */
export function formatOutput(output: Output, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(output);
  }

  switch (output.type) {
    case 'result':
      return `OK ${output.message}`;

    case 'value': {
      let line = `${output.cell} = ${output.value}`;
      if (output.formula !== null) line += ` [${output.formula}]`;
      if (output.error !== null) line += ` (${output.error})`;
      return line;
    }

    case 'table':
      return formatTable(output.headers, output.rows);

    case 'error':
      return `ERROR (${output.errorType}): ${output.message}`;

    case 'info':
      return `INFO: ${output.message}`;
  }
}

export function formatEcho(command: string, format: OutputFormat): string {
  return format === 'json' ? JSON.stringify({ type: 'echo', command }) : `> ${command}`;
}
