/**
 * GridCalc Engine - Cell Values
 *
 * Closed sum type over numbers and text, with the coercion and comparison
 * rules used by operators and functions.
 */

export type CellValue =
  | { kind: 'number'; value: number }
  | { kind: 'text'; value: string };

/** Display token for a cell whose evaluation failed */
export const ERROR_SENTINEL = '#ERROR';

const NUMERIC_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function numberValue(value: number): CellValue {
  return { kind: 'number', value };
}

export function textValue(value: string): CellValue {
  return { kind: 'text', value };
}

export const EMPTY_TEXT: CellValue = textValue('');

export const ERROR_VALUE: CellValue = textValue(ERROR_SENTINEL);

/**
 * Parse text as a float64. Surrounding whitespace is ignored.
 * Returns null for anything that isn't a plain decimal number.
 */
export function parseNumber(text: string): number | null {
  const trimmed = text.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export function toNumber(v: CellValue): number {
  switch (v.kind) {
    case 'number':
      return v.value;
    case 'text':
      return parseNumber(v.value) ?? 0;
  }
}

export function formatNumber(n: number): string {
  if (Object.is(n, -0)) return '0';
  return String(n);
}

export function toText(v: CellValue): string {
  switch (v.kind) {
    case 'number':
      return formatNumber(v.value);
    case 'text':
      return v.value;
  }
}

export function isTruthy(v: CellValue): boolean {
  switch (v.kind) {
    case 'number':
      return v.value !== 0;
    case 'text':
      return v.value !== '';
  }
}

/**
 * `=` semantics. Same variant compares natively; mixed variants compare as text.
 */
export function valuesEqual(a: CellValue, b: CellValue): boolean {
  if (a.kind === 'number' && b.kind === 'number') return a.value === b.value;
  if (a.kind === 'text' && b.kind === 'text') return a.value === b.value;
  return toText(a) === toText(b);
}

/**
 * Ordering for `< > <= >=`, always numeric.
 */
export function compareValues(a: CellValue, b: CellValue): number {
  return toNumber(a) - toNumber(b);
}

export function concatValues(a: CellValue, b: CellValue): CellValue {
  return textValue(toText(a) + toText(b));
}

export function booleanValue(flag: boolean): CellValue {
  return numberValue(flag ? 1 : 0);
}

/**
 * Auto-type a literal (non-formula) input.
 */
export function literalValue(raw: string): CellValue {
  const parsed = raw === '' ? null : parseNumber(raw);
  return parsed === null ? textValue(raw) : numberValue(parsed);
}

export function sameValue(a: CellValue, b: CellValue): boolean {
  return a.kind === b.kind && Object.is(a.value, b.value);
}
