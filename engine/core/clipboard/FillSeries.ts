/**
 * GridCalc Engine - Fill Series
 *
 * Pure pattern inference for auto-fill. Works on raw literal text only;
 * formulas are handled by the caller through reference shifting.
 *
 * Detection order:
 * - Arithmetic numeric sequences (1, 3 → 5, 7)
 * - Known sequences (Mon → Tue, Jan → Feb, Q1 → Q2), wrapping around
 * - Text with number (Item1, Item2 → Item3)
 * - Copy (repeat the source values)
 */

import { parseNumber } from '../formula/Value.js';

// =============================================================================
// Types
// =============================================================================

export type FillDirection = 'down' | 'up' | 'right' | 'left';

export const FILL_DIRECTIONS: readonly FillDirection[] = ['down', 'up', 'right', 'left'];

export type KnownSequenceName = 'days' | 'months' | 'quarters';

export interface KnownSequence {
  name: KnownSequenceName;
  values: readonly string[];
}

export type FillPattern =
  | { type: 'arithmetic'; start: number; step: number }
  | {
      type: 'knownSequence';
      sequence: KnownSequence;
      startIndex: number;
      /** Source value whose capitalization generated values follow */
      caseSample: string;
    }
  | { type: 'prefixedNumber'; prefix: string; suffix: string; start: number; step: number }
  | { type: 'copy'; values: string[] };

// =============================================================================
// Constants - Built-in Lists
// =============================================================================

/** Checked in this order; the first list that matches wins */
export const KNOWN_SEQUENCES: readonly KnownSequence[] = [
  { name: 'days', values: ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'] },
  { name: 'days', values: ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'] },
  { name: 'months', values: ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] },
  {
    name: 'months',
    values: ['January', 'February', 'March', 'April', 'May', 'June',
             'July', 'August', 'September', 'October', 'November', 'December'],
  },
  { name: 'quarters', values: ['Q1', 'Q2', 'Q3', 'Q4'] },
];

const STEP_EPSILON = 1e-9;

// =============================================================================
// Detection
// =============================================================================

/**
 * Constant difference between consecutive numbers, or null.
 */
function detectLinearStep(nums: number[]): number | null {
  if (nums.length < 2) return null;

  const step = nums[1] - nums[0];
  for (let i = 2; i < nums.length; i++) {
    if (Math.abs(nums[i] - nums[i - 1] - step) > STEP_EPSILON) {
      return null;
    }
  }
  return step;
}

function matchSequence(values: string[], sequence: readonly string[]): number | null {
  if (values.length === 0 || values.length > sequence.length) return null;

  const lower = sequence.map((s) => s.toLowerCase());
  const startIndex = lower.indexOf(values[0].toLowerCase());
  if (startIndex === -1) return null;

  for (let i = 1; i < values.length; i++) {
    if (values[i].toLowerCase() !== lower[(startIndex + i) % lower.length]) {
      return null;
    }
  }
  return startIndex;
}

/**
 * Split "Row_5_data" into prefix "Row_", 5 and suffix "_data".
 * The number runs from the first digit over digits, '.' and '-'.
 */
export function splitPrefixedNumber(
  text: string
): { prefix: string; number: number; suffix: string } | null {
  const first = text.search(/\d/);
  if (first === -1) return null;

  let end = first;
  while (end < text.length && /[\d.-]/.test(text[end])) end++;

  const number = parseNumber(text.slice(first, end));
  if (number === null) return null;

  return { prefix: text.slice(0, first), number, suffix: text.slice(end) };
}

function detectPrefixedNumber(
  values: string[]
): Extract<FillPattern, { type: 'prefixedNumber' }> | null {
  const parts: Array<NonNullable<ReturnType<typeof splitPrefixedNumber>>> = [];
  for (const value of values) {
    const part = splitPrefixedNumber(value);
    if (!part) return null;
    parts.push(part);
  }

  const { prefix, suffix } = parts[0];
  if (!parts.every((p) => p.prefix === prefix && p.suffix === suffix)) return null;

  const nums = parts.map((p) => p.number);
  const step = detectLinearStep(nums);
  if (step === null) return null;

  return { type: 'prefixedNumber', prefix, suffix, start: nums[0], step };
}

/**
 * Infer a pattern from the raw text of the source cells, in fill order.
 */
export function detectPattern(
  values: string[],
  sequences: readonly KnownSequence[] = KNOWN_SEQUENCES
): FillPattern {
  if (values.length < 2) {
    return { type: 'copy', values: values.length === 0 ? [''] : [...values] };
  }

  const nums = values.map(parseNumber);
  if (nums.every((n): n is number => n !== null)) {
    const step = detectLinearStep(nums);
    if (step !== null) return { type: 'arithmetic', start: nums[0], step };
  }

  for (const sequence of sequences) {
    const startIndex = matchSequence(values, sequence.values);
    if (startIndex !== null) {
      return { type: 'knownSequence', sequence, startIndex, caseSample: values[0] };
    }
  }

  return detectPrefixedNumber(values) ?? { type: 'copy', values: [...values] };
}

// =============================================================================
// Generation
// =============================================================================

/**
 * Whole numbers print without a fraction; others in shortest form.
 */
export function formatFillNumber(n: number): string {
  if (Math.abs(n % 1) < STEP_EPSILON) {
    const whole = Math.trunc(n);
    return Object.is(whole, -0) ? '0' : String(whole);
  }
  return String(n);
}

/**
 * Match case style of source string.
 */
function matchCase(value: string, source: string): string {
  if (source === source.toUpperCase()) {
    return value.toUpperCase();
  }
  if (source === source.toLowerCase()) {
    return value.toLowerCase();
  }
  return value;
}

/**
 * Value at `index`, counted from the first source value (index 0).
 */
export function generateValue(pattern: FillPattern, index: number): string {
  switch (pattern.type) {
    case 'arithmetic':
      return formatFillNumber(pattern.start + pattern.step * index);
    case 'prefixedNumber':
      return `${pattern.prefix}${formatFillNumber(pattern.start + pattern.step * index)}${pattern.suffix}`;
    case 'knownSequence': {
      const values = pattern.sequence.values;
      return matchCase(values[(pattern.startIndex + index) % values.length], pattern.caseSample);
    }
    case 'copy':
      return pattern.values[index % pattern.values.length];
  }
}

/**
 * Continue the pattern for `count` values after `sourceLength` sources.
 */
export function generateSeries(pattern: FillPattern, sourceLength: number, count: number): string[] {
  const result: string[] = [];
  for (let i = 0; i < count; i++) {
    result.push(generateValue(pattern, sourceLength + i));
  }
  return result;
}

export function describePattern(pattern: FillPattern): string {
  switch (pattern.type) {
    case 'arithmetic':
      return pattern.step >= 0
        ? `arithmetic sequence (+${formatFillNumber(pattern.step)})`
        : `arithmetic sequence (${formatFillNumber(pattern.step)})`;
    case 'prefixedNumber':
      return `"${pattern.prefix}..." sequence (+${formatFillNumber(pattern.step)})`;
    case 'knownSequence':
      return `${pattern.sequence.name} sequence`;
    case 'copy':
      return 'copy';
  }
}
