/**
 * GridCalc Engine - Built-in Functions
 *
 * String positions are 0-based and count Unicode code points.
 */

import {
  CellValue,
  booleanValue,
  isTruthy,
  numberValue,
  parseNumber,
  textValue,
  toNumber,
  toText,
} from './Value.js';
import { evaluationError, ok } from './errors.js';
import { ProcessHttpClient, type HttpClient } from './HttpClient.js';
import {
  FunctionRegistry,
  type EagerFunctionDefinition,
  type FunctionDefinition,
  type FunctionResult,
  type LazyFunctionDefinition,
} from './FunctionRegistry.js';

// ============================================================================
// Argument helpers
// ============================================================================

type IntegerArgument = { ok: true; value: number } | ReturnType<typeof evaluationError>;

/**
 * Count, start and places arguments. Text must parse as a number; the empty
 * text of an unset cell reads as 0. Fractions truncate toward zero.
 */
function integerArgument(value: CellValue, fn: string, label: string): IntegerArgument {
  switch (value.kind) {
    case 'number':
      return ok(Math.trunc(value.value));
    case 'text': {
      if (value.value === '') return ok(0);
      const parsed = parseNumber(value.value);
      if (parsed === null) {
        return evaluationError('type', `${fn}: ${label} '${value.value}' is not a number`);
      }
      return ok(Math.trunc(parsed));
    }
  }
}

function codePoints(value: CellValue): string[] {
  return Array.from(toText(value));
}

function finite(fn: string, result: number): FunctionResult {
  return Number.isFinite(result)
    ? ok(numberValue(result))
    : evaluationError('domain', `${fn}: result is not a finite number`);
}

/**
 * Round half away from zero; negative places round to tens, hundreds, ...
 */
export function roundHalfAwayFromZero(value: number, places: number): number {
  const magnitude = Math.abs(value);
  const factor = 10 ** Math.abs(places);
  let rounded: number;
  if (places >= 0) {
    const scaled = magnitude * factor;
    // From 2^52 up every double is already a whole number
    if (!Number.isFinite(scaled) || scaled >= 2 ** 52) return value;
    rounded = Math.round(scaled) / factor;
  } else {
    if (!Number.isFinite(factor)) return 0;
    rounded = Math.round(magnitude / factor) * factor;
  }
  return value < 0 ? -rounded : rounded;
}

function indexOfCodePoints(haystack: string[], needle: string[], from: number): number {
  for (let i = from; i + needle.length <= haystack.length; i++) {
    let matched = true;
    for (let j = 0; j < needle.length; j++) {
      if (haystack[i + j] !== needle[j]) {
        matched = false;
        break;
      }
    }
    if (matched) return i;
  }
  return -1;
}

// ============================================================================
// Definitions
// ============================================================================

const aggregate = (
  name: string,
  description: string,
  reduce: (numbers: number[]) => number
): EagerFunctionDefinition => ({
  kind: 'eager',
  name,
  category: 'aggregate',
  minArgs: 1,
  maxArgs: Infinity,
  syntax: `${name}(value1, [value2, ...])`,
  description,
  call: (args) => finite(name, reduce(args.map(toNumber))),
});

const stringFunction = (
  name: string,
  description: string,
  apply: (text: string) => CellValue
): EagerFunctionDefinition => ({
  kind: 'eager',
  name,
  category: 'string',
  minArgs: 1,
  maxArgs: 1,
  syntax: `${name}(text)`,
  description,
  call: (args) => ok(apply(toText(args[0]))),
});

const AGGREGATES: EagerFunctionDefinition[] = [
  aggregate('SUM', 'Sum of all values', (xs) => xs.reduce((sum, x) => sum + x, 0)),
  aggregate('AVERAGE', 'Arithmetic mean of all values', (xs) =>
    xs.reduce((sum, x) => sum + x, 0) / xs.length
  ),
  aggregate('MIN', 'Smallest value', (xs) => Math.min(...xs)),
  aggregate('MAX', 'Largest value', (xs) => Math.max(...xs)),
];

const NUMERIC: EagerFunctionDefinition[] = [
  {
    kind: 'eager',
    name: 'ABS',
    category: 'numeric',
    minArgs: 1,
    maxArgs: 1,
    syntax: 'ABS(number)',
    description: 'Absolute value',
    call: (args) => ok(numberValue(Math.abs(toNumber(args[0])))),
  },
  {
    kind: 'eager',
    name: 'SQRT',
    category: 'numeric',
    minArgs: 1,
    maxArgs: 1,
    syntax: 'SQRT(number)',
    description: 'Square root',
    call: (args) => {
      const n = toNumber(args[0]);
      if (n < 0) return evaluationError('domain', `SQRT of negative number ${n}`);
      return ok(numberValue(Math.sqrt(n)));
    },
  },
  {
    kind: 'eager',
    name: 'ROUND',
    category: 'numeric',
    minArgs: 1,
    maxArgs: 2,
    syntax: 'ROUND(number, [places])',
    description: 'Round half away from zero to the given decimal places',
    call: (args) => {
      let places = 0;
      if (args.length === 2) {
        const parsed = integerArgument(args[1], 'ROUND', 'places');
        if (!parsed.ok) return parsed;
        places = parsed.value;
      }
      return finite('ROUND', roundHalfAwayFromZero(toNumber(args[0]), places));
    },
  },
];

const STRINGS: EagerFunctionDefinition[] = [
  stringFunction('LEN', 'Number of characters', (text) => numberValue(Array.from(text).length)),
  stringFunction('UPPER', 'Convert to upper case', (text) => textValue(text.toUpperCase())),
  stringFunction('LOWER', 'Convert to lower case', (text) => textValue(text.toLowerCase())),
  stringFunction('TRIM', 'Remove leading and trailing whitespace', (text) => textValue(text.trim())),
];

const EXTRACTION: EagerFunctionDefinition[] = [
  {
    kind: 'eager',
    name: 'LEFT',
    category: 'extraction',
    minArgs: 2,
    maxArgs: 2,
    syntax: 'LEFT(text, count)',
    description: 'First count characters',
    call: (args) => {
      const chars = codePoints(args[0]);
      const count = integerArgument(args[1], 'LEFT', 'count');
      if (!count.ok) return count;
      if (count.value < 0) return evaluationError('index', `LEFT: negative count ${count.value}`);
      return ok(textValue(chars.slice(0, Math.min(count.value, chars.length)).join('')));
    },
  },
  {
    kind: 'eager',
    name: 'RIGHT',
    category: 'extraction',
    minArgs: 2,
    maxArgs: 2,
    syntax: 'RIGHT(text, count)',
    description: 'Last count characters',
    call: (args) => {
      const chars = codePoints(args[0]);
      const count = integerArgument(args[1], 'RIGHT', 'count');
      if (!count.ok) return count;
      if (count.value < 0) return evaluationError('index', `RIGHT: negative count ${count.value}`);
      const taken = Math.min(count.value, chars.length);
      return ok(textValue(chars.slice(chars.length - taken).join('')));
    },
  },
  {
    kind: 'eager',
    name: 'MID',
    category: 'extraction',
    minArgs: 3,
    maxArgs: 3,
    syntax: 'MID(text, start, length)',
    description: 'Substring starting at a 0-based position',
    call: (args) => {
      const chars = codePoints(args[0]);
      const start = integerArgument(args[1], 'MID', 'start');
      if (!start.ok) return start;
      const length = integerArgument(args[2], 'MID', 'length');
      if (!length.ok) return length;
      if (start.value < 0 || start.value > chars.length) {
        return evaluationError('index', `MID: start ${start.value} outside 0..${chars.length}`);
      }
      if (length.value < 0) {
        return evaluationError('index', `MID: negative length ${length.value}`);
      }
      const end = Math.min(start.value + length.value, chars.length);
      return ok(textValue(chars.slice(start.value, end).join('')));
    },
  },
  {
    kind: 'eager',
    name: 'FIND',
    category: 'extraction',
    minArgs: 2,
    maxArgs: 3,
    syntax: 'FIND(needle, haystack, [start])',
    description: '0-based position of needle in haystack',
    call: (args) => {
      const needle = codePoints(args[0]);
      const haystack = codePoints(args[1]);
      let from = 0;
      if (args.length === 3) {
        const start = integerArgument(args[2], 'FIND', 'start');
        if (!start.ok) return start;
        if (start.value < 0 || start.value > haystack.length) {
          return evaluationError('index', `FIND: start ${start.value} outside 0..${haystack.length}`);
        }
        from = start.value;
      }
      const position = indexOfCodePoints(haystack, needle, from);
      if (position < 0) {
        return evaluationError('notFound', `FIND: '${needle.join('')}' not found`);
      }
      return ok(numberValue(position));
    },
  },
];

const CONCATENATION: EagerFunctionDefinition[] = [
  {
    kind: 'eager',
    name: 'CONCAT',
    category: 'concatenation',
    minArgs: 1,
    maxArgs: Infinity,
    syntax: 'CONCAT(text1, [text2, ...])',
    description: 'Join values as text',
    call: (args) => ok(textValue(args.map(toText).join(''))),
  },
];

const IF_FUNCTION: LazyFunctionDefinition = {
  kind: 'lazy',
  name: 'IF',
  category: 'logical',
  minArgs: 3,
  maxArgs: 3,
  syntax: 'IF(condition, then, else)',
  description: 'Evaluate only the branch selected by condition',
  callLazy: ([condition, whenTrue, whenFalse]) => {
    const test = condition();
    if (!test.ok) return test;
    return isTruthy(test.value) ? whenTrue() : whenFalse();
  },
};

const LOGICAL: FunctionDefinition[] = [
  IF_FUNCTION,
  {
    kind: 'eager',
    name: 'AND',
    category: 'logical',
    minArgs: 1,
    maxArgs: Infinity,
    syntax: 'AND(value1, [value2, ...])',
    description: '1 when every value is truthy, else 0',
    call: (args) => ok(booleanValue(args.every(isTruthy))),
  },
  {
    kind: 'eager',
    name: 'OR',
    category: 'logical',
    minArgs: 1,
    maxArgs: Infinity,
    syntax: 'OR(value1, [value2, ...])',
    description: '1 when any value is truthy, else 0',
    call: (args) => ok(booleanValue(args.some(isTruthy))),
  },
  {
    kind: 'eager',
    name: 'NOT',
    category: 'logical',
    minArgs: 1,
    maxArgs: 1,
    syntax: 'NOT(value)',
    description: '1 when value is falsy, else 0',
    call: (args) => ok(booleanValue(!isTruthy(args[0]))),
  },
];

function webFunctions(httpClient: HttpClient): EagerFunctionDefinition[] {
  return [
    {
      kind: 'eager',
      name: 'GET',
      category: 'web',
      minArgs: 1,
      maxArgs: 1,
      syntax: 'GET(url)',
      description: 'Fetch a URL and return the response body as text',
      call: (args) => {
        const response = httpClient.getText(toText(args[0]));
        if (!response.ok) return evaluationError('network', `GET: ${response.error}`);
        return ok(textValue(response.value));
      },
    },
  ];
}

// ============================================================================
// Registry factory
// ============================================================================

export interface BuiltinFunctionOptions {
  /** Transport for GET; defaults to a child-process fetch */
  httpClient?: HttpClient;
}

export function builtinFunctions(options: BuiltinFunctionOptions = {}): FunctionDefinition[] {
  const httpClient = options.httpClient ?? new ProcessHttpClient();
  return [
    ...AGGREGATES,
    ...NUMERIC,
    ...STRINGS,
    ...EXTRACTION,
    ...CONCATENATION,
    ...LOGICAL,
    ...webFunctions(httpClient),
  ];
}

export function createFunctionRegistry(options: BuiltinFunctionOptions = {}): FunctionRegistry {
  return new FunctionRegistry(builtinFunctions(options));
}
