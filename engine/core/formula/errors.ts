/**
 * GridCalc Engine - Error Taxonomy
 *
 * Errors are plain values discriminated by `type`. Parse, circular and
 * reference errors reject an edit; evaluation errors stay on the cell.
 */

import type { Address } from '../types/index.js';

export interface ParseError {
  type: 'parse';
  /** 0-based offset into the formula text */
  position: number;
  message: string;
}

export interface CircularReferenceError {
  type: 'circular';
  /** Cells on the detected cycle, starting at the edited cell */
  cells: Address[];
  message: string;
}

/** A cell or range address outside the grid bounds */
export interface InvalidReferenceError {
  type: 'reference';
  address: Address;
  message: string;
}

export type EvaluationErrorCode =
  | 'unknownFunction'
  | 'arity'
  | 'index'
  | 'type'
  | 'notFound'
  | 'divisionByZero'
  | 'domain'
  | 'network'
  | 'depth'
  | 'reference'
  | 'circular';

export interface EvaluationError {
  type: 'evaluation';
  code: EvaluationErrorCode;
  message: string;
}

export type EditError = ParseError | CircularReferenceError | InvalidReferenceError;

export type ErrorKind = EditError['type'] | EvaluationError['type'];

export type Result<T, E = EvaluationError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function evaluationError(
  code: EvaluationErrorCode,
  message: string
): { ok: false; error: EvaluationError } {
  return { ok: false, error: { type: 'evaluation', code, message } };
}

export function parseError(position: number, message: string): ParseError {
  return { type: 'parse', position, message };
}
