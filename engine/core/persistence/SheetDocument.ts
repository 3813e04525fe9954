/**
 * GridCalc Engine - Persisted Sheet Document
 *
 * On-disk JSON shape. Dependency edges are never stored; they are rebuilt
 * from the formulas on load.
 */

import { z } from 'zod';

const IndexSchema = z.number().int().nonnegative();

export const PersistedCellSchema = z.object({
  value: z.string(),
  formula: z.string().nullable().optional(),
});

export type PersistedCell = z.infer<typeof PersistedCellSchema>;

export const SheetDocumentSchema = z.object({
  cells: z.array(z.tuple([IndexSchema, IndexSchema, PersistedCellSchema])),
  rows: z.number().int().positive(),
  cols: z.number().int().positive(),
  column_widths: z.record(z.string().regex(/^\d+$/), z.number().int().positive()).default({}),
  default_column_width: z.number().int().positive(),
});

export type SheetDocument = z.infer<typeof SheetDocumentSchema>;

/**
 * "cells.3.2.value: Expected string, received number"
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
