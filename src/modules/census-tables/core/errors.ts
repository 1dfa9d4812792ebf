/**
 * Census Tables Module - Domain Errors
 *
 * Table issues are collected per cell, row or column and never abort the load
 * of the rest of a table. Only a missing activity column or an unreadable file
 * rejects a whole table.
 */

import type { IoError } from '../../../common/types/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Cell / table issues (non-fatal)
// ─────────────────────────────────────────────────────────────────────────────

export interface CellParseError {
  readonly type: 'ParseError';
  readonly message: string;
  readonly raw: string;
}

export interface TableParseError extends CellParseError {
  readonly geographyId: string;
  readonly rowLabel: string;
  readonly column: string;
}

export interface InvalidHeaderIssue {
  readonly type: 'InvalidHeader';
  readonly message: string;
  readonly geographyId: string;
  readonly column: string;
}

export interface DuplicateRowIssue {
  readonly type: 'DuplicateRow';
  readonly message: string;
  readonly geographyId: string;
  readonly rowLabel: string;
}

export interface MissingTotalRowIssue {
  readonly type: 'MissingTotalRow';
  readonly message: string;
  readonly geographyId: string;
}

export interface UnlabelledRowIssue {
  readonly type: 'UnlabelledRow';
  readonly message: string;
  readonly geographyId: string;
  readonly rowNumber: number;
}

export type TableIssue =
  | TableParseError
  | InvalidHeaderIssue
  | DuplicateRowIssue
  | MissingTotalRowIssue
  | UnlabelledRowIssue;

// ─────────────────────────────────────────────────────────────────────────────
// Fatal table errors
// ─────────────────────────────────────────────────────────────────────────────

export interface MissingActivityColumnError {
  readonly type: 'MissingActivityColumn';
  readonly message: string;
  readonly geographyId: string;
}

export interface MalformedCsvError {
  readonly type: 'MalformedCsv';
  readonly message: string;
  readonly path: string;
}

export interface MissingExportColumnError {
  readonly type: 'MissingExportColumn';
  readonly message: string;
  readonly column: string;
}

export type CensusTableError = MissingActivityColumnError | MalformedCsvError | IoError;

// ─────────────────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────────────────

export const createCellParseError = (raw: string): CellParseError => ({
  type: 'ParseError',
  message: `Cell '${raw}' is neither a number nor a reserved marker (N/A, C)`,
  raw,
});

export const createMissingActivityColumnError = (
  geographyId: string,
  found: string
): MissingActivityColumnError => ({
  type: 'MissingActivityColumn',
  message: `Table for '${geographyId}' must start with an 'Actividad Economica' column, found '${found}'`,
  geographyId,
});

export const createMissingTotalRowIssue = (geographyId: string): MissingTotalRowIssue => ({
  type: 'MissingTotalRow',
  message: `Table for '${geographyId}' has no Total row; its columns cannot be verified`,
  geographyId,
});
