import { err, ok, type Result } from 'neverthrow';

import {
  CHECKSUM_ROW_LABEL,
  isCensusYear,
  isVariableCode,
  type ColumnRef,
  type Sector,
} from './types.js';

const COLUMN_RE = /^([A-Z]\d{3}[A-Z])_(\d{4})$/;
const SECTOR_RE = /^Sector\s+(\d{2}(?:-\d{2})?)\b/i;
const TOTAL_RE = /^total\b/i;

/**
 * Splits a `VariableCode_Year` header. The message explains why a header was
 * rejected.
 */
export const parseColumnHeader = (header: string): Result<ColumnRef, string> => {
  const trimmed = header.trim();
  const match = COLUMN_RE.exec(trimmed);
  if (match === null) {
    return err(`Column '${trimmed}' does not follow the VariableCode_Year convention`);
  }

  const [, code = '', yearText = ''] = match;
  if (!isVariableCode(code)) {
    return err(`Column '${trimmed}' names unknown variable code '${code}'`);
  }

  const year = Number(yearText);
  if (!isCensusYear(year)) {
    return err(`Column '${trimmed}' names ${yearText}, which is not a census year`);
  }

  return ok({ header: trimmed, variable: code, year });
};

export const columnHeader = (variable: string, year: number): string =>
  `${variable}_${String(year)}`;

/**
 * Builds the sector identity from a row label such as "Sector 21 Minería".
 */
export const parseSector = (label: string): Sector => {
  const trimmed = label.trim();
  const match = SECTOR_RE.exec(trimmed);
  const code = match?.[1] ?? null;
  return { key: code ?? trimmed, code, label: trimmed };
};

export type RowKind = 'sector' | 'total' | 'checksum';

export const classifyRow = (label: string): RowKind => {
  const trimmed = label.trim();
  if (trimmed.toLowerCase() === CHECKSUM_ROW_LABEL) return 'checksum';
  if (TOTAL_RE.test(trimmed)) return 'total';
  return 'sector';
};

/**
 * Sort key for wide-table columns: by variable code, then by year.
 */
export const compareColumns = (a: ColumnRef, b: ColumnRef): number =>
  a.variable === b.variable ? a.year - b.year : a.variable.localeCompare(b.variable);
