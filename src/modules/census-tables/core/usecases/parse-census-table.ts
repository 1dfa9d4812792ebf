import { err, ok, type Result } from 'neverthrow';

import { parseCell } from '../cells.js';
import {
  createMissingActivityColumnError,
  createMissingTotalRowIssue,
  type MissingActivityColumnError,
  type TableIssue,
} from '../errors.js';
import { classifyRow, parseColumnHeader, parseSector } from '../labels.js';
import {
  ACTIVITY_COLUMN_ALIASES,
  type CensusTable,
  type ColumnRef,
  type Observation,
  type ParseTableOptions,
  type RawTable,
  type Sector,
  type SectorTotal,
} from '../types.js';

export interface ParsedCensusTable {
  table: CensusTable;
  issues: TableIssue[];
}

interface IndexedColumn {
  index: number;
  ref: ColumnRef;
}

const isActivityHeader = (header: string): boolean =>
  (ACTIVITY_COLUMN_ALIASES as readonly string[]).includes(header.trim());

const isBlankRow = (row: string[]): boolean => row.every((cell) => cell.trim() === '');

/**
 * Turns a wide census table (sector rows × VariableCode_Year columns) into
 * Observations and SectorTotals.
 *
 * Only a missing activity column rejects the table. Bad headers, malformed
 * cells and repeated rows are returned as issues and the rest of the table
 * still loads.
 */
export const parseCensusTable = (
  raw: RawTable,
  options: ParseTableOptions
): Result<ParsedCensusTable, MissingActivityColumnError> => {
  const { geographyId, blankMeans = 'not-applicable' } = options;
  const [header = [], ...rows] = raw;
  const firstHeader = header[0] ?? '';

  if (!isActivityHeader(firstHeader)) {
    return err(createMissingActivityColumnError(geographyId, firstHeader));
  }

  const issues: TableIssue[] = [];
  const columns: IndexedColumn[] = [];
  const seenHeaders = new Set<string>();

  header.slice(1).forEach((text, offset) => {
    const parsed = parseColumnHeader(text);
    if (parsed.isErr()) {
      issues.push({ type: 'InvalidHeader', message: parsed.error, geographyId, column: text });
      return;
    }
    if (seenHeaders.has(parsed.value.header)) {
      issues.push({
        type: 'InvalidHeader',
        message: `Column '${parsed.value.header}' appears more than once; the first one is used`,
        geographyId,
        column: text,
      });
      return;
    }
    seenHeaders.add(parsed.value.header);
    columns.push({ index: offset + 1, ref: parsed.value });
  });

  const sectors: Sector[] = [];
  const sectorKeys = new Set<string>();
  const observations: Observation[] = [];
  const totals: SectorTotal[] = [];
  let totalRowLabel: string | null = null;

  for (const [rowOffset, row] of rows.entries()) {
    const label = (row[0] ?? '').trim();

    if (label === '') {
      if (!isBlankRow(row)) {
        issues.push({
          type: 'UnlabelledRow',
          message: `Row ${String(rowOffset + 2)} has values but no activity label`,
          geographyId,
          rowNumber: rowOffset + 2,
        });
      }
      continue;
    }

    const kind = classifyRow(label);
    if (kind === 'checksum') continue;

    if (kind === 'total') {
      if (totalRowLabel !== null) {
        issues.push({
          type: 'DuplicateRow',
          message: `Second Total row '${label}' ignored; '${totalRowLabel}' is used`,
          geographyId,
          rowLabel: label,
        });
        continue;
      }
      totalRowLabel = label;
    }

    const sector = kind === 'sector' ? parseSector(label) : null;
    if (sector !== null) {
      if (sectorKeys.has(sector.key)) {
        issues.push({
          type: 'DuplicateRow',
          message: `Sector '${sector.key}' appears more than once; the first row is used`,
          geographyId,
          rowLabel: label,
        });
        continue;
      }
      sectorKeys.add(sector.key);
      sectors.push(sector);
    }

    for (const { index, ref } of columns) {
      const rawCell = row[index] ?? '';
      const parsed = parseCell(rawCell, blankMeans);

      if (parsed.isErr()) {
        issues.push({
          ...parsed.error,
          geographyId,
          rowLabel: label,
          column: ref.header,
        });
        continue;
      }

      if (sector === null) {
        totals.push({ geographyId, variable: ref.variable, year: ref.year, value: parsed.value });
      } else {
        observations.push({
          geographyId,
          sector,
          variable: ref.variable,
          year: ref.year,
          value: parsed.value,
        });
      }
    }
  }

  if (totalRowLabel === null) {
    issues.push(createMissingTotalRowIssue(geographyId));
  }

  return ok({
    table: {
      geographyId,
      totalLabel: totalRowLabel,
      columns: columns.map((column) => column.ref),
      sectors,
      observations,
      totals,
    },
    issues,
  });
};
