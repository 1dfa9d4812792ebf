import { Decimal } from 'decimal.js';

import { formatCell, formatPartialSum } from '../cells.js';
import {
  ACTIVITY_COLUMN,
  CHECKSUM_ROW_LABEL,
  type CellValue,
  type CensusTable,
  type ColumnRef,
  type RawTable,
} from '../types.js';

/**
 * Partial sum of sector cells plus the count of withheld values.
 * Annotated cells ("x + kC") add both their base and their count.
 */
export interface SectorSum {
  sum: Decimal;
  withheld: number;
  /** False when the column had no sector cell at all */
  hasValues: boolean;
}

export const sumSectorCells = (cells: readonly CellValue[]): SectorSum => {
  let sum = new Decimal(0);
  let withheld = 0;

  for (const cell of cells) {
    if (cell.kind === 'numeric') {
      sum = sum.plus(cell.value);
    } else if (cell.kind === 'confidential') {
      sum = sum.plus(cell.partial?.sum ?? 0);
      withheld += cell.partial?.withheld ?? 1;
    }
  }

  return { sum, withheld, hasValues: cells.length > 0 };
};

const columnCells = (table: CensusTable, column: ColumnRef): CellValue[] =>
  table.observations
    .filter((obs) => obs.variable === column.variable && obs.year === column.year)
    .map((obs) => obs.value);

/**
 * Renders a table back to wide CSV rows: sectors in table order, the Total row
 * last, then a `checksum` row reading "sum" or "sum + kC".
 * Cells left out at parse time render empty.
 */
export const renderWideTable = (table: CensusTable): RawTable => {
  const lookup = new Map<string, CellValue>();
  for (const obs of table.observations) {
    lookup.set(`${obs.sector.key}|${obs.variable}|${String(obs.year)}`, obs.value);
  }
  const totals = new Map<string, CellValue>();
  for (const total of table.totals) {
    totals.set(`${total.variable}|${String(total.year)}`, total.value);
  }

  const rows: RawTable = [[ACTIVITY_COLUMN, ...table.columns.map((column) => column.header)]];

  for (const sector of table.sectors) {
    rows.push([
      sector.label,
      ...table.columns.map((column) => {
        const cell = lookup.get(`${sector.key}|${column.variable}|${String(column.year)}`);
        return cell === undefined ? '' : formatCell(cell);
      }),
    ]);
  }

  if (table.totalLabel !== null) {
    rows.push([
      table.totalLabel,
      ...table.columns.map((column) => {
        const cell = totals.get(`${column.variable}|${String(column.year)}`);
        return cell === undefined ? '' : formatCell(cell);
      }),
    ]);
  }

  rows.push([
    CHECKSUM_ROW_LABEL,
    ...table.columns.map((column) => {
      const { sum, withheld, hasValues } = sumSectorCells(columnCells(table, column));
      return hasValues ? formatPartialSum(sum, withheld) : '';
    }),
  ]);

  return rows;
};
