import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { createNotFoundError, type NotFoundError } from '../../../../common/types/errors.js';
import {
  CONFIDENTIAL,
  NOT_APPLICABLE,
  compareColumns,
  numeric,
  parseSector,
  type CellValue,
  type CensusTable,
  type ColumnRef,
  type ObservationIndex,
  type Observation,
  type SectorTotal,
} from '../../../census-tables/index.js';

import type { GeographyHierarchy, RegionNode } from '../../../geography/index.js';

/**
 * Member cells of a region folded into one descriptive cell: the sum of the
 * numeric values plus the count of withheld ones. All members N/A or absent
 * gives N/A.
 */
export const foldMemberCells = (cells: readonly (CellValue | undefined)[]): CellValue => {
  let sum = new Decimal(0);
  let withheld = 0;
  let present = false;

  for (const cell of cells) {
    if (cell === undefined || cell.kind === 'not-applicable') continue;
    present = true;
    if (cell.kind === 'numeric') {
      sum = sum.plus(cell.value);
    } else {
      sum = sum.plus(cell.partial?.sum ?? 0);
      withheld += cell.partial?.withheld ?? 1;
    }
  }

  if (!present) return NOT_APPLICABLE;
  if (withheld > 0) return { kind: 'confidential', partial: { sum, withheld } };
  return numeric(sum);
};

/**
 * Builds the descriptive wide table of a region of tabulated geographies.
 * Withheld member values are counted, not estimated: such a cell stays
 * Confidential and ratios never read it. A member without a loaded table,
 * or without the column, counts as withheld.
 */
export const aggregateRegionTable = (
  index: ObservationIndex,
  hierarchy: GeographyHierarchy,
  regionId: string
): Result<CensusTable, NotFoundError> => {
  const node = hierarchy.nodes.get(regionId);
  if (node?.level !== 'region') {
    return err(createNotFoundError('Region', regionId));
  }

  const members = memberTables(index, node);

  const columns = new Map<string, ColumnRef>();
  const sectorLabels = new Map<string, string>();
  let hasTotal = false;
  for (const table of members) {
    for (const column of table.columns) columns.set(column.header, column);
    for (const sector of table.sectors) {
      if (!sectorLabels.has(sector.key)) sectorLabels.set(sector.key, sector.label);
    }
    if (table.totalLabel !== null) hasTotal = true;
  }
  const orderedColumns = [...columns.values()].sort(compareColumns);
  const sectors = [...sectorLabels.values()].map(parseSector);

  const observations: Observation[] = [];
  for (const sector of sectors) {
    for (const column of orderedColumns) {
      observations.push({
        geographyId: regionId,
        sector,
        variable: column.variable,
        year: column.year,
        value: foldMemberCells(
          node.members.map((memberId) =>
            hasColumn(index, memberId, column)
              ? index.observation(memberId, sector.key, column.variable, column.year)
              : CONFIDENTIAL
          )
        ),
      });
    }
  }

  const totals: SectorTotal[] = hasTotal
    ? orderedColumns.map((column) => ({
        geographyId: regionId,
        variable: column.variable,
        year: column.year,
        value: foldMemberCells(
          node.members.map((memberId) =>
            hasColumn(index, memberId, column)
              ? index.total(memberId, column.variable, column.year)
              : CONFIDENTIAL
          )
        ),
      }))
    : [];

  return ok({
    geographyId: regionId,
    totalLabel: hasTotal ? `Total ${node.name}` : null,
    columns: orderedColumns,
    sectors,
    observations,
    totals,
  });
};

const memberTables = (index: ObservationIndex, region: RegionNode): CensusTable[] =>
  region.members.flatMap((memberId) => {
    const table = index.table(memberId);
    return table === undefined ? [] : [table];
  });

const hasColumn = (index: ObservationIndex, memberId: string, column: ColumnRef): boolean =>
  index.table(memberId)?.columns.some((own) => own.header === column.header) ?? false;
