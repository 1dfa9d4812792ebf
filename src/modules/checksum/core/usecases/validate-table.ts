import { DEFAULT_TOLERANCE, type ChecksumFinding, type ChecksumTolerance } from '../types.js';
import { validateColumn } from './validate-column.js';

import type { CellValue, CensusTable } from '../../../census-tables/index.js';

/**
 * Validates every (variable, year) column of a table, in column order.
 */
export const validateTable = (
  table: CensusTable,
  tolerance: ChecksumTolerance = DEFAULT_TOLERANCE
): ChecksumFinding[] => {
  const totals = new Map<string, CellValue>();
  for (const total of table.totals) {
    totals.set(`${total.variable}|${String(total.year)}`, total.value);
  }

  return table.columns.map((column) =>
    validateColumn(
      {
        geographyId: table.geographyId,
        variable: column.variable,
        year: column.year,
        observations: table.observations.filter(
          (obs) => obs.variable === column.variable && obs.year === column.year
        ),
        total: totals.get(`${column.variable}|${String(column.year)}`),
      },
      tolerance
    )
  );
};
