import { Decimal } from 'decimal.js';

import {
  TOTAL_ROW_KEY,
  type CensusYear,
  type ObservationIndex,
  type VariableCode,
} from '../../../census-tables/index.js';
import { divide } from './divide.js';
import { resolveValue, sectorsOf } from './resolve-value.js';

import type { MatrixRow, RatioCell, ShareMatrix } from '../types.js';
import type { GeographyHierarchy } from '../../../geography/index.js';

const HUNDRED = new Decimal(100);
const SHARE_DECIMALS = 2;

const asPercent = (cell: RatioCell): RatioCell =>
  cell.kind === 'undefined'
    ? cell
    : {
        kind: 'defined',
        value: cell.value.times(HUNDRED).toDecimalPlaces(SHARE_DECIMALS, Decimal.ROUND_HALF_UP),
        ...(cell.anomaly !== undefined && { anomaly: cell.anomaly }),
      };

/**
 * Each sector of a geography as a percentage of its reported total, per year.
 * The Total row reads 100 wherever the total itself is usable.
 */
export const computeShareMatrix = (
  index: ObservationIndex,
  hierarchy: GeographyHierarchy,
  geographyId: string,
  variable: VariableCode,
  years: readonly CensusYear[]
): ShareMatrix => {
  const totalOf = (year: CensusYear) =>
    resolveValue(index, hierarchy, geographyId, TOTAL_ROW_KEY, variable, year);

  const sectorRows: MatrixRow[] = sectorsOf(index, hierarchy, geographyId).map(
    ({ sectorKey, label }) => ({
      sectorKey,
      label,
      cells: years.map((year) =>
        asPercent(
          divide(
            resolveValue(index, hierarchy, geographyId, sectorKey, variable, year),
            totalOf(year)
          )
        )
      ),
    })
  );

  const totalRow: MatrixRow = {
    sectorKey: TOTAL_ROW_KEY,
    label: TOTAL_ROW_KEY,
    cells: years.map((year): RatioCell => {
      const total = totalOf(year);
      const cell = divide(total, total);
      return cell.kind === 'undefined' ? cell : { kind: 'defined', value: HUNDRED };
    }),
  };

  return { geographyId, variable, years: [...years], rows: [...sectorRows, totalRow] };
};
