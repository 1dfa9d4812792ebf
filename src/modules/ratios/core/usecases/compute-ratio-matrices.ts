import {
  TOTAL_ROW_KEY,
  type CensusYear,
  type ObservationIndex,
  type VariableCode,
} from '../../../census-tables/index.js';
import {
  DEFAULT_RATIO_VARIABLES,
  RATIO_KINDS,
  type ComputeRatiosOptions,
  type MatrixRow,
  type RatioComputation,
  type RatioKind,
  type RatioMatrix,
} from '../types.js';
import { divide } from './divide.js';
import { hasData, resolveValue, sectorsOf } from './resolve-value.js';

import type { GeographyHierarchy } from '../../../geography/index.js';

export interface RatioPair {
  kind: RatioKind;
  numeratorId: string;
  denominatorId: string;
}

/**
 * Numerator/denominator pairs of each kind: every state against the nation,
 * every region against the nation, and every region of municipalities
 * against its state.
 */
export const ratioPairs = (
  hierarchy: GeographyHierarchy,
  kinds: readonly RatioKind[] = RATIO_KINDS
): RatioPair[] =>
  kinds.flatMap((kind): RatioPair[] => {
    switch (kind) {
      case 'state/national':
        return hierarchy.states.map((state) => ({
          kind,
          numeratorId: state.id,
          denominatorId: hierarchy.national.id,
        }));
      case 'region/national':
        return hierarchy.regions.map((region) => ({
          kind,
          numeratorId: region.id,
          denominatorId: hierarchy.national.id,
        }));
      case 'region/state':
        return hierarchy.regions
          .filter((region) => region.memberLevel === 'municipality')
          .map((region) => ({ kind, numeratorId: region.id, denominatorId: region.parentId }));
    }
  });

/**
 * Years with at least one column of the variable in any loaded table.
 */
export const yearsWithData = (index: ObservationIndex, variable: VariableCode): CensusYear[] => {
  const years = new Set<CensusYear>();
  for (const geographyId of index.geographyIds()) {
    for (const column of index.table(geographyId)?.columns ?? []) {
      if (column.variable === variable) years.add(column.year);
    }
  }
  return [...years].sort((a, b) => a - b);
};

/**
 * Years to compute for a variable: those with data, narrowed to `requested`
 * when given. Empty when the variable has no column in the requested years.
 */
export const selectYears = (
  index: ObservationIndex,
  variable: VariableCode,
  requested?: readonly CensusYear[]
): CensusYear[] => {
  const available = yearsWithData(index, variable);
  return requested === undefined
    ? available
    : available.filter((year) => requested.includes(year));
};

export const computeRatioMatrix = (
  index: ObservationIndex,
  hierarchy: GeographyHierarchy,
  pair: RatioPair,
  variable: VariableCode,
  years: readonly CensusYear[]
): RatioMatrix => {
  const sectors = new Map<string, string>();
  for (const geographyId of [pair.denominatorId, pair.numeratorId]) {
    for (const { sectorKey, label } of sectorsOf(index, hierarchy, geographyId)) {
      if (!sectors.has(sectorKey)) sectors.set(sectorKey, label);
    }
  }
  sectors.set(TOTAL_ROW_KEY, TOTAL_ROW_KEY);

  const rows: MatrixRow[] = [...sectors].map(([sectorKey, label]) => ({
    sectorKey,
    label,
    cells: years.map((year) =>
      divide(
        resolveValue(index, hierarchy, pair.numeratorId, sectorKey, variable, year),
        resolveValue(index, hierarchy, pair.denominatorId, sectorKey, variable, year)
      )
    ),
  }));

  return {
    variable,
    kind: pair.kind,
    numeratorId: pair.numeratorId,
    denominatorId: pair.denominatorId,
    years: [...years],
    rows,
  };
};

/**
 * Computes every ratio matrix for the requested variables and kinds, and
 * lists each Undefined cell and each anomalous ratio.
 *
 * Pairs where either side has no loaded table are skipped. The result
 * depends only on its inputs.
 */
export const computeRatioMatrices = (
  index: ObservationIndex,
  hierarchy: GeographyHierarchy,
  options: ComputeRatiosOptions = {}
): RatioComputation => {
  const variables = options.variables ?? DEFAULT_RATIO_VARIABLES;
  const pairs = ratioPairs(hierarchy, options.kinds).filter(
    (pair) =>
      hasData(index, hierarchy, pair.numeratorId) && hasData(index, hierarchy, pair.denominatorId)
  );

  const result: RatioComputation = { matrices: [], undefinedCells: [], anomalies: [] };

  for (const variable of variables) {
    const years = selectYears(index, variable, options.years);
    if (years.length === 0) continue;

    for (const pair of pairs) {
      const matrix = computeRatioMatrix(index, hierarchy, pair, variable, years);
      result.matrices.push(matrix);

      for (const row of matrix.rows) {
        row.cells.forEach((cell, position) => {
          const year = years[position];
          if (year === undefined) return;
          const location = {
            variable,
            kind: pair.kind,
            numeratorId: pair.numeratorId,
            denominatorId: pair.denominatorId,
            year,
            sectorKey: row.sectorKey,
          };
          if (cell.kind === 'undefined') {
            result.undefinedCells.push({ ...location, reason: cell.reason, cause: cell.cause });
          } else if (cell.anomaly !== undefined) {
            result.anomalies.push({ ...location, value: cell.value, anomaly: cell.anomaly });
          }
        });
      }
    }
  }

  return result;
};
