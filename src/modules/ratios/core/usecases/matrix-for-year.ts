import type { CensusYear, VariableCode } from '../../../census-tables/index.js';
import type { RatioCell, RatioKind, RatioMatrix, YearRatioView } from '../types.js';

/**
 * Slices one year out of the matrices of a (variable, kind): one row per
 * numerator geography, one column per sector. Every cell comes from a matrix,
 * so each Undefined one is also in the computation's undefined cells. Returns
 * null when no matrix covers that year.
 */
export const matrixForYear = (
  matrices: readonly RatioMatrix[],
  variable: VariableCode,
  kind: RatioKind,
  year: CensusYear
): YearRatioView | null => {
  const selected = matrices.filter(
    (matrix) => matrix.variable === variable && matrix.kind === kind && matrix.years.includes(year)
  );
  if (selected.length === 0) return null;

  const sectors = new Map<string, string>();
  for (const matrix of selected) {
    for (const row of matrix.rows) {
      if (!sectors.has(row.sectorKey)) sectors.set(row.sectorKey, row.label);
    }
  }

  const rows = selected.map((matrix) => {
    const position = matrix.years.indexOf(year);
    const byKey = new Map<string, RatioCell>();
    for (const row of matrix.rows) {
      const cell = row.cells[position];
      if (cell !== undefined) byKey.set(row.sectorKey, cell);
    }

    return {
      numeratorId: matrix.numeratorId,
      denominatorId: matrix.denominatorId,
      cells: [...sectors.keys()].map((sectorKey) => byKey.get(sectorKey) ?? null),
    };
  });

  return {
    variable,
    kind,
    year,
    sectors: [...sectors].map(([sectorKey, label]) => ({ sectorKey, label })),
    rows,
  };
};
