import type { ChecksumFinding } from '../../../checksum/index.js';
import type { RatioCell, RatioMatrix, YearRatioView } from '../../../ratios/index.js';
import type { FindingDTO, RatioCellDTO } from './schemas.js';

// Decimals travel as plain-notation strings

export const toRatioCellDTO = (cell: RatioCell): RatioCellDTO =>
  cell.kind === 'defined'
    ? {
        kind: 'defined',
        value: cell.value.toFixed(),
        ...(cell.anomaly !== undefined && { anomaly: cell.anomaly }),
      }
    : {
        kind: 'undefined',
        reason: cell.reason,
        cause: {
          geographyId: cell.cause.geographyId,
          sectorKey: cell.cause.sectorKey,
          ...(cell.cause.regionId !== undefined && { regionId: cell.cause.regionId }),
        },
      };

export const toYearRatioViewDTO = (view: YearRatioView) => ({
  ...view,
  rows: view.rows.map((row) => ({
    ...row,
    cells: row.cells.map((cell) => (cell === null ? null : toRatioCellDTO(cell))),
  })),
});

export const toRatioMatrixDTO = (matrix: RatioMatrix) => ({
  ...matrix,
  rows: matrix.rows.map((row) => ({ ...row, cells: row.cells.map(toRatioCellDTO) })),
});

export const toFindingDTO = (finding: ChecksumFinding): FindingDTO => {
  const base = {
    geographyId: finding.geographyId,
    variable: finding.variable,
    year: finding.year,
    status: finding.status,
    checksum: finding.checksum.toFixed(),
  };

  switch (finding.status) {
    case 'consistent':
      return { ...base, reportedTotal: finding.reportedTotal.toFixed() };
    case 'discrepancy':
      return {
        ...base,
        reportedTotal: finding.reportedTotal.toFixed(),
        delta: finding.delta.toFixed(),
        allowed: finding.allowed.toFixed(),
        confidentialSectors: finding.confidentialSectors,
      };
    case 'unverifiable':
      return {
        ...base,
        reason: finding.reason,
        ...(finding.reportedTotal !== undefined && {
          reportedTotal: finding.reportedTotal.toFixed(),
        }),
        ...(finding.confidentialSectors.length > 0 && {
          confidentialSectors: finding.confidentialSectors,
        }),
      };
  }
};
