import {
  ACTIVITY_COLUMN,
  columnHeader,
  formatTrimmed,
  type RawTable,
  type TableIssue,
} from '../../../census-tables/index.js';

import type { TableLoadFailure } from '../../core/types.js';
import type { ChecksumFinding } from '../../../checksum/index.js';
import type { GeographyHierarchy } from '../../../geography/index.js';
import type {
  AnomalyRecord,
  RatioCell,
  RatioKind,
  RatioMatrix,
  ShareMatrix,
  UndefinedCellRecord,
  YearRatioView,
} from '../../../ratios/index.js';

/** Written in place of a ratio that cannot be computed */
export const UNDEFINED_MARKER = 'ND';

const SHARE_DECIMALS = 2;

export const kindSlug = (kind: RatioKind): string => kind.replace('/', '-');

export const formatRatioCell = (cell: RatioCell, decimals: number): string =>
  cell.kind === 'defined' ? cell.value.toFixed(decimals) : UNDEFINED_MARKER;

export const ratioMatrixRows = (matrix: RatioMatrix, decimals: number): RawTable => [
  [ACTIVITY_COLUMN, ...matrix.years.map((year) => columnHeader(matrix.variable, year))],
  ...matrix.rows.map((row) => [
    row.label,
    ...row.cells.map((cell) => formatRatioCell(cell, decimals)),
  ]),
];

export const yearViewRows = (
  view: YearRatioView,
  hierarchy: GeographyHierarchy,
  decimals: number
): RawTable => [
  ['geography_id', 'geography', ...view.sectors.map((sector) => sector.label)],
  ...view.rows.map((row) => [
    row.numeratorId,
    hierarchy.nodes.get(row.numeratorId)?.name ?? row.numeratorId,
    ...row.cells.map((cell) => (cell === null ? '' : formatRatioCell(cell, decimals))),
  ]),
];

export const shareMatrixRows = (matrix: ShareMatrix): RawTable => [
  [ACTIVITY_COLUMN, ...matrix.years.map((year) => columnHeader(matrix.variable, year))],
  ...matrix.rows.map((row) => [
    row.label,
    ...row.cells.map((cell) => formatRatioCell(cell, SHARE_DECIMALS)),
  ]),
];

export const checksumFindingRows = (findings: readonly ChecksumFinding[]): RawTable => [
  [
    'geography_id',
    'variable',
    'year',
    'status',
    'checksum',
    'reported_total',
    'delta',
    'allowed',
    'reason',
    'confidential_sectors',
  ],
  ...findings.map((finding) => {
    const key = [finding.geographyId, finding.variable, String(finding.year), finding.status];
    switch (finding.status) {
      case 'consistent':
        return [
          ...key,
          formatTrimmed(finding.checksum),
          formatTrimmed(finding.reportedTotal),
          '',
          '',
          '',
          '',
        ];
      case 'discrepancy':
        return [
          ...key,
          formatTrimmed(finding.checksum),
          formatTrimmed(finding.reportedTotal),
          formatTrimmed(finding.delta),
          formatTrimmed(finding.allowed, 6),
          '',
          finding.confidentialSectors.join(';'),
        ];
      case 'unverifiable':
        return [
          ...key,
          formatTrimmed(finding.checksum),
          finding.reportedTotal !== undefined ? formatTrimmed(finding.reportedTotal) : '',
          '',
          '',
          finding.reason,
          finding.confidentialSectors.join(';'),
        ];
    }
  }),
];

export const undefinedRatioRows = (records: readonly UndefinedCellRecord[]): RawTable => [
  [
    'variable',
    'kind',
    'numerator_id',
    'denominator_id',
    'year',
    'sector',
    'reason',
    'cause_geography_id',
    'cause_sector',
    'cause_region_id',
  ],
  ...records.map((record) => [
    record.variable,
    record.kind,
    record.numeratorId,
    record.denominatorId,
    String(record.year),
    record.sectorKey,
    record.reason,
    record.cause.geographyId,
    record.cause.sectorKey,
    record.cause.regionId ?? '',
  ]),
];

export const anomalyRows = (records: readonly AnomalyRecord[], decimals: number): RawTable => [
  ['variable', 'kind', 'numerator_id', 'denominator_id', 'year', 'sector', 'value', 'anomaly'],
  ...records.map((record) => [
    record.variable,
    record.kind,
    record.numeratorId,
    record.denominatorId,
    String(record.year),
    record.sectorKey,
    record.value.toFixed(decimals),
    record.anomaly,
  ]),
];

const issueLocation = (issue: TableIssue): { row: string; column: string; raw: string } => {
  switch (issue.type) {
    case 'ParseError':
      return { row: issue.rowLabel, column: issue.column, raw: issue.raw };
    case 'InvalidHeader':
      return { row: '', column: issue.column, raw: '' };
    case 'DuplicateRow':
      return { row: issue.rowLabel, column: '', raw: '' };
    case 'UnlabelledRow':
      return { row: String(issue.rowNumber), column: '', raw: '' };
    case 'MissingTotalRow':
      return { row: '', column: '', raw: '' };
  }
};

export const parseIssueRows = (issues: readonly TableIssue[]): RawTable => [
  ['type', 'geography_id', 'row', 'column', 'raw', 'message'],
  ...issues.map((issue) => {
    const { row, column, raw } = issueLocation(issue);
    return [issue.type, issue.geographyId, row, column, raw, issue.message];
  }),
];

export const loadFailureRows = (failures: readonly TableLoadFailure[]): RawTable => [
  ['geography_id', 'path', 'error', 'message'],
  ...failures.map((failure) => [
    failure.geographyId,
    failure.path,
    failure.error.type,
    failure.error.message,
  ]),
];
