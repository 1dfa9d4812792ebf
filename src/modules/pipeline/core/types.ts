import type {
  CensusTable,
  CensusTableError,
  CensusYear,
  TableIssue,
  VariableCode,
} from '../../census-tables/index.js';
import type { ChecksumFinding, ChecksumTolerance, FindingsSummary } from '../../checksum/index.js';
import type { GeographyHierarchy } from '../../geography/index.js';
import type { RatioComputation, RatioKind, ShareMatrix } from '../../ratios/index.js';

/**
 * A configured table that could not be read. Its geography is then treated
 * as having no data; the run continues.
 */
export interface TableLoadFailure {
  geographyId: string;
  path: string;
  error: CensusTableError;
}

export interface PipelineInput {
  tolerance: ChecksumTolerance;
  variables?: readonly VariableCode[];
  kinds?: readonly RatioKind[];
  years?: readonly CensusYear[];
}

export interface PipelineSummary {
  tablesLoaded: number;
  tablesFailed: number;
  parseIssues: number;
  checksum: FindingsSummary;
  ratioMatrices: number;
  undefinedRatios: number;
  ratioAnomalies: number;
  shareMatrices: number;
  regionTables: number;
}

/**
 * Everything one run produced. Findings are only ever appended.
 */
export interface PipelineReport {
  tables: CensusTable[];
  loadFailures: TableLoadFailure[];
  parseIssues: TableIssue[];
  checksumFindings: ChecksumFinding[];
  ratios: RatioComputation;
  shares: ShareMatrix[];
  regionTables: CensusTable[];
  summary: PipelineSummary;
}

export interface PipelineRun {
  hierarchy: GeographyHierarchy;
  report: PipelineReport;
}
