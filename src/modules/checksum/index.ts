/**
 * Checksum Module
 *
 * Compares the sum of sector values with the agency-reported total of every
 * column. Mismatches are findings, not errors.
 */

export {
  DEFAULT_TOLERANCE,
  type ChecksumFinding,
  type ChecksumStatus,
  type ChecksumTolerance,
  type ColumnKey,
  type ConsistentFinding,
  type DiscrepancyFinding,
  type FindingsSummary,
  type UnverifiableFinding,
  type UnverifiableReason,
} from './core/types.js';

export {
  allowedDifference,
  validateColumn,
  type ColumnInput,
} from './core/usecases/validate-column.js';
export { validateTable } from './core/usecases/validate-table.js';
export { summarizeFindings } from './core/usecases/summarize-findings.js';
