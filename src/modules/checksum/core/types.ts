import { Decimal } from 'decimal.js';

import type { CensusYear, VariableCode } from '../../census-tables/index.js';

/**
 * Allowed gap between the sector sum and the reported total.
 *
 * The source figures are rounded to `roundingDecimals` places, so each of the
 * summed values and the total may be off by half a unit in the last place.
 * The allowance grows with the number of numeric terms; `null` disables it.
 */
export interface ChecksumTolerance {
  absolute: Decimal;
  roundingDecimals: number | null;
}

export const DEFAULT_TOLERANCE: ChecksumTolerance = {
  absolute: new Decimal('0.001'),
  roundingDecimals: 3,
};

export interface ColumnKey {
  geographyId: string;
  variable: VariableCode;
  year: CensusYear;
}

export interface ConsistentFinding extends ColumnKey {
  status: 'consistent';
  checksum: Decimal;
  reportedTotal: Decimal;
}

/**
 * Sector sum and reported total differ by more than the tolerance. Expected
 * wherever sectors are withheld; it is reported, never raised.
 */
export interface DiscrepancyFinding extends ColumnKey {
  status: 'discrepancy';
  checksum: Decimal;
  reportedTotal: Decimal;
  /** reportedTotal − checksum */
  delta: Decimal;
  allowed: Decimal;
  /** Keys of sectors whose value is Confidential in this column */
  confidentialSectors: string[];
}

/**
 * `sectors-confidential`: the sum matches the total only because withheld
 * sectors count as zero, so the total may leave them out.
 */
export type UnverifiableReason =
  | 'total-confidential'
  | 'total-not-applicable'
  | 'total-missing'
  | 'sectors-confidential';

export interface UnverifiableFinding extends ColumnKey {
  status: 'unverifiable';
  reason: UnverifiableReason;
  checksum: Decimal;
  /** Present when the total itself is numeric */
  reportedTotal?: Decimal;
  confidentialSectors: string[];
}

export type ChecksumFinding = ConsistentFinding | DiscrepancyFinding | UnverifiableFinding;

export type ChecksumStatus = ChecksumFinding['status'];

export interface FindingsSummary {
  consistent: number;
  discrepancy: number;
  unverifiable: number;
  total: number;
}
