import { Decimal } from 'decimal.js';

import {
  DEFAULT_TOLERANCE,
  type ChecksumFinding,
  type ChecksumTolerance,
  type ColumnKey,
  type UnverifiableReason,
} from '../types.js';

import type { CellValue, Observation } from '../../../census-tables/index.js';

export interface ColumnInput extends ColumnKey {
  /** Sector observations of the column */
  observations: readonly Observation[];
  /** Reported total; undefined when the table has no value for it */
  total: CellValue | undefined;
}

/**
 * Allowed |checksum − total| for a sum of `numericCount` rounded terms.
 */
export const allowedDifference = (numericCount: number, tolerance: ChecksumTolerance): Decimal => {
  if (tolerance.roundingDecimals === null) {
    return tolerance.absolute;
  }
  const halfUnit = new Decimal(10).pow(-tolerance.roundingDecimals).div(2);
  return tolerance.absolute.plus(halfUnit.times(numericCount + 1));
};

/**
 * Compares the sum of numeric sector values with the reported total.
 * NotApplicable and Confidential sectors contribute zero, so a match with
 * Confidential sectors present is unverifiable rather than consistent.
 */
export const validateColumn = (
  input: ColumnInput,
  tolerance: ChecksumTolerance = DEFAULT_TOLERANCE
): ChecksumFinding => {
  const key: ColumnKey = {
    geographyId: input.geographyId,
    variable: input.variable,
    year: input.year,
  };

  let checksum = new Decimal(0);
  let numericCount = 0;
  const confidentialSectors: string[] = [];

  for (const obs of input.observations) {
    if (obs.value.kind === 'numeric') {
      checksum = checksum.plus(obs.value.value);
      numericCount += 1;
    } else if (obs.value.kind === 'confidential') {
      confidentialSectors.push(obs.sector.key);
    }
  }

  const { total } = input;
  if (total?.kind !== 'numeric') {
    const reason: UnverifiableReason =
      total === undefined
        ? 'total-missing'
        : total.kind === 'confidential'
          ? 'total-confidential'
          : 'total-not-applicable';
    return { ...key, status: 'unverifiable', reason, checksum, confidentialSectors };
  }

  const reportedTotal = total.value;
  const delta = reportedTotal.minus(checksum);
  const allowed = allowedDifference(numericCount, tolerance);

  if (delta.abs().lte(allowed)) {
    if (confidentialSectors.length > 0) {
      return {
        ...key,
        status: 'unverifiable',
        reason: 'sectors-confidential',
        checksum,
        reportedTotal,
        confidentialSectors,
      };
    }
    return { ...key, status: 'consistent', checksum, reportedTotal };
  }

  return {
    ...key,
    status: 'discrepancy',
    checksum,
    reportedTotal,
    delta,
    allowed,
    confidentialSectors,
  };
};
