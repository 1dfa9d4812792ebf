import type {
  Operand,
  RatioAnomaly,
  RatioCell,
  UndefinedReason,
  UnknownValueReason,
} from '../types.js';

const REASONS: Record<'numerator' | 'denominator', Record<UnknownValueReason, UndefinedReason>> = {
  numerator: {
    confidential: 'numerator-confidential',
    'not-applicable': 'numerator-not-applicable',
    missing: 'numerator-missing',
  },
  denominator: {
    confidential: 'denominator-confidential',
    'not-applicable': 'denominator-not-applicable',
    missing: 'denominator-missing',
  },
};

/**
 * numerator / denominator. Unknown operands and a zero denominator give an
 * Undefined cell; the numerator is checked first. Results above one or below
 * zero are kept and flagged.
 */
export const divide = (numerator: Operand, denominator: Operand): RatioCell => {
  if (numerator.kind === 'unknown') {
    return {
      kind: 'undefined',
      reason: REASONS.numerator[numerator.reason],
      cause: numerator.cause,
    };
  }

  if (denominator.kind === 'unknown') {
    return {
      kind: 'undefined',
      reason: REASONS.denominator[denominator.reason],
      cause: denominator.cause,
    };
  }

  if (denominator.value.isZero()) {
    return {
      kind: 'undefined',
      reason: 'denominator-zero',
      cause: { geographyId: denominator.geographyId, sectorKey: denominator.sectorKey },
    };
  }

  const value = numerator.value.div(denominator.value);
  const anomaly: RatioAnomaly | null = value.gt(1) ? 'above-one' : value.lt(0) ? 'negative' : null;

  return anomaly === null ? { kind: 'defined', value } : { kind: 'defined', value, anomaly };
};
