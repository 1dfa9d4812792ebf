import type { CensusYear, VariableCode } from '../../census-tables/index.js';
import type { Decimal } from 'decimal.js';

export const RATIO_KINDS = ['state/national', 'region/state', 'region/national'] as const;

export type RatioKind = (typeof RATIO_KINDS)[number];

export const isRatioKind = (value: string): value is RatioKind =>
  (RATIO_KINDS as readonly string[]).includes(value);

/** Production, intermediate consumption, value added and fixed capital formation */
export const DEFAULT_RATIO_VARIABLES: readonly VariableCode[] = ['A111A', 'A121A', 'A131A', 'A221A'];

// ─────────────────────────────────────────────────────────────────────────────
// Operands
// ─────────────────────────────────────────────────────────────────────────────

export type UnknownValueReason = 'confidential' | 'not-applicable' | 'missing';

/**
 * The cell that made a value unknown. For a region this is the first member
 * whose value is not numeric.
 */
export interface ValueCause {
  geographyId: string;
  sectorKey: string;
  /** Set when the cell was reached while aggregating this region */
  regionId?: string;
}

export interface KnownOperand {
  kind: 'known';
  geographyId: string;
  sectorKey: string;
  value: Decimal;
}

export interface UnknownOperand {
  kind: 'unknown';
  geographyId: string;
  sectorKey: string;
  reason: UnknownValueReason;
  cause: ValueCause;
}

export type Operand = KnownOperand | UnknownOperand;

// ─────────────────────────────────────────────────────────────────────────────
// Ratio cells
// ─────────────────────────────────────────────────────────────────────────────

export type RatioAnomaly = 'above-one' | 'negative';

export type UndefinedReason =
  | 'numerator-confidential'
  | 'numerator-not-applicable'
  | 'numerator-missing'
  | 'denominator-confidential'
  | 'denominator-not-applicable'
  | 'denominator-missing'
  | 'denominator-zero';

export interface DefinedRatio {
  kind: 'defined';
  value: Decimal;
  anomaly?: RatioAnomaly;
}

/**
 * A ratio that cannot be computed. This is a value, not an error: it keeps
 * withheld activity from reading as zero.
 */
export interface UndefinedRatio {
  kind: 'undefined';
  reason: UndefinedReason;
  cause: ValueCause;
}

export type RatioCell = DefinedRatio | UndefinedRatio;

// ─────────────────────────────────────────────────────────────────────────────
// Matrices
// ─────────────────────────────────────────────────────────────────────────────

export interface MatrixRow {
  /** Sector key, or "Total" for the reported total */
  sectorKey: string;
  label: string;
  /** One cell per year of the matrix, in the same order */
  cells: RatioCell[];
}

/**
 * Ratios of one numerator/denominator pair for one variable: sector rows ×
 * census years.
 */
export interface RatioMatrix {
  variable: VariableCode;
  kind: RatioKind;
  numeratorId: string;
  denominatorId: string;
  years: CensusYear[];
  rows: MatrixRow[];
}

export interface CellLocation {
  variable: VariableCode;
  kind: RatioKind;
  numeratorId: string;
  denominatorId: string;
  year: CensusYear;
  sectorKey: string;
}

export interface UndefinedCellRecord extends CellLocation {
  reason: UndefinedReason;
  cause: ValueCause;
}

export interface AnomalyRecord extends CellLocation {
  value: Decimal;
  anomaly: RatioAnomaly;
}

export interface RatioComputation {
  matrices: RatioMatrix[];
  undefinedCells: UndefinedCellRecord[];
  anomalies: AnomalyRecord[];
}

export interface ComputeRatiosOptions {
  variables?: readonly VariableCode[];
  kinds?: readonly RatioKind[];
  /** Defaults to every year found in the loaded tables for the variable */
  years?: readonly CensusYear[];
}

/**
 * One (variable, kind, year) view: numerator geographies × sectors.
 */
export interface YearRatioView {
  variable: VariableCode;
  kind: RatioKind;
  year: CensusYear;
  sectors: { sectorKey: string; label: string }[];
  /** `null` where the pair has no such sector on either side */
  rows: { numeratorId: string; denominatorId: string; cells: (RatioCell | null)[] }[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Shares and regional tables
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Each sector as a percentage of the geography's reported total, two decimals.
 */
export interface ShareMatrix {
  geographyId: string;
  variable: VariableCode;
  years: CensusYear[];
  rows: MatrixRow[];
}
