import type { Decimal } from 'decimal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Census dimensions
// ─────────────────────────────────────────────────────────────────────────────

export const VARIABLE_CODES = [
  'A111A',
  'A121A',
  'A131A',
  'A211A',
  'A221A',
  'H001A',
  'Q000A',
] as const;

export type VariableCode = (typeof VARIABLE_CODES)[number];

export interface VariableDefinition {
  code: VariableCode;
  label: string;
  unit: 'millones de pesos' | 'personas';
}

export const VARIABLES: Record<VariableCode, VariableDefinition> = {
  A111A: { code: 'A111A', label: 'Producción bruta total', unit: 'millones de pesos' },
  A121A: { code: 'A121A', label: 'Consumo intermedio', unit: 'millones de pesos' },
  A131A: { code: 'A131A', label: 'Valor agregado censal bruto', unit: 'millones de pesos' },
  A211A: { code: 'A211A', label: 'Inversión total', unit: 'millones de pesos' },
  A221A: { code: 'A221A', label: 'Formación bruta de capital fijo', unit: 'millones de pesos' },
  H001A: { code: 'H001A', label: 'Personal ocupado total', unit: 'personas' },
  Q000A: { code: 'Q000A', label: 'Acervo total de activos fijos', unit: 'millones de pesos' },
};

export const CENSUS_YEARS = [2003, 2008, 2013, 2018, 2023] as const;

export type CensusYear = (typeof CENSUS_YEARS)[number];

export const isVariableCode = (value: string): value is VariableCode =>
  (VARIABLE_CODES as readonly string[]).includes(value);

export const isCensusYear = (value: number): value is CensusYear =>
  (CENSUS_YEARS as readonly number[]).includes(value);

/** Label of the activity column in wide tables */
export const ACTIVITY_COLUMN = 'Actividad Economica';

/** Accepted spellings of the activity column header */
export const ACTIVITY_COLUMN_ALIASES = ['Actividad Economica', 'Actividad económica'] as const;

/** Label of the synthetic sector-sum row */
export const CHECKSUM_ROW_LABEL = 'checksum';

/** Row key used for the reported Total row */
export const TOTAL_ROW_KEY = 'Total';

// ─────────────────────────────────────────────────────────────────────────────
// Cell values
// ─────────────────────────────────────────────────────────────────────────────

export interface NumericValue {
  kind: 'numeric';
  value: Decimal;
}

export interface NotApplicableValue {
  kind: 'not-applicable';
}

/**
 * Value withheld by the agency. `partial` is present when the cell carried an
 * annotated partial sum such as "123.45 + 2C".
 */
export interface ConfidentialValue {
  kind: 'confidential';
  partial?: { sum: Decimal; withheld: number };
}

export type CellValue = NumericValue | NotApplicableValue | ConfidentialValue;

export const NOT_APPLICABLE: NotApplicableValue = { kind: 'not-applicable' };
export const CONFIDENTIAL: ConfidentialValue = { kind: 'confidential' };

export const numeric = (value: Decimal): NumericValue => ({ kind: 'numeric', value });

export const isNumeric = (cell: CellValue): cell is NumericValue => cell.kind === 'numeric';

/** How a strictly empty cell is read; the source files use both conventions. */
export type BlankCellMeaning = 'not-applicable' | 'confidential';

// ─────────────────────────────────────────────────────────────────────────────
// Table model
// ─────────────────────────────────────────────────────────────────────────────

export interface Sector {
  /** Matching key across geographies: the sector code when present, else the label */
  key: string;
  /** e.g. "21" or "31-33" */
  code: string | null;
  label: string;
}

export interface ColumnRef {
  header: string;
  variable: VariableCode;
  year: CensusYear;
}

export interface Observation {
  geographyId: string;
  sector: Sector;
  variable: VariableCode;
  year: CensusYear;
  value: CellValue;
}

/** Agency-reported total, independent of the sum of its sector rows */
export interface SectorTotal {
  geographyId: string;
  variable: VariableCode;
  year: CensusYear;
  value: CellValue;
}

export interface CensusTable {
  geographyId: string;
  /** Label of the reported Total row, null when the table has none */
  totalLabel: string | null;
  columns: ColumnRef[];
  sectors: Sector[];
  observations: Observation[];
  totals: SectorTotal[];
}

/** Raw CSV content: the header row followed by data rows */
export type RawTable = string[][];

export interface ParseTableOptions {
  geographyId: string;
  blankMeans?: BlankCellMeaning;
}
