import type { CensusTableError } from './errors.js';
import type { ParsedCensusTable } from './usecases/parse-census-table.js';
import type { BlankCellMeaning, RawTable } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Where the wide table of one geography lives.
 */
export interface TableSource {
  geographyId: string;
  /** Path relative to the repository root directory */
  path: string;
  /** Overrides the repository default for this table */
  blankMeans?: BlankCellMeaning;
}

export interface CensusTableRepo {
  /**
   * Reads and parses the wide table of one geography.
   * Cell-level problems come back as issues on the Ok value.
   */
  load(source: TableSource): Promise<Result<ParsedCensusTable, CensusTableError>>;

  /**
   * Reads a CSV file as raw rows (header first).
   */
  readRaw(relativePath: string): Promise<Result<RawTable, CensusTableError>>;
}
