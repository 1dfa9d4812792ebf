/**
 * Census Tables Module
 *
 * Loads wide SAIC tables (sector rows × VariableCode_Year columns) into typed
 * observations and reported totals.
 */

// Types
export {
  ACTIVITY_COLUMN,
  CENSUS_YEARS,
  CHECKSUM_ROW_LABEL,
  CONFIDENTIAL,
  NOT_APPLICABLE,
  TOTAL_ROW_KEY,
  VARIABLES,
  VARIABLE_CODES,
  isCensusYear,
  isNumeric,
  isVariableCode,
  numeric,
  type BlankCellMeaning,
  type CellValue,
  type CensusTable,
  type CensusYear,
  type ColumnRef,
  type ConfidentialValue,
  type NotApplicableValue,
  type NumericValue,
  type Observation,
  type ParseTableOptions,
  type RawTable,
  type Sector,
  type SectorTotal,
  type VariableCode,
  type VariableDefinition,
} from './core/types.js';

// Errors
export {
  createCellParseError,
  type CellParseError,
  type CensusTableError,
  type DuplicateRowIssue,
  type InvalidHeaderIssue,
  type MalformedCsvError,
  type MissingActivityColumnError,
  type MissingExportColumnError,
  type MissingTotalRowIssue,
  type TableIssue,
  type TableParseError,
  type UnlabelledRowIssue,
} from './core/errors.js';

// Ports
export type { CensusTableRepo, TableSource } from './core/ports.js';

// Cells and labels
export { formatCell, formatPartialSum, formatTrimmed, parseCell } from './core/cells.js';
export {
  classifyRow,
  columnHeader,
  compareColumns,
  parseColumnHeader,
  parseSector,
  type RowKind,
} from './core/labels.js';

// Use cases
export { parseCensusTable, type ParsedCensusTable } from './core/usecases/parse-census-table.js';
export {
  makeObservationIndex,
  type ObservationIndex,
} from './core/usecases/make-observation-index.js';
export {
  buildWideTables,
  type BuildWideTablesOptions,
  type BuiltWideTables,
  type WideTable,
  type WideTableGeography,
  type WideTableLevel,
} from './core/usecases/build-wide-tables.js';
export {
  renderWideTable,
  sumSectorCells,
  type SectorSum,
} from './core/usecases/render-wide-table.js';

// Shell
export { parseCsv } from './shell/repo/csv-reader.js';
export { createFsTableRepo, type FsTableRepoOptions } from './shell/repo/fs-table-repo.js';
export { writeWideTables } from './shell/repo/fs-table-writer.js';
