/**
 * Test data builders/factories
 * Provides sensible defaults for test entities
 */

import {
  parseCensusTable,
  type CensusTable,
  type RawTable,
} from '@/modules/census-tables/index.js';
import {
  buildGeographyHierarchy,
  type GeographyConfigDTO,
  type GeographyHierarchy,
} from '@/modules/geography/index.js';

import type { AppConfig } from '@/infra/config/env.js';
import type { HealthCheckResult, HealthChecker } from '@/modules/health/index.js';

/**
 * Create a health check result with defaults
 */
export const makeHealthCheckResult = (
  overrides: Partial<HealthCheckResult> = {}
): HealthCheckResult => ({
  name: 'test-check',
  status: 'healthy',
  ...overrides,
});

/**
 * Create a health checker function that returns a fixed result
 */
export const makeHealthChecker = (result: Partial<HealthCheckResult> = {}): HealthChecker => {
  const fullResult = makeHealthCheckResult(result);
  return async () => fullResult;
};

/**
 * Create a health checker that throws an error
 */
export const makeFailingHealthChecker = (errorMessage: string): HealthChecker => {
  return async () => {
    throw new Error(errorMessage);
  };
};

/**
 * Create a test configuration with defaults
 */
export const makeTestConfig = (overrides: Partial<AppConfig> = {}): AppConfig => {
  const defaults: AppConfig = {
    server: {
      port: 3000,
      host: '0.0.0.0',
      isDevelopment: true,
      isProduction: false,
      isTest: true,
    },
    logger: {
      level: 'silent',
      pretty: false,
    },
    census: {
      dataDir: './data/tables',
      geographyConfigPath: './config/geography.yaml',
      outputDir: './output',
      blankCellMeans: 'not-applicable',
    },
    checksum: {
      tolerance: '0.001',
      roundingDecimals: 3,
    },
    output: {
      ratioDecimals: 6,
    },
    cors: {
      allowedOrigins: undefined,
    },
  };

  return {
    ...defaults,
    ...overrides,
    server: { ...defaults.server, ...overrides.server },
    logger: { ...defaults.logger, ...overrides.logger },
    census: { ...defaults.census, ...overrides.census },
    checksum: { ...defaults.checksum, ...overrides.checksum },
    output: { ...defaults.output, ...overrides.output },
    cors: { ...defaults.cors, ...overrides.cors },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Census tables
// ─────────────────────────────────────────────────────────────────────────────

export type TableRow = [label: string, ...cells: string[]];

/**
 * Raw wide table with the activity column first.
 */
export const makeRawTable = (columns: string[], rows: TableRow[]): RawTable => [
  ['Actividad Economica', ...columns],
  ...rows,
];

/**
 * Parses a wide table and fails the test setup on a fatal error.
 */
export const makeTable = (geographyId: string, columns: string[], rows: TableRow[]): CensusTable =>
  parseCensusTable(makeRawTable(columns, rows), { geographyId })._unsafeUnwrap().table;

/**
 * Small hierarchy: the nation, two states, three municipalities of state 28,
 * two municipal regions and one region of states.
 */
export const makeTestGeographyConfig = (
  overrides: Partial<GeographyConfigDTO> = {}
): GeographyConfigDTO => ({
  national: { id: '00', name: 'Total Nacional' },
  states: [
    { id: '19', name: 'Nuevo León' },
    { id: '28', name: 'Tamaulipas' },
  ],
  municipalities: [
    { id: '28001', name: 'Alfa', state: '28' },
    { id: '28002', name: 'Beta', state: '28' },
    { id: '28003', name: 'Gamma', state: '28' },
  ],
  regions: [
    { id: 'norte', name: 'Norte', parent: '28', members: ['28001', '28002'] },
    { id: 'sur', name: 'Sur', parent: '28', members: ['28003'] },
    { id: 'noreste', name: 'Noreste', parent: '00', members: ['19', '28'] },
  ],
  ...overrides,
});

export const makeTestHierarchy = (
  overrides: Partial<GeographyConfigDTO> = {}
): GeographyHierarchy =>
  buildGeographyHierarchy(makeTestGeographyConfig(overrides))._unsafeUnwrap();

/** Columns of the shared test dataset */
export const TEST_COLUMNS = ['A131A_2018', 'A131A_2023'];

/**
 * Wide tables for every tabulated geography of the test hierarchy.
 *
 * State 28 withholds mining in 2018 and Beta withholds agriculture in 2023;
 * those two columns do not add up to their totals. Gamma's 2018 agriculture
 * exceeds its state's.
 */
export const makeTestCensusTables = (): Record<string, RawTable> => ({
  '00': makeRawTable(TEST_COLUMNS, [
    ['Sector 11 Agricultura', '1000', '1200'],
    ['Sector 21 Minería', '500', '600'],
    ['Total Nacional', '1500', '1800'],
  ]),
  '19': makeRawTable(TEST_COLUMNS, [
    ['Sector 11 Agricultura', '50', '40'],
    ['Sector 21 Minería', '20', 'N/A'],
    ['Total Nuevo León', '70', '40'],
  ]),
  '28': makeRawTable(TEST_COLUMNS, [
    ['Sector 11 Agricultura', '100', '150'],
    ['Sector 21 Minería', 'C', '60'],
    ['Total Tamaulipas', '300', '210'],
  ]),
  '28001': makeRawTable(TEST_COLUMNS, [
    ['Sector 11 Agricultura', '10', '15'],
    ['Sector 21 Minería', '5', '6'],
    ['Total Alfa', '15', '21'],
  ]),
  '28002': makeRawTable(TEST_COLUMNS, [
    ['Sector 11 Agricultura', '30', 'C'],
    ['Sector 21 Minería', '2', '3'],
    ['Total Beta', '32', '50'],
  ]),
  '28003': makeRawTable(TEST_COLUMNS, [
    ['Sector 11 Agricultura', '400', '20'],
    ['Sector 21 Minería', '1', '1'],
    ['Total Gamma', '401', '21'],
  ]),
});

/**
 * Parsed tables of the shared test dataset.
 */
export const makeTestTables = (): CensusTable[] =>
  Object.entries(makeTestCensusTables()).map(
    ([geographyId, raw]) => parseCensusTable(raw, { geographyId })._unsafeUnwrap().table
  );
