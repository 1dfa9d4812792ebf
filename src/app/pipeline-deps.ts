/**
 * Wires the pipeline to the file system from configuration.
 * Shared by the API entry point and the command-line scripts.
 */

import { Decimal } from 'decimal.js';

import { createFsTableRepo } from '../modules/census-tables/index.js';
import { loadGeographyHierarchy } from '../modules/geography/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { ChecksumTolerance } from '../modules/checksum/index.js';
import type { RunPipelineDeps } from '../modules/pipeline/index.js';
import type { Logger } from 'pino';

export const toleranceFromConfig = (config: AppConfig): ChecksumTolerance => ({
  absolute: new Decimal(config.checksum.tolerance),
  roundingDecimals: config.checksum.roundingDecimals,
});

export const makePipelineDeps = (config: AppConfig, logger: Logger): RunPipelineDeps => ({
  geographySource: {
    load: () => loadGeographyHierarchy(config.census.geographyConfigPath),
  },
  tableRepo: createFsTableRepo({
    rootDir: config.census.dataDir,
    blankMeans: config.census.blankCellMeans,
    logger: logger.child({ component: 'table-repo' }),
  }),
  logger,
});
