/**
 * Run Pipeline Use Case
 *
 * Loads the geography hierarchy and every configured table, validates each
 * table against its reported totals, then derives ratio matrices, share
 * matrices and regional tables. Single pass, in that order.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  makeObservationIndex,
  type CensusTable,
  type TableIssue,
} from '../../../census-tables/index.js';
import { summarizeFindings, validateTable, type ChecksumFinding } from '../../../checksum/index.js';
import { tabulatedNodes } from '../../../geography/index.js';
import {
  DEFAULT_RATIO_VARIABLES,
  aggregateRegionTable,
  computeRatioMatrices,
  computeShareMatrix,
  hasData,
  selectYears,
  type ShareMatrix,
} from '../../../ratios/index.js';
import { createNoTablesLoadedError, type PipelineError } from '../errors.js';

import type { GeographySource } from '../ports.js';
import type { PipelineInput, PipelineRun, PipelineSummary, TableLoadFailure } from '../types.js';
import type { CensusTableRepo } from '../../../census-tables/index.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RunPipelineDeps {
  geographySource: GeographySource;
  tableRepo: CensusTableRepo;
  logger: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const runPipeline = async (
  deps: RunPipelineDeps,
  input: PipelineInput
): Promise<Result<PipelineRun, PipelineError>> => {
  const { geographySource, tableRepo, logger } = deps;
  const log = logger.child({ usecase: 'runPipeline' });

  const hierarchyResult = await geographySource.load();
  if (hierarchyResult.isErr()) {
    log.error({ error: hierarchyResult.error }, 'Geography configuration rejected');
    return err(hierarchyResult.error);
  }
  const hierarchy = hierarchyResult.value;

  // Load
  const tables: CensusTable[] = [];
  const loadFailures: TableLoadFailure[] = [];
  const parseIssues: TableIssue[] = [];
  const nodes = tabulatedNodes(hierarchy);

  for (const node of nodes) {
    const loaded = await tableRepo.load({ geographyId: node.id, path: node.table });
    if (loaded.isErr()) {
      log.warn(
        { geographyId: node.id, path: node.table, error: loaded.error.type },
        'Table not loaded'
      );
      loadFailures.push({ geographyId: node.id, path: node.table, error: loaded.error });
      continue;
    }

    tables.push(loaded.value.table);
    for (const issue of loaded.value.issues) {
      log.warn({ issue }, issue.message);
      parseIssues.push(issue);
    }
  }

  if (tables.length === 0 && nodes.length > 0) {
    const error = createNoTablesLoadedError(loadFailures.length);
    log.error({ failed: loadFailures.length }, error.message);
    return err(error);
  }

  // Validate
  const checksumFindings: ChecksumFinding[] = [];
  for (const table of tables) {
    for (const finding of validateTable(table, input.tolerance)) {
      if (finding.status === 'discrepancy') {
        log.info(
          {
            geographyId: finding.geographyId,
            variable: finding.variable,
            year: finding.year,
            delta: finding.delta.toString(),
            confidentialSectors: finding.confidentialSectors,
          },
          'Checksum discrepancy'
        );
      }
      checksumFindings.push(finding);
    }
  }

  // Ratios
  const index = makeObservationIndex(tables);
  const variables = input.variables ?? DEFAULT_RATIO_VARIABLES;
  const ratios = computeRatioMatrices(index, hierarchy, {
    variables,
    ...(input.kinds !== undefined && { kinds: input.kinds }),
    ...(input.years !== undefined && { years: input.years }),
  });

  // Shares of the reported total, for every geography with data
  const shares: ShareMatrix[] = [];
  const shareGeographies = [...nodes, ...hierarchy.regions].filter((node) =>
    hasData(index, hierarchy, node.id)
  );
  for (const variable of variables) {
    const years = selectYears(index, variable, input.years);
    if (years.length === 0) continue;
    for (const node of shareGeographies) {
      shares.push(computeShareMatrix(index, hierarchy, node.id, variable, years));
    }
  }

  // Descriptive regional tables
  const regionTables: CensusTable[] = [];
  for (const region of hierarchy.regions) {
    if (!hasData(index, hierarchy, region.id)) continue;
    const table = aggregateRegionTable(index, hierarchy, region.id);
    if (table.isOk()) regionTables.push(table.value);
  }

  const summary: PipelineSummary = {
    tablesLoaded: tables.length,
    tablesFailed: loadFailures.length,
    parseIssues: parseIssues.length,
    checksum: summarizeFindings(checksumFindings),
    ratioMatrices: ratios.matrices.length,
    undefinedRatios: ratios.undefinedCells.length,
    ratioAnomalies: ratios.anomalies.length,
    shareMatrices: shares.length,
    regionTables: regionTables.length,
  };

  log.info(summary, 'Pipeline run completed');

  return ok({
    hierarchy,
    report: {
      tables,
      loadFailures,
      parseIssues,
      checksumFindings,
      ratios,
      shares,
      regionTables,
      summary,
    },
  });
};
