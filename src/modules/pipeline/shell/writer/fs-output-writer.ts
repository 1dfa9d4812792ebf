import fs from 'node:fs/promises';
import path from 'node:path';

import { stringify } from 'csv-stringify/sync';
import { err, ok, type Result } from 'neverthrow';

import {
  anomalyRows,
  checksumFindingRows,
  kindSlug,
  loadFailureRows,
  parseIssueRows,
  ratioMatrixRows,
  shareMatrixRows,
  undefinedRatioRows,
  yearViewRows,
} from './format.js';
import { toIoError } from '../../../../common/types/errors.js';
import { createSilentLogger, type Logger } from '../../../../infra/logger/index.js';
import { renderWideTable, type RawTable } from '../../../census-tables/index.js';
import { matrixForYear } from '../../../ratios/index.js';

import type { OutputError } from '../../core/errors.js';
import type { OutputWriter } from '../../core/ports.js';
import type { PipelineRun } from '../../core/types.js';

export interface FsOutputWriterOptions {
  outputDir: string;
  /** Decimals of written ratio values */
  ratioDecimals: number;
  logger?: Logger;
}

interface OutputFile {
  relativePath: string;
  contents: string;
}

const csvFile = (relativePath: string, rows: RawTable): OutputFile => ({
  relativePath,
  contents: stringify(rows),
});

/**
 * Lays out every artefact of a run as files relative to the output directory.
 */
export const planOutputFiles = (run: PipelineRun, ratioDecimals: number): OutputFile[] => {
  const { hierarchy, report } = run;
  const files: OutputFile[] = [];
  const views = new Set<string>();

  for (const matrix of report.ratios.matrices) {
    const dir = path.posix.join('ratios', kindSlug(matrix.kind), matrix.variable);
    files.push(
      csvFile(
        path.posix.join(dir, `${matrix.numeratorId}__${matrix.denominatorId}.csv`),
        ratioMatrixRows(matrix, ratioDecimals)
      )
    );

    for (const year of matrix.years) {
      const viewPath = path.posix.join(dir, 'by-year', `${String(year)}.csv`);
      if (views.has(viewPath)) continue;
      views.add(viewPath);
      const view = matrixForYear(report.ratios.matrices, matrix.variable, matrix.kind, year);
      if (view !== null) {
        files.push(csvFile(viewPath, yearViewRows(view, hierarchy, ratioDecimals)));
      }
    }
  }

  for (const share of report.shares) {
    files.push(
      csvFile(
        path.posix.join('shares', share.geographyId, `${share.variable}_percent.csv`),
        shareMatrixRows(share)
      )
    );
  }

  for (const table of report.regionTables) {
    files.push(
      csvFile(path.posix.join('regions', `${table.geographyId}.csv`), renderWideTable(table))
    );
  }

  files.push(
    csvFile('report/checksum-findings.csv', checksumFindingRows(report.checksumFindings)),
    csvFile('report/undefined-ratios.csv', undefinedRatioRows(report.ratios.undefinedCells)),
    csvFile('report/ratio-anomalies.csv', anomalyRows(report.ratios.anomalies, ratioDecimals)),
    csvFile('report/parse-issues.csv', parseIssueRows(report.parseIssues)),
    csvFile('report/table-load-failures.csv', loadFailureRows(report.loadFailures)),
    {
      relativePath: 'report/summary.json',
      contents: `${JSON.stringify(report.summary, null, 2)}\n`,
    }
  );

  return files;
};

/**
 * Writes run outputs under `outputDir`, removing whatever a previous run left
 * there first.
 */
export const createFsOutputWriter = (options: FsOutputWriterOptions): OutputWriter => {
  const outputDir = path.resolve(options.outputDir);
  const logger = options.logger ?? createSilentLogger();

  return {
    async write(run: PipelineRun): Promise<Result<string[], OutputError>> {
      const files = planOutputFiles(run, options.ratioDecimals);

      try {
        await fs.rm(outputDir, { recursive: true, force: true });
        await fs.mkdir(outputDir, { recursive: true });
      } catch (error) {
        return err(toIoError(error, outputDir, 'write'));
      }

      const written: string[] = [];
      for (const file of files) {
        const target = path.join(outputDir, file.relativePath);
        try {
          await fs.mkdir(path.dirname(target), { recursive: true });
          await fs.writeFile(target, file.contents, 'utf8');
        } catch (error) {
          return err(toIoError(error, target, 'write'));
        }
        written.push(file.relativePath);
      }

      logger.info({ outputDir, files: written.length }, 'Outputs written');
      return ok(written);
    },
  };
};
