import fs from 'node:fs/promises';
import path from 'node:path';

import { err, ok, type Result } from 'neverthrow';

import { parseCsv } from './csv-reader.js';
import { toIoError } from '../../../../common/types/errors.js';
import { createSilentLogger, type Logger } from '../../../../infra/logger/index.js';
import { parseCensusTable, type ParsedCensusTable } from '../../core/usecases/parse-census-table.js';

import type { CensusTableError } from '../../core/errors.js';
import type { CensusTableRepo, TableSource } from '../../core/ports.js';
import type { BlankCellMeaning, RawTable } from '../../core/types.js';

export interface FsTableRepoOptions {
  rootDir: string;
  blankMeans?: BlankCellMeaning;
  logger?: Logger;
}

export const createFsTableRepo = (options: FsTableRepoOptions): CensusTableRepo => {
  const rootDir = path.resolve(options.rootDir);
  const defaultBlankMeans = options.blankMeans ?? 'not-applicable';
  const logger = options.logger ?? createSilentLogger();

  const readRaw = async (relativePath: string): Promise<Result<RawTable, CensusTableError>> => {
    const filePath = path.resolve(rootDir, relativePath);
    let contents: string;

    try {
      contents = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      return err(toIoError(error, filePath, 'read'));
    }

    return parseCsv(contents, filePath);
  };

  return {
    readRaw,

    async load(source: TableSource): Promise<Result<ParsedCensusTable, CensusTableError>> {
      const rawResult = await readRaw(source.path);
      if (rawResult.isErr()) {
        return err(rawResult.error);
      }

      const parsed = parseCensusTable(rawResult.value, {
        geographyId: source.geographyId,
        blankMeans: source.blankMeans ?? defaultBlankMeans,
      });
      if (parsed.isErr()) {
        return err(parsed.error);
      }

      logger.debug(
        {
          geographyId: source.geographyId,
          observations: parsed.value.table.observations.length,
          issues: parsed.value.issues.length,
        },
        'Loaded census table'
      );

      return ok(parsed.value);
    },
  };
};
