import fs from 'node:fs/promises';
import path from 'node:path';

import { stringify } from 'csv-stringify/sync';
import { err, ok, type Result } from 'neverthrow';

import { toIoError, type IoError } from '../../../../common/types/errors.js';
import { renderWideTable } from '../../core/usecases/render-wide-table.js';

import type { WideTable } from '../../core/usecases/build-wide-tables.js';

/**
 * Writes each table to `<dir>/<geographyId>.csv`, checksum row included.
 * Returns the written file names.
 */
export const writeWideTables = async (
  tables: readonly WideTable[],
  dir: string
): Promise<Result<string[], IoError>> => {
  const root = path.resolve(dir);
  try {
    await fs.mkdir(root, { recursive: true });
  } catch (error) {
    return err(toIoError(error, root, 'write'));
  }

  const written: string[] = [];
  for (const { geography, table } of tables) {
    const fileName = `${geography.id}.csv`;
    const target = path.join(root, fileName);
    try {
      await fs.writeFile(target, stringify(renderWideTable(table)), 'utf8');
    } catch (error) {
      return err(toIoError(error, target, 'write'));
    }
    written.push(fileName);
  }

  return ok(written);
};
