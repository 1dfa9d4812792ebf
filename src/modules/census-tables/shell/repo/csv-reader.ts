import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import type { MalformedCsvError } from '../../core/errors.js';
import type { RawTable } from '../../core/types.js';

const isRawTable = (value: unknown): value is RawTable =>
  Array.isArray(value) &&
  value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'));

/**
 * Parses CSV text into raw rows. Rows may have different lengths; the table
 * parser treats missing trailing cells as blank.
 */
export const parseCsv = (content: string, source: string): Result<RawTable, MalformedCsvError> => {
  let records: unknown;

  try {
    records = parse(content, {
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true,
    });
  } catch (error) {
    return err({
      type: 'MalformedCsv',
      message: `Failed to parse CSV at ${source}: ${error instanceof Error ? error.message : String(error)}`,
      path: source,
    });
  }

  if (!isRawTable(records)) {
    return err({
      type: 'MalformedCsv',
      message: `CSV at ${source} did not produce rows of text cells`,
      path: source,
    });
  }

  return ok(records);
};
