/**
 * Converts a long SAIC export into one wide table per geography.
 *
 * Usage:
 *   tsx scripts/build-wide-tables.ts <export.csv> [--out <dir>] [--entity <code>]...
 *
 * --out defaults to DATA_DIR. --entity may repeat; the national total is
 * always kept.
 */

import fs from 'node:fs/promises';

import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { createLogger } from '../src/infra/logger/index.js';
import { buildWideTables, parseCsv, writeWideTables } from '../src/modules/census-tables/index.js';

interface CLIOptions {
  input: string;
  out: string | undefined;
  entities: string[];
}

function parseArgs(): CLIOptions {
  const args = process.argv.slice(2);
  let input: string | undefined;
  let out: string | undefined;
  const entities: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--out':
        out = nextArg;
        i++;
        break;
      case '--entity':
        if (nextArg !== undefined) entities.push(nextArg);
        i++;
        break;
      default:
        input ??= arg;
    }
  }

  if (input === undefined) {
    throw new Error('Usage: build-wide-tables <export.csv> [--out <dir>] [--entity <code>]');
  }

  return { input, out, entities };
}

const main = async (): Promise<void> => {
  const options = parseArgs();
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({ level: config.logger.level, pretty: config.logger.pretty });
  const outDir = options.out ?? config.census.dataDir;

  const contents = await fs.readFile(options.input, 'utf8');
  const raw = parseCsv(contents, options.input);
  if (raw.isErr()) {
    logger.fatal({ error: raw.error }, raw.error.message);
    process.exit(1);
  }

  const built = buildWideTables(raw.value, {
    ...(options.entities.length > 0 && { entities: options.entities }),
  });
  if (built.isErr()) {
    logger.fatal({ error: built.error }, built.error.message);
    process.exit(1);
  }

  for (const issue of built.value.issues) {
    logger.warn({ issue }, issue.message);
  }

  const written = await writeWideTables(built.value.tables, outDir);
  if (written.isErr()) {
    logger.fatal({ error: written.error }, written.error.message);
    process.exit(1);
  }

  logger.info(
    { outDir, tables: written.value.length, issues: built.value.issues.length },
    'Wide tables written'
  );
};

await main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
