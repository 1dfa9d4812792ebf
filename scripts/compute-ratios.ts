/**
 * Runs the full pipeline over the configured inputs and writes every output
 * under OUTPUT_DIR.
 *
 * Usage:
 *   tsx scripts/compute-ratios.ts [--variables A111A,A131A] [--kinds state/national,region/state]
 *                                 [--years 2018,2023]
 *
 * Exits non-zero only when nothing could be computed or written. Checksum
 * discrepancies and undefined ratios are findings and end up in the report.
 */

import { makePipelineDeps, toleranceFromConfig } from '../src/app/pipeline-deps.js';
import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { createLogger } from '../src/infra/logger/index.js';
import {
  isCensusYear,
  isVariableCode,
  type CensusYear,
  type VariableCode,
} from '../src/modules/census-tables/index.js';
import {
  createFsOutputWriter,
  runPipeline,
  type PipelineInput,
} from '../src/modules/pipeline/index.js';
import { isRatioKind, type RatioKind } from '../src/modules/ratios/index.js';

interface CLIOptions {
  variables?: VariableCode[];
  kinds?: RatioKind[];
  years?: CensusYear[];
}

const splitList = <T>(
  value: string | undefined,
  accept: (item: string) => T | null,
  flag: string
): T[] => {
  const items = (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
  return items.map((item) => {
    const accepted = accept(item);
    if (accepted === null) throw new Error(`${flag}: '${item}' is not a valid value`);
    return accepted;
  });
};

function parseArgs(): CLIOptions {
  const args = process.argv.slice(2);
  const options: CLIOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const nextArg = args[i + 1];

    switch (arg) {
      case '--variables':
        options.variables = splitList(nextArg, (item) => (isVariableCode(item) ? item : null), arg);
        i++;
        break;
      case '--kinds':
        options.kinds = splitList(nextArg, (item) => (isRatioKind(item) ? item : null), arg);
        i++;
        break;
      case '--years':
        options.years = splitList(
          nextArg,
          (item) => {
            const year = Number(item);
            return isCensusYear(year) ? year : null;
          },
          arg
        );
        i++;
        break;
      default:
        throw new Error(`Unknown argument '${String(arg)}'`);
    }
  }

  return options;
}

const main = async (): Promise<void> => {
  const options = parseArgs();
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({ level: config.logger.level, pretty: config.logger.pretty });

  const input: PipelineInput = { tolerance: toleranceFromConfig(config), ...options };
  const run = await runPipeline(makePipelineDeps(config, logger), input);
  if (run.isErr()) {
    logger.fatal({ error: run.error }, run.error.message);
    process.exit(1);
  }

  const writer = createFsOutputWriter({
    outputDir: config.census.outputDir,
    ratioDecimals: config.output.ratioDecimals,
    logger,
  });
  const written = await writer.write(run.value);
  if (written.isErr()) {
    logger.fatal({ error: written.error }, written.error.message);
    process.exit(1);
  }

  logger.info({ summary: run.value.report.summary, files: written.value.length }, 'Done');
};

await main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
