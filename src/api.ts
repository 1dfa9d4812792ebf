/**
 * API server entry point
 * Runs the pipeline once over the configured inputs, then serves the result
 */

import { buildApp } from './app/build-app.js';
import { makePipelineDeps, toleranceFromConfig } from './app/pipeline-deps.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { createLogger } from './infra/logger/index.js';
import { makeFsHealthChecker } from './modules/health/index.js';
import { makeMemoryReportStore, runPipeline } from './modules/pipeline/index.js';

const getVersion = (): string | undefined => process.env['APP_VERSION'] ?? '0.1.0';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    pretty: config.logger.pretty,
  });

  logger.info({ config: { server: config.server, census: config.census } }, 'Starting API server');

  const reportStore = makeMemoryReportStore();
  const run = await runPipeline(makePipelineDeps(config, logger), {
    tolerance: toleranceFromConfig(config),
  });

  if (run.isErr()) {
    logger.fatal({ error: run.error }, 'Pipeline run failed');
    process.exit(1);
  }
  reportStore.save(run.value);

  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        ...(config.logger.pretty && {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          },
        }),
      },
      disableRequestLogging: false,
    },
    deps: {
      config,
      reportStore,
      healthCheckers: [
        makeFsHealthChecker({
          name: 'census-data',
          path: config.census.dataDir,
          expect: 'directory',
        }),
        makeFsHealthChecker({
          name: 'geography-config',
          path: config.census.geographyConfigPath,
          expect: 'file',
        }),
      ],
    },
    version: getVersion(),
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      logger.info('Server closed');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
