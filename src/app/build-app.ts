/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { registerCors } from '../infra/plugins/index.js';
import {
  makeHealthRoutes,
  makeRunHealthChecker,
  type HealthChecker,
} from '../modules/health/index.js';
import {
  makeMemoryReportStore,
  makePipelineRoutes,
  type ReportStore,
} from '../modules/pipeline/index.js';

import type { AppConfig } from '../infra/config/env.js';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  /** Holds the run the API serves; an empty in-memory store when omitted */
  reportStore?: ReportStore;
  /** Extra readiness checks; the pipeline-run check is always added */
  healthCheckers?: HealthChecker[];
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps?: Partial<AppDeps>;
  version?: string | undefined;
}

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps = {}, version } = options;

  if (deps.config === undefined) {
    throw new Error('Missing required dependency: config');
  }

  const config = deps.config;
  const reportStore = deps.reportStore ?? makeMemoryReportStore();

  const app = fastifyLib({
    ...fastifyOptions,
  });

  // Handlers first: plugins registered afterwards inherit them
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: 'Request validation failed',
        details: error.validation,
      });
    }

    if (error.statusCode != null) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  await registerCors(app, config);

  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: [...(deps.healthCheckers ?? []), makeRunHealthChecker(reportStore)],
    })
  );

  await app.register(makePipelineRoutes({ reportStore }));

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
