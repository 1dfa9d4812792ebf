/**
 * Integration tests for health endpoints
 */

import { describe, expect, it, afterEach } from 'vitest';

import { createApp } from '@/app/build-app.js';
import { makeMemoryReportStore } from '@/modules/pipeline/index.js';

import {
  makeFailingHealthChecker,
  makeHealthChecker,
  makeTestConfig,
} from '../fixtures/builders.js';
import { makeTestRun } from '../fixtures/fakes.js';

import type { FastifyInstance } from 'fastify';

describe('Health Endpoints', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    if (app !== undefined) {
      await app.close();
      app = undefined;
    }
  });

  describe('GET /health/live', () => {
    it('returns 200 with status ok even before a run', async () => {
      app = await createApp({
        fastifyOptions: { logger: false },
        deps: { config: makeTestConfig() },
      });

      const response = await app.inject({ method: 'GET', url: '/health/live' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: 'ok' });
    });
  });

  describe('GET /health/ready', () => {
    it('returns 503 until a pipeline run is stored', async () => {
      app = await createApp({
        fastifyOptions: { logger: false },
        deps: { config: makeTestConfig() },
      });

      const response = await app.inject({ method: 'GET', url: '/health/ready' });
      const body = response.json<{ status: string; checks: { name: string; message?: string }[] }>();

      expect(response.statusCode).toBe(503);
      expect(body.status).toBe('unhealthy');
      expect(body.checks).toEqual([
        {
          name: 'pipeline-run',
          status: 'unhealthy',
          message: 'No pipeline run is available',
          critical: true,
        },
      ]);
    });

    it('returns 200 once a run is stored and inputs are readable', async () => {
      app = await createApp({
        fastifyOptions: { logger: false },
        deps: {
          config: makeTestConfig(),
          reportStore: makeMemoryReportStore(await makeTestRun()),
          healthCheckers: [makeHealthChecker({ name: 'census-data', critical: true })],
        },
        version: '0.1.0',
      });

      const response = await app.inject({ method: 'GET', url: '/health/ready' });
      const body = response.json<{ status: string; version: string; checks: { name: string }[] }>();

      expect(response.statusCode).toBe(200);
      expect(body.status).toBe('ok');
      expect(body.version).toBe('0.1.0');
      expect(body.checks.map((check) => check.name)).toEqual(['census-data', 'pipeline-run']);
    });

    it('returns 200 degraded when only a non-critical check fails', async () => {
      app = await createApp({
        fastifyOptions: { logger: false },
        deps: {
          config: makeTestConfig(),
          reportStore: makeMemoryReportStore(await makeTestRun()),
          healthCheckers: [
            makeHealthChecker({ name: 'output-dir', status: 'unhealthy', critical: false }),
          ],
        },
      });

      const response = await app.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(200);
      expect(response.json<{ status: string }>().status).toBe('degraded');
    });

    it('returns 503 when a checker throws', async () => {
      app = await createApp({
        fastifyOptions: { logger: false },
        deps: {
          config: makeTestConfig(),
          reportStore: makeMemoryReportStore(await makeTestRun()),
          healthCheckers: [makeFailingHealthChecker('EACCES: permission denied')],
        },
      });

      const response = await app.inject({ method: 'GET', url: '/health/ready' });

      expect(response.statusCode).toBe(503);
    });
  });
});
