/**
 * Unit tests for app factory
 */

import { describe, expect, it, beforeEach, afterEach } from 'vitest';

import { buildApp, createApp } from '@/app/build-app.js';

import { makeTestConfig } from '../fixtures/builders.js';

describe('App Factory', () => {
  describe('buildApp', () => {
    it('requires a config', async () => {
      await expect(buildApp({ fastifyOptions: { logger: false } })).rejects.toThrow(
        'Missing required dependency: config'
      );
    });

    it('accepts custom logger', async () => {
      const app = await buildApp({
        fastifyOptions: { logger: { level: 'silent' } },
        deps: { config: makeTestConfig() },
      });

      expect(app.log.level).toBe('silent');

      await app.close();
    });

    it('registers health and pipeline routes', async () => {
      const app = await buildApp({
        fastifyOptions: { logger: false },
        deps: { config: makeTestConfig() },
      });
      await app.ready();

      const routes = app.printRoutes();
      expect(routes).toContain('live');
      expect(routes).toContain('ready');
      expect(routes).toContain('summary');
      expect(routes).toContain('findings');
      expect(routes).toContain('matrix');

      await app.close();
    });
  });

  describe('createApp', () => {
    it('returns a ready app instance', async () => {
      const app = await createApp({
        fastifyOptions: { logger: false },
        deps: { config: makeTestConfig() },
      });

      const response = await app.inject({ method: 'GET', url: '/health/live' });

      expect(response.statusCode).toBe(200);

      await app.close();
    });
  });

  describe('Error Handling', () => {
    let app: Awaited<ReturnType<typeof createApp>> | undefined;

    beforeEach(async () => {
      app = await createApp({
        fastifyOptions: { logger: false },
        deps: { config: makeTestConfig() },
      });
    });

    afterEach(async () => {
      if (app !== undefined) await app.close();
    });

    it('returns 404 for unknown routes', async () => {
      const response = await app?.inject({ method: 'GET', url: '/unknown-route' });

      expect(response?.statusCode).toBe(404);
      expect(response?.json()).toEqual({
        ok: false,
        error: 'NotFoundError',
        message: 'Route GET /unknown-route not found',
      });
    });

    it('returns 404 for methods the API does not serve', async () => {
      const response = await app?.inject({ method: 'POST', url: '/api/v1/summary' });

      expect(response?.statusCode).toBe(404);
      expect(response?.json<{ message: string }>().message).toBe(
        'Route POST /api/v1/summary not found'
      );
    });
  });
});
