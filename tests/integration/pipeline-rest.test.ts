/**
 * Integration tests for the pipeline REST API
 */

import { describe, expect, it, beforeAll, afterAll } from 'vitest';

import { createApp } from '@/app/build-app.js';
import { makeMemoryReportStore } from '@/modules/pipeline/index.js';

import { makeTestConfig } from '../fixtures/builders.js';
import { makeTestRun } from '../fixtures/fakes.js';

import type { FastifyInstance } from 'fastify';

interface RatioCellBody {
  kind: string;
  value?: string;
  anomaly?: string;
  reason?: string;
  cause?: { geographyId: string; sectorKey: string; regionId?: string };
}

describe('Pipeline REST API', () => {
  let app: FastifyInstance;

  beforeAll(async () => {
    app = await createApp({
      fastifyOptions: { logger: false },
      deps: {
        config: makeTestConfig(),
        reportStore: makeMemoryReportStore(await makeTestRun()),
      },
    });
  });

  afterAll(async () => {
    await app.close();
  });

  describe('GET /api/v1/summary', () => {
    it('returns the counts of the stored run', async () => {
      const response = await app.inject({ method: 'GET', url: '/api/v1/summary' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        ok: true,
        data: {
          tablesLoaded: 6,
          tablesFailed: 0,
          parseIssues: 0,
          checksum: { consistent: 10, discrepancy: 2, unverifiable: 0, total: 12 },
          ratioMatrices: 7,
          undefinedRatios: 8,
          ratioAnomalies: 2,
          shareMatrices: 9,
          regionTables: 3,
        },
      });
    });
  });

  describe('GET /api/v1/ratios', () => {
    it('returns one row per numerator for a census year', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/ratios?variable=A131A&kind=state%2Fnational&year=2018',
      });
      const body = response.json<{
        ok: boolean;
        data: {
          year: number;
          sectors: { sectorKey: string }[];
          rows: { numeratorId: string; cells: RatioCellBody[] }[];
        };
      }>();

      expect(response.statusCode).toBe(200);
      expect(body.data.year).toBe(2018);
      expect(body.data.sectors.map((sector) => sector.sectorKey)).toEqual(['11', '21', 'Total']);
      expect(body.data.rows.map((row) => row.numeratorId)).toEqual(['19', '28']);
      expect(body.data.rows[1]?.cells).toEqual([
        { kind: 'defined', value: '0.1' },
        {
          kind: 'undefined',
          reason: 'numerator-confidential',
          cause: { geographyId: '28', sectorKey: '21' },
        },
        { kind: 'defined', value: '0.2' },
      ]);
    });

    it('returns 404 for a year without a census', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/ratios?variable=A131A&kind=state%2Fnational&year=2019',
      });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        ok: false,
        error: 'NotFoundError',
        message: 'No state/national ratios for A131A in 2019',
      });
    });

    it('rejects an unknown variable', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/ratios?variable=X000X&kind=state%2Fnational&year=2018',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ ok: false, error: 'ValidationError' });
    });
  });

  describe('GET /api/v1/ratios/matrix', () => {
    it('returns the full matrix with anomalies flagged', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/ratios/matrix?variable=A131A&kind=region%2Fstate&numerator=sur',
      });
      const body = response.json<{
        data: {
          denominatorId: string;
          years: number[];
          rows: { sectorKey: string; cells: RatioCellBody[] }[];
        };
      }>();

      expect(response.statusCode).toBe(200);
      expect(body.data.denominatorId).toBe('28');
      expect(body.data.years).toEqual([2018, 2023]);
      expect(body.data.rows[0]?.cells[0]).toEqual({
        kind: 'defined',
        value: '4',
        anomaly: 'above-one',
      });
      expect(body.data.rows[1]?.cells[0]).toEqual({
        kind: 'undefined',
        reason: 'denominator-confidential',
        cause: { geographyId: '28', sectorKey: '21' },
      });
    });

    it('returns 404 for a numerator without a matrix', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/ratios/matrix?variable=A131A&kind=region%2Fstate&numerator=noreste',
      });

      expect(response.statusCode).toBe(404);
      expect(response.json<{ message: string }>().message).toBe(
        "No region/state matrix of A131A for 'noreste'"
      );
    });
  });

  describe('GET /api/v1/findings', () => {
    it('filters findings by status', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/findings?type=discrepancy',
      });
      const body = response.json<{ data: { geographyId: string }[] }>();

      expect(response.statusCode).toBe(200);
      expect(body.data.map((finding) => finding.geographyId)).toEqual(['28', '28002']);
      expect(body.data[0]).toEqual({
        geographyId: '28',
        variable: 'A131A',
        year: 2018,
        status: 'discrepancy',
        checksum: '100',
        reportedTotal: '300',
        delta: '200',
        allowed: '0.002',
        confidentialSectors: ['21'],
      });
    });

    it('filters findings by geography', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/findings?geography=28001',
      });
      const body = response.json<{ data: { year: number; status: string }[] }>();

      expect(body.data).toEqual([
        expect.objectContaining({ year: 2018, status: 'consistent' }),
        expect.objectContaining({ year: 2023, status: 'consistent' }),
      ]);
    });

    it('answers an invalid status with the error envelope', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/api/v1/findings?type=bogus',
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        ok: false,
        error: 'ValidationError',
        message: 'Request validation failed',
      });
    });
  });
});

describe('Pipeline REST API without a run', () => {
  it('returns 404 until a run is stored', async () => {
    const app = await createApp({
      fastifyOptions: { logger: false },
      deps: { config: makeTestConfig() },
    });

    const response = await app.inject({ method: 'GET', url: '/api/v1/summary' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      ok: false,
      error: 'NotFoundError',
      message: 'No pipeline run is available yet',
    });

    await app.close();
  });
});
