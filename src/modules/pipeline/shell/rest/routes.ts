/**
 * Pipeline REST routes
 *
 * Read-only views over the last pipeline run.
 *
 * Endpoints:
 * - GET /api/v1/summary        - counts of the run
 * - GET /api/v1/ratios         - one (variable, kind, year) view
 * - GET /api/v1/ratios/matrix  - full matrix of one numerator geography
 * - GET /api/v1/findings       - checksum findings
 */

import { isCensusYear } from '../../../census-tables/index.js';
import { matrixForYear } from '../../../ratios/index.js';
import { toFindingDTO, toRatioMatrixDTO, toYearRatioViewDTO } from './dto.js';
import {
  ErrorResponseSchema,
  FindingsQuerySchema,
  FindingsResponseSchema,
  RatioMatrixQuerySchema,
  RatioMatrixResponseSchema,
  RatiosQuerySchema,
  SummaryResponseSchema,
  YearRatioViewResponseSchema,
  type FindingsQuery,
  type RatioMatrixQuery,
  type RatiosQuery,
} from './schemas.js';

import type { ReportStore } from '../../core/ports.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';

export interface MakePipelineRoutesDeps {
  reportStore: ReportStore;
}

function sendNoRun(reply: FastifyReply) {
  return reply.status(404).send({
    ok: false,
    error: 'NotFoundError',
    message: 'No pipeline run is available yet',
  });
}

function sendNotFound(reply: FastifyReply, message: string) {
  return reply.status(404).send({ ok: false, error: 'NotFoundError', message });
}

export const makePipelineRoutes = (deps: MakePipelineRoutesDeps): FastifyPluginAsync => {
  const { reportStore } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/summary
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/summary',
      {
        schema: {
          response: { 200: SummaryResponseSchema, 404: ErrorResponseSchema },
        },
      },
      async (_request, reply) => {
        const run = reportStore.latest();
        if (run === null) return sendNoRun(reply);

        return reply.status(200).send({ ok: true, data: run.report.summary });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/ratios?variable=&kind=&year=
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: RatiosQuery }>(
      '/api/v1/ratios',
      {
        schema: {
          querystring: RatiosQuerySchema,
          response: { 200: YearRatioViewResponseSchema, 404: ErrorResponseSchema },
        },
      },
      async (request, reply) => {
        const run = reportStore.latest();
        if (run === null) return sendNoRun(reply);

        const { variable, kind, year } = request.query;
        const view = isCensusYear(year)
          ? matrixForYear(run.report.ratios.matrices, variable, kind, year)
          : null;
        if (view === null) {
          return sendNotFound(reply, `No ${kind} ratios for ${variable} in ${String(year)}`);
        }

        return reply.status(200).send({ ok: true, data: toYearRatioViewDTO(view) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/ratios/matrix?variable=&kind=&numerator=
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: RatioMatrixQuery }>(
      '/api/v1/ratios/matrix',
      {
        schema: {
          querystring: RatioMatrixQuerySchema,
          response: { 200: RatioMatrixResponseSchema, 404: ErrorResponseSchema },
        },
      },
      async (request, reply) => {
        const run = reportStore.latest();
        if (run === null) return sendNoRun(reply);

        const { variable, kind, numerator } = request.query;
        const matrix = run.report.ratios.matrices.find(
          (candidate) =>
            candidate.variable === variable &&
            candidate.kind === kind &&
            candidate.numeratorId === numerator
        );
        if (matrix === undefined) {
          return sendNotFound(reply, `No ${kind} matrix of ${variable} for '${numerator}'`);
        }

        return reply.status(200).send({ ok: true, data: toRatioMatrixDTO(matrix) });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/findings?type=&geography=
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get<{ Querystring: FindingsQuery }>(
      '/api/v1/findings',
      {
        schema: {
          querystring: FindingsQuerySchema,
          response: { 200: FindingsResponseSchema, 404: ErrorResponseSchema },
        },
      },
      async (request, reply) => {
        const run = reportStore.latest();
        if (run === null) return sendNoRun(reply);

        const { type, geography } = request.query;
        const findings = run.report.checksumFindings.filter(
          (finding) =>
            (type === undefined || finding.status === type) &&
            (geography === undefined || finding.geographyId === geography)
        );

        return reply.status(200).send({ ok: true, data: findings.map(toFindingDTO) });
      }
    );
  };
};
