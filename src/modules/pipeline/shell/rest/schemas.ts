/**
 * Pipeline Module REST API - TypeBox Schemas
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';

import { VARIABLE_CODES } from '../../../census-tables/index.js';
import { RATIO_KINDS } from '../../../ratios/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

const VariableSchema = Type.Union(
  VARIABLE_CODES.map((code) => Type.Literal(code)),
  { description: 'SAIC variable code, e.g. A131A' }
);

const KindSchema = Type.Union(
  RATIO_KINDS.map((kind) => Type.Literal(kind)),
  { description: 'Ratio kind' }
);

const StatusSchema = Type.Union([
  Type.Literal('consistent'),
  Type.Literal('discrepancy'),
  Type.Literal('unverifiable'),
]);

export const RatiosQuerySchema = Type.Object(
  {
    variable: VariableSchema,
    kind: KindSchema,
    year: Type.Integer({ minimum: 1900, maximum: 2100, description: 'Census year' }),
  },
  { additionalProperties: false }
);

export type RatiosQuery = Static<typeof RatiosQuerySchema>;

export const RatioMatrixQuerySchema = Type.Object(
  {
    variable: VariableSchema,
    kind: KindSchema,
    numerator: Type.String({ minLength: 1, description: 'Numerator geography id' }),
  },
  { additionalProperties: false }
);

export type RatioMatrixQuery = Static<typeof RatioMatrixQuerySchema>;

export const FindingsQuerySchema = Type.Object(
  {
    type: Type.Optional(StatusSchema),
    geography: Type.Optional(Type.String({ minLength: 1 })),
  },
  { additionalProperties: false }
);

export type FindingsQuery = Static<typeof FindingsQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const RatioCellSchema = Type.Object({
  kind: Type.Union([Type.Literal('defined'), Type.Literal('undefined')]),
  value: Type.Optional(Type.String({ description: 'Decimal value as string' })),
  anomaly: Type.Optional(Type.Union([Type.Literal('above-one'), Type.Literal('negative')])),
  reason: Type.Optional(Type.String()),
  cause: Type.Optional(
    Type.Object({
      geographyId: Type.String(),
      sectorKey: Type.String(),
      regionId: Type.Optional(Type.String()),
    })
  ),
});

export type RatioCellDTO = Static<typeof RatioCellSchema>;

export const YearRatioViewSchema = Type.Object({
  variable: Type.String(),
  kind: Type.String(),
  year: Type.Integer(),
  sectors: Type.Array(Type.Object({ sectorKey: Type.String(), label: Type.String() })),
  rows: Type.Array(
    Type.Object({
      numeratorId: Type.String(),
      denominatorId: Type.String(),
      cells: Type.Array(Type.Union([RatioCellSchema, Type.Null()])),
    })
  ),
});

export const RatioMatrixSchema = Type.Object({
  variable: Type.String(),
  kind: Type.String(),
  numeratorId: Type.String(),
  denominatorId: Type.String(),
  years: Type.Array(Type.Integer()),
  rows: Type.Array(
    Type.Object({
      sectorKey: Type.String(),
      label: Type.String(),
      cells: Type.Array(RatioCellSchema),
    })
  ),
});

export const FindingSchema = Type.Object({
  geographyId: Type.String(),
  variable: Type.String(),
  year: Type.Integer(),
  status: StatusSchema,
  checksum: Type.String(),
  reportedTotal: Type.Optional(Type.String()),
  delta: Type.Optional(Type.String()),
  allowed: Type.Optional(Type.String()),
  reason: Type.Optional(Type.String()),
  confidentialSectors: Type.Optional(Type.Array(Type.String())),
});

export type FindingDTO = Static<typeof FindingSchema>;

const FindingsSummarySchema = Type.Object({
  consistent: Type.Integer(),
  discrepancy: Type.Integer(),
  unverifiable: Type.Integer(),
  total: Type.Integer(),
});

export const SummarySchema = Type.Object({
  tablesLoaded: Type.Integer(),
  tablesFailed: Type.Integer(),
  parseIssues: Type.Integer(),
  checksum: FindingsSummarySchema,
  ratioMatrices: Type.Integer(),
  undefinedRatios: Type.Integer(),
  ratioAnomalies: Type.Integer(),
  shareMatrices: Type.Integer(),
  regionTables: Type.Integer(),
});

const success = <T extends TSchema>(data: T) => Type.Object({ ok: Type.Literal(true), data });

export const YearRatioViewResponseSchema = success(YearRatioViewSchema);
export const RatioMatrixResponseSchema = success(RatioMatrixSchema);
export const FindingsResponseSchema = success(Type.Array(FindingSchema));
export const SummaryResponseSchema = success(SummarySchema);

/**
 * Error response schema.
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String({ description: 'Error type' }),
  message: Type.Optional(Type.String({ description: 'Human-readable error message' })),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;
