/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Census data
  DATA_DIR: Type.String({ minLength: 1, default: './data/tables' }),
  GEOGRAPHY_CONFIG: Type.String({ minLength: 1, default: './config/geography.yaml' }),
  OUTPUT_DIR: Type.String({ minLength: 1, default: './output' }),
  BLANK_CELL_MEANS: Type.Union([Type.Literal('not-applicable'), Type.Literal('confidential')], {
    default: 'not-applicable',
  }),

  // Checksum validation
  CHECKSUM_TOLERANCE: Type.String({ pattern: '^\\d+(\\.\\d+)?$', default: '0.001' }),
  CHECKSUM_ROUNDING_DECIMALS: Type.Union([Type.Integer({ minimum: 0, maximum: 12 }), Type.Null()], {
    default: 3,
  }),

  // Output
  RATIO_DECIMALS: Type.Integer({ minimum: 0, maximum: 20, default: 6 }),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

const parseOptionalInt = (raw: string | undefined, fallback: number): number =>
  raw != null && raw !== '' ? Number.parseInt(raw, 10) : fallback;

const parseRoundingDecimals = (raw: string | undefined): number | null => {
  if (raw === undefined || raw === '') return 3;
  if (raw.toLowerCase() === 'none') return null;
  return Number.parseInt(raw, 10);
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseOptionalInt(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATA_DIR: env['DATA_DIR'] ?? './data/tables',
    GEOGRAPHY_CONFIG: env['GEOGRAPHY_CONFIG'] ?? './config/geography.yaml',
    OUTPUT_DIR: env['OUTPUT_DIR'] ?? './output',
    BLANK_CELL_MEANS: env['BLANK_CELL_MEANS'] ?? 'not-applicable',
    CHECKSUM_TOLERANCE: env['CHECKSUM_TOLERANCE'] ?? '0.001',
    CHECKSUM_ROUNDING_DECIMALS: parseRoundingDecimals(env['CHECKSUM_ROUNDING_DECIMALS']),
    RATIO_DECIMALS: parseOptionalInt(env['RATIO_DECIMALS'], 6),
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  census: {
    dataDir: env.DATA_DIR,
    geographyConfigPath: env.GEOGRAPHY_CONFIG,
    outputDir: env.OUTPUT_DIR,
    /** How a strictly empty cell in a sector row is read */
    blankCellMeans: env.BLANK_CELL_MEANS,
  },
  checksum: {
    /** Absolute tolerance, decimal string */
    tolerance: env.CHECKSUM_TOLERANCE,
    /** Decimals the source figures are rounded to; null disables the rounding allowance */
    roundingDecimals: env.CHECKSUM_ROUNDING_DECIMALS,
  },
  output: {
    ratioDecimals: env.RATIO_DECIMALS,
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
