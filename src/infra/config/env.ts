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
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

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

  // Sanitization
  REGION_TABLE_PATH: Type.String({ minLength: 1, default: 'data/city-regions.json' }),
  REPORT_LOCALE: Type.String({ minLength: 2, default: 'de' }),

  // Report defaults
  DEFAULT_MONTH_WINDOW: Type.Integer({ minimum: 1, default: 12 }),
  TOP_PROFESSIONS: Type.Integer({ minimum: 1, default: 10 }),
  HISTOGRAM_BINS: Type.Integer({ minimum: 1, maximum: 200, default: 15 }),
});

export type Env = Static<typeof EnvSchema>;

const parseInteger = (raw: string | undefined, fallback: number): number =>
  raw != null && raw !== '' ? Number(raw) : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    REGION_TABLE_PATH: env['REGION_TABLE_PATH'] ?? 'data/city-regions.json',
    REPORT_LOCALE: env['REPORT_LOCALE'] ?? 'de',
    DEFAULT_MONTH_WINDOW: parseInteger(env['DEFAULT_MONTH_WINDOW'], 12),
    TOP_PROFESSIONS: parseInteger(env['TOP_PROFESSIONS'], 10),
    HISTOGRAM_BINS: parseInteger(env['HISTOGRAM_BINS'], 15),
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
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  sanitization: {
    /** Path of the city -> region lookup table, relative to the working directory */
    regionTablePath: env.REGION_TABLE_PATH,
    /** Collation locale for row sorting and category ordering */
    locale: env.REPORT_LOCALE,
  },
  report: {
    defaultMonthWindow: env.DEFAULT_MONTH_WINDOW,
    topProfessions: env.TOP_PROFESSIONS,
    histogramBins: env.HISTOGRAM_BINS,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
