/**
 * @cortex-lens/lensd — Environment
 *
 * Read once at startup. Any invalid value is a ConfigurationError; the
 * entry point logs it and exits.
 */

import { ConfigurationError } from '@cortex-lens/core';
import { createEnv } from '@t3-oss/env-core';
import { z } from 'zod';

type RuntimeEnv = Record<string, string | undefined>;

const hostname = z.union([z.literal('localhost'), z.string().ip()]);
const millis = z.coerce.number().int().positive();
const actorList = z
  .string()
  .transform((raw) =>
    raw
      .split(',')
      .map((name) => name.trim())
      .filter(Boolean),
  )
  .pipe(z.array(z.string()).min(1));

export function parseEnv(runtimeEnv: RuntimeEnv) {
  return createEnv({
    server: {
      LENS_REDIS_URL: z.string().url().default('redis://localhost:6379'),
      LENS_QDRANT_URL: z.string().url().default('http://localhost:6333'),
      LENS_QDRANT_API_KEY: z.string().optional(),
      LENS_HOST: hostname.default('127.0.0.1'),
      LENS_PORT: z.coerce.number().int().min(1).max(65535).default(3000),
      LENS_TICK_MS: millis.default(200),
      LENS_SOURCE_TIMEOUT_MS: millis.default(150),
      LENS_WRITE_TIMEOUT_MS: millis.default(100),
      LENS_QUEUE_DEPTH: z.coerce.number().int().min(1).max(2).default(1),
      LENS_REFRESH_MS: millis.default(2000),
      LENS_SAMPLE_COUNT: z.coerce.number().int().positive().default(500),
      LENS_EMBEDDING_DIM: z.coerce.number().int().min(3).default(384),
      LENS_PROJECTION: z.enum(['random', 'pca']).default('random'),
      LENS_PROJECTION_SEED: z.coerce.number().int().default(42),
      LENS_STREAM_KEY: z.string().default('daneel:stream:awake'),
      LENS_ACTOR_KEY: z.string().default('daneel:actors'),
      LENS_ACTORS: actorList.default('memory,attention,salience,volition'),
      LENS_IDENTITY_NAME: z.string().default('Timmy'),
      LENS_OTLP_ENDPOINT: z.string().url().optional(),
      NODE_ENV: z
        .enum(['development', 'test', 'production'])
        .default('development'),
      LOG_LEVEL: z
        .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace'])
        .default('info'),
    },
    runtimeEnv,
    emptyStringAsUndefined: true,
    onValidationError: (error) => {
      const details = error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Invalid environment: ${details}`);
    },
  });
}

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

export interface LensConfig {
  redisUrl: string;
  qdrantUrl: string;
  qdrantApiKey?: string;
  host: string;
  port: number;
  tickIntervalMs: number;
  sourceTimeoutMs: number;
  writeTimeoutMs: number;
  queueDepth: number;
  refreshIntervalMs: number;
  sampleCount: number;
  embeddingDimensions: number;
  projection: 'random' | 'pca';
  projectionSeed: number;
  streamKey: string;
  actorKey: string;
  actors: string[];
  identityName: string;
  otlpEndpoint?: string;
  nodeEnv: 'development' | 'test' | 'production';
  logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';
}

/**
 * Parse and cross-check the environment. Timeouts must leave room inside
 * the tick they belong to.
 */
export function loadConfig(runtimeEnv: RuntimeEnv = process.env): LensConfig {
  const env = parseEnv(runtimeEnv);

  if (env.LENS_SOURCE_TIMEOUT_MS >= env.LENS_TICK_MS) {
    throw new ConfigurationError(
      `LENS_SOURCE_TIMEOUT_MS (${env.LENS_SOURCE_TIMEOUT_MS}) must be below LENS_TICK_MS (${env.LENS_TICK_MS})`,
    );
  }
  if (env.LENS_WRITE_TIMEOUT_MS >= env.LENS_TICK_MS) {
    throw new ConfigurationError(
      `LENS_WRITE_TIMEOUT_MS (${env.LENS_WRITE_TIMEOUT_MS}) must be below LENS_TICK_MS (${env.LENS_TICK_MS})`,
    );
  }

  return {
    redisUrl: env.LENS_REDIS_URL,
    qdrantUrl: env.LENS_QDRANT_URL,
    qdrantApiKey: env.LENS_QDRANT_API_KEY,
    host: env.LENS_HOST,
    port: env.LENS_PORT,
    tickIntervalMs: env.LENS_TICK_MS,
    sourceTimeoutMs: env.LENS_SOURCE_TIMEOUT_MS,
    writeTimeoutMs: env.LENS_WRITE_TIMEOUT_MS,
    queueDepth: env.LENS_QUEUE_DEPTH,
    refreshIntervalMs: env.LENS_REFRESH_MS,
    sampleCount: env.LENS_SAMPLE_COUNT,
    embeddingDimensions: env.LENS_EMBEDDING_DIM,
    projection: env.LENS_PROJECTION,
    projectionSeed: env.LENS_PROJECTION_SEED,
    streamKey: env.LENS_STREAM_KEY,
    actorKey: env.LENS_ACTOR_KEY,
    actors: env.LENS_ACTORS,
    identityName: env.LENS_IDENTITY_NAME,
    otlpEndpoint: env.LENS_OTLP_ENDPOINT,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
  };
}
