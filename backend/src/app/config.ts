/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Built ONCE at startup and passed explicitly into buildDeps(); nothing else reads env
 *   for behaviour (the logger only reads its level/service name at import time).
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), so invalid values
 *   ('prod', 'staging') fail at startup instead of falling through to the wrong branch.
 * - Boolean flags are parsed from 'true'/'false'/'1'/'0'. z.coerce.boolean() would turn
 *   the string 'false' into true.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const BooleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback)
    .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    PORT: z.coerce.number().default(8000),

    DATABASE_URL: z.string().min(1),
    REDIS_URL: z.string().min(1),

    // Logging / service identity
    LOG_LEVEL: z
      .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
      .default('info'),
    SERVICE_NAME: z.string().default('cadastral-history-backend'),

    BCRYPT_COST: z.coerce.number().int().min(4).max(15).default(12),

    // Bearer sessions
    ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().min(60).max(604800).default(3600),

    // External resolver
    RESOLVER_BASE_URL: z.string().url().default('http://127.0.0.1:8000'),
    RESOLVER_TIMEOUT_SECONDS: z.coerce.number().positive().default(60),

    // Built-in /result stub
    RESOLVER_STUB_ENABLED: BooleanFlag('true'),
    RESOLVER_STUB_MIN_DELAY_SECONDS: z.coerce.number().min(0).default(1),
    RESOLVER_STUB_MAX_DELAY_SECONDS: z.coerce.number().min(0).default(60),

    // Optional storage-level uniqueness of (latitude, longitude)
    ENFORCE_UNIQUE_COORDINATES: BooleanFlag('false'),

    // DEV seed bootstrap (idempotent)
    SEED_ON_START: BooleanFlag('false'),
    SEED_SUPERUSER_EMAIL: z.string().email().default('admin@example.com'),
    SEED_SUPERUSER_PASSWORD: z.string().min(8).default('change-me-please'),
  })
  .refine((env) => env.RESOLVER_STUB_MIN_DELAY_SECONDS <= env.RESOLVER_STUB_MAX_DELAY_SECONDS, {
    message: 'RESOLVER_STUB_MIN_DELAY_SECONDS must not exceed RESOLVER_STUB_MAX_DELAY_SECONDS',
    path: ['RESOLVER_STUB_MIN_DELAY_SECONDS'],
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;

  accessTokenTtlSeconds: number;

  resolver: {
    baseUrl: string;
    timeoutMs: number;
  };

  resolverStub: {
    enabled: boolean;
    minDelaySeconds: number;
    maxDelaySeconds: number;
  };

  enforceUniqueCoordinates: boolean;

  seed: {
    enabled: boolean;
    superuserEmail: string;
    superuserPassword: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,

    accessTokenTtlSeconds: parsed.ACCESS_TOKEN_TTL_SECONDS,

    resolver: {
      baseUrl: parsed.RESOLVER_BASE_URL,
      timeoutMs: Math.round(parsed.RESOLVER_TIMEOUT_SECONDS * 1000),
    },

    resolverStub: {
      enabled: parsed.RESOLVER_STUB_ENABLED,
      minDelaySeconds: parsed.RESOLVER_STUB_MIN_DELAY_SECONDS,
      maxDelaySeconds: parsed.RESOLVER_STUB_MAX_DELAY_SECONDS,
    },

    enforceUniqueCoordinates: parsed.ENFORCE_UNIQUE_COORDINATES,

    seed: {
      enabled: parsed.SEED_ON_START,
      superuserEmail: parsed.SEED_SUPERUSER_EMAIL,
      superuserPassword: parsed.SEED_SUPERUSER_PASSWORD,
    },
  };
}
