// src/config/index.ts
import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

import { ConfigError } from '@/common/errors/authErrors';

// ---- Chargement des Fichiers .env ----
// Priorité : .env.development, .env.production, etc. > .env (base)
export function loadEnvFiles(nodeEnv = process.env.NODE_ENV || 'development'): void {
  dotenv.config({ path: path.resolve(process.cwd(), `.env.${nodeEnv}`) });
  dotenv.config({ path: path.resolve(process.cwd(), '.env'), override: false });
}

// z.coerce.boolean() turns "false" into true
const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const failPolicy = z.enum(['open', 'closed']);

const limitMax = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const windowSeconds = (fallback: number) => z.coerce.number().int().positive().default(fallback);

// ---- Schéma de Validation Zod ----
export const envSchema = z
  .object({
    // --- Général ---
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    HOST: z
      .string()
      .ip({ version: 'v4' })
      .default('0.0.0.0')
      .describe('IP address to bind the server to'),
    LOG_LEVEL: z
      .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
      .default('info'),
    CORS_ORIGIN: z.string().default('*'),

    // --- Base de Données (TypeORM) ---
    DB_TYPE: z.enum(['postgres']).default('postgres'),
    DB_HOST: z.string().min(1).default('localhost'),
    DB_PORT: z.coerce.number().int().positive().default(5432),
    DB_USERNAME: z.string().min(1).default('access_gate'),
    DB_PASSWORD: z.string().optional(),
    DB_DATABASE: z.string().min(1).default('access_gate'),
    DB_SYNCHRONIZE: booleanString
      .default('false')
      .describe('!! DANGER !! Set to false in production. Use migrations instead.'),
    DB_LOGGING: booleanString.default('false'),

    // --- Redis ---
    REDIS_HOST: z.string().default('localhost'),
    REDIS_PORT: z.coerce.number().int().positive().default(6379),
    REDIS_PASSWORD: z.string().optional(),
    REDIS_DB: z.coerce.number().int().min(0).default(0),
    REDIS_KEY_PREFIX: z.string().default('access-gate:'),

    // --- Tokens ---
    JWT_SECRET: z
      .string({ required_error: 'JWT_SECRET is required' })
      .min(32, { message: 'JWT_SECRET must be at least 32 characters long for security' }),
    JWT_ISSUER: z.string().min(1).default('access-gate'),
    JWT_ACCESS_TTL_SECONDS: z.coerce
      .number()
      .int()
      .positive()
      .default(60 * 15)
      .describe('Access token lifetime (default: 15 minutes)'),
    JWT_REFRESH_TTL_SECONDS: z.coerce
      .number()
      .int()
      .positive()
      .default(60 * 60 * 24 * 7)
      .describe('Refresh token lifetime (default: 7 days)'),
    JWT_ACCESS_MAX_TTL_SECONDS: z.coerce.number().int().positive().default(60 * 60 * 24),
    JWT_REFRESH_MAX_TTL_SECONDS: z.coerce
      .number()
      .int()
      .positive()
      .default(60 * 60 * 24 * 30),
    JWT_REFRESH_ROTATION: booleanString
      .default('false')
      .describe('Refresh tokens are single-use; consumed ids are tracked in the shared store'),
    JWT_REVOCATION: booleanString
      .default('false')
      .describe('Check the token blacklist on every authenticated request'),

    // --- Permissions ---
    PERMISSION_CACHE_TTL_SECONDS: z.coerce.number().int().min(1).max(300).default(30),
    PERMISSION_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(10_000),
    PERMISSION_FAIL_POLICY: failPolicy.default('closed'),

    // --- Rate limiting ---
    RATE_LIMIT_BACKEND: z.enum(['memory', 'redis']).default('memory'),
    RATE_LIMIT_FAIL_POLICY: failPolicy.optional(),
    RATE_LIMIT_PREAUTH_MAX: limitMax(300),
    RATE_LIMIT_PREAUTH_WINDOW_SECONDS: windowSeconds(60),
    RATE_LIMIT_AUTH_MAX: limitMax(5),
    RATE_LIMIT_AUTH_WINDOW_SECONDS: windowSeconds(60),
    RATE_LIMIT_GENERAL_MAX: limitMax(100),
    RATE_LIMIT_GENERAL_WINDOW_SECONDS: windowSeconds(60),
    RATE_LIMIT_ADMIN_MAX: limitMax(200),
    RATE_LIMIT_ADMIN_WINDOW_SECONDS: windowSeconds(60),
    RATE_LIMIT_SWEEP_INTERVAL_SECONDS: windowSeconds(60),

    // --- External calls ---
    STORE_TIMEOUT_MS: z.coerce.number().int().min(2000).max(5000).default(3000),
    STORE_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).max(1000).default(50),

    // --- Observabilité ---
    METRICS_ENABLED: booleanString.default('true').describe('Serve Prometheus metrics on /metrics'),
    HEALTH_CHECK_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  })
  .refine((data) => !(data.NODE_ENV === 'production' && data.DB_SYNCHRONIZE), {
    message: 'DB_SYNCHRONIZE must be false in production environment',
    path: ['DB_SYNCHRONIZE'],
  })
  .refine((data) => data.JWT_ACCESS_TTL_SECONDS <= data.JWT_ACCESS_MAX_TTL_SECONDS, {
    message: 'JWT_ACCESS_TTL_SECONDS exceeds JWT_ACCESS_MAX_TTL_SECONDS',
    path: ['JWT_ACCESS_TTL_SECONDS'],
  })
  .refine((data) => data.JWT_REFRESH_TTL_SECONDS <= data.JWT_REFRESH_MAX_TTL_SECONDS, {
    message: 'JWT_REFRESH_TTL_SECONDS exceeds JWT_REFRESH_MAX_TTL_SECONDS',
    path: ['JWT_REFRESH_TTL_SECONDS'],
  })
  .refine((data) => data.RATE_LIMIT_BACKEND !== 'redis' || data.RATE_LIMIT_FAIL_POLICY, {
    message: 'RATE_LIMIT_FAIL_POLICY must be set explicitly when RATE_LIMIT_BACKEND=redis',
    path: ['RATE_LIMIT_FAIL_POLICY'],
  });

type ParsedEnv = z.infer<typeof envSchema>;

export type AppConfig = Readonly<
  Omit<ParsedEnv, 'RATE_LIMIT_FAIL_POLICY'> & {
    RATE_LIMIT_FAIL_POLICY: z.infer<typeof failPolicy>;
  }
>;

/**
 * Validates the environment once at startup.
 * @throws {ConfigError} listing every invalid variable; the caller must not start.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues.map(
      (issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid environment configuration: ${details.join('; ')}`, details);
  }
  // The memory backend cannot be unreachable; closed keeps the type total.
  return Object.freeze({
    ...result.data,
    RATE_LIMIT_FAIL_POLICY: result.data.RATE_LIMIT_FAIL_POLICY ?? 'closed',
  });
}
