import dotenv from 'dotenv';
import { z } from 'zod';
import type { EnvConfig } from '../types';

dotenv.config();

// ============================================
// Environment Schema
// ============================================

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('localhost'),
  API_PREFIX: z.string().default('/api/v1'),
  CORS_ORIGIN: z
    .string()
    .default('*')
    .transform((value) => value.split(',').map((origin) => origin.trim())),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),

  DATABASE_PATH: z.string().default('data/disputes.db'),
  SEED_DATABASE: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),

  REDIS_HOST: optionalString,
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  SNAPSHOT_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),

  AMOUNT_TOLERANCE_PERCENT: z.coerce.number().positive().default(10),
  DATE_TOLERANCE_DAYS: z.coerce.number().int().nonnegative().default(3),
  ACCEPTANCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
  AMBIGUITY_EPSILON: z.coerce.number().min(0).max(1).default(0.05),
  MAX_CANDIDATES: z.coerce.number().int().positive().default(5),
  WEIGHT_AMOUNT: z.coerce.number().positive().default(0.15),
  WEIGHT_DATE: z.coerce.number().positive().default(0.25),
  WEIGHT_MERCHANT: z.coerce.number().positive().default(0.6),

  PENDING_MAX_TURNS: z.coerce.number().int().positive().default(1),
  PENDING_TTL_MS: z.coerce.number().int().positive().default(600_000),

  RATE_LIMIT_RPM: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_MAX_WAIT_MS: z.coerce.number().int().nonnegative().default(5_000),
  CIRCUIT_FAILURE_THRESHOLD: z.coerce.number().int().positive().default(5),
  CIRCUIT_OPEN_DURATION_MS: z.coerce.number().int().positive().default(60_000),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(2_000),
  RETRY_MAX_JITTER_MS: z.coerce.number().int().nonnegative().default(250),
  ATTEMPT_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const issues = parsed.error.errors
    .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
    .join('\n');
  throw new Error(`Invalid environment configuration:\n${issues}`);
}

export const env: EnvConfig = parsed.data;

// ============================================
// Derived Configuration
// ============================================

/**
 * Tunables consumed by the scorer and ranker
 */
export const matchingConfig = {
  amountTolerancePercent: env.AMOUNT_TOLERANCE_PERCENT,
  dateToleranceDays: env.DATE_TOLERANCE_DAYS,
  acceptanceThreshold: env.ACCEPTANCE_THRESHOLD,
  ambiguityEpsilon: env.AMBIGUITY_EPSILON,
  maxCandidates: env.MAX_CANDIDATES,
  weights: {
    amount: env.WEIGHT_AMOUNT,
    date: env.WEIGHT_DATE,
    merchant: env.WEIGHT_MERCHANT,
  },
};

export const disambiguationConfig = {
  maxPendingTurns: env.PENDING_MAX_TURNS,
  pendingTtlMs: env.PENDING_TTL_MS,
};

/**
 * Default policy applied to every outbound provider
 */
export const resilienceConfig = {
  rateLimit: {
    capacity: env.RATE_LIMIT_RPM,
    refillPerMs: env.RATE_LIMIT_RPM / 60_000,
    maxWaitMs: env.RATE_LIMIT_MAX_WAIT_MS,
  },
  circuit: {
    failureThreshold: env.CIRCUIT_FAILURE_THRESHOLD,
    openDurationMs: env.CIRCUIT_OPEN_DURATION_MS,
  },
  retry: {
    maxAttempts: env.RETRY_MAX_ATTEMPTS,
    baseDelayMs: env.RETRY_BASE_DELAY_MS,
    maxJitterMs: env.RETRY_MAX_JITTER_MS,
    attemptTimeoutMs: env.ATTEMPT_TIMEOUT_MS,
  },
};

export default env;
