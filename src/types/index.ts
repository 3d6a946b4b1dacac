import type { ErrorKind } from '../utils/AppError';

// Environment configuration type
export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  HOST: string;
  API_PREFIX: string;
  CORS_ORIGIN: string[];
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX_REQUESTS: number;
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'http' | 'debug';
  DATABASE_PATH: string;
  SEED_DATABASE: boolean;
  // Redis (OPTIONAL - app works without Redis)
  REDIS_HOST?: string;
  REDIS_PORT: number;
  SNAPSHOT_CACHE_TTL_SECONDS: number;
  // Matching
  AMOUNT_TOLERANCE_PERCENT: number;
  DATE_TOLERANCE_DAYS: number;
  ACCEPTANCE_THRESHOLD: number;
  AMBIGUITY_EPSILON: number;
  MAX_CANDIDATES: number;
  WEIGHT_AMOUNT: number;
  WEIGHT_DATE: number;
  WEIGHT_MERCHANT: number;
  // Disambiguation
  PENDING_MAX_TURNS: number;
  PENDING_TTL_MS: number;
  // Outbound resilience
  RATE_LIMIT_RPM: number;
  RATE_LIMIT_MAX_WAIT_MS: number;
  CIRCUIT_FAILURE_THRESHOLD: number;
  CIRCUIT_OPEN_DURATION_MS: number;
  RETRY_MAX_ATTEMPTS: number;
  RETRY_BASE_DELAY_MS: number;
  RETRY_MAX_JITTER_MS: number;
  ATTEMPT_TIMEOUT_MS: number;
}

// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  kind?: ErrorKind;
  stack?: string;
  timestamp: string;
}

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
}
