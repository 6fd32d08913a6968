// Load environment variables as the very first thing
import dotenv from 'dotenv';
import { resolve } from 'node:path';

// Load .env and .env.local files (if present)
dotenv.config();

const envLocalPath = resolve(process.cwd(), '.env.local');
dotenv.config({ path: envLocalPath });

if (!process.env.NODE_ENV) {
  process.env.NODE_ENV = 'development';
}

const environment = process.env.NODE_ENV;

const requiredVariables = ['DATABASE_URL', 'ENCRYPTION_MASTER_KEY', 'JWT_SECRET'] as const;

function isMissing(value: string | undefined): boolean {
  return !value || value.trim().length === 0;
}

const missingVariables = requiredVariables.filter((key) => isMissing(process.env[key]));

if (environment === 'production' && missingVariables.length > 0) {
  throw new Error(
    `Missing required environment variables for production: ${missingVariables.join(', ')}`
  );
}

if (missingVariables.length > 0 && environment !== 'test') {
  console.warn(
    `⚠️ Missing environment variables (${missingVariables.join(', ')}). Using development defaults; set them in ${envLocalPath}.`
  );
}

function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

// Export environment variables for easy access
export const env = {
  NODE_ENV: environment,
  DATABASE_URL: process.env.DATABASE_URL,
  JWT_SECRET: process.env.JWT_SECRET || 'development-jwt-secret',
  ENCRYPTION_MASTER_KEY: process.env.ENCRYPTION_MASTER_KEY || 'development-encryption-key',
  PORT: process.env.PORT || '5000',
  PUBLIC_BASE_URL: (process.env.PUBLIC_BASE_URL || `http://localhost:${process.env.PORT || '5000'}`).replace(/\/+$/, ''),
  CORS_ORIGIN: process.env.CORS_ORIGIN || '',
  N8N_BASE_URL: (process.env.N8N_BASE_URL || 'http://localhost:5678').replace(/\/+$/, ''),
  N8N_API_KEY: process.env.N8N_API_KEY || '',
  DISPATCH_TIMEOUT_MS: readInt('DISPATCH_TIMEOUT_MS', 10_000),
  DISPATCH_MAX_ATTEMPTS: Math.max(1, readInt('DISPATCH_MAX_ATTEMPTS', 3)),
  DISPATCH_BACKOFF_MS: readInt('DISPATCH_BACKOFF_MS', 250),
  TOKEN_REFRESH_MARGIN_MS: readInt('TOKEN_REFRESH_MARGIN_MS', 60_000),
  POLL_GRACE_MS: readInt('POLL_GRACE_MS', 120_000),
  POLL_INTERVAL_MS: readInt('POLL_INTERVAL_MS', 30_000),
  POLL_BATCH_SIZE: Math.max(1, readInt('POLL_BATCH_SIZE', 50)),
  EXECUTION_RETENTION_DAYS: Math.max(1, readInt('EXECUTION_RETENTION_DAYS', 30)),
  RATE_LIMIT_DEFAULT_MAX: Math.max(1, readInt('RATE_LIMIT_DEFAULT_MAX', 60)),
  RATE_LIMIT_DEFAULT_WINDOW_MS: Math.max(1, readInt('RATE_LIMIT_DEFAULT_WINDOW_MS', 60_000)),
  REDIS_URL: process.env.REDIS_URL,
  QUEUE_DRIVER: process.env.QUEUE_DRIVER,
  QUEUE_CONCURRENCY: Math.max(1, readInt('QUEUE_CONCURRENCY', 5)),
  QUEUE_ATTEMPTS: Math.max(1, readInt('QUEUE_ATTEMPTS', 5)),
  QUEUE_BACKOFF_MS: readInt('QUEUE_BACKOFF_MS', 1_000),
  QUEUE_REDIS_HOST: process.env.QUEUE_REDIS_HOST || '127.0.0.1',
  QUEUE_REDIS_PORT: Number.parseInt(process.env.QUEUE_REDIS_PORT ?? '6379', 10),
  QUEUE_REDIS_DB: Number.parseInt(process.env.QUEUE_REDIS_DB ?? '0', 10),
  QUEUE_REDIS_USERNAME: process.env.QUEUE_REDIS_USERNAME,
  QUEUE_REDIS_PASSWORD: process.env.QUEUE_REDIS_PASSWORD,
  QUEUE_REDIS_TLS: process.env.QUEUE_REDIS_TLS === 'true',
  OBSERVABILITY_ENABLED: process.env.OBSERVABILITY_ENABLED === 'true',
  OTEL_SERVICE_NAME: process.env.OTEL_SERVICE_NAME || 'conduit-platform',
  OTEL_EXPORTER_OTLP_ENDPOINT: process.env.OTEL_EXPORTER_OTLP_ENDPOINT,
  OTEL_EXPORTER_OTLP_HEADERS: process.env.OTEL_EXPORTER_OTLP_HEADERS,
  OTEL_EXPORTER_OTLP_TRACES_ENDPOINT: process.env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT,
  OTEL_EXPORTER_OTLP_LOGS_ENDPOINT: process.env.OTEL_EXPORTER_OTLP_LOGS_ENDPOINT,
} as const;

/**
 * Reads a provider-scoped variable such as `SLACK_CLIENT_ID` or `WEBHOOK_SECRET_GITHUB`.
 */
export function readScopedEnv(prefix: string, scope: string, suffix = ''): string | undefined {
  const name = `${prefix}${scope.toUpperCase().replace(/[^A-Z0-9]/g, '_')}${suffix}`;
  const value = process.env[name];
  return value && value.trim().length > 0 ? value.trim() : undefined;
}
