/**
 * Shared Application Configuration
 *
 * Centralizes the environment variables for the HTTP surface and the
 * enrichment pool. Follows the same pattern as src/extraction/config.ts and
 * src/store/config.ts.
 *
 * Environment variables:
 * - AUTOMATION_KILL_SWITCH: Set to 'true' to reject new ingestion batches
 * - PORT: HTTP server port (default 3000)
 * - ENRICHMENT_WORKERS: Size of the bounded enrichment pool (default 4)
 * - SLOW_STORE_MS: Phase-1 create duration that triggers a warning (default 3000)
 * - LOG_PREVIEW_CHARS: Max characters of message text echoed in logs/summaries (default 280)
 */

import 'dotenv/config';

export interface AppConfig {
  isDev: boolean;
  killSwitch: boolean;
  server: {
    port: number;
  };
  enrichment: {
    workers: number;
    slowStoreMs: number;
    previewChars: number;
  };
}

export function requiredEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(
      `Missing required environment variable: ${key}. ` +
      `Copy .env.example to .env and fill in the required values.`
    );
  }
  return value;
}

export function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

/** Parse an integer env var, falling back when unset or not a number. */
export function intEnv(key: string, fallback: number): number {
  const parsed = parseInt(optionalEnv(key, String(fallback)), 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/** Parse a float env var, falling back when unset or not a number. */
export function floatEnv(key: string, fallback: number): number {
  const parsed = parseFloat(optionalEnv(key, String(fallback)));
  return Number.isNaN(parsed) ? fallback : parsed;
}

const isDev = (optionalEnv('APP_ENV', 'development')) !== 'production';

export const appConfig: AppConfig = {
  isDev,
  killSwitch: process.env.AUTOMATION_KILL_SWITCH === 'true',
  server: {
    port: intEnv('PORT', 3000),
  },
  enrichment: {
    workers: Math.max(1, intEnv('ENRICHMENT_WORKERS', 4)),
    slowStoreMs: intEnv('SLOW_STORE_MS', 3000),
    previewChars: intEnv('LOG_PREVIEW_CHARS', 280),
  },
};
