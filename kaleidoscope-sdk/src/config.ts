/**
 * Client configuration
 */

import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { Logger } from './logger';
import type { ResponseCache } from './cache';

/** Production URL of the Kaleidoscope API, used when no baseUrl is given */
export const PROD_API_URL = 'https://api.kaleidoscope.bio';

/** Default timeout for every request, token calls included */
export const DEFAULT_TIMEOUT_MS = 10_000;

/** Tokens are refreshed this long before the server says they expire */
export const TOKEN_REFRESH_MARGIN_MS = 10 * 60 * 1000;

export const TOKEN_PATH = '/auth/oauth/token';

/** Content types a file download may carry */
export const VALID_CONTENT_TYPES = [
  'text/csv',
  'chemical/x-mdl-sdfile',
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
] as const;

export type FileContentType = (typeof VALID_CONTENT_TYPES)[number];

export const ENV_CLIENT_ID = 'KALEIDOSCOPE_API_CLIENT_ID';
export const ENV_CLIENT_SECRET = 'KALEIDOSCOPE_API_CLIENT_SECRET';
export const ENV_API_URL = 'KALEIDOSCOPE_API_URL';
export const ENV_TIMEOUT = 'KALEIDOSCOPE_API_TIMEOUT_MS';

/**
 * Configuration for the Kaleidoscope client
 */
export interface KaleidoscopeClientConfig {
  /** API client ID */
  clientId: string;
  /** API client secret */
  clientSecret: string;
  /** Base URL for the API (default: https://api.kaleidoscope.bio) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeout?: number;
  /** Where failures are reported (default: console) */
  logger?: Logger;
  /** Response cache shared by all managers (default: a new, unbounded cache) */
  cache?: ResponseCache;
}

const envSchema = z.object({
  [ENV_CLIENT_ID]: z.string().min(1),
  [ENV_CLIENT_SECRET]: z.string().min(1),
  [ENV_API_URL]: z.string().url().optional(),
  [ENV_TIMEOUT]: z.coerce.number().int().positive().optional(),
});

/**
 * Loads client configuration from environment variables.
 * Throws a ConfigurationError naming every variable that is missing or invalid.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Pick<KaleidoscopeClientConfig, 'clientId' | 'clientSecret' | 'baseUrl' | 'timeout'> {
  const present = Object.fromEntries(
    [ENV_CLIENT_ID, ENV_CLIENT_SECRET, ENV_API_URL, ENV_TIMEOUT]
      .map((name) => [name, env[name]] as const)
      .filter(([, value]) => value !== undefined && value !== '')
  );

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const names = [...new Set(result.error.issues.map((issue) => String(issue.path[0])))];
    throw new ConfigurationError(`Missing or invalid environment variables: ${names.join(', ')}`);
  }

  const parsed = result.data;
  return {
    clientId: parsed[ENV_CLIENT_ID],
    clientSecret: parsed[ENV_CLIENT_SECRET],
    baseUrl: parsed[ENV_API_URL],
    timeout: parsed[ENV_TIMEOUT],
  };
}

/**
 * Strip a trailing slash so relative paths can be appended directly
 */
export function normalizeBaseUrl(url: string | undefined): string {
  return (url ?? PROD_API_URL).replace(/\/$/, '');
}
