/**
 * OAuth token lifecycle
 *
 * Holds the client credentials and the current access/refresh token pair.
 * Token calls go through their own axios instance so they never pass through
 * the refresh check that guards ordinary requests.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { TOKEN_PATH, TOKEN_REFRESH_MARGIN_MS } from './config';
import { toKaleidoscopeError } from './errors';
import type { Logger } from './logger';

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().nullish(),
  expires_in: z.coerce.number(),
});

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

export interface TokenManagerConfig {
  baseUrl: string;
  clientId: string;
  clientSecret: string;
  timeout: number;
  logger: Logger;
}

type TokenForm =
  | { grant_type: 'client_credentials'; client_id: string; client_secret: string }
  | { grant_type: 'refresh_token'; refresh_token: string };

export class TokenManager {
  private readonly client: AxiosInstance;
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly timeout: number;
  private readonly logger: Logger;

  private accessToken: string | null = null;
  private refreshToken: string | null = null;
  private deadline: number | null = null;

  constructor(config: TokenManagerConfig) {
    this.clientId = config.clientId;
    this.clientSecret = config.clientSecret;
    this.timeout = config.timeout;
    this.logger = config.logger;

    this.client = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeout,
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
    });
  }

  /**
   * Exchange the client credentials for a fresh token pair.
   * Resolves to false, keeping the previous pair, when the exchange fails.
   */
  async authenticate(): Promise<boolean> {
    const ok = await this.requestToken({
      grant_type: 'client_credentials',
      client_id: this.clientId,
      client_secret: this.clientSecret,
    });
    if (!ok) {
      this.logger.error(`Could not connect to server with client_id ${this.clientId}`);
    }
    return ok;
  }

  /**
   * Mint a new access token from the refresh token, or fall back to the
   * client-credentials exchange when there is none
   */
  async refresh(): Promise<boolean> {
    if (!this.refreshToken) {
      return this.authenticate();
    }
    const ok = await this.requestToken({
      grant_type: 'refresh_token',
      refresh_token: this.refreshToken,
    });
    if (!ok) {
      this.logger.error('Could not refresh access token');
    }
    return ok;
  }

  /**
   * A client that never authenticated has no deadline and counts as expired
   */
  isExpired(now: number = Date.now()): boolean {
    return this.deadline === null || now >= this.deadline;
  }

  getAccessToken(): string | null {
    return this.accessToken;
  }

  getRefreshToken(): string | null {
    return this.refreshToken;
  }

  getDeadline(): number | null {
    return this.deadline;
  }

  private async requestToken(form: TokenForm): Promise<boolean> {
    let raw: unknown;
    try {
      const response = await this.client.post<unknown>(
        TOKEN_PATH,
        new URLSearchParams(form).toString()
      );
      raw = response.data;
    } catch (error) {
      const failure = toKaleidoscopeError(error, this.timeout);
      this.logger.warn(`POST ${TOKEN_PATH} failed: ${failure.message}`, {
        grantType: form.grant_type,
        code: failure.code,
        statusCode: failure.statusCode,
      });
      return false;
    }

    const parsed = tokenResponseSchema.safeParse(parseJson(raw));
    if (!parsed.success) {
      this.logger.warn(`POST ${TOKEN_PATH} returned an unusable token response`, {
        grantType: form.grant_type,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
      return false;
    }

    this.store(parsed.data);
    return true;
  }

  private store(token: TokenResponse): void {
    this.accessToken = token.access_token;
    this.refreshToken = token.refresh_token ?? null;
    this.deadline = Date.now() + token.expires_in * 1000 - TOKEN_REFRESH_MARGIN_MS;
  }
}

/**
 * Parse a JSON text body, yielding undefined for anything unparsable
 */
export function parseJson(raw: unknown): unknown {
  if (typeof raw !== 'string') return raw;
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
