/**
 * Kaleidoscope SDK HTTP Client
 *
 * Wraps axios with the token lifecycle and the transport's failure policy:
 * every primitive resolves to the parsed payload, or to null after logging.
 */

import axios, { type AxiosInstance, type AxiosResponse, type Method } from 'axios';
import { createWriteStream } from 'node:fs';
import { rm } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { TokenManager, parseJson } from './auth';
import { DEFAULT_TIMEOUT_MS, VALID_CONTENT_TYPES, normalizeBaseUrl } from './config';
import { ContentTypeError, toKaleidoscopeError } from './errors';
import { consoleLogger, type Logger } from './logger';

export type QueryValue = string | number | boolean | null | undefined;
export type QueryParams = Record<string, QueryValue>;

/**
 * A file to send as the `file` part of a multipart upload
 */
export interface UploadFile {
  name: string;
  data: Buffer | Uint8Array | string;
  /** MIME type, e.g. text/csv */
  type: string;
}

export interface HttpClientConfig {
  clientId: string;
  clientSecret: string;
  /** Base URL for the Kaleidoscope API */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeout?: number;
  logger?: Logger;
}

interface SendOptions {
  params?: QueryParams;
  data?: unknown;
  headers?: Record<string, string>;
}

/**
 * Drop undefined values; everything else is sent as its string form
 */
export function toSearchParams(params?: QueryParams): URLSearchParams | undefined {
  if (!params) return undefined;
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    search.append(key, value === null ? 'null' : String(value));
  }
  return search;
}

/**
 * Media type without parameters, lower-cased
 */
export function mediaType(header: unknown): string {
  if (typeof header !== 'string') return '';
  return (header.split(';')[0] ?? '').trim().toLowerCase();
}

export function isValidContentType(header: unknown): boolean {
  const type = mediaType(header);
  return VALID_CONTENT_TYPES.some((valid) => valid === type);
}

/**
 * HTTP client for Kaleidoscope API requests
 */
export class HttpClient {
  private readonly client: AxiosInstance;
  readonly auth: TokenManager;
  readonly baseUrl: string;
  readonly timeout: number;
  readonly logger: Logger;
  /** Outcome of the client-credentials exchange started on construction */
  readonly ready: Promise<boolean>;

  constructor(config: HttpClientConfig) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
    this.logger = config.logger ?? consoleLogger;

    this.auth = new TokenManager({
      baseUrl: this.baseUrl,
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      timeout: this.timeout,
      logger: this.logger,
    });

    this.client = axios.create({
      baseURL: this.baseUrl,
      timeout: this.timeout,
      headers: { 'Content-Type': 'application/json' },
      validateStatus: (status) => status < 400,
    });

    // Refresh check and bearer header
    this.client.interceptors.request.use(async (request) => {
      await this.ensureToken();
      const token = this.auth.getAccessToken();
      if (token) {
        request.headers.set('Authorization', `Bearer ${token}`);
      }
      return request;
    });

    // Response interceptor for error handling
    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => {
        // unread error body of a download
        if (axios.isAxiosError(error) && error.response?.data instanceof Readable) {
          error.response.data.destroy();
        }
        throw toKaleidoscopeError(error, this.timeout);
      }
    );

    this.ready = this.auth.authenticate();
  }

  /**
   * Wait for the initial exchange, then refresh if the token has expired.
   * A failed refresh keeps the previous token.
   */
  async ensureToken(): Promise<void> {
    await this.ready;
    if (this.auth.isExpired()) {
      await this.auth.refresh();
    }
  }

  async get(path: string, params?: QueryParams): Promise<unknown> {
    return this.send('GET', path, { params });
  }

  async post(path: string, body: unknown): Promise<unknown> {
    return this.send('POST', path, { data: body });
  }

  /**
   * Multipart upload: a `file` part, plus a `body` part holding `body` as a
   * JSON string when one is given
   */
  async postFile(path: string, file: UploadFile, body?: unknown): Promise<unknown> {
    const form = new FormData();
    const part = typeof file.data === 'string' ? file.data : new Uint8Array(file.data);
    form.append('file', new Blob([part], { type: file.type }), file.name);
    if (body !== undefined && body !== null) {
      form.append('body', JSON.stringify(body));
    }
    return this.send('POST', path, {
      data: form,
      headers: { 'Content-Type': 'multipart/form-data' },
    });
  }

  async put(path: string, body: unknown): Promise<unknown> {
    return this.send('PUT', path, { data: body });
  }

  async delete(path: string, params?: QueryParams): Promise<unknown> {
    return this.send('DELETE', path, { params });
  }

  /**
   * Stream a file download to `downloadPath`.
   * Nothing is written unless the response carries an accepted content type,
   * and a partially written file is removed.
   */
  async getFile(path: string, downloadPath: string, params?: QueryParams): Promise<string | null> {
    let response: AxiosResponse<Readable>;
    try {
      response = await this.client.get<Readable>(path, {
        params: toSearchParams(params),
        responseType: 'stream',
      });
    } catch (error) {
      this.report('GET', path, error);
      return null;
    }

    const header: unknown = response.headers['content-type'];
    if (!isValidContentType(header)) {
      response.data.destroy();
      const failure = new ContentTypeError(typeof header === 'string' ? header : '');
      this.logger.error(failure.message, { path, code: failure.code });
      return null;
    }

    try {
      await pipeline(response.data, createWriteStream(downloadPath));
      return downloadPath;
    } catch (error) {
      this.logger.error(`GET ${path} could not be written to ${downloadPath}`, {
        cause: error instanceof Error ? error.message : String(error),
      });
      await rm(downloadPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn(`Could not remove partial download ${downloadPath}`, {
          cause: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
        });
      });
      return null;
    }
  }

  private async send(method: Method, path: string, options: SendOptions): Promise<unknown> {
    try {
      const response = await this.client.request<unknown>({
        method,
        url: path,
        params: toSearchParams(options.params),
        data: options.data,
        headers: options.headers,
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
      });
      return parseJson(response.data) ?? null;
    } catch (error) {
      this.report(method, path, error);
      return null;
    }
  }

  private report(method: string, path: string, error: unknown): void {
    const failure = toKaleidoscopeError(error, this.timeout);
    const verb = method.toUpperCase();
    if (failure.statusCode !== undefined) {
      this.logger.error(`${verb} ${path} received ${failure.statusCode}`, {
        code: failure.code,
        message: failure.message,
      });
    } else {
      this.logger.error(`${verb} ${path} failed: ${failure.message}`, { code: failure.code });
    }
  }
}
