/**
 * Base Manager Class
 *
 * Provides common functionality for all resource managers. Managers never
 * throw: failed calls and payloads that do not match their schema are logged
 * and come back as null or an empty list.
 */

import type { z } from 'zod';
import type { ResponseCache } from '../cache';
import { cacheKey } from '../cache';
import { ValidationError } from '../errors';
import type { HttpClient, QueryParams } from '../http';
import type { Logger } from '../logger';

/**
 * Everything a manager needs from its client
 */
export interface ManagerContext {
  http: HttpClient;
  cache: ResponseCache;
}

/**
 * Base class for all resource managers
 */
export abstract class BaseManager {
  protected readonly http: HttpClient;
  protected readonly cache: ResponseCache;
  protected readonly logger: Logger;
  protected readonly basePath: string;

  constructor(context: ManagerContext, basePath: string) {
    this.http = context.http;
    this.cache = context.cache;
    this.logger = context.http.logger;
    this.basePath = basePath;
  }

  /**
   * Build query parameters, filtering out undefined values
   */
  protected buildParams(params: QueryParams): QueryParams {
    const result: QueryParams = {};
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== null) {
        result[key] = value;
      }
    }
    return result;
  }

  /**
   * Build full path with ID
   */
  protected pathWithId(id: string, ...segments: string[]): string {
    return [`${this.basePath}/${id}`, ...segments].join('/');
  }

  /**
   * GET through the shared cache. Failed loads are not stored.
   */
  protected async cached(path: string, params?: QueryParams): Promise<unknown> {
    return this.cache.getOrLoad(cacheKey(path, params), () => this.http.get(path, params));
  }

  /**
   * Validate a single model; null for a missing or malformed payload
   */
  protected parseOne<T extends z.ZodTypeAny>(
    schema: T,
    payload: unknown,
    what: string
  ): z.output<T> | null {
    if (payload === null || payload === undefined) return null;
    const result = schema.safeParse(payload);
    if (!result.success) {
      this.reportInvalid(what, result.error);
      return null;
    }
    return result.data;
  }

  /**
   * Validate a list of models; [] for a missing or malformed payload.
   * One bad element rejects the whole list.
   */
  protected parseList<T extends z.ZodTypeAny>(
    schema: T,
    payload: unknown,
    what: string
  ): Array<z.output<T>> {
    return this.tryParseList(schema, payload, what) ?? [];
  }

  /**
   * Like parseList, but tells a failure (null) apart from an empty list
   */
  protected tryParseList<T extends z.ZodTypeAny>(
    schema: T,
    payload: unknown,
    what: string
  ): Array<z.output<T>> | null {
    if (payload === null || payload === undefined) return null;
    if (!Array.isArray(payload)) {
      this.reportInvalid(what, undefined);
      return null;
    }
    const items: unknown[] = payload;
    const parsed: Array<z.output<T>> = [];
    for (const [index, item] of items.entries()) {
      const result = schema.safeParse(item);
      if (!result.success) {
        this.reportInvalid(`${what}[${index}]`, result.error);
        return null;
      }
      parsed.push(result.data);
    }
    return parsed;
  }

  private reportInvalid(what: string, error: z.ZodError | undefined): void {
    const issues = error
      ? error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      : ['expected an array'];
    const failure = new ValidationError(`Unexpected ${what} payload`, issues);
    this.logger.error(failure.message, { code: failure.code, issues: failure.validationErrors });
  }
}

/**
 * Split `items` into consecutive chunks of at most `size`
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const step = Math.max(1, Math.floor(size));
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += step) {
    chunks.push(items.slice(i, i + step));
  }
  return chunks;
}
