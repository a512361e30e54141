/**
 * Response Cache
 *
 * Holds raw list payloads keyed by request shape, so repeated lookups of
 * slow-changing collections (programs, labels, fields...) skip the network.
 * Managers parse the payload on every read; the cache never hands out a
 * shared model object.
 */

import type { QueryParams } from './http';

interface CachedEntry {
  payload: unknown;
  /** Timestamp when this was stored (milliseconds since epoch) */
  storedAt: number;
}

/**
 * Cache statistics
 */
export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  /** Cache hit rate (0-1) */
  hitRate: number;
}

export interface ResponseCacheOptions {
  /** Entry lifetime in milliseconds. Entries never expire when omitted. */
  ttlMs?: number;
}

/**
 * Key for a request: the path, then its defined params sorted by name
 */
export function cacheKey(path: string, params?: QueryParams): string {
  if (!params) return path;
  const entries = Object.entries(params)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  if (entries.length === 0) return path;
  const query = new URLSearchParams(entries.map(([k, v]) => [k, String(v)])).toString();
  return `${path}?${query}`;
}

/**
 * @example
 * ```typescript
 * const cache = new ResponseCache({ ttlMs: 60_000 });
 * const programs = await cache.getOrLoad('/programs', () => http.get('/programs'));
 *
 * // after a write
 * cache.invalidate('/programs');
 * ```
 */
export class ResponseCache {
  private readonly entries: Map<string, CachedEntry> = new Map();
  private readonly ttlMs?: number;
  private hits = 0;
  private misses = 0;

  constructor(options: ResponseCacheOptions = {}) {
    this.ttlMs = options.ttlMs;
  }

  /**
   * Return the stored payload for `key`, or run `load` and store its result.
   * A null result is a failed load and is not stored.
   */
  async getOrLoad(key: string, load: () => Promise<unknown>): Promise<unknown> {
    const cached = this.entries.get(key);
    if (cached && !this.isExpired(cached)) {
      this.hits++;
      return cached.payload;
    }

    this.misses++;
    const payload = await load();
    if (payload === null || payload === undefined) {
      this.entries.delete(key);
      return null;
    }

    this.entries.set(key, { payload, storedAt: Date.now() });
    return payload;
  }

  has(key: string): boolean {
    const cached = this.entries.get(key);
    return cached !== undefined && !this.isExpired(cached);
  }

  /**
   * Drop every entry whose key is `prefix` itself or extends it as a path or
   * query (`/activities` drops `/activities?…` and `/activities/…`, not
   * `/activity_definitions`)
   */
  invalidate(prefix: string): void {
    for (const key of [...this.entries.keys()]) {
      if (key === prefix || key.startsWith(`${prefix}?`) || key.startsWith(`${prefix}/`)) {
        this.entries.delete(key);
      }
    }
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  getStats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: total === 0 ? 0 : this.hits / total,
    };
  }

  private isExpired(entry: CachedEntry): boolean {
    if (this.ttlMs === undefined) return false;
    return Date.now() - entry.storedAt >= this.ttlMs;
  }
}
