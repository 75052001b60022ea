/**
 * Aggregation Cache
 * TTL memoization of expensive read queries with single-flight loading
 */

import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';

export interface CacheEntry<V> {
  value: V;
  fetchedAt: number;
  ttlMs: number;
}

export interface CacheStats {
  entries: number;
  inFlight: number;
  hits: number;
  misses: number;
  loads: number;
  failures: number;
}

export interface AggregationCacheOptions {
  ttlMs?: number;
  maxEntries?: number;
  retryLoaderOnce?: boolean;
  now?: () => number;
}

interface InFlightLoad<V> {
  promise: Promise<V>;
}

export type Loader<V> = () => Promise<V>;

type QueryParam = string | number | boolean | null | undefined | readonly (string | number)[];

/**
 * Canonical key for a read query: parameter names sorted, set-valued
 * parameters sorted, unset parameters dropped
 */
export function canonicalKey(queryType: string, params: Record<string, QueryParam>): string {
  const normalized: Record<string, string | number | boolean | (string | number)[]> = {};
  for (const name of Object.keys(params).sort()) {
    const value = params[name];
    if (value === undefined || value === null) continue;
    if (Array.isArray(value)) {
      if (value.length === 0) continue;
      normalized[name] = [...value].sort();
    } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      normalized[name] = value;
    }
  }
  return `${queryType}:${JSON.stringify(normalized)}`;
}

export class AggregationCache<V> {
  private entries = new Map<string, CacheEntry<V>>();
  private inFlight = new Map<string, InFlightLoad<V>>();
  private counters = { hits: 0, misses: 0, loads: 0, failures: 0 };

  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly retryLoaderOnce: boolean;
  private readonly now: () => number;

  constructor(options: AggregationCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? config.cache.ttlMs;
    this.maxEntries = options.maxEntries ?? config.cache.maxEntries;
    this.retryLoaderOnce = options.retryLoaderOnce ?? config.cache.retryLoaderOnce;
    this.now = options.now ?? Date.now;
  }

  /**
   * Cached value if present and unexpired, otherwise the result of the one
   * outstanding load for this key
   */
  fetch(queryKey: string, loader: Loader<V>): Promise<V> {
    const entry = this.entries.get(queryKey);
    if (entry && this.now() - entry.fetchedAt < entry.ttlMs) {
      this.counters.hits += 1;
      return Promise.resolve(entry.value);
    }
    if (entry) {
      this.entries.delete(queryKey);
    }

    this.counters.misses += 1;
    const pending = this.inFlight.get(queryKey);
    if (pending) {
      logger.debug({ queryKey }, 'Joining in-flight load');
      return pending.promise;
    }

    const load: InFlightLoad<V> = { promise: Promise.resolve().then(() => this.load(queryKey, loader, load)) };
    this.inFlight.set(queryKey, load);
    return load.promise;
  }

  /**
   * Cached value without loading
   */
  peek(queryKey: string): V | undefined {
    const entry = this.entries.get(queryKey);
    if (!entry || this.now() - entry.fetchedAt >= entry.ttlMs) return undefined;
    return entry.value;
  }

  invalidate(queryKey: string): boolean {
    this.inFlight.delete(queryKey);
    const removed = this.entries.delete(queryKey);
    logger.debug({ queryKey, removed }, 'Cache entry invalidated');
    return removed;
  }

  invalidateWhere(predicate: (queryKey: string) => boolean): number {
    let removed = 0;
    for (const key of Array.from(this.entries.keys())) {
      if (predicate(key)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    for (const key of Array.from(this.inFlight.keys())) {
      if (predicate(key)) this.inFlight.delete(key);
    }
    logger.info({ removed }, 'Cache entries invalidated');
    return removed;
  }

  invalidateAll(): number {
    const removed = this.entries.size;
    this.entries.clear();
    this.inFlight.clear();
    logger.info({ removed }, 'Cache cleared');
    return removed;
  }

  stats(): CacheStats {
    return {
      entries: this.entries.size,
      inFlight: this.inFlight.size,
      ...this.counters,
    };
  }

  private async load(queryKey: string, loader: Loader<V>, self: InFlightLoad<V>): Promise<V> {
    try {
      const value = await this.runLoader(queryKey, loader);
      // A load invalidated while running still answers its waiters but is not stored
      if (this.inFlight.get(queryKey) === self) {
        this.store(queryKey, value);
      }
      return value;
    } finally {
      if (this.inFlight.get(queryKey) === self) {
        this.inFlight.delete(queryKey);
      }
    }
  }

  private async runLoader(queryKey: string, loader: Loader<V>): Promise<V> {
    this.counters.loads += 1;
    try {
      return await loader();
    } catch (error) {
      this.counters.failures += 1;
      if (!this.retryLoaderOnce) throw error;
      logger.warn({ queryKey, err: error }, 'Cache loader failed, retrying once');
      this.counters.loads += 1;
      try {
        return await loader();
      } catch (retryError) {
        this.counters.failures += 1;
        throw retryError;
      }
    }
  }

  private store(queryKey: string, value: V): void {
    if (this.entries.size >= this.maxEntries && !this.entries.has(queryKey)) {
      // Map iteration order is insertion order
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(queryKey, { value, fetchedAt: this.now(), ttlMs: this.ttlMs });
  }
}
