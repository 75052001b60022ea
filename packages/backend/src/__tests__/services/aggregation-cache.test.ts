/**
 * Aggregation cache tests
 */

import { describe, it, expect } from 'vitest';
import { AggregationCache, canonicalKey } from '../../services/aggregation-cache.js';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('canonicalKey', () => {
  it('should ignore parameter and set order', () => {
    const a = canonicalKey('aggregate', { boroughs: ['Richmond', 'Merton'], year: 2022 });
    const b = canonicalKey('aggregate', { year: 2022, boroughs: ['Merton', 'Richmond'] });
    expect(a).toBe(b);
    expect(a).toBe('aggregate:{"boroughs":["Merton","Richmond"],"year":2022}');
  });

  it('should drop unset and empty parameters', () => {
    expect(canonicalKey('aggregate', { month: undefined, pollutants: [], averaging: 'Annual' })).toBe(
      'aggregate:{"averaging":"Annual"}'
    );
  });
});

describe('AggregationCache', () => {
  it('should call the loader once for concurrent requests', async () => {
    const cache = new AggregationCache<number>();
    const pending = deferred<number>();
    let calls = 0;
    const loader = () => {
      calls += 1;
      return pending.promise;
    };

    const results = Promise.all([cache.fetch('k', loader), cache.fetch('k', loader), cache.fetch('k', loader)]);
    pending.resolve(42);

    expect(await results).toEqual([42, 42, 42]);
    expect(calls).toBe(1);
    expect(cache.stats()).toMatchObject({ entries: 1, inFlight: 0, loads: 1, misses: 3 });
  });

  it('should serve fresh entries and reload after the TTL', async () => {
    let now = 0;
    const cache = new AggregationCache<string>({ ttlMs: 100, now: () => now });
    let calls = 0;
    const loader = async () => `value-${++calls}`;

    expect(await cache.fetch('k', loader)).toBe('value-1');
    now = 99;
    expect(await cache.fetch('k', loader)).toBe('value-1');
    expect(cache.peek('k')).toBe('value-1');
    now = 100;
    expect(cache.peek('k')).toBeUndefined();
    expect(await cache.fetch('k', loader)).toBe('value-2');
    expect(cache.stats().hits).toBe(1);
  });

  it('should retry a failed loader once', async () => {
    const cache = new AggregationCache<string>({ retryLoaderOnce: true });
    let calls = 0;
    const loader = async () => {
      calls += 1;
      if (calls === 1) throw new Error('flaky');
      return 'ok';
    };

    expect(await cache.fetch('k', loader)).toBe('ok');
    expect(calls).toBe(2);
    expect(cache.stats()).toMatchObject({ loads: 2, failures: 1 });
  });

  it('should not cache failures', async () => {
    const cache = new AggregationCache<string>({ retryLoaderOnce: false });
    let calls = 0;
    const failing = async (): Promise<string> => {
      calls += 1;
      throw new Error('down');
    };

    await expect(cache.fetch('k', failing)).rejects.toThrow('down');
    expect(cache.stats().entries).toBe(0);
    expect(cache.stats().inFlight).toBe(0);
    expect(await cache.fetch('k', async () => 'recovered')).toBe('recovered');
    expect(calls).toBe(1);
  });

  it('should answer waiters but not store a load invalidated in flight', async () => {
    const cache = new AggregationCache<string>();
    const pending = deferred<string>();
    const result = cache.fetch('k', () => pending.promise);

    await Promise.resolve();
    cache.invalidate('k');
    pending.resolve('stale');

    expect(await result).toBe('stale');
    expect(cache.peek('k')).toBeUndefined();
    expect(await cache.fetch('k', async () => 'fresh')).toBe('fresh');
  });

  it('should evict the oldest entry at capacity', async () => {
    const cache = new AggregationCache<number>({ maxEntries: 2 });
    await cache.fetch('a', async () => 1);
    await cache.fetch('b', async () => 2);
    await cache.fetch('c', async () => 3);

    expect(cache.peek('a')).toBeUndefined();
    expect(cache.peek('b')).toBe(2);
    expect(cache.peek('c')).toBe(3);
  });

  it('should invalidate by predicate and entirely', async () => {
    const cache = new AggregationCache<number>();
    await cache.fetch('aggregate:{"year":2022}', async () => 1);
    await cache.fetch('aggregate:{"year":2023}', async () => 2);
    await cache.fetch('unique-values:{"field":"year"}', async () => 3);

    expect(cache.invalidateWhere((key) => key.startsWith('aggregate:'))).toBe(2);
    expect(cache.stats().entries).toBe(1);
    expect(cache.invalidateAll()).toBe(1);
    expect(cache.stats().entries).toBe(0);
  });
});
