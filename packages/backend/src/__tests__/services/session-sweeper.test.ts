/**
 * Session sweeper tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { SessionContextStore } from '../../services/session.service.js';
import { SessionSweeper } from '../../services/session-sweeper.js';
import { RateAccessGate } from '../../services/rate-gate.js';
import { ExportService } from '../../services/export.service.js';
import { queryFromFilters } from '../../tools/query.js';

describe('SessionSweeper', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should evict idle sessions on demand', () => {
    let now = 0;
    const store = new SessionContextStore({ idleTimeoutMs: 100, now: () => now });
    store.getOrCreate('s1');
    const sweeper = new SessionSweeper(store, 50, () => now);

    now = 100;
    expect(sweeper.sweep()).toEqual([]);
    now = 101;
    expect(sweeper.sweep()).toEqual(['s1']);
    expect(store.size).toBe(0);
  });

  it('should drop stale rate windows and expired exports', () => {
    let now = 0;
    const clock = () => now;
    const store = new SessionContextStore({ idleTimeoutMs: 10_000, now: clock });
    const gate = new RateAccessGate({ maxCalls: 5, windowMs: 1000, adminCallerIds: [], now: clock });
    const exports = new ExportService({ handleTtlMs: 500, now: clock });
    const sweeper = new SessionSweeper(store, 50, clock, { gate, exports });

    gate.check('user-1', 'export_current_view', 'none');
    exports.create({ sessionId: 's1', format: 'csv', filters: {}, query: queryFromFilters({}), rows: [] });
    expect(gate.trackedCallers).toBe(1);
    expect(exports.size).toBe(1);

    now = 1000;
    expect(sweeper.sweep()).toEqual([]);
    expect(gate.trackedCallers).toBe(0);
    expect(exports.size).toBe(0);
  });

  it('should sweep on an interval until stopped', () => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    const store = new SessionContextStore({ idleTimeoutMs: 1000 });
    store.getOrCreate('s1');
    const sweeper = new SessionSweeper(store, 500);

    sweeper.start();
    expect(sweeper.isRunning).toBe(true);

    vi.advanceTimersByTime(1000);
    expect(store.size).toBe(1);
    vi.advanceTimersByTime(500);
    expect(store.size).toBe(0);

    sweeper.stop();
    expect(sweeper.isRunning).toBe(false);
    store.getOrCreate('s2');
    vi.advanceTimersByTime(5000);
    expect(store.size).toBe(1);
  });
});
