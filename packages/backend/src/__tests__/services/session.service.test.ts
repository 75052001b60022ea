/**
 * Session context store tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_VIEWPORT, SessionContextStore } from '../../services/session.service.js';

function turn(tool: string, at: number) {
  return { at, call: { tool, arguments: {}, callerId: 'user-1' }, result: null };
}

function clock(start = 1_000_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('SessionContextStore', () => {
  it('should create a blank session on first interaction', () => {
    const store = new SessionContextStore({ overlays: ['uk_limit', 'who_guideline'], now: () => 5000 });
    const session = store.getOrCreate('s1');

    expect(session.filters).toEqual({});
    expect(session.viewport).toEqual(DEFAULT_VIEWPORT);
    expect(session.overlays).toEqual({ uk_limit: false, who_guideline: false });
    expect(session.history).toEqual([]);
    expect(session.createdAt).toBe(5000);
    expect(store.size).toBe(1);
  });

  it('should apply a delta and append the turn', () => {
    const store = new SessionContextStore();
    store.applyDelta('s1', { filters: { pollutant: 'NO2' } }, turn('update_filters', 1));
    store.applyDelta('s1', { filters: { year: 2022 } }, turn('update_filters', 2));

    const snapshot = store.snapshot('s1');
    expect(snapshot.filters).toEqual({ pollutant: 'NO2', year: 2022 });
    expect(snapshot.history.map((t) => t.delta)).toEqual([
      { filters: { pollutant: 'NO2' } },
      { filters: { year: 2022 } },
    ]);
  });

  it('should keep only the most recent turns', () => {
    const store = new SessionContextStore({ historyCapacity: 3 });
    for (let i = 0; i < 5; i++) {
      store.recordTurn('s1', turn(`tool_${i}`, i));
    }

    const history = store.snapshot('s1').history;
    expect(history.map((t) => t.call.tool)).toEqual(['tool_2', 'tool_3', 'tool_4']);
    expect(history.every((t) => Object.keys(t.delta).length === 0)).toBe(true);
  });

  it('should place a reserved turn ahead of later ones', () => {
    const store = new SessionContextStore();
    const seq = store.reserveTurn('s1');
    store.applyDelta('s1', { filters: { year: 2022 } }, turn('update_filters', 2));
    store.recordTurn('s1', turn('summary_statistics', 1), seq);
    store.recordTurn('s1', turn('list_filter_options', 3));

    const history = store.snapshot('s1').history;
    expect(history.map((t) => t.call.tool)).toEqual(['summary_statistics', 'update_filters', 'list_filter_options']);
    expect(history.map((t) => t.seq)).toEqual([0, 1, 2]);
  });

  it('should store a copy of the applied delta', () => {
    const store = new SessionContextStore();
    const delta = { filters: { boroughs: ['Merton'] } };
    store.applyDelta('s1', delta, turn('update_filters', 1));

    delta.filters.boroughs.push('Wandsworth');
    const snapshot = store.snapshot('s1');
    expect(snapshot.filters).toEqual({ boroughs: ['Merton'] });
    expect(snapshot.history[0].delta).toEqual({ filters: { boroughs: ['Merton'] } });
  });

  it('should start with an empty sensor selection and apply changes to it', () => {
    const store = new SessionContextStore();
    store.applyDelta('s1', { selectedSites: ['RIC-01', 'WAN-01'] }, turn('select_sensors', 1));

    expect(store.snapshot('s1').selectedSites).toEqual(['RIC-01', 'WAN-01']);
    expect(store.snapshot('s2').selectedSites).toEqual([]);
  });

  it('should return detached, frozen snapshots', () => {
    const store = new SessionContextStore();
    store.applyDelta('s1', { filters: { boroughs: ['Merton'] } }, turn('update_filters', 1));

    const snapshot = store.snapshot('s1');
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.filters.boroughs)).toBe(true);

    store.applyDelta('s1', { filters: { boroughs: ['Richmond'] } }, turn('update_filters', 2));
    expect(snapshot.filters.boroughs).toEqual(['Merton']);
    expect(snapshot.history).toHaveLength(1);
  });

  it('should return state copies that do not alias the stored session', () => {
    const store = new SessionContextStore();
    store.applyDelta('s1', { filters: { boroughs: ['Merton'] } }, turn('update_filters', 1));

    const state = store.state('s1');
    state.filters.boroughs?.push('Richmond');
    state.viewport.zoom = 3;

    expect(store.snapshot('s1').filters.boroughs).toEqual(['Merton']);
    expect(store.snapshot('s1').viewport.zoom).toBe(DEFAULT_VIEWPORT.zoom);
  });

  it('should hand out a blank context after the idle timeout', () => {
    const time = clock();
    const store = new SessionContextStore({ idleTimeoutMs: 1000, now: time.now });
    store.applyDelta('s1', { filters: { pollutant: 'PM10' } }, turn('update_filters', time.now()));

    time.advance(1000);
    expect(store.get('s1')?.filters).toEqual({ pollutant: 'PM10' });

    time.advance(1);
    expect(store.get('s1')).toBeUndefined();
    expect(store.getOrCreate('s1').filters).toEqual({});
  });

  it('should expire idle sessions and keep active ones', () => {
    const time = clock();
    const store = new SessionContextStore({ idleTimeoutMs: 1000, now: time.now });
    store.recordTurn('old', turn('summary_statistics', time.now()));
    time.advance(600);
    store.recordTurn('fresh', turn('summary_statistics', time.now()));
    time.advance(600);

    expect(store.expire()).toEqual(['old']);
    expect(store.size).toBe(1);
    expect(store.get('fresh')).toBeDefined();
  });

  it('should keep sessions isolated', () => {
    const store = new SessionContextStore();
    store.applyDelta('a', { filters: { pollutant: 'NO2' } }, turn('update_filters', 1));

    expect(store.snapshot('b').filters).toEqual({});
    expect(store.delete('a')).toBe(true);
    expect(store.get('a')).toBeUndefined();
  });
});
