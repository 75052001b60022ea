/**
 * Session Context Store
 * Per-conversation dashboard state with bounded history and idle expiry
 */

import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { applyDelta as mergeDelta, isEmptyDelta } from './context-delta.js';
import type {
  ContextDelta,
  ContextState,
  HistoryTurn,
  MapViewport,
  SessionContext,
  SessionSnapshot,
  TurnRecord,
} from '../types/session.js';

export const DEFAULT_VIEWPORT: Readonly<MapViewport> = Object.freeze({
  lat: 51.445,
  lon: -0.22,
  zoom: 11.3,
});

export interface SessionStoreOptions {
  historyCapacity?: number;
  idleTimeoutMs?: number;
  overlays?: readonly string[];
  now?: () => number;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) deepFreeze(nested);
  }
  return value;
}

export class SessionContextStore {
  private sessions = new Map<string, SessionContext>();
  private readonly historyCapacity: number;
  private readonly idleTimeoutMs: number;
  private readonly overlayNames: readonly string[];
  private readonly now: () => number;

  constructor(options: SessionStoreOptions = {}) {
    this.historyCapacity = options.historyCapacity ?? config.session.historyCapacity;
    this.idleTimeoutMs = options.idleTimeoutMs ?? config.session.idleTimeoutMs;
    this.overlayNames = options.overlays ?? [];
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Existing session, or undefined when absent or idle past the threshold
   */
  get(sessionId: string): SessionContext | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) return undefined;
    if (this.isIdle(session, this.now())) {
      this.sessions.delete(sessionId);
      logger.debug({ sessionId }, 'Idle session dropped on lookup');
      return undefined;
    }
    return session;
  }

  /**
   * Return the session, creating a blank one on first interaction
   */
  getOrCreate(sessionId: string): SessionContext {
    const existing = this.get(sessionId);
    if (existing) {
      return existing;
    }

    const now = this.now();
    const session: SessionContext = {
      sessionId,
      filters: {},
      viewport: { ...DEFAULT_VIEWPORT },
      overlays: Object.fromEntries(this.overlayNames.map((name) => [name, false])),
      selectedSites: [],
      history: [],
      nextTurnSeq: 0,
      createdAt: now,
      lastActivityAt: now,
    };
    this.sessions.set(sessionId, session);
    logger.info({ sessionId }, 'Session created');
    return session;
  }

  /**
   * Current state fields only, detached from the stored session
   */
  state(sessionId: string): ContextState {
    const session = this.getOrCreate(sessionId);
    return {
      filters: structuredClone(session.filters),
      viewport: { ...session.viewport },
      overlays: { ...session.overlays },
      selectedSites: [...session.selectedSites],
    };
  }

  /**
   * Claim the next history position. A turn recorded later with this
   * sequence number lands in admission order, not completion order.
   */
  reserveTurn(sessionId: string): number {
    const session = this.getOrCreate(sessionId);
    const seq = session.nextTurnSeq;
    session.nextTurnSeq += 1;
    return seq;
  }

  /**
   * Merge a delta and append the turn that produced it
   */
  applyDelta(sessionId: string, delta: ContextDelta, turn: TurnRecord): SessionContext {
    const session = this.getOrCreate(sessionId);
    if (!isEmptyDelta(delta)) {
      const next = mergeDelta(session, delta);
      session.filters = next.filters;
      session.viewport = next.viewport;
      session.overlays = next.overlays;
      session.selectedSites = next.selectedSites;
    }
    this.appendTurn(session, { ...turn, seq: this.reserveTurn(sessionId), delta: structuredClone(delta) });
    return session;
  }

  /**
   * Record a turn that changed nothing, at a reserved position or at the end
   */
  recordTurn(sessionId: string, turn: TurnRecord, seq?: number): SessionContext {
    const session = this.getOrCreate(sessionId);
    this.appendTurn(session, { ...turn, seq: seq ?? this.reserveTurn(sessionId), delta: {} });
    return session;
  }

  /**
   * Immutable deep copy for inclusion in a response
   */
  snapshot(sessionId: string): SessionSnapshot {
    const session = this.getOrCreate(sessionId);
    return deepFreeze(structuredClone(session));
  }

  /**
   * Evict sessions idle for longer than the threshold
   */
  expire(now: number = this.now()): string[] {
    const evicted: string[] = [];
    for (const [sessionId, session] of this.sessions) {
      if (this.isIdle(session, now)) {
        this.sessions.delete(sessionId);
        evicted.push(sessionId);
      }
    }
    if (evicted.length > 0) {
      logger.info({ count: evicted.length }, 'Expired idle sessions');
    }
    return evicted;
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  private appendTurn(session: SessionContext, turn: HistoryTurn): void {
    let index = session.history.length;
    while (index > 0 && session.history[index - 1].seq > turn.seq) {
      index -= 1;
    }
    session.history.splice(index, 0, turn);
    session.nextTurnSeq = Math.max(session.nextTurnSeq, turn.seq + 1);
    if (session.history.length > this.historyCapacity) {
      session.history.splice(0, session.history.length - this.historyCapacity);
    }
    session.lastActivityAt = this.now();
  }

  private isIdle(session: SessionContext, now: number): boolean {
    return now - session.lastActivityAt > this.idleTimeoutMs;
  }
}
