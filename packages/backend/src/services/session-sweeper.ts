/**
 * Session sweeper
 * Periodically evicts idle sessions from the context store, along with
 * stale rate windows and expired export handles
 */

import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import type { ExportService } from './export.service.js';
import type { RateAccessGate } from './rate-gate.js';
import type { SessionContextStore } from './session.service.js';

export interface SweepTargets {
  gate?: RateAccessGate;
  exports?: ExportService;
}

export class SessionSweeper {
  private running = false;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly store: SessionContextStore,
    private readonly intervalMs: number = config.session.sweepIntervalMs,
    private readonly now: () => number = Date.now,
    private readonly targets: SweepTargets = {}
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      logger.warn('Session sweeper already running');
      return;
    }

    logger.info({ intervalMs: this.intervalMs }, 'Starting session sweeper');
    this.running = true;
    this.timer = setInterval(() => this.sweep(), this.intervalMs);
    // Never keeps the process alive on its own
    this.timer.unref();
  }

  stop(): void {
    if (!this.running) return;
    logger.info('Stopping session sweeper');
    this.running = false;

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * One sweep, returning the evicted session ids
   */
  sweep(): string[] {
    const now = this.now();
    const evicted = this.store.expire(now);
    const callers = this.targets.gate?.sweep(now) ?? 0;
    const exports = this.targets.exports?.purgeExpired(now) ?? 0;
    if (evicted.length > 0 || callers > 0 || exports > 0) {
      logger.debug({ evicted, callers, exports }, 'Session sweep complete');
    }
    return evicted;
  }
}
