/**
 * Rate & Access Gate
 * Sliding-window quota per caller and role checks for restricted tools.
 * Only checks that pass consume quota.
 */

import { config } from '../config/index.js';
import { ForbiddenError, RateLimitError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { CallerRole, RoleRequirement } from '../tools/types.js';

export interface RateGateOptions {
  maxCalls?: number;
  windowMs?: number;
  adminCallerIds?: readonly string[];
  now?: () => number;
}

export interface GateDecision {
  role: CallerRole;
  remaining: number;
}

export class RateAccessGate {
  // caller id -> call timestamps inside the current window
  private windows = new Map<string, number[]>();
  private readonly maxCalls: number;
  private readonly windowMs: number;
  private readonly admins: ReadonlySet<string>;
  private readonly now: () => number;

  constructor(options: RateGateOptions = {}) {
    this.maxCalls = options.maxCalls ?? config.rateLimit.maxCalls;
    this.windowMs = options.windowMs ?? config.rateLimit.windowMs;
    this.admins = new Set(options.adminCallerIds ?? config.access.adminCallerIds);
    this.now = options.now ?? Date.now;
  }

  roleOf(callerId: string): CallerRole {
    return this.admins.has(callerId) ? 'admin' : 'user';
  }

  /**
   * Admit one call or throw RateLimitError / ForbiddenError
   */
  check(callerId: string, toolName: string, requirement: RoleRequirement): GateDecision {
    const now = this.now();
    const timestamps = this.prune(callerId, now);

    if (timestamps.length >= this.maxCalls) {
      const retryAfterMs = Math.max(1, timestamps[0] + this.windowMs - now);
      logger.warn({ callerId, toolName, retryAfterMs }, 'Rate limit exceeded');
      throw new RateLimitError(
        `Rate limit of ${this.maxCalls} calls per ${Math.round(this.windowMs / 1000)}s exceeded; retry in ${Math.ceil(retryAfterMs / 1000)}s`,
        retryAfterMs
      );
    }

    const role = this.roleOf(callerId);
    if (requirement === 'admin' && role !== 'admin') {
      logger.warn({ callerId, toolName }, 'Caller lacks role for tool');
      throw new ForbiddenError(`Tool '${toolName}' requires the admin role`);
    }

    timestamps.push(now);
    this.windows.set(callerId, timestamps);
    return { role, remaining: this.maxCalls - timestamps.length };
  }

  /**
   * Calls left in the current window
   */
  remaining(callerId: string): number {
    return this.maxCalls - this.prune(callerId, this.now()).length;
  }

  get trackedCallers(): number {
    return this.windows.size;
  }

  /**
   * Drop callers with no call inside the window, returning how many went
   */
  sweep(now: number = this.now()): number {
    const cutoff = now - this.windowMs;
    let removed = 0;
    for (const [callerId, timestamps] of this.windows) {
      if (timestamps.length === 0 || timestamps[timestamps.length - 1] <= cutoff) {
        this.windows.delete(callerId);
        removed += 1;
      }
    }
    return removed;
  }

  reset(callerId?: string): void {
    if (callerId === undefined) {
      this.windows.clear();
    } else {
      this.windows.delete(callerId);
    }
  }

  private prune(callerId: string, now: number): number[] {
    const cutoff = now - this.windowMs;
    const timestamps = (this.windows.get(callerId) ?? []).filter((t) => t > cutoff);
    if (timestamps.length === 0) {
      this.windows.delete(callerId);
    } else {
      this.windows.set(callerId, timestamps);
    }
    return timestamps;
  }
}
