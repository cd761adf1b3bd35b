/**
 * Rate limiter service - per-user cooldown between rate-limited actions
 */
import { config } from '../config/index';

export type Clock = () => number;

export interface RateLimiterOptions {
  cooldownMs?: number;
  clock?: Clock;
  /** Table size above which expired entries are pruned */
  pruneThreshold?: number;
}

/**
 * Tracks the last allowed invocation per user.
 * A user is admitted again once the cooldown has fully elapsed.
 */
export class RateLimiterService {
  private readonly lastInvocation = new Map<string, number>();
  private readonly cooldownMs: number;
  private readonly clock: Clock;
  private readonly pruneThreshold: number;

  constructor(options: RateLimiterOptions = {}) {
    this.cooldownMs = options.cooldownMs ?? config.rateLimit.cooldownMs;
    this.clock = options.clock ?? Date.now;
    this.pruneThreshold = options.pruneThreshold ?? 1000;
  }

  getCooldownMs(): number {
    return this.cooldownMs;
  }

  /**
   * Admits the user and records the invocation time, or rejects without
   * touching the existing entry
   * @returns Whether the invocation is allowed
   */
  tryAcquire(userId: string): boolean {
    const now = this.clock();
    const last = this.lastInvocation.get(userId);

    if (last !== undefined && now - last < this.cooldownMs) {
      return false;
    }

    this.lastInvocation.set(userId, now);
    if (this.lastInvocation.size > this.pruneThreshold) {
      this.prune(now);
    }
    return true;
  }

  /**
   * Milliseconds until the user is admitted again (0 when allowed now)
   */
  getRetryAfterMs(userId: string): number {
    const last = this.lastInvocation.get(userId);
    if (last === undefined) {
      return 0;
    }
    return Math.max(0, this.cooldownMs - (this.clock() - last));
  }

  /**
   * Number of users currently tracked
   */
  size(): number {
    return this.lastInvocation.size;
  }

  reset(): void {
    this.lastInvocation.clear();
  }

  /**
   * Drops entries whose cooldown has elapsed
   */
  private prune(now: number): void {
    for (const [userId, last] of this.lastInvocation) {
      if (now - last >= this.cooldownMs) {
        this.lastInvocation.delete(userId);
      }
    }
  }
}
