/**
 * Rate Limiter (Sliding Window Log)
 *
 * Bounds outbound requests across all workers: no more than maxRequests
 * requests are granted inside any rolling window (60 s by default).
 *
 * ALGORITHM:
 * - Ledger of grant timestamps, pruned to the current window
 * - Grant when ledger size < maxRequests
 * - Otherwise sleep until the oldest entry leaves the window
 *
 * FAIRNESS:
 * - Waiters are chained FIFO; each waits for its predecessor's grant
 * - Only the gate is serialized; callers do everything else concurrently
 */

import type { Clock } from '../core/clock.js';
import { systemClock } from '../core/clock.js';
import type { Instant } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'rate-limiter' });

export interface RateLimiterConfig {
  /** Maximum grants inside one window */
  readonly maxRequests: number;

  /** Window length in milliseconds (default: 60000) */
  readonly windowMs?: number;

  readonly clock?: Clock;
}

export interface RateLimiterStats {
  readonly maxRequests: number;
  readonly windowMs: number;

  /** Grants currently inside the window */
  readonly inWindow: number;

  /** Callers waiting for a grant */
  readonly waiting: number;

  /** Grants since construction */
  readonly granted: number;
}

export class SlidingWindowRateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly clock: Clock;

  /** Grant timestamps, ascending */
  private readonly ledger: Instant[] = [];
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;
  private granted = 0;

  constructor(config: RateLimiterConfig) {
    const windowMs = config.windowMs ?? 60_000;

    if (!Number.isInteger(config.maxRequests) || config.maxRequests <= 0 || windowMs <= 0) {
      throw new RangeError('maxRequests must be a positive integer and windowMs must be > 0');
    }

    this.maxRequests = config.maxRequests;
    this.windowMs = windowMs;
    this.clock = config.clock ?? systemClock;
  }

  /**
   * Wait until one more request fits in the window, then record it
   */
  acquire(): Promise<void> {
    this.waiting++;

    const turn = this.tail.then(() => this.waitForSlot());

    // The chain must keep moving even if one waiter's sleep rejects;
    // that waiter still receives its own rejection through `turn`
    this.tail = turn.catch(() => undefined);

    return turn.finally(() => {
      this.waiting--;
    });
  }

  getStats(): RateLimiterStats {
    this.prune(this.clock.now());
    return {
      maxRequests: this.maxRequests,
      windowMs: this.windowMs,
      inWindow: this.ledger.length,
      waiting: this.waiting,
      granted: this.granted,
    };
  }

  private async waitForSlot(): Promise<void> {
    for (;;) {
      const now = this.clock.now();
      this.prune(now);

      if (this.ledger.length < this.maxRequests) {
        this.ledger.push(now);
        this.granted++;
        return;
      }

      const waitMs = this.ledger[0] + this.windowMs - now;
      log.debug('Rate limit reached, waiting', { waitMs, queued: this.waiting });
      await this.clock.sleep(waitMs);
    }
  }

  private prune(now: Instant): void {
    while (this.ledger.length > 0 && now - this.ledger[0] >= this.windowMs) {
      this.ledger.shift();
    }
  }
}

/**
 * Create a per-minute limiter
 */
export function createRateLimiter(
  maxRequestsPerMinute: number,
  clock?: Clock
): SlidingWindowRateLimiter {
  return new SlidingWindowRateLimiter({ maxRequests: maxRequestsPerMinute, windowMs: 60_000, clock });
}
