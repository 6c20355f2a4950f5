/**
 * Time source for the engine
 *
 * TokenStore, RateLimiter and the worker pool never read Date.now() or call
 * setTimeout directly; they receive a Clock so tests can run on virtual time.
 */

import type { Instant } from './types.js';

export interface Clock {
  now(): Instant;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) =>
    new Promise((resolve) => {
      setTimeout(resolve, Math.max(0, ms));
    }),
};
