/**
 * Token Store (single-flight bearer token lifecycle)
 *
 * Owns the current bearer token and its cache file. Any number of workers may
 * call getValidToken() concurrently; at most one authentication exchange is
 * in flight at a time and every caller that arrives during it receives that
 * exchange's result.
 *
 * LIFECYCLE:
 * - Loaded lazily from the cache on first use
 * - Refreshed when expired, when forced, or after a 401 on the current value
 * - Persisted to the cache before any caller sees a refreshed token
 * - Destroyed only by clear()
 */

import type { Clock } from '../core/clock.js';
import { systemClock } from '../core/clock.js';
import { AuthError, errorMessage } from '../core/errors.js';
import { formatInstant } from '../core/time-range.js';
import type { Instant, Token } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { TokenCache } from './token-cache.js';

const log = createLogger({ module: 'token-store' });

/** Assumed lifetime when the server omits an expiry */
export const DEFAULT_TOKEN_TTL_MS = 3 * 60 * 60 * 1000;

/**
 * Result of one credential exchange
 */
export interface AuthGrant {
  readonly value: string;

  /** Absent when the server does not report an expiry */
  readonly expiresAt?: Instant;
}

/**
 * Performs the email/password → bearer token exchange
 */
export interface Authenticator {
  authenticate(): Promise<AuthGrant>;
}

export interface TokenStoreConfig {
  readonly authenticator: Authenticator;
  readonly cache: TokenCache;
  readonly clock?: Clock;

  /** Lifetime assumed when the grant carries no expiry */
  readonly defaultTtlMs?: number;

  /** Treat tokens as expired this long before their real expiry */
  readonly expirySkewMs?: number;
}

export interface TokenStoreStats {
  readonly exchanges: number;
  readonly refreshInFlight: boolean;
  readonly expiresAt: Instant | null;
}

export class TokenStore {
  private readonly authenticator: Authenticator;
  private readonly cache: TokenCache;
  private readonly clock: Clock;
  private readonly defaultTtlMs: number;
  private readonly expirySkewMs: number;

  private token: Token | null = null;
  private cacheLoad: Promise<void> | null = null;
  private inflight: Promise<Token> | null = null;
  private forceNext = false;
  private exchanges = 0;

  constructor(config: TokenStoreConfig) {
    this.authenticator = config.authenticator;
    this.cache = config.cache;
    this.clock = config.clock ?? systemClock;
    this.defaultTtlMs = config.defaultTtlMs ?? DEFAULT_TOKEN_TTL_MS;
    this.expirySkewMs = config.expirySkewMs ?? 0;
  }

  /**
   * Return a token valid right now, authenticating at most once for all
   * concurrent callers
   *
   * @throws {AuthError} If the exchange fails
   */
  async getValidToken(): Promise<Token> {
    if (this.inflight) {
      return this.inflight;
    }

    if (!this.forceNext) {
      await this.ensureCacheLoaded();

      // Another caller may have started a refresh while we awaited the cache
      if (this.inflight) {
        return this.inflight;
      }

      if (this.token && this.isValid(this.token)) {
        return this.token;
      }
    }

    return this.startRefresh();
  }

  /**
   * Handle a 401 for the given token value
   *
   * If the current token is already a different, valid one (another worker
   * refreshed first) it is returned without a new exchange.
   */
  async refreshAfterRejection(rejectedValue: string): Promise<Token> {
    if (this.inflight) {
      return this.inflight;
    }

    if (this.token && this.token.value !== rejectedValue && this.isValid(this.token)) {
      return this.token;
    }

    log.warn('Token rejected by API, renewing');
    return this.startRefresh();
  }

  /**
   * Make the next getValidToken() bypass the cached token once
   */
  forceReauth(): void {
    this.forceNext = true;
  }

  /**
   * Destroy the cached token (memory and file)
   */
  async clear(): Promise<void> {
    await this.cache.clear();
    this.token = null;
    this.cacheLoad = Promise.resolve();
    log.info('Token cache cleared');
  }

  getStats(): TokenStoreStats {
    return {
      exchanges: this.exchanges,
      refreshInFlight: this.inflight !== null,
      expiresAt: this.token?.expiresAt ?? null,
    };
  }

  private isValid(token: Token): boolean {
    return this.clock.now() < token.expiresAt - this.expirySkewMs;
  }

  private ensureCacheLoaded(): Promise<void> {
    if (!this.cacheLoad) {
      this.cacheLoad = this.cache.load().then((cached) => {
        if (!cached) return;

        if (this.isValid(cached)) {
          // Never replace a token refreshed while the cache was being read
          this.token ??= cached;
          log.info('Using cached token', { expiresAt: formatInstant(cached.expiresAt) });
        } else {
          log.warn('Cached token expired', { expiresAt: formatInstant(cached.expiresAt) });
        }
      });
    }
    return this.cacheLoad;
  }

  private startRefresh(): Promise<Token> {
    this.forceNext = false;

    const flight: Promise<Token> = this.refresh().finally(() => {
      if (this.inflight === flight) {
        this.inflight = null;
      }
    });

    this.inflight = flight;
    return flight;
  }

  private async refresh(): Promise<Token> {
    // Invalidate the old value up front; callers now wait on the flight
    this.token = null;
    this.exchanges++;

    log.info('Requesting new token from API');

    let grant: AuthGrant;
    try {
      grant = await this.authenticator.authenticate();
    } catch (error) {
      if (error instanceof AuthError) {
        throw error;
      }
      throw new AuthError(`Authentication failed: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }

    const issuedAt = this.clock.now();
    const token: Token = Object.freeze({
      value: grant.value,
      issuedAt,
      expiresAt: grant.expiresAt ?? issuedAt + this.defaultTtlMs,
    });

    try {
      await this.cache.save(token);
    } catch (error) {
      // The token is still usable for this run; only the next run loses it
      log.error('Failed to persist token cache', { error: errorMessage(error) });
    }

    this.token = token;
    log.info('New token acquired', { expiresAt: formatInstant(token.expiresAt) });

    return token;
  }
}
