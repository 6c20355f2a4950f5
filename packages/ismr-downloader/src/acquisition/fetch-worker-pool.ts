/**
 * Fetch Worker Pool
 *
 * Runs chunks concurrently, at most `maxWorkers` in flight. Each worker takes
 * one chunk end-to-end before pulling the next:
 *
 *   skip-existing check → [rate limit → token → fetch → write → decide]*
 *
 * HALTING:
 * - A halt (maintenance, repeated 401, authentication failure) stops dispatch
 * - Chunks already dispatched run to their own terminal outcome
 * - Chunks never dispatched are reported as not-attempted
 *
 * Every chunk produces exactly one outcome and onOutcome fires once for it.
 */

import type { Clock } from '../core/clock.js';
import { systemClock } from '../core/clock.js';
import {
  ArtifactWriteError,
  AuthError,
  UnexpectedResponseError,
  errorMessage,
} from '../core/errors.js';
import {
  HTTPError,
  HTTPJSONParseError,
  HTTPNetworkError,
  HTTPTimeoutError,
} from '../core/http-client.js';
import { formatInstant } from '../core/time-range.js';
import type {
  Chunk,
  FailureCause,
  FetchOutcome,
  RunHalt,
  SuccessOutcome,
  Token,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { TokenStore } from '../auth/token-store.js';
import type { SlidingWindowRateLimiter } from '../resilience/rate-limiter.js';
import type { ChunkRetryState, ObservedOutcome, RetryPolicy } from '../resilience/retry-policy.js';
import type { ArtifactWriter } from './artifact-writer.js';
import type { ChunkResponse, DataApi } from './ismr-api-client.js';

const log = createLogger({ module: 'worker-pool' });

// ============================================================================
// Types
// ============================================================================

export interface FetchWorkerPoolConfig {
  readonly maxWorkers: number;

  /** Re-download chunks whose artifacts already exist */
  readonly overwrite: boolean;

  readonly api: DataApi;
  readonly writer: ArtifactWriter;
  readonly tokenStore: TokenStore;
  readonly rateLimiter: Pick<SlidingWindowRateLimiter, 'acquire'>;
  readonly retryPolicy: RetryPolicy;
  readonly clock?: Clock;

  /**
   * Force a fresh token after this many consecutive transport failures
   * across all workers (default: 3, 0 disables)
   */
  readonly reauthAfterConsecutiveErrors?: number;
}

export interface PoolHooks {
  /** Called once per chunk, as soon as its outcome is final */
  readonly onOutcome?: (outcome: FetchOutcome) => void | Promise<void>;
}

export interface PoolResult {
  readonly outcomes: readonly FetchOutcome[];
  readonly halt: RunHalt | null;
}

/**
 * Result of one attempt: what was observed plus the artifacts it produced
 */
interface AttemptResult {
  readonly observed: ObservedOutcome;
  readonly filePaths?: readonly string[];
  readonly bytes?: number;
}

/**
 * Mutable state of one run() call, shared by its workers
 */
interface RunState {
  next: number;
  halt: RunHalt | null;
  consecutiveErrors: number;
  readonly outcomes: FetchOutcome[];
}

// ============================================================================
// Pool
// ============================================================================

export class FetchWorkerPool {
  private readonly config: FetchWorkerPoolConfig;
  private readonly clock: Clock;
  private readonly reauthThreshold: number;

  constructor(config: FetchWorkerPoolConfig) {
    if (!Number.isInteger(config.maxWorkers) || config.maxWorkers <= 0) {
      throw new RangeError(`maxWorkers must be a positive integer, got ${config.maxWorkers}`);
    }

    this.config = config;
    this.clock = config.clock ?? systemClock;
    this.reauthThreshold = config.reauthAfterConsecutiveErrors ?? 3;
  }

  /**
   * Process every chunk; resolves once all dispatched chunks have finished
   */
  async run(chunks: readonly Chunk[], hooks: PoolHooks = {}): Promise<PoolResult> {
    const state: RunState = { next: 0, halt: null, consecutiveErrors: 0, outcomes: [] };

    const emit = async (outcome: FetchOutcome): Promise<void> => {
      state.outcomes.push(outcome);
      if (!hooks.onOutcome) return;

      try {
        await hooks.onOutcome(outcome);
      } catch (error) {
        // Hook failures are logged; the worker carries on
        log.error('Outcome hook failed', {
          station: outcome.chunk.station,
          sequenceIndex: outcome.chunk.sequenceIndex,
          error: errorMessage(error),
        });
      }
    };

    const worker = async (): Promise<void> => {
      while (!state.halt && state.next < chunks.length) {
        const chunk = chunks[state.next++];
        await emit(await this.processChunk(chunk, state));
      }
    };

    const workerCount = Math.min(this.config.maxWorkers, chunks.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    for (const chunk of chunks.slice(state.next)) {
      await emit({ kind: 'not-attempted', chunk });
    }

    return { outcomes: state.outcomes, halt: state.halt };
  }

  // ==========================================================================
  // Per-chunk Execution
  // ==========================================================================

  private async processChunk(chunk: Chunk, state: RunState): Promise<FetchOutcome> {
    const chunkLog = log.with({
      station: chunk.station,
      sequenceIndex: chunk.sequenceIndex,
      rangeStart: formatInstant(chunk.rangeStart),
    });

    if (!this.config.overwrite) {
      try {
        const existing = await this.config.writer.findExisting(chunk);
        if (existing) {
          chunkLog.debug('Artifact exists, skipping', { path: existing });
          return { kind: 'success', chunk, filePaths: [], bytes: 0, skipped: true, attempts: 0 };
        }
      } catch (error) {
        return {
          kind: 'fatal-failure',
          chunk,
          cause: {
            kind: 'write',
            message: `Cannot inspect output directory: ${errorMessage(error)}`,
          },
          attempts: 0,
        };
      }
    }

    const policy = this.config.retryPolicy;
    const tracker = policy.begin();

    for (;;) {
      policy.markInFlight(tracker);
      await this.config.rateLimiter.acquire();

      let token: Token;
      try {
        token = await this.config.tokenStore.getValidToken();
      } catch (error) {
        return this.authFailure(chunk, tracker, state, error);
      }

      const result = await this.attempt(chunk, token.value);
      this.trackTransportHealth(result.observed, state);

      const decision = policy.decide(tracker, result.observed);

      switch (decision.action) {
        case 'complete':
          return this.success(chunk, tracker, result);

        case 'record-no-data':
          chunkLog.info('No data for interval');
          return { kind: 'no-data', chunk, attempts: tracker.attempts };

        case 'refresh-token-and-retry':
          try {
            await this.config.tokenStore.refreshAfterRejection(token.value);
          } catch (error) {
            return this.authFailure(chunk, tracker, state, error);
          }
          continue;

        case 'retry':
          chunkLog.warn('Retrying chunk', {
            observed: result.observed.type,
            attempt: tracker.attempts,
            delayMs: decision.delayMs,
          });
          await this.clock.sleep(decision.delayMs);
          continue;

        case 'halt-run':
          this.requestHalt(state, { reason: decision.reason, message: decision.cause.message });
          return { kind: 'fatal-failure', chunk, cause: decision.cause, attempts: tracker.attempts };

        case 'fail-chunk':
          chunkLog.error('Chunk failed', { ...decision.cause, attempts: tracker.attempts });
          return {
            kind: decision.transient ? 'transient-failure' : 'fatal-failure',
            chunk,
            cause: decision.cause,
            attempts: tracker.attempts,
          };
      }
    }
  }

  /**
   * One exchange with the data endpoint plus the artifact downloads it names
   */
  private async attempt(chunk: Chunk, token: string): Promise<AttemptResult> {
    let response: ChunkResponse;
    try {
      response = await this.config.api.fetchChunk(chunk, token);
    } catch (error) {
      return { observed: observeFailure(error, 'request') };
    }

    if (response.kind === 'no-data') {
      return { observed: { type: 'empty' } };
    }

    const staging = this.config.writer.stage(chunk, response.artifacts.length);
    let bytes = 0;
    let phase: 'artifact' | 'body' = 'body';
    let timedOut = false;

    try {
      for (const artifact of response.artifacts) {
        phase = artifact.remote ? 'artifact' : 'body';
        if (artifact.remote) {
          await this.config.rateLimiter.acquire();
        }

        const stream = await artifact.open();
        phase = 'body';
        try {
          bytes += await staging.write(artifact.filename, stream.body);
        } catch (error) {
          timedOut = stream.timedOut();
          throw error;
        } finally {
          stream.close();
        }
      }

      const filePaths = await staging.commit();
      return { observed: { type: 'ok' }, filePaths, bytes };
    } catch (error) {
      await staging.abort().catch((abortError: unknown) => {
        log.warn('Failed to discard partial artifacts', { error: errorMessage(abortError) });
      });
      return {
        observed: timedOut
          ? { type: 'timeout', message: `Artifact download timed out: ${errorMessage(error)}` }
          : observeFailure(error, phase),
      };
    }
  }

  private success(chunk: Chunk, tracker: ChunkRetryState, result: AttemptResult): SuccessOutcome {
    return {
      kind: 'success',
      chunk,
      filePaths: result.filePaths ?? [],
      bytes: result.bytes ?? 0,
      skipped: false,
      attempts: tracker.attempts,
    };
  }

  private authFailure(
    chunk: Chunk,
    tracker: ChunkRetryState,
    state: RunState,
    error: unknown
  ): FetchOutcome {
    const cause: FailureCause = {
      kind: 'auth',
      message: errorMessage(error),
      ...(error instanceof AuthError && error.status !== undefined ? { status: error.status } : {}),
    };
    this.requestHalt(state, { reason: 'auth', message: cause.message });
    return { kind: 'fatal-failure', chunk, cause, attempts: tracker.attempts };
  }

  private requestHalt(state: RunState, halt: RunHalt): void {
    if (state.halt) return;

    state.halt = halt;
    log.warn('Run halting, no further chunks will be dispatched', {
      reason: halt.reason,
      message: halt.message,
    });
  }

  /**
   * Consecutive timeouts, network errors and 5xx across all workers suggest a
   * stale session; force the next token read to re-authenticate
   */
  private trackTransportHealth(observed: ObservedOutcome, state: RunState): void {
    if (observed.type === 'ok' || observed.type === 'empty') {
      state.consecutiveErrors = 0;
      return;
    }

    const transportFailure =
      observed.type === 'timeout' ||
      observed.type === 'network' ||
      (observed.type === 'status' && observed.status >= 500);

    if (!transportFailure || this.reauthThreshold <= 0) return;

    state.consecutiveErrors++;
    if (state.consecutiveErrors >= this.reauthThreshold) {
      log.warn('Consecutive transport failures, forcing re-authentication', {
        failures: state.consecutiveErrors,
      });
      this.config.tokenStore.forceReauth();
      state.consecutiveErrors = 0;
    }
  }
}

// ============================================================================
// Error Classification
// ============================================================================

/**
 * Map a thrown error to what the attempt observed
 *
 * - request: the data endpoint call
 * - artifact: opening a temporary URL (refusals there are not retryable)
 * - body: reading an artifact body (unknown errors are transport failures)
 */
export function observeFailure(
  error: unknown,
  phase: 'request' | 'artifact' | 'body'
): ObservedOutcome {
  const message = errorMessage(error);

  if (error instanceof HTTPError) {
    if (phase === 'artifact' && [401, 403, 404].includes(error.statusCode)) {
      return { type: 'rejected', status: error.statusCode, message };
    }
    return { type: 'status', status: error.statusCode, message, retryAfterMs: error.retryAfterMs };
  }
  if (error instanceof HTTPTimeoutError) {
    return { type: 'timeout', message };
  }
  if (error instanceof HTTPNetworkError) {
    return { type: 'network', message };
  }
  if (error instanceof ArtifactWriteError) {
    return { type: 'write-failed', message };
  }
  if (error instanceof HTTPJSONParseError || error instanceof UnexpectedResponseError) {
    return { type: 'malformed', message };
  }

  return phase === 'body' ? { type: 'network', message } : { type: 'malformed', message };
}
