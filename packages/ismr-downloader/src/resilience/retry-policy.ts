/**
 * Retry Policy (per-chunk state machine)
 *
 * Maps the observed outcome of one attempt to the next action for that chunk.
 * Classification and handling are two tables:
 *
 *   observed outcome --classify--> transition --TRANSITIONS--> decision
 *
 * | Observed                  | Transition       | Decision                                  |
 * |---------------------------|------------------|-------------------------------------------|
 * | 2xx with artifacts        | success          | complete                                  |
 * | 401                       | token-expired    | refresh + retry once, then halt run       |
 * | 404 / empty-result marker | no-data-recorded | record no-data                            |
 * | 429                       | throttled        | exponential backoff + jitter, bounded     |
 * | 503                       | maintenance      | halt run                                  |
 * | timeout / network error   | timed-out        | fixed delay, bounded                      |
 * | other status, bad body,   | fatal-abort      | fail chunk                                |
 * | refused temp URL, disk    |                  |                                           |
 *
 * New status codes are added through `statusTransitions`, not new branches.
 *
 * BASED ON:
 * - Exponential backoff with jitter from the resilience retry executor
 * - "Exponential Backoff And Jitter" (AWS Architecture Blog)
 */

import type { FailureCause, FailureKind } from '../core/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * What one attempt observed
 */
export type ObservedOutcome =
  | { readonly type: 'ok' }
  | { readonly type: 'empty' }
  | {
      readonly type: 'status';
      readonly status: number;
      readonly message: string;
      readonly retryAfterMs?: number;
    }
  | { readonly type: 'timeout'; readonly message: string }
  | { readonly type: 'network'; readonly message: string }
  | { readonly type: 'malformed'; readonly message: string }
  /** Non-retryable status regardless of the status table (temporary URL refused) */
  | { readonly type: 'rejected'; readonly status: number; readonly message: string }
  | { readonly type: 'write-failed'; readonly message: string };

/**
 * Chunk attempt states
 */
export type AttemptState =
  | 'pending'
  | 'in-flight'
  | 'retryable'
  | 'success'
  | 'token-expired'
  | 'no-data-recorded'
  | 'throttled'
  | 'maintenance'
  | 'timed-out'
  | 'fatal-abort';

/**
 * States reachable directly from an observation
 */
export type Transition = Exclude<AttemptState, 'pending' | 'in-flight' | 'retryable'>;

export type RetryDecision =
  | { readonly action: 'complete' }
  | { readonly action: 'record-no-data' }
  | { readonly action: 'refresh-token-and-retry' }
  | { readonly action: 'retry'; readonly delayMs: number }
  | {
      readonly action: 'halt-run';
      readonly reason: 'maintenance' | 'unauthorized';
      readonly cause: FailureCause;
    }
  | { readonly action: 'fail-chunk'; readonly transient: boolean; readonly cause: FailureCause };

export interface ThrottleBackoffConfig {
  /** Retries allowed after throttled responses (total attempts <= maxRetries + 1) */
  readonly maxRetries: number;
  readonly initialDelayMs: number;
  readonly backoffMultiplier: number;
  readonly maxDelayMs: number;

  /** Jitter range: [delay * (1 - f), delay * (1 + f)] */
  readonly jitterFactor: number;
}

export interface TimeoutRetryConfig {
  /** Retries allowed after timeouts or network errors */
  readonly maxRetries: number;
  readonly delayMs: number;
}

export interface RetryPolicyConfig {
  readonly throttled: ThrottleBackoffConfig;
  readonly timedOut: TimeoutRetryConfig;

  /** Token refreshes allowed before a consecutive 401 halts the run */
  readonly maxTokenRefreshes: number;
}

export interface RetryPolicyOptions {
  /** Extra or overriding status → transition mappings */
  readonly statusTransitions?: ReadonlyMap<number, Transition>;

  /** Random source in [0, 1) for jitter */
  readonly random?: () => number;
}

/**
 * Mutable per-chunk retry bookkeeping, owned by the worker running the chunk
 */
export interface ChunkRetryState {
  state: AttemptState;
  attempts: number;
  throttledRetries: number;
  timeoutRetries: number;
  consecutiveUnauthorized: number;
  lastDelayMs: number | null;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_RETRY_POLICY: RetryPolicyConfig = {
  throttled: {
    maxRetries: 5,
    initialDelayMs: 2000,
    backoffMultiplier: 2,
    maxDelayMs: 60000,
    jitterFactor: 0.1,
  },
  timedOut: {
    maxRetries: 3,
    delayMs: 5000,
  },
  maxTokenRefreshes: 1,
};

export const DEFAULT_STATUS_TRANSITIONS: ReadonlyMap<number, Transition> = new Map<number, Transition>([
  [401, 'token-expired'],
  [404, 'no-data-recorded'],
  [429, 'throttled'],
  [503, 'maintenance'],
]);

// ============================================================================
// Transition Table
// ============================================================================

interface TransitionContext {
  readonly tracker: ChunkRetryState;
  readonly observed: ObservedOutcome;
  readonly policy: RetryPolicy;
}

type TransitionHandler = (ctx: TransitionContext) => RetryDecision;

const FATAL_KINDS: Partial<Record<ObservedOutcome['type'], FailureKind>> = {
  malformed: 'protocol',
  'write-failed': 'write',
};

const TRANSITIONS: Record<Transition, TransitionHandler> = {
  success: () => ({ action: 'complete' }),

  'no-data-recorded': () => ({ action: 'record-no-data' }),

  'token-expired': ({ tracker, observed, policy }) => {
    tracker.consecutiveUnauthorized++;

    if (tracker.consecutiveUnauthorized > policy.config.maxTokenRefreshes) {
      return {
        action: 'halt-run',
        reason: 'unauthorized',
        cause: causeOf(observed, 'unauthorized'),
      };
    }

    return { action: 'refresh-token-and-retry' };
  },

  throttled: ({ tracker, observed, policy }) => {
    const { maxRetries } = policy.config.throttled;

    if (tracker.throttledRetries >= maxRetries) {
      return { action: 'fail-chunk', transient: true, cause: causeOf(observed, 'throttled') };
    }

    tracker.throttledRetries++;
    const retryAfterMs = observed.type === 'status' ? observed.retryAfterMs : undefined;

    return { action: 'retry', delayMs: policy.backoffDelay(tracker.throttledRetries, retryAfterMs) };
  },

  maintenance: ({ observed }) => ({
    action: 'halt-run',
    reason: 'maintenance',
    cause: causeOf(observed, 'maintenance'),
  }),

  'timed-out': ({ tracker, observed, policy }) => {
    const kind: FailureKind = observed.type === 'network' ? 'network' : 'timeout';

    if (tracker.timeoutRetries >= policy.config.timedOut.maxRetries) {
      return { action: 'fail-chunk', transient: true, cause: causeOf(observed, kind) };
    }

    tracker.timeoutRetries++;
    return { action: 'retry', delayMs: policy.config.timedOut.delayMs };
  },

  'fatal-abort': ({ observed }) => ({
    action: 'fail-chunk',
    transient: false,
    cause: causeOf(observed, FATAL_KINDS[observed.type] ?? 'http'),
  }),
};

// ============================================================================
// Policy
// ============================================================================

export class RetryPolicy {
  readonly config: RetryPolicyConfig;
  private readonly statusTransitions: ReadonlyMap<number, Transition>;
  private readonly random: () => number;

  constructor(config: Partial<RetryPolicyConfig> = {}, options: RetryPolicyOptions = {}) {
    this.config = {
      ...DEFAULT_RETRY_POLICY,
      ...config,
      throttled: { ...DEFAULT_RETRY_POLICY.throttled, ...config.throttled },
      timedOut: { ...DEFAULT_RETRY_POLICY.timedOut, ...config.timedOut },
    };
    this.statusTransitions = new Map([
      ...DEFAULT_STATUS_TRANSITIONS,
      ...(options.statusTransitions ?? []),
    ]);
    this.random = options.random ?? Math.random;
  }

  /**
   * Fresh bookkeeping for a chunk about to be attempted
   */
  begin(): ChunkRetryState {
    return {
      state: 'pending',
      attempts: 0,
      throttledRetries: 0,
      timeoutRetries: 0,
      consecutiveUnauthorized: 0,
      lastDelayMs: null,
    };
  }

  /**
   * Mark the start of an attempt
   */
  markInFlight(tracker: ChunkRetryState): void {
    tracker.state = 'in-flight';
    tracker.attempts++;
  }

  /**
   * Map an observation to its transition
   */
  classify(observed: ObservedOutcome): Transition {
    switch (observed.type) {
      case 'ok':
        return 'success';
      case 'empty':
        return 'no-data-recorded';
      case 'timeout':
      case 'network':
        return 'timed-out';
      case 'malformed':
      case 'rejected':
      case 'write-failed':
        return 'fatal-abort';
      case 'status':
        if (observed.status >= 200 && observed.status < 300) {
          return 'success';
        }
        return this.statusTransitions.get(observed.status) ?? 'fatal-abort';
    }
  }

  /**
   * Apply an observation to a chunk's state and return the next action
   */
  decide(tracker: ChunkRetryState, observed: ObservedOutcome): RetryDecision {
    const transition = this.classify(observed);

    if (transition !== 'token-expired') {
      tracker.consecutiveUnauthorized = 0;
    }

    const decision = TRANSITIONS[transition]({ tracker, observed, policy: this });

    tracker.state = decision.action === 'retry' || decision.action === 'refresh-token-and-retry'
      ? 'retryable'
      : transition;
    tracker.lastDelayMs = decision.action === 'retry' ? decision.delayMs : null;

    return decision;
  }

  /**
   * Exponential backoff delay for the n-th throttled retry (1-based)
   *
   * A larger Retry-After from the server wins, capped at maxDelayMs.
   */
  backoffDelay(retry: number, retryAfterMs?: number): number {
    const { initialDelayMs, backoffMultiplier, maxDelayMs, jitterFactor } = this.config.throttled;

    const exponentialDelay = initialDelayMs * Math.pow(backoffMultiplier, retry - 1);
    const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

    const jitterRange = cappedDelay * jitterFactor;
    const jitter = this.random() * 2 * jitterRange - jitterRange;
    const delay = Math.max(0, Math.floor(cappedDelay + jitter));

    if (retryAfterMs !== undefined && retryAfterMs > delay) {
      return Math.min(retryAfterMs, maxDelayMs);
    }

    return delay;
  }
}

function causeOf(observed: ObservedOutcome, kind: FailureKind): FailureCause {
  switch (observed.type) {
    case 'status':
    case 'rejected':
      return { kind, message: observed.message, status: observed.status };
    case 'timeout':
    case 'network':
    case 'malformed':
    case 'write-failed':
      return { kind, message: observed.message };
    case 'ok':
    case 'empty':
      return { kind, message: `Unexpected ${observed.type} outcome` };
  }
}
