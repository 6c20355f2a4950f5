/**
 * Core Types for the ISMR Downloader
 *
 * Shared data model of the download orchestration engine. Every value here
 * is immutable once built: request specs and chunks are frozen, tokens are
 * handed out as frozen copies, outcomes are produced once per chunk.
 *
 * TYPE SAFETY: Instants are UTC epoch milliseconds everywhere in the core.
 * Formatting to ISO strings happens only at the edges (API params, reports).
 */

// ============================================================================
// Primitives
// ============================================================================

/**
 * UTC epoch milliseconds
 */
export type Instant = number;

/**
 * Data products served by the ISMR Query Tool API
 */
export const DATA_TYPES = ['ismr', 'ismr1min', 'sbf', 'rinex'] as const;

export type DataType = (typeof DATA_TYPES)[number];

/**
 * Half-open time interval [start, end)
 */
export interface TimeRange {
  readonly start: Instant;
  readonly end: Instant;
}

// ============================================================================
// Request Model
// ============================================================================

/**
 * Validated, normalized description of one download run
 *
 * Built by createRequestSpec(); never mutated afterwards.
 */
export interface RequestSpec {
  /** Station identifiers, deduplicated, in request order */
  readonly stations: readonly string[];

  readonly dataType: DataType;

  /** Inclusive start instant */
  readonly start: Instant;

  /** End instant (start < end) */
  readonly end: Instant;

  /** Maximum span of a single API query in days */
  readonly maxDays: number;

  /** Maximum concurrently in-flight chunk attempts */
  readonly maxWorkers: number;

  /** Ceiling of requests leaving the process per rolling minute */
  readonly maxRequestsPerMinute: number;

  /** Re-download chunks whose artifacts already exist */
  readonly overwrite: boolean;

  /** Root directory for downloaded artifacts */
  readonly outputDir: string;
}

/**
 * One bounded sub-interval of the request for one station
 */
export interface Chunk {
  readonly station: string;
  readonly dataType: DataType;
  readonly rangeStart: Instant;
  readonly rangeEnd: Instant;

  /** Position of this chunk within its station's stream (0-based) */
  readonly sequenceIndex: number;
}

// ============================================================================
// Authentication
// ============================================================================

/**
 * Bearer token issued by the authentication exchange
 */
export interface Token {
  readonly value: string;
  readonly issuedAt: Instant;
  readonly expiresAt: Instant;
}

// ============================================================================
// Outcomes
// ============================================================================

/**
 * Failure categories surfaced to reports and summaries
 */
export type FailureKind =
  | 'throttled'
  | 'timeout'
  | 'network'
  | 'http'
  | 'unauthorized'
  | 'auth'
  | 'maintenance'
  | 'protocol'
  | 'write';

/**
 * Cause attached to a failed chunk
 */
export interface FailureCause {
  readonly kind: FailureKind;
  readonly message: string;

  /** HTTP status code, when the failure came from a response */
  readonly status?: number;
}

export interface SuccessOutcome {
  readonly kind: 'success';
  readonly chunk: Chunk;

  /** Written artifact paths (empty when skipped) */
  readonly filePaths: readonly string[];

  /** Total bytes written for this chunk */
  readonly bytes: number;

  /** True when the destination already existed and no request was made */
  readonly skipped: boolean;

  readonly attempts: number;
}

export interface NoDataOutcome {
  readonly kind: 'no-data';
  readonly chunk: Chunk;
  readonly attempts: number;
}

/**
 * Bounded retries exhausted (throttling, timeouts)
 */
export interface TransientFailureOutcome {
  readonly kind: 'transient-failure';
  readonly chunk: Chunk;
  readonly cause: FailureCause;
  readonly attempts: number;
}

/**
 * Non-retryable failure for this chunk
 */
export interface FatalFailureOutcome {
  readonly kind: 'fatal-failure';
  readonly chunk: Chunk;
  readonly cause: FailureCause;
  readonly attempts: number;
}

/**
 * Chunk never dispatched because the run halted first
 */
export interface NotAttemptedOutcome {
  readonly kind: 'not-attempted';
  readonly chunk: Chunk;
}

/**
 * Tagged result of processing one chunk
 */
export type FetchOutcome =
  | SuccessOutcome
  | NoDataOutcome
  | TransientFailureOutcome
  | FatalFailureOutcome
  | NotAttemptedOutcome;

export type FailedOutcome = TransientFailureOutcome | FatalFailureOutcome;

/**
 * Why a run stopped dispatching before its chunk list was exhausted
 */
export interface RunHalt {
  readonly reason: 'maintenance' | 'auth' | 'unauthorized';
  readonly message: string;
}

/**
 * Interval the API confirmed as having no data
 */
export interface NoDataInterval {
  readonly station: string;
  readonly dataType: DataType;
  readonly rangeStart: Instant;
  readonly rangeEnd: Instant;
}

/**
 * Failed chunk with enough detail to re-run just that interval
 */
export interface ChunkFailure {
  readonly chunk: Chunk;
  readonly cause: FailureCause;
  readonly transient: boolean;
}

/**
 * Aggregated result of one run
 *
 * Invariant: downloaded + skippedExisting + noData + failed + notAttempted
 * equals totalChunks.
 */
export interface RunSummary {
  readonly startedAt: Instant;
  readonly finishedAt: Instant;
  readonly totalChunks: number;

  /** Chunks that produced at least one new artifact */
  readonly downloaded: number;
  readonly filesDownloaded: number;
  readonly bytesDownloaded: number;
  readonly skippedExisting: number;
  readonly noData: number;
  readonly failed: number;
  readonly notAttempted: number;

  readonly noDataIntervals: readonly NoDataInterval[];
  readonly failures: readonly ChunkFailure[];
  readonly notAttemptedChunks: readonly Chunk[];
  readonly files: readonly string[];

  /** Set when the run halted early */
  readonly halt: RunHalt | null;
}

// ============================================================================
// Type Guards
// ============================================================================

export function isDataType(value: string): value is DataType {
  return (DATA_TYPES as readonly string[]).includes(value);
}

export function isFailedOutcome(outcome: FetchOutcome): outcome is FailedOutcome {
  return outcome.kind === 'transient-failure' || outcome.kind === 'fatal-failure';
}
