/**
 * ISMR Downloader - bulk retrieval from the ISMR query tool API
 *
 * ismr-downloader provides:
 * - Time-range chunking per station
 * - Shared token lifecycle with single-flight refresh
 * - A per-minute sliding-window rate limit across all workers
 * - A retry state machine for throttling, timeouts, expiry and maintenance
 * - Atomic artifact writes and per-run reports
 *
 * @packageDocumentation
 */

// Core model
export {
    DATA_TYPES,
    isDataType,
    isFailedOutcome,
    type Instant,
    type DataType,
    type TimeRange,
    type RequestSpec,
    type Chunk,
    type Token,
    type FailureKind,
    type FailureCause,
    type SuccessOutcome,
    type NoDataOutcome,
    type TransientFailureOutcome,
    type FatalFailureOutcome,
    type NotAttemptedOutcome,
    type FetchOutcome,
    type FailedOutcome,
    type RunHalt,
    type NoDataInterval,
    type ChunkFailure,
    type RunSummary,
} from './core/types.js';

export {
    IsmrDownloaderError,
    InvalidRangeError,
    AuthError,
    ConfigError,
    UnexpectedResponseError,
    ArtifactWriteError,
    type ErrorCode,
} from './core/errors.js';

export {
    MS_PER_DAY,
    splitTimeRange,
    buildChunks,
    normalizeInstant,
    formatInstant,
    formatApiTimestamp,
    formatCompactTimestamp,
} from './core/time-range.js';

export { createRequestSpec, type RequestSpecInput } from './core/request-spec.js';
export { systemClock, type Clock } from './core/clock.js';
export {
    HTTPClient,
    HTTPError,
    HTTPTimeoutError,
    HTTPNetworkError,
    HTTPJSONParseError,
    type HTTPClientConfig,
    type HTTPStream,
} from './core/http-client.js';

// Authentication
export {
    TokenStore,
    DEFAULT_TOKEN_TTL_MS,
    type Authenticator,
    type AuthGrant,
    type TokenStoreConfig,
} from './auth/token-store.js';
export { FileTokenCache, MemoryTokenCache, type TokenCache } from './auth/token-cache.js';

// Resilience
export {
    SlidingWindowRateLimiter,
    createRateLimiter,
    type RateLimiterConfig,
} from './resilience/rate-limiter.js';
export {
    RetryPolicy,
    DEFAULT_RETRY_POLICY,
    DEFAULT_STATUS_TRANSITIONS,
    type RetryPolicyConfig,
    type RetryDecision,
    type ObservedOutcome,
    type Transition,
} from './resilience/retry-policy.js';

// Acquisition
export {
    IsmrApiClient,
    RESPONSE_MODES,
    type ResponseMode,
    type DataApi,
    type ChunkResponse,
    type RemoteArtifact,
} from './acquisition/ismr-api-client.js';
export {
    FsArtifactWriter,
    MemoryArtifactWriter,
    artifactStem,
    type ArtifactWriter,
    type ArtifactStaging,
} from './acquisition/artifact-writer.js';
export { FetchWorkerPool, type FetchWorkerPoolConfig } from './acquisition/fetch-worker-pool.js';
export {
    DownloadOrchestrator,
    summarizeOutcomes,
    type DownloadOrchestratorConfig,
} from './acquisition/download-orchestrator.js';

// Reporting
export {
    CompositeReportSink,
    MemoryReportSink,
    dispatchOutcome,
    type ReportSink,
} from './reporting/report-sink.js';
export { FileReportSink, type ReportPaths } from './reporting/file-report-sink.js';
export { ConsoleReportSink } from './reporting/console-report-sink.js';
