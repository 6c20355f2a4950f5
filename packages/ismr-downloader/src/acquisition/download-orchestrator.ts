/**
 * Download Orchestrator
 *
 * Top-level coordinator of a run:
 * 1. Chunk the requested range for every station (same boundaries)
 * 2. Feed all chunks into one worker pool, so every station shares the
 *    rate limiter and the token store
 * 3. Report each outcome as it arrives
 * 4. Aggregate outcomes into a RunSummary, complete or halted
 *
 * Aggregation does not depend on arrival order: counts are sums and the
 * interval lists are sorted before they are returned.
 */

import type { Clock } from '../core/clock.js';
import { systemClock } from '../core/clock.js';
import { buildChunks, formatInstant } from '../core/time-range.js';
import type {
  Chunk,
  ChunkFailure,
  FetchOutcome,
  Instant,
  NoDataInterval,
  RequestSpec,
  RunHalt,
  RunSummary,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { TokenStore } from '../auth/token-store.js';
import { createRateLimiter, type SlidingWindowRateLimiter } from '../resilience/rate-limiter.js';
import { RetryPolicy } from '../resilience/retry-policy.js';
import { dispatchOutcome, type ReportSink } from '../reporting/report-sink.js';
import type { ArtifactWriter } from './artifact-writer.js';
import { FetchWorkerPool } from './fetch-worker-pool.js';
import type { DataApi } from './ismr-api-client.js';

const log = createLogger({ module: 'orchestrator' });

export interface DownloadOrchestratorConfig {
  readonly api: DataApi;
  readonly tokenStore: TokenStore;

  /** Builds the writer for a spec's output directory */
  readonly createWriter: (outputDir: string) => ArtifactWriter;

  /** Defaults to a per-minute limiter built from `RequestSpec.maxRequestsPerMinute` */
  readonly rateLimiter?: Pick<SlidingWindowRateLimiter, 'acquire'>;
  readonly retryPolicy?: RetryPolicy;
  readonly sink?: ReportSink;
  readonly clock?: Clock;
  readonly reauthAfterConsecutiveErrors?: number;
}

export class DownloadOrchestrator {
  private readonly config: DownloadOrchestratorConfig;
  private readonly clock: Clock;

  constructor(config: DownloadOrchestratorConfig) {
    this.config = config;
    this.clock = config.clock ?? systemClock;
  }

  /**
   * Execute a download run
   *
   * @throws {InvalidRangeError} Before any chunk is created, for a bad range
   */
  async run(spec: RequestSpec): Promise<RunSummary> {
    const chunks = buildChunks(spec);
    const startedAt = this.clock.now();
    const sink = this.config.sink;

    log.info('Starting download run', {
      stations: spec.stations,
      dataType: spec.dataType,
      start: formatInstant(spec.start),
      end: formatInstant(spec.end),
      chunks: chunks.length,
      maxWorkers: spec.maxWorkers,
      maxRequestsPerMinute: spec.maxRequestsPerMinute,
    });

    await sink?.runStarted(spec, chunks.length);

    const pool = new FetchWorkerPool({
      maxWorkers: spec.maxWorkers,
      overwrite: spec.overwrite,
      api: this.config.api,
      writer: this.config.createWriter(spec.outputDir),
      tokenStore: this.config.tokenStore,
      rateLimiter:
        this.config.rateLimiter ?? createRateLimiter(spec.maxRequestsPerMinute, this.clock),
      retryPolicy: this.config.retryPolicy ?? new RetryPolicy(),
      clock: this.clock,
      reauthAfterConsecutiveErrors: this.config.reauthAfterConsecutiveErrors,
    });

    const result = await pool.run(chunks, {
      onOutcome: sink ? (outcome) => dispatchOutcome(sink, outcome) : undefined,
    });

    const summary = summarizeOutcomes(result.outcomes, {
      startedAt,
      finishedAt: this.clock.now(),
      totalChunks: chunks.length,
      halt: result.halt,
    });

    log.info('Download run finished', {
      downloaded: summary.downloaded,
      skippedExisting: summary.skippedExisting,
      noData: summary.noData,
      failed: summary.failed,
      notAttempted: summary.notAttempted,
      halt: summary.halt?.reason ?? null,
    });

    await sink?.runFinished(summary);
    return summary;
  }
}

// ============================================================================
// Aggregation
// ============================================================================

interface SummaryContext {
  readonly startedAt: Instant;
  readonly finishedAt: Instant;
  readonly totalChunks: number;
  readonly halt: RunHalt | null;
}

/**
 * Fold chunk outcomes into a RunSummary
 */
export function summarizeOutcomes(
  outcomes: readonly FetchOutcome[],
  context: SummaryContext
): RunSummary {
  let downloaded = 0;
  let skippedExisting = 0;
  let bytesDownloaded = 0;
  const files: string[] = [];
  const noDataIntervals: NoDataInterval[] = [];
  const failures: ChunkFailure[] = [];
  const notAttemptedChunks: Chunk[] = [];

  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case 'success':
        if (outcome.skipped) {
          skippedExisting++;
        } else {
          downloaded++;
          bytesDownloaded += outcome.bytes;
          files.push(...outcome.filePaths);
        }
        break;
      case 'no-data': {
        const { station, dataType, rangeStart, rangeEnd } = outcome.chunk;
        noDataIntervals.push({ station, dataType, rangeStart, rangeEnd });
        break;
      }
      case 'transient-failure':
      case 'fatal-failure':
        failures.push({
          chunk: outcome.chunk,
          cause: outcome.cause,
          transient: outcome.kind === 'transient-failure',
        });
        break;
      case 'not-attempted':
        notAttemptedChunks.push(outcome.chunk);
        break;
    }
  }

  noDataIntervals.sort(compareIntervals);
  failures.sort((a, b) => compareIntervals(a.chunk, b.chunk));
  notAttemptedChunks.sort(compareIntervals);
  files.sort();

  return {
    startedAt: context.startedAt,
    finishedAt: context.finishedAt,
    totalChunks: context.totalChunks,
    downloaded,
    filesDownloaded: files.length,
    bytesDownloaded,
    skippedExisting,
    noData: noDataIntervals.length,
    failed: failures.length,
    notAttempted: notAttemptedChunks.length,
    noDataIntervals,
    failures,
    notAttemptedChunks,
    files,
    halt: context.halt,
  };
}

function compareIntervals(
  a: { readonly station: string; readonly rangeStart: Instant },
  b: { readonly station: string; readonly rangeStart: Instant }
): number {
  if (a.station !== b.station) {
    return a.station < b.station ? -1 : 1;
  }
  return a.rangeStart - b.rangeStart;
}
