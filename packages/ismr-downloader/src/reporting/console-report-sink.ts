/**
 * Console Report Sink
 *
 * Logs run events through the CLI logger and keeps a progress bar of
 * finished chunks.
 */

import { formatApiTimestamp } from '../core/time-range.js';
import type {
  Chunk,
  FailedOutcome,
  NoDataOutcome,
  NotAttemptedOutcome,
  RequestSpec,
  RunSummary,
  SuccessOutcome,
} from '../core/types.js';
import type { CLILogger } from '../cli/lib/logger.js';
import { formatBytes, formatDuration } from '../cli/lib/logger.js';
import type { ReportSink } from './report-sink.js';

type SinkLogger = Pick<CLILogger, 'debug' | 'info' | 'warn' | 'error' | 'progress'>;

export class ConsoleReportSink implements ReportSink {
  private total = 0;
  private done = 0;

  constructor(private readonly logger: SinkLogger) {}

  async runStarted(spec: RequestSpec, totalChunks: number): Promise<void> {
    this.total = totalChunks;
    this.done = 0;
    this.logger.info(`Downloading ${totalChunks} chunk(s)`, {
      stations: spec.stations.join(','),
      dataType: spec.dataType,
      start: formatApiTimestamp(spec.start),
      end: formatApiTimestamp(spec.end),
      output: spec.outputDir,
    });
  }

  async chunkDownloaded(outcome: SuccessOutcome): Promise<void> {
    this.logger.info(`Downloaded ${label(outcome.chunk)}`, {
      files: outcome.filePaths.length,
      size: formatBytes(outcome.bytes),
    });
    this.advance(outcome.chunk);
  }

  async chunkSkipped(outcome: SuccessOutcome): Promise<void> {
    this.logger.debug(`Skipped ${label(outcome.chunk)} (already downloaded)`);
    this.advance(outcome.chunk);
  }

  async chunkNoData(outcome: NoDataOutcome): Promise<void> {
    this.logger.info(`No data for ${label(outcome.chunk)}`);
    this.advance(outcome.chunk);
  }

  async chunkFailed(outcome: FailedOutcome): Promise<void> {
    this.logger.error(`Failed ${label(outcome.chunk)}`, {
      kind: outcome.cause.kind,
      ...(outcome.cause.status !== undefined ? { status: outcome.cause.status } : {}),
      message: outcome.cause.message,
      attempts: outcome.attempts,
    });
    this.advance(outcome.chunk);
  }

  async chunkNotAttempted(outcome: NotAttemptedOutcome): Promise<void> {
    this.logger.debug(`Not attempted ${label(outcome.chunk)}`);
    this.advance(outcome.chunk);
  }

  async runFinished(summary: RunSummary): Promise<void> {
    const metadata = {
      downloaded: summary.downloaded,
      files: summary.filesDownloaded,
      size: formatBytes(summary.bytesDownloaded),
      skipped: summary.skippedExisting,
      noData: summary.noData,
      failed: summary.failed,
      notAttempted: summary.notAttempted,
      duration: formatDuration(summary.finishedAt - summary.startedAt),
    };

    if (summary.halt) {
      this.logger.warn(`Run halted: ${summary.halt.reason}`, {
        message: summary.halt.message,
        ...metadata,
      });
    } else if (summary.failed > 0) {
      this.logger.warn('Run finished with failures', metadata);
    } else {
      this.logger.info('Run finished', metadata);
    }
  }

  private advance(chunk: Chunk): void {
    this.done++;
    this.logger.progress({ total: this.total, current: this.done, label: chunk.station });
  }
}

function label(chunk: Chunk): string {
  return `${chunk.station} ${formatApiTimestamp(chunk.rangeStart)} -> ${formatApiTimestamp(chunk.rangeEnd)}`;
}
