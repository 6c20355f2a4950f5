/**
 * File Report Sink
 *
 * Writes the per-run report files under the logs directory, all sharing
 * one run stamp (`YYYYMMDD_HHmmss`, UTC):
 *
 * - run_{stamp}.log               one line per event plus a closing summary
 * - downloaded_files_{stamp}.txt  one artifact path per line
 * - no_data_{stamp}.csv           station,dataType,rangeStart,rangeEnd
 * - failures_{stamp}.ndjson       one JSON object per failed chunk
 *
 * Files are created at run start, so an empty file means "none".
 */

import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Clock } from '../core/clock.js';
import { systemClock } from '../core/clock.js';
import { formatApiTimestamp, formatInstant } from '../core/time-range.js';
import type {
  Chunk,
  FailedOutcome,
  Instant,
  NoDataOutcome,
  NotAttemptedOutcome,
  RequestSpec,
  RunSummary,
  SuccessOutcome,
} from '../core/types.js';
import type { ReportSink } from './report-sink.js';

export const NO_DATA_CSV_HEADER = 'station,dataType,rangeStart,rangeEnd';

export interface ReportPaths {
  readonly runLog: string;
  readonly filesList: string;
  readonly noDataCsv: string;
  readonly failures: string;
}

export interface FileReportSinkConfig {
  readonly logsDir: string;
  readonly clock?: Clock;
}

export class FileReportSink implements ReportSink {
  readonly logsDir: string;
  readonly paths: ReportPaths;
  private readonly clock: Clock;

  constructor(config: FileReportSinkConfig) {
    this.logsDir = config.logsDir;
    this.clock = config.clock ?? systemClock;

    const stamp = formatRunStamp(this.clock.now());
    this.paths = {
      runLog: join(this.logsDir, `run_${stamp}.log`),
      filesList: join(this.logsDir, `downloaded_files_${stamp}.txt`),
      noDataCsv: join(this.logsDir, `no_data_${stamp}.csv`),
      failures: join(this.logsDir, `failures_${stamp}.ndjson`),
    };
  }

  async runStarted(spec: RequestSpec, totalChunks: number): Promise<void> {
    await mkdir(this.logsDir, { recursive: true });
    await Promise.all([
      writeFile(this.paths.runLog, ''),
      writeFile(this.paths.filesList, ''),
      writeFile(this.paths.noDataCsv, `${NO_DATA_CSV_HEADER}\n`),
      writeFile(this.paths.failures, ''),
    ]);

    await this.logLine(
      'INFO',
      `Run started: stations=${spec.stations.join(',')} dataType=${spec.dataType} ` +
        `start=${formatApiTimestamp(spec.start)} end=${formatApiTimestamp(spec.end)} ` +
        `chunks=${totalChunks}`
    );
  }

  async chunkDownloaded(outcome: SuccessOutcome): Promise<void> {
    if (outcome.filePaths.length > 0) {
      await appendFile(this.paths.filesList, outcome.filePaths.map((path) => `${path}\n`).join(''));
    }
    await this.logLine(
      'INFO',
      `Downloaded ${describeChunk(outcome.chunk)}: ${outcome.filePaths.join(', ')} (${outcome.bytes} bytes)`
    );
  }

  async chunkSkipped(outcome: SuccessOutcome): Promise<void> {
    await this.logLine('INFO', `Skipped ${describeChunk(outcome.chunk)}: artifact exists`);
  }

  async chunkNoData(outcome: NoDataOutcome): Promise<void> {
    const { station, dataType, rangeStart, rangeEnd } = outcome.chunk;
    const row = [station, dataType, formatApiTimestamp(rangeStart), formatApiTimestamp(rangeEnd)]
      .map(csvField)
      .join(',');

    await appendFile(this.paths.noDataCsv, `${row}\n`);
    await this.logLine('INFO', `No data ${describeChunk(outcome.chunk)}`);
  }

  async chunkFailed(outcome: FailedOutcome): Promise<void> {
    const { chunk, cause } = outcome;
    const record = {
      station: chunk.station,
      dataType: chunk.dataType,
      rangeStart: formatApiTimestamp(chunk.rangeStart),
      rangeEnd: formatApiTimestamp(chunk.rangeEnd),
      sequenceIndex: chunk.sequenceIndex,
      transient: outcome.kind === 'transient-failure',
      kind: cause.kind,
      status: cause.status ?? null,
      message: cause.message,
      attempts: outcome.attempts,
    };

    await appendFile(this.paths.failures, `${JSON.stringify(record)}\n`);
    await this.logLine('ERROR', `Failed ${describeChunk(chunk)}: [${cause.kind}] ${cause.message}`);
  }

  async chunkNotAttempted(outcome: NotAttemptedOutcome): Promise<void> {
    await this.logLine('WARN', `Not attempted ${describeChunk(outcome.chunk)}`);
  }

  async runFinished(summary: RunSummary): Promise<void> {
    const lines = [
      '========== SUMMARY ==========',
      `Chunks: total=${summary.totalChunks} downloaded=${summary.downloaded} ` +
        `skipped=${summary.skippedExisting} noData=${summary.noData} ` +
        `failed=${summary.failed} notAttempted=${summary.notAttempted}`,
      `Files downloaded: ${summary.filesDownloaded}`,
      `Total size: ${(summary.bytesDownloaded / (1024 * 1024)).toFixed(2)} MB`,
      ...(summary.halt ? [`Halted: ${summary.halt.reason} (${summary.halt.message})`] : []),
      `Files list: ${this.paths.filesList}`,
      `No-data intervals: ${this.paths.noDataCsv}`,
      `Failures: ${this.paths.failures}`,
      '=============================',
    ];

    for (const line of lines) {
      await this.logLine('INFO', line);
    }
  }

  private async logLine(level: 'INFO' | 'WARN' | 'ERROR', message: string): Promise<void> {
    await appendFile(this.paths.runLog, `${formatInstant(this.clock.now())} [${level}] ${message}\n`);
  }
}

/**
 * `YYYYMMDD_HHmmss` (UTC)
 */
export function formatRunStamp(instant: Instant): string {
  const iso = new Date(instant).toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
}

function describeChunk(chunk: Chunk): string {
  return `${chunk.station} ${chunk.dataType} ${formatApiTimestamp(chunk.rangeStart)} -> ${formatApiTimestamp(chunk.rangeEnd)}`;
}

function csvField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}
