import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileReportSink, formatRunStamp } from '../../../reporting/file-report-sink.js';
import { createRequestSpec } from '../../../core/request-spec.js';
import type { RunSummary } from '../../../core/types.js';
import { DAY_MS, VirtualClock, makeChunk } from '../../setup.js';

const T0 = Date.UTC(2024, 0, 1);
const PREFIX = '2024-01-01T00:00:00.000Z';

const SPEC = createRequestSpec({
  stations: ['POAL'],
  dataType: 'ismr',
  start: '2024-01-01',
  end: '2024-01-03',
  maxDays: 2,
  maxWorkers: 1,
  maxRequestsPerMinute: 30,
  overwrite: false,
  outputDir: 'downloads',
});

describe('formatRunStamp', () => {
  it('renders YYYYMMDD_HHmmss in UTC', () => {
    expect(formatRunStamp(Date.UTC(2024, 10, 5, 7, 8, 9))).toBe('20241105_070809');
  });
});

describe('FileReportSink', () => {
  let dir: string;
  let sink: FileReportSink;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ismr-logs-'));
    sink = new FileReportSink({ logsDir: join(dir, 'logs'), clock: new VirtualClock(T0) });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const read = (path: string) => readFile(path, 'utf-8');

  it('names every report after the run stamp', () => {
    expect(sink.paths).toEqual({
      runLog: join(dir, 'logs', 'run_20240101_000000.log'),
      filesList: join(dir, 'logs', 'downloaded_files_20240101_000000.txt'),
      noDataCsv: join(dir, 'logs', 'no_data_20240101_000000.csv'),
      failures: join(dir, 'logs', 'failures_20240101_000000.ndjson'),
    });
  });

  it('creates empty reports at run start', async () => {
    await sink.runStarted(SPEC, 2);

    expect(await read(sink.paths.filesList)).toBe('');
    expect(await read(sink.paths.noDataCsv)).toBe('station,dataType,rangeStart,rangeEnd\n');
    expect(await read(sink.paths.failures)).toBe('');
    expect(await read(sink.paths.runLog)).toBe(
      `${PREFIX} [INFO] Run started: stations=POAL dataType=ismr ` +
        'start=2024-01-01T00:00:00 end=2024-01-03T23:59:59 chunks=2\n'
    );
  });

  it('records each chunk event in its report', async () => {
    const first = makeChunk();
    const second = makeChunk({
      sequenceIndex: 1,
      rangeStart: T0 + 2 * DAY_MS,
      rangeEnd: T0 + 3 * DAY_MS,
    });

    await sink.runStarted(SPEC, 2);
    await sink.chunkDownloaded({
      kind: 'success',
      chunk: first,
      filePaths: ['downloads/POAL/a.csv', 'downloads/POAL/b.csv'],
      bytes: 12,
      skipped: false,
      attempts: 1,
    });
    await sink.chunkNoData({ kind: 'no-data', chunk: second, attempts: 1 });
    await sink.chunkFailed({
      kind: 'transient-failure',
      chunk: second,
      cause: { kind: 'throttled', message: 'HTTP 429: Too Many Requests', status: 429 },
      attempts: 6,
    });
    await sink.chunkNotAttempted({ kind: 'not-attempted', chunk: second });

    expect(await read(sink.paths.filesList)).toBe('downloads/POAL/a.csv\ndownloads/POAL/b.csv\n');
    expect(await read(sink.paths.noDataCsv)).toBe(
      'station,dataType,rangeStart,rangeEnd\nPOAL,ismr,2024-01-03T00:00:00,2024-01-04T00:00:00\n'
    );
    expect(JSON.parse(await read(sink.paths.failures))).toEqual({
      station: 'POAL',
      dataType: 'ismr',
      rangeStart: '2024-01-03T00:00:00',
      rangeEnd: '2024-01-04T00:00:00',
      sequenceIndex: 1,
      transient: true,
      kind: 'throttled',
      status: 429,
      message: 'HTTP 429: Too Many Requests',
      attempts: 6,
    });

    const lines = (await read(sink.paths.runLog)).trimEnd().split('\n');
    expect(lines.slice(1)).toEqual([
      `${PREFIX} [INFO] Downloaded POAL ismr 2024-01-01T00:00:00 -> 2024-01-03T00:00:00: ` +
        'downloads/POAL/a.csv, downloads/POAL/b.csv (12 bytes)',
      `${PREFIX} [INFO] No data POAL ismr 2024-01-03T00:00:00 -> 2024-01-04T00:00:00`,
      `${PREFIX} [ERROR] Failed POAL ismr 2024-01-03T00:00:00 -> 2024-01-04T00:00:00: ` +
        '[throttled] HTTP 429: Too Many Requests',
      `${PREFIX} [WARN] Not attempted POAL ismr 2024-01-03T00:00:00 -> 2024-01-04T00:00:00`,
    ]);
  });

  it('closes the run log with a summary block', async () => {
    const summary: RunSummary = {
      startedAt: T0,
      finishedAt: T0 + 5000,
      totalChunks: 3,
      downloaded: 1,
      filesDownloaded: 1,
      bytesDownloaded: 1_572_864,
      skippedExisting: 0,
      noData: 1,
      failed: 1,
      notAttempted: 0,
      noDataIntervals: [],
      failures: [],
      notAttemptedChunks: [],
      files: [],
      halt: { reason: 'maintenance', message: 'HTTP 503: Service Unavailable' },
    };

    await sink.runStarted(SPEC, 3);
    await sink.runFinished(summary);

    const lines = (await read(sink.paths.runLog)).trimEnd().split('\n').slice(1);
    expect(lines).toEqual(
      [
        '========== SUMMARY ==========',
        'Chunks: total=3 downloaded=1 skipped=0 noData=1 failed=1 notAttempted=0',
        'Files downloaded: 1',
        'Total size: 1.50 MB',
        'Halted: maintenance (HTTP 503: Service Unavailable)',
        `Files list: ${sink.paths.filesList}`,
        `No-data intervals: ${sink.paths.noDataCsv}`,
        `Failures: ${sink.paths.failures}`,
        '=============================',
      ].map((line) => `${PREFIX} [INFO] ${line}`)
    );
  });
});
