/**
 * Download Command
 *
 * Download every chunk of the requested range for each station.
 *
 * Usage:
 *   ismr-downloader download --stations POAL,PRU2 --start 2024-01-01 --end 2024-03-31
 *
 * Options:
 *   --stations <list>      Comma-separated station codes
 *   --start <date>         Range start (YYYY-MM-DD or timestamp, UTC)
 *   --end <date>           Range end (inclusive when a bare date)
 *   --data-type <type>     ismr | ismr1min | sbf | rinex
 *   --max-days <n>         Days per chunk
 *   --max-workers <n>      Concurrent chunks
 *   --rpm <n>              Requests per minute, shared by all workers
 *   --overwrite            Re-download chunks whose artifact exists
 *   --output-dir <dir>     Artifact root
 *   --logs-dir <dir>       Report directory
 *   --insecure             Disable TLS certificate verification
 *   --force-auth           Ignore the cached token
 *
 * Exit codes: 0 complete, 1 failed or not-attempted chunks, 3 bad
 * configuration or range, 4 authentication failure.
 */

import type { Command } from 'commander';
import type { Clock } from '../../core/clock.js';
import { HTTPClient } from '../../core/http-client.js';
import { formatInstant } from '../../core/time-range.js';
import type { RunSummary } from '../../core/types.js';
import { FileTokenCache } from '../../auth/token-cache.js';
import { TokenStore } from '../../auth/token-store.js';
import { FsArtifactWriter } from '../../acquisition/artifact-writer.js';
import { DownloadOrchestrator } from '../../acquisition/download-orchestrator.js';
import { IsmrApiClient } from '../../acquisition/ismr-api-client.js';
import { RetryPolicy } from '../../resilience/retry-policy.js';
import { ConsoleReportSink } from '../../reporting/console-report-sink.js';
import { FileReportSink } from '../../reporting/file-report-sink.js';
import { CompositeReportSink } from '../../reporting/report-sink.js';
import { requireCredentials, toRequestSpec, type ConfigOverrides } from '../lib/config.js';
import {
  applyTlsSetting,
  createCommandContext,
  exitCodeForSummary,
  readGlobalOptions,
  reportFailure,
  EXIT_CODES,
  type CommandContext,
  type ContextSources,
  type ExitCode,
  type GlobalOptions,
} from '../lib/context.js';

/**
 * Download options from CLI
 */
export interface DownloadOptions {
  readonly stations?: string;
  readonly start?: string;
  readonly end?: string;
  readonly dataType?: string;
  readonly maxDays?: string;
  readonly maxWorkers?: string;
  readonly rpm?: string;
  readonly overwrite?: boolean;
  readonly outputDir?: string;
  readonly logsDir?: string;
  readonly tokenCache?: string;
  readonly mode?: string;
  readonly baseUrl?: string;
  readonly insecure?: boolean;
  readonly forceAuth?: boolean;
}

export interface DownloadDependencies extends ContextSources {
  readonly clock?: Clock;
}

/**
 * Register the download command
 */
export function registerDownloadCommand(program: Command): void {
  program
    .command('download')
    .description('Download data for stations over a time range')
    .option('--stations <list>', 'Comma-separated station codes')
    .option('--start <date>', 'Range start (YYYY-MM-DD or ISO timestamp, UTC)')
    .option('--end <date>', 'Range end (a bare date covers the whole day)')
    .option('--data-type <type>', 'Data type: ismr|ismr1min|sbf|rinex')
    .option('--max-days <n>', 'Maximum days per request chunk')
    .option('--max-workers <n>', 'Concurrent chunk downloads')
    .option('--rpm <n>', 'Maximum requests per minute across all workers')
    .option('--overwrite', 'Re-download chunks whose artifact already exists')
    .option('--output-dir <dir>', 'Artifact output directory')
    .option('--logs-dir <dir>', 'Run report directory')
    .option('--token-cache <path>', 'Token cache file')
    .option('--mode <mode>', 'Response mode: bundle|files|direct')
    .option('--base-url <url>', 'API base URL')
    .option('--insecure', 'Disable TLS certificate verification')
    .option('--force-auth', 'Ignore the cached token and authenticate again')
    .action(async (options: DownloadOptions, command: Command) => {
      process.exitCode = await executeDownload(options, readGlobalOptions(command));
    });
}

export function downloadOverrides(options: DownloadOptions): ConfigOverrides {
  return {
    stations: options.stations,
    start: options.start,
    end: options.end,
    dataType: options.dataType,
    maxDays: options.maxDays,
    maxWorkers: options.maxWorkers,
    maxRequestsPerMinute: options.rpm,
    overwrite: options.overwrite,
    outputDir: options.outputDir,
    logsDir: options.logsDir,
    tokenCache: options.tokenCache,
    mode: options.mode,
    baseUrl: options.baseUrl,
    insecure: options.insecure,
    forceAuth: options.forceAuth,
  };
}

/**
 * Execute the download command
 */
export async function executeDownload(
  options: DownloadOptions,
  globals: GlobalOptions,
  deps: DownloadDependencies = {}
): Promise<ExitCode> {
  let context: CommandContext;
  try {
    context = createCommandContext(globals, downloadOverrides(options), deps);
  } catch (error) {
    return reportFailure(null, error);
  }

  const { config, logger } = context;

  try {
    const spec = toRequestSpec(config);
    const credentials = requireCredentials(config);

    logger.commandStart('download', {
      stations: spec.stations.join(','),
      dataType: spec.dataType,
      start: formatInstant(spec.start),
      end: formatInstant(spec.end),
      ...(config.configPath ? { config: config.configPath } : {}),
    });

    applyTlsSetting(config, logger);

    const api = new IsmrApiClient({
      apiBaseUrl: config.apiBaseUrl,
      email: credentials.email,
      password: credentials.password,
      mode: config.mode,
      http: new HTTPClient({
        timeoutMs: config.requestTimeoutMs,
        downloadTimeoutMs: config.downloadTimeoutMs,
      }),
    });

    const tokenStore = new TokenStore({
      authenticator: api,
      cache: new FileTokenCache(config.tokenCache),
      clock: deps.clock,
      expirySkewMs: config.tokenExpirySkewMs,
    });

    if (config.forceAuth) {
      tokenStore.forceReauth();
    }

    // Fail fast on bad credentials before any chunk is dispatched
    await tokenStore.getValidToken();

    const fileSink = new FileReportSink({ logsDir: config.logsDir, clock: deps.clock });
    const orchestrator = new DownloadOrchestrator({
      api,
      tokenStore,
      createWriter: (outputDir) => new FsArtifactWriter(outputDir),
      retryPolicy: new RetryPolicy(config.retry),
      sink: new CompositeReportSink([fileSink, new ConsoleReportSink(logger)]),
      clock: deps.clock,
      reauthAfterConsecutiveErrors: config.reauthAfterConsecutiveErrors,
    });

    const summary = await orchestrator.run(spec);
    const exitCode = exitCodeForSummary(summary);

    logger.info(`Run log: ${fileSink.paths.runLog}`);
    logger.commandEnd(exitCode === EXIT_CODES.SUCCESS, {
      ...summaryMetadata(summary),
      exitCode,
    });

    return exitCode;
  } catch (error) {
    const exitCode = reportFailure(logger, error);
    logger.commandEnd(false, { exitCode });
    return exitCode;
  }
}

function summaryMetadata(summary: RunSummary): Record<string, number | string> {
  return {
    chunks: summary.totalChunks,
    downloaded: summary.downloaded,
    skipped: summary.skippedExisting,
    noData: summary.noData,
    failed: summary.failed,
    notAttempted: summary.notAttempted,
    ...(summary.halt ? { halt: summary.halt.reason } : {}),
  };
}
