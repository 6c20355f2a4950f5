/**
 * Plan Command
 *
 * Show the chunks a download would request, without authenticating or
 * touching the network. Chunks whose artifact already exists are marked.
 *
 * Usage:
 *   ismr-downloader plan --stations POAL --start 2024-01-01 --end 2024-06-30
 */

import type { Command } from 'commander';
import { FsArtifactWriter, type ArtifactWriter } from '../../acquisition/artifact-writer.js';
import { buildChunks, formatApiTimestamp, rangeDays } from '../../core/time-range.js';
import type { Chunk } from '../../core/types.js';
import { toRequestSpec } from '../lib/config.js';
import {
  createCommandContext,
  readGlobalOptions,
  reportFailure,
  EXIT_CODES,
  type CommandContext,
  type ContextSources,
  type ExitCode,
  type GlobalOptions,
} from '../lib/context.js';
import { downloadOverrides, type DownloadOptions } from './download.js';

export type PlanOptions = Pick<
  DownloadOptions,
  'stations' | 'start' | 'end' | 'dataType' | 'maxDays' | 'outputDir' | 'overwrite'
>;

export type PlanRow = {
  readonly index: number;
  readonly station: string;
  readonly dataType: string;
  readonly start: string;
  readonly end: string;
  readonly days: string;
  readonly existing: string;
};

/**
 * Register the plan command
 */
export function registerPlanCommand(program: Command): void {
  program
    .command('plan')
    .description('List the request chunks for a download without running it')
    .option('--stations <list>', 'Comma-separated station codes')
    .option('--start <date>', 'Range start (YYYY-MM-DD or ISO timestamp, UTC)')
    .option('--end <date>', 'Range end (a bare date covers the whole day)')
    .option('--data-type <type>', 'Data type: ismr|ismr1min|sbf|rinex')
    .option('--max-days <n>', 'Maximum days per request chunk')
    .option('--output-dir <dir>', 'Artifact output directory (for existing-artifact checks)')
    .option('--overwrite', 'Count existing artifacts as chunks to download')
    .action(async (options: PlanOptions, command: Command) => {
      process.exitCode = await executePlan(options, readGlobalOptions(command));
    });
}

/**
 * Execute the plan command
 */
export async function executePlan(
  options: PlanOptions,
  globals: GlobalOptions,
  sources: ContextSources = {}
): Promise<ExitCode> {
  let context: CommandContext;
  try {
    context = createCommandContext(globals, downloadOverrides(options), sources);
  } catch (error) {
    return reportFailure(null, error);
  }

  const { config, logger } = context;

  try {
    const spec = toRequestSpec(config);
    const chunks = buildChunks(spec);
    const rows = await planRows(chunks, new FsArtifactWriter(spec.outputDir));

    logger.table(rows, ['index', 'station', 'dataType', 'start', 'end', 'days', 'existing']);

    const existing = rows.filter((row) => row.existing !== '').length;
    logger.info(`${chunks.length} chunk(s) planned`, {
      stations: spec.stations.length,
      existing,
      toDownload: spec.overwrite ? chunks.length : chunks.length - existing,
    });

    return EXIT_CODES.SUCCESS;
  } catch (error) {
    return reportFailure(logger, error);
  }
}

/**
 * One table row per chunk, with the existing artifact path if any
 */
export async function planRows(
  chunks: readonly Chunk[],
  writer: Pick<ArtifactWriter, 'findExisting'>
): Promise<PlanRow[]> {
  const rows: PlanRow[] = [];

  for (const chunk of chunks) {
    const existing = await writer.findExisting(chunk);
    rows.push({
      index: chunk.sequenceIndex,
      station: chunk.station,
      dataType: chunk.dataType,
      start: formatApiTimestamp(chunk.rangeStart),
      end: formatApiTimestamp(chunk.rangeEnd),
      days: rangeDays({ start: chunk.rangeStart, end: chunk.rangeEnd }).toFixed(2),
      existing: existing ?? '',
    });
  }

  return rows;
}
