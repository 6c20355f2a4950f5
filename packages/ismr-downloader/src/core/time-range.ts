/**
 * Time Range Chunking
 *
 * Splits a requested interval into sub-intervals the API accepts in a single
 * query, and normalizes user-supplied dates into instants.
 *
 * BOUNDARIES:
 * - Chunks are half-open [start, end) and contiguous: chunk[i].end === chunk[i+1].start
 * - Every chunk spans at most maxDays days; only the last may be shorter
 * - All arithmetic is in UTC epoch milliseconds (no DST surprises)
 */

import { InvalidRangeError } from './errors.js';
import type { Chunk, Instant, RequestSpec, TimeRange } from './types.js';

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const HAS_ZONE = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Split [start, end) into ordered sub-intervals of at most maxDays days
 *
 * @throws {InvalidRangeError} If start >= end, maxDays <= 0 or a bound is not finite
 *
 * @example
 * ```typescript
 * const t = Date.UTC(2025, 0, 1);
 * splitTimeRange(t, t + 90 * MS_PER_DAY, 15).length; // 6
 * ```
 */
export function splitTimeRange(start: Instant, end: Instant, maxDays: number): readonly TimeRange[] {
  if (!Number.isFinite(start) || !Number.isFinite(end)) {
    throw new InvalidRangeError('Range bounds must be finite instants');
  }
  if (start >= end) {
    throw new InvalidRangeError(
      `Range start must precede end (start=${formatInstant(start)}, end=${formatInstant(end)})`
    );
  }
  if (!Number.isFinite(maxDays) || maxDays <= 0) {
    throw new InvalidRangeError(`maxDays must be positive, got ${maxDays}`);
  }

  const span = maxDays * MS_PER_DAY;
  const ranges: TimeRange[] = [];

  for (let cursor = start; cursor < end; cursor += span) {
    ranges.push(Object.freeze({ start: cursor, end: Math.min(cursor + span, end) }));
  }

  return Object.freeze(ranges);
}

/**
 * Build the chunk streams of a request: one stream per station, shared boundaries
 */
export function buildChunks(spec: RequestSpec): readonly Chunk[] {
  const ranges = splitTimeRange(spec.start, spec.end, spec.maxDays);

  return Object.freeze(
    spec.stations.flatMap((station) =>
      ranges.map((range, sequenceIndex) =>
        Object.freeze({
          station,
          dataType: spec.dataType,
          rangeStart: range.start,
          rangeEnd: range.end,
          sequenceIndex,
        })
      )
    )
  );
}

/**
 * Normalize a date or timestamp string to an instant
 *
 * - `YYYY-MM-DD` expands to 00:00:00 (start) or 23:59:59 (end) UTC of that day
 * - Timestamps with `Z` or an offset are taken as-is
 * - Timestamps without a zone are read as UTC
 *
 * @throws {InvalidRangeError} If the input cannot be parsed
 */
export function normalizeInstant(input: string, boundary: 'start' | 'end'): Instant {
  const value = input.trim();
  const dateOnly = DATE_ONLY.exec(value);

  if (dateOnly) {
    const [, year, month, day] = dateOnly;
    const midnight = Date.UTC(Number(year), Number(month) - 1, Number(day));

    // Date.UTC rolls over invalid days (2025-02-30 -> March 2); reject those
    if (new Date(midnight).toISOString().slice(0, 10) !== value) {
      throw new InvalidRangeError(`Invalid calendar date: ${input}`);
    }

    return boundary === 'start' ? midnight : midnight + MS_PER_DAY - 1000;
  }

  const parsed = Date.parse(HAS_ZONE.test(value) ? value : `${value}Z`);
  if (Number.isNaN(parsed)) {
    throw new InvalidRangeError(`Unrecognized date or timestamp: ${input}`);
  }

  return parsed;
}

/**
 * ISO 8601 rendering used in logs and reports
 */
export function formatInstant(instant: Instant): string {
  return Number.isFinite(instant) ? new Date(instant).toISOString() : String(instant);
}

/**
 * `YYYY-MM-DDTHH:mm:ss` (UTC, no zone suffix), the form the data endpoint expects
 */
export function formatApiTimestamp(instant: Instant): string {
  return new Date(instant).toISOString().slice(0, 19);
}

/**
 * `YYYYMMDDHHmm` (UTC), used in artifact file names
 */
export function formatCompactTimestamp(instant: Instant): string {
  return new Date(instant).toISOString().slice(0, 16).replace(/[-:T]/g, '');
}

/**
 * Length of a range in days (fractional)
 */
export function rangeDays(range: TimeRange): number {
  return (range.end - range.start) / MS_PER_DAY;
}
