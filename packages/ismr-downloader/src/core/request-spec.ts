/**
 * RequestSpec construction
 *
 * Normalizes and validates user input into the frozen RequestSpec the engine
 * consumes. Range problems raise InvalidRangeError; anything else that is
 * out of bounds raises ConfigError with one issue per field.
 */

import { ConfigError, InvalidRangeError } from './errors.js';
import { normalizeInstant } from './time-range.js';
import type { DataType, Instant, RequestSpec } from './types.js';
import { isDataType } from './types.js';

export interface RequestSpecInput {
  readonly stations: readonly string[];
  readonly dataType: DataType | string;

  /** Date (`YYYY-MM-DD`), timestamp, or instant */
  readonly start: string | Instant;
  readonly end: string | Instant;

  readonly maxDays: number;
  readonly maxWorkers: number;
  readonly maxRequestsPerMinute: number;
  readonly overwrite: boolean;
  readonly outputDir: string;
}

/**
 * Build a validated, frozen RequestSpec
 *
 * @throws {InvalidRangeError} If the range is unparseable or start >= end
 * @throws {ConfigError} If any other field is invalid
 */
export function createRequestSpec(input: RequestSpecInput): RequestSpec {
  const issues: string[] = [];

  const stations = [
    ...new Set(input.stations.map((station) => station.trim()).filter((station) => station !== '')),
  ];
  if (stations.length === 0) {
    issues.push('stations: at least one station is required');
  }

  if (!isDataType(input.dataType)) {
    issues.push(`dataType: unsupported value "${input.dataType}"`);
  }

  for (const field of ['maxDays', 'maxWorkers', 'maxRequestsPerMinute'] as const) {
    const value = input[field];
    if (!Number.isInteger(value) || value <= 0) {
      issues.push(`${field}: must be a positive integer, got ${value}`);
    }
  }

  if (input.outputDir.trim() === '') {
    issues.push('outputDir: must not be empty');
  }

  if (issues.length > 0 || !isDataType(input.dataType)) {
    throw new ConfigError('Invalid download request', issues);
  }

  const start = toInstant(input.start, 'start');
  const end = toInstant(input.end, 'end');

  if (start >= end) {
    throw new InvalidRangeError(
      `Start must precede end (start=${new Date(start).toISOString()}, end=${new Date(end).toISOString()})`
    );
  }

  return Object.freeze({
    stations: Object.freeze(stations),
    dataType: input.dataType,
    start,
    end,
    maxDays: input.maxDays,
    maxWorkers: input.maxWorkers,
    maxRequestsPerMinute: input.maxRequestsPerMinute,
    overwrite: input.overwrite,
    outputDir: input.outputDir,
  });
}

function toInstant(value: string | Instant, boundary: 'start' | 'end'): Instant {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new InvalidRangeError(`Range ${boundary} must be a finite instant`);
    }
    return value;
  }
  return normalizeInstant(value, boundary);
}
