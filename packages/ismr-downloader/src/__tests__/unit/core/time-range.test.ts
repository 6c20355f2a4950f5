/**
 * Time range chunking and normalization
 */

import { describe, it, expect } from 'vitest';
import {
  MS_PER_DAY,
  buildChunks,
  formatApiTimestamp,
  formatCompactTimestamp,
  normalizeInstant,
  splitTimeRange,
} from '../../../core/time-range.js';
import { InvalidRangeError } from '../../../core/errors.js';
import { createRequestSpec } from '../../../core/request-spec.js';

const JAN_1 = Date.UTC(2024, 0, 1);

describe('splitTimeRange', () => {
  it('returns a single range when the span fits in maxDays', () => {
    const ranges = splitTimeRange(JAN_1, JAN_1 + 10 * MS_PER_DAY, 62);

    expect(ranges).toEqual([{ start: JAN_1, end: JAN_1 + 10 * MS_PER_DAY }]);
  });

  it('produces contiguous ranges of at most maxDays with a shorter tail', () => {
    const end = JAN_1 + 90 * MS_PER_DAY;
    const ranges = splitTimeRange(JAN_1, end, 40);

    expect(ranges).toEqual([
      { start: JAN_1, end: JAN_1 + 40 * MS_PER_DAY },
      { start: JAN_1 + 40 * MS_PER_DAY, end: JAN_1 + 80 * MS_PER_DAY },
      { start: JAN_1 + 80 * MS_PER_DAY, end },
    ]);
  });

  it('covers an exact multiple of maxDays without an empty tail', () => {
    const ranges = splitTimeRange(JAN_1, JAN_1 + 90 * MS_PER_DAY, 15);

    expect(ranges).toHaveLength(6);
    expect(ranges[5].end).toBe(JAN_1 + 90 * MS_PER_DAY);
  });

  it('rejects empty and inverted ranges', () => {
    expect(() => splitTimeRange(JAN_1, JAN_1, 62)).toThrow(InvalidRangeError);
    expect(() => splitTimeRange(JAN_1 + 1, JAN_1, 62)).toThrow(InvalidRangeError);
  });

  it('rejects a non-positive maxDays', () => {
    expect(() => splitTimeRange(JAN_1, JAN_1 + MS_PER_DAY, 0)).toThrow(
      'maxDays must be positive, got 0'
    );
  });
});

describe('normalizeInstant', () => {
  it('expands a bare date to the start or end of that UTC day', () => {
    expect(normalizeInstant('2024-03-31', 'start')).toBe(Date.UTC(2024, 2, 31));
    expect(normalizeInstant('2024-03-31', 'end')).toBe(Date.UTC(2024, 2, 31, 23, 59, 59));
  });

  it('reads zone-less timestamps as UTC', () => {
    expect(normalizeInstant('2024-01-05T06:30:00', 'start')).toBe(Date.UTC(2024, 0, 5, 6, 30));
  });

  it('honours an explicit offset', () => {
    expect(normalizeInstant('2024-01-05T06:30:00-03:00', 'start')).toBe(
      Date.UTC(2024, 0, 5, 9, 30)
    );
  });

  it('rejects calendar dates that do not exist', () => {
    expect(() => normalizeInstant('2023-02-29', 'start')).toThrow('Invalid calendar date: 2023-02-29');
  });

  it('rejects unparseable input', () => {
    expect(() => normalizeInstant('last tuesday', 'end')).toThrow(InvalidRangeError);
  });
});

describe('formatting', () => {
  it('renders API and compact timestamps in UTC', () => {
    const instant = Date.UTC(2024, 1, 29, 13, 5, 9);

    expect(formatApiTimestamp(instant)).toBe('2024-02-29T13:05:09');
    expect(formatCompactTimestamp(instant)).toBe('202402291305');
  });
});

describe('buildChunks', () => {
  it('gives every station the same boundaries with per-station sequence indices', () => {
    const spec = createRequestSpec({
      stations: ['POAL', 'PRU2'],
      dataType: 'ismr',
      start: '2024-01-01',
      end: '2024-03-31',
      maxDays: 62,
      maxWorkers: 2,
      maxRequestsPerMinute: 30,
      overwrite: false,
      outputDir: 'downloads',
    });

    const chunks = buildChunks(spec);
    const march3 = Date.UTC(2024, 2, 3);
    const endOfMarch = Date.UTC(2024, 2, 31, 23, 59, 59);

    expect(chunks).toEqual([
      { station: 'POAL', dataType: 'ismr', rangeStart: JAN_1, rangeEnd: march3, sequenceIndex: 0 },
      { station: 'POAL', dataType: 'ismr', rangeStart: march3, rangeEnd: endOfMarch, sequenceIndex: 1 },
      { station: 'PRU2', dataType: 'ismr', rangeStart: JAN_1, rangeEnd: march3, sequenceIndex: 0 },
      { station: 'PRU2', dataType: 'ismr', rangeStart: march3, rangeEnd: endOfMarch, sequenceIndex: 1 },
    ]);
  });
});
