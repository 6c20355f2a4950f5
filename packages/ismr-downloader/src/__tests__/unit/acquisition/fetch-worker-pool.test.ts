/**
 * FetchWorkerPool on virtual time with a scripted API
 */

import { describe, it, expect, vi } from 'vitest';
import { FetchWorkerPool, type FetchWorkerPoolConfig } from '../../../acquisition/fetch-worker-pool.js';
import { MemoryArtifactWriter } from '../../../acquisition/artifact-writer.js';
import { IsmrApiClient, type DataApi, type RemoteArtifact } from '../../../acquisition/ismr-api-client.js';
import { MemoryTokenCache } from '../../../auth/token-cache.js';
import { TokenStore, type Authenticator } from '../../../auth/token-store.js';
import { AuthError } from '../../../core/errors.js';
import { HTTPClient, HTTPError, HTTPTimeoutError } from '../../../core/http-client.js';
import type { Chunk, FetchOutcome } from '../../../core/types.js';
import { SlidingWindowRateLimiter } from '../../../resilience/rate-limiter.js';
import { RetryPolicy } from '../../../resilience/retry-policy.js';
import {
  CountingAuthenticator,
  DAY_MS,
  FakeDataApi,
  VirtualClock,
  artifactsResponse,
  failingStreamOf,
  fakeStream,
  makeChunk,
  remoteArtifact,
} from '../../setup.js';

const DATA_URL = 'https://api.example.test/data';
const STEM = 'POAL_ismr_202401010000_202401030000';

interface PoolFixture {
  readonly api: DataApi;
  readonly authenticator?: Authenticator;
  readonly clock?: VirtualClock;
  readonly config?: Partial<Omit<FetchWorkerPoolConfig, 'api' | 'tokenStore' | 'clock'>>;
}

function createPool({ api, authenticator, clock = new VirtualClock(), config = {} }: PoolFixture) {
  const counting = new CountingAuthenticator();
  const tokenStore = new TokenStore({
    authenticator: authenticator ?? counting,
    cache: new MemoryTokenCache(),
    clock,
  });
  const writer = new MemoryArtifactWriter();

  const pool = new FetchWorkerPool({
    maxWorkers: 2,
    overwrite: false,
    api,
    writer,
    tokenStore,
    rateLimiter: { acquire: async () => undefined },
    retryPolicy: new RetryPolicy({}, { random: () => 0.5 }),
    clock,
    ...config,
  });

  return { pool, clock, writer, authenticator: counting };
}

/** Consecutive two-day chunks for one station */
function chunksFor(count: number, station = 'POAL'): Chunk[] {
  const start = Date.UTC(2024, 0, 1);
  return Array.from({ length: count }, (_, i) =>
    makeChunk({
      station,
      sequenceIndex: i,
      rangeStart: start + i * 2 * DAY_MS,
      rangeEnd: start + (i + 1) * 2 * DAY_MS,
    })
  );
}

function kindsByIndex(outcomes: readonly FetchOutcome[]): string[] {
  return [...outcomes]
    .sort((a, b) => a.chunk.sequenceIndex - b.chunk.sequenceIndex)
    .map((outcome) => outcome.kind);
}

describe('FetchWorkerPool', () => {
  describe('successful chunks', () => {
    it('writes a single artifact under its deterministic name', async () => {
      const api = new FakeDataApi().script(
        'POAL',
        artifactsResponse(remoteArtifact('ismr_poal_export.csv', 'a,b,c'))
      );
      const { pool, writer } = createPool({ api });
      const chunk = makeChunk();

      const result = await pool.run([chunk]);

      expect(result.halt).toBeNull();
      expect(result.outcomes).toEqual([
        {
          kind: 'success',
          chunk,
          filePaths: [`downloads/POAL/${STEM}.csv`],
          bytes: 5,
          skipped: false,
          attempts: 1,
        },
      ]);
      expect(new TextDecoder().decode(writer.files.get(`downloads/POAL/${STEM}.csv`))).toBe('a,b,c');
      expect(api.calls.map((call) => call.token)).toEqual(['token-1']);
    });

    it('places several artifacts in a directory named after the chunk', async () => {
      const api = new FakeDataApi().script(
        'POAL',
        artifactsResponse(remoteArtifact('part-1.csv', '12'), remoteArtifact('part-2.csv', '345'))
      );
      const { pool, writer } = createPool({ api });

      const result = await pool.run([makeChunk()]);

      expect(result.outcomes[0]).toMatchObject({
        kind: 'success',
        filePaths: [`downloads/POAL/${STEM}/part-1.csv`, `downloads/POAL/${STEM}/part-2.csv`],
        bytes: 5,
      });
      expect([...writer.files.keys()]).toEqual([
        `downloads/POAL/${STEM}/part-1.csv`,
        `downloads/POAL/${STEM}/part-2.csv`,
      ]);
    });

    it('skips a chunk whose artifact exists without touching the API', async () => {
      const api = new FakeDataApi();
      const { pool, writer, authenticator } = createPool({ api });
      writer.files.set(`downloads/POAL/${STEM}.csv`, new Uint8Array([1]));
      const chunk = makeChunk();

      const result = await pool.run([chunk]);

      expect(result.outcomes).toEqual([
        { kind: 'success', chunk, filePaths: [], bytes: 0, skipped: true, attempts: 0 },
      ]);
      expect(api.calls).toHaveLength(0);
      expect(authenticator.calls).toBe(0);
    });

    it('downloads again when overwrite is set', async () => {
      const api = new FakeDataApi().script(
        'POAL',
        artifactsResponse(remoteArtifact('export.csv', 'fresh'))
      );
      const { pool, writer } = createPool({ api, config: { overwrite: true } });
      writer.files.set(`downloads/POAL/${STEM}.csv`, new Uint8Array([1]));

      const result = await pool.run([makeChunk()]);

      expect(result.outcomes[0]).toMatchObject({ kind: 'success', skipped: false, bytes: 5 });
      expect(api.calls).toHaveLength(1);
    });
  });

  describe('no data', () => {
    it('records an empty response as no-data', async () => {
      const { pool } = createPool({ api: new FakeDataApi() });
      const chunk = makeChunk();

      const result = await pool.run([chunk]);

      expect(result.outcomes).toEqual([{ kind: 'no-data', chunk, attempts: 1 }]);
    });

    it('records 404 as no-data', async () => {
      const api = new FakeDataApi().script('POAL', new HTTPError('Not Found', 404, DATA_URL));
      const { pool } = createPool({ api });

      const result = await pool.run([makeChunk()]);

      expect(result.outcomes[0]).toMatchObject({ kind: 'no-data', attempts: 1 });
    });
  });

  describe('retries', () => {
    it('backs off after 429 and then succeeds', async () => {
      const api = new FakeDataApi().script(
        'POAL',
        new HTTPError('Too Many Requests', 429, DATA_URL),
        artifactsResponse(remoteArtifact('export.csv', 'ok'))
      );
      const { pool, clock } = createPool({ api });

      const result = await pool.run([makeChunk()]);

      expect(result.outcomes[0]).toMatchObject({ kind: 'success', attempts: 2 });
      expect(clock.sleeps).toEqual([2000]);
    });

    it('gives up on repeated timeouts and re-authenticates after consecutive failures', async () => {
      const api = new FakeDataApi().script('POAL', new HTTPTimeoutError(DATA_URL, 30_000));
      const { pool, clock } = createPool({ api });
      const chunk = makeChunk();

      const result = await pool.run([chunk]);

      expect(result.outcomes).toEqual([
        {
          kind: 'transient-failure',
          chunk,
          cause: { kind: 'timeout', message: `Request timeout after 30000ms: ${DATA_URL}` },
          attempts: 4,
        },
      ]);
      expect(clock.sleeps).toEqual([5000, 5000, 5000]);
      expect(api.calls.map((call) => call.token)).toEqual([
        'token-1',
        'token-1',
        'token-1',
        'token-2',
      ]);
    });

    it('does not force re-authentication when the threshold is 0', async () => {
      const api = new FakeDataApi().script('POAL', new HTTPTimeoutError(DATA_URL, 30_000));
      const { pool, authenticator } = createPool({
        api,
        config: { reauthAfterConsecutiveErrors: 0 },
      });

      await pool.run([makeChunk()]);

      expect(authenticator.calls).toBe(1);
    });

    it('retries a body that fails mid-stream as a network failure', async () => {
      const broken: RemoteArtifact = {
        filename: 'export.csv',
        remote: true,
        open: async () => ({
          ...fakeStream(''),
          body: failingStreamOf('partial', new Error('socket hang up')),
        }),
      };
      const api = new FakeDataApi().script(
        'POAL',
        artifactsResponse(broken),
        artifactsResponse(remoteArtifact('export.csv', 'whole'))
      );
      const { pool, clock, writer } = createPool({ api });

      const result = await pool.run([makeChunk()]);

      expect(result.outcomes[0]).toMatchObject({ kind: 'success', attempts: 2, bytes: 5 });
      expect(clock.sleeps).toEqual([5000]);
      expect(new TextDecoder().decode(writer.files.get(`downloads/POAL/${STEM}.csv`))).toBe('whole');
    });

    it('retries a data response whose connection resets mid-body', async () => {
      const fetchMock = vi
        .fn<typeof fetch>()
        .mockResolvedValueOnce(new Response(failingStreamOf('{"bundle":', new TypeError('terminated'))))
        .mockResolvedValueOnce(
          new Response(JSON.stringify({ bundle: null }), {
            headers: { 'content-type': 'application/json' },
          })
        );
      vi.stubGlobal('fetch', fetchMock);

      try {
        const api = new IsmrApiClient({
          apiBaseUrl: 'https://api.example.test/api/v1',
          email: 'user@example.test',
          password: 'test-secret',
          mode: 'bundle',
          http: new HTTPClient({ timeoutMs: 1000 }),
        });
        const { pool, clock } = createPool({ api });

        const result = await pool.run([makeChunk()]);

        expect(result.outcomes[0]).toMatchObject({ kind: 'no-data', attempts: 2 });
        expect(clock.sleeps).toEqual([5000]);
        expect(fetchMock).toHaveBeenCalledTimes(2);
      } finally {
        vi.unstubAllGlobals();
      }
    });

    it('reports a body read that hit its timeout as a timeout', async () => {
      const slow: RemoteArtifact = {
        filename: 'export.csv',
        remote: true,
        open: async () => ({
          ...fakeStream('', { timedOut: true }),
          body: failingStreamOf('partial', new Error('This operation was aborted')),
        }),
      };
      const api = new FakeDataApi().script('POAL', artifactsResponse(slow));
      const { pool } = createPool({
        api,
        config: { retryPolicy: new RetryPolicy({ timedOut: { maxRetries: 0, delayMs: 5000 } }) },
      });

      const result = await pool.run([makeChunk()]);

      expect(result.outcomes[0]).toMatchObject({
        kind: 'transient-failure',
        cause: {
          kind: 'timeout',
          message: 'Artifact download timed out: This operation was aborted',
        },
      });
    });
  });

  describe('authorization', () => {
    it('refreshes the token once after a 401 and retries', async () => {
      const api = new FakeDataApi().script(
        'POAL',
        new HTTPError('Unauthorized', 401, DATA_URL),
        artifactsResponse(remoteArtifact('export.csv', 'ok'))
      );
      const { pool, authenticator } = createPool({ api });

      const result = await pool.run([makeChunk()]);

      expect(result.outcomes[0]).toMatchObject({ kind: 'success', attempts: 2 });
      expect(api.calls.map((call) => call.token)).toEqual(['token-1', 'token-2']);
      expect(authenticator.calls).toBe(2);
    });

    it('halts the run on a second consecutive 401', async () => {
      const api = new FakeDataApi().script('POAL', new HTTPError('Unauthorized', 401, DATA_URL));
      const { pool } = createPool({ api, config: { maxWorkers: 1 } });
      const chunks = chunksFor(2);

      const result = await pool.run(chunks);

      expect(result.halt).toEqual({ reason: 'unauthorized', message: 'Unauthorized' });
      expect(result.outcomes).toEqual([
        {
          kind: 'fatal-failure',
          chunk: chunks[0],
          cause: { kind: 'unauthorized', message: 'Unauthorized', status: 401 },
          attempts: 2,
        },
        { kind: 'not-attempted', chunk: chunks[1] },
      ]);
    });

    it('halts the run when authentication fails', async () => {
      const api = new FakeDataApi();
      const rejecting = new CountingAuthenticator(
        undefined,
        new AuthError('Authentication rejected (HTTP 401)', 401)
      );
      const { pool } = createPool({ api, authenticator: rejecting, config: { maxWorkers: 1 } });
      const chunks = chunksFor(3);

      const result = await pool.run(chunks);

      expect(result.halt).toEqual({ reason: 'auth', message: 'Authentication rejected (HTTP 401)' });
      expect(result.outcomes[0]).toEqual({
        kind: 'fatal-failure',
        chunk: chunks[0],
        cause: { kind: 'auth', message: 'Authentication rejected (HTTP 401)', status: 401 },
        attempts: 1,
      });
      expect(kindsByIndex(result.outcomes)).toEqual([
        'fatal-failure',
        'not-attempted',
        'not-attempted',
      ]);
      expect(api.calls).toHaveLength(0);
    });
  });

  describe('halting and failures', () => {
    it('stops dispatch on 503 and lets in-flight chunks finish', async () => {
      const api = new FakeDataApi()
        .script('POAL#0', new HTTPError('Service Unavailable', 503, DATA_URL))
        .script('POAL#1', async () => {
          await clock.sleep(1000);
          return { kind: 'no-data' };
        });
      const { pool, clock } = createPool({ api, config: { maxWorkers: 2 } });
      const reported: FetchOutcome[] = [];

      const result = await pool.run(chunksFor(4), {
        onOutcome: (outcome) => {
          reported.push(outcome);
        },
      });

      expect(result.halt).toEqual({ reason: 'maintenance', message: 'Service Unavailable' });
      expect(kindsByIndex(result.outcomes)).toEqual([
        'fatal-failure',
        'no-data',
        'not-attempted',
        'not-attempted',
      ]);
      for (const outcome of result.outcomes) {
        expect(outcome.kind).toBeOneOf(['fatal-failure', 'no-data', 'not-attempted']);
      }
      expect(reported).toHaveLength(4);
      expect(api.calls).toHaveLength(2);
    });

    it('fails a chunk whose temporary URL is refused without retrying', async () => {
      const refused: RemoteArtifact = {
        filename: 'export.csv',
        remote: true,
        open: async () => {
          throw new HTTPError('Forbidden', 403, 'https://files.example.test/export.csv');
        },
      };
      const api = new FakeDataApi().script('POAL', artifactsResponse(refused));
      const { pool, writer } = createPool({ api });

      const result = await pool.run([makeChunk()]);

      expect(result.outcomes[0]).toMatchObject({
        kind: 'fatal-failure',
        cause: { kind: 'http', message: 'Forbidden', status: 403 },
        attempts: 1,
      });
      expect(writer.files.size).toBe(0);
      expect(result.halt).toBeNull();
    });

    it('keeps running when the outcome hook throws', async () => {
      const { pool } = createPool({ api: new FakeDataApi() });

      const result = await pool.run(chunksFor(2), {
        onOutcome: () => {
          throw new Error('sink unavailable');
        },
      });

      expect(kindsByIndex(result.outcomes)).toEqual(['no-data', 'no-data']);
    });
  });

  describe('concurrency and rate limiting', () => {
    it('never runs more than maxWorkers chunks at once', async () => {
      let inFlight = 0;
      let peak = 0;
      const api = new FakeDataApi(async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await clock.sleep(1000);
        inFlight--;
        return { kind: 'no-data' };
      });
      const { pool, clock } = createPool({ api, config: { maxWorkers: 2 } });

      const result = await pool.run(chunksFor(5));

      expect(result.outcomes).toHaveLength(5);
      expect(peak).toBe(2);
    });

    it('shares the rate limiter across workers', async () => {
      const clock = new VirtualClock();
      const offsets: number[] = [];
      const api = new FakeDataApi(async () => {
        offsets.push(clock.now() - Date.UTC(2024, 0, 1));
        return { kind: 'no-data' };
      });
      const { pool } = createPool({
        api,
        clock,
        config: {
          maxWorkers: 3,
          rateLimiter: new SlidingWindowRateLimiter({ maxRequests: 2, windowMs: 60_000, clock }),
        },
      });

      await pool.run(chunksFor(3));

      expect(offsets).toEqual([0, 0, 60_000]);
    });

    it('takes a rate limiter slot for each temporary URL', async () => {
      const clock = new VirtualClock();
      const opened: number[] = [];
      const timed: RemoteArtifact = {
        filename: 'export.csv',
        remote: true,
        open: async () => {
          opened.push(clock.now() - Date.UTC(2024, 0, 1));
          return fakeStream('ok');
        },
      };
      const api = new FakeDataApi().script('POAL', artifactsResponse(timed));
      const { pool } = createPool({
        api,
        clock,
        config: {
          rateLimiter: new SlidingWindowRateLimiter({ maxRequests: 1, windowMs: 1000, clock }),
        },
      });

      await pool.run([makeChunk()]);

      expect(opened).toEqual([1000]);
    });

    it('rejects a non-positive worker count', () => {
      expect(() => createPool({ api: new FakeDataApi(), config: { maxWorkers: 0 } })).toThrow(
        RangeError
      );
    });
  });
});
