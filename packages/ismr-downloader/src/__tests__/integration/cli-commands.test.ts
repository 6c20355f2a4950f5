/**
 * CLI commands end to end against a stubbed fetch and a temporary directory
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock, type MockInstance } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { executeDownload, type DownloadOptions } from '../../cli/commands/download.js';
import { executePlan } from '../../cli/commands/plan.js';
import { executeClear, executeLogin, executeStatus } from '../../cli/commands/auth.js';
import { EXIT_CODES } from '../../cli/lib/context.js';
import { VirtualClock } from '../setup.js';

const BASE_URL = 'https://api.example.test/api/v1';
const FILES_URL = 'https://files.example.test/';
const ENV = { ISMR_EMAIL: 'user@example.test', ISMR_PASSWORD: 'test-secret' };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

/**
 * Token endpoint plus a data endpoint that has data for 2024-01-01 only
 */
function apiServer(overrides: { login?: () => Response; data?: () => Response } = {}) {
  return async (input: string | URL | Request): Promise<Response> => {
    const url = String(input);
    if (url.endsWith('/user/token')) {
      return overrides.login?.() ??
        jsonResponse({ access_token: 'test-token', expires_at: '2024-01-01T03:00:00' });
    }
    if (url.startsWith(FILES_URL)) {
      return new Response('a,b\n');
    }
    if (overrides.data) {
      return overrides.data();
    }
    return url.includes('start=2024-01-01')
      ? jsonResponse({ bundle: { url: `${FILES_URL}poal-1.csv`, filename: 'poal-1.csv' } })
      : jsonResponse({ bundle: null });
  };
}

function messages(spy: MockInstance<typeof console.info>): string[] {
  return spy.mock.calls.map(([line]) => {
    const entry: unknown = JSON.parse(String(line));
    return typeof entry === 'object' && entry !== null && 'message' in entry
      ? String(entry.message)
      : '';
  });
}

describe('CLI commands', () => {
  let dir: string;
  let fetchMock: Mock<typeof fetch>;
  let info: MockInstance<typeof console.info>;
  let stdout: MockInstance<typeof console.log>;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ismr-cli-'));
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);

    info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    stdout = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'debug').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  function downloadOptions(overrides: DownloadOptions = {}): DownloadOptions {
    return {
      stations: 'POAL',
      start: '2024-01-01',
      end: '2024-01-02',
      maxDays: '1',
      outputDir: join(dir, 'out'),
      logsDir: join(dir, 'logs'),
      tokenCache: join(dir, 'token.json'),
      baseUrl: BASE_URL,
      ...overrides,
    };
  }

  const requestsTo = (suffix: string) =>
    fetchMock.mock.calls.filter(([input]) => String(input).includes(suffix)).length;

  describe('download', () => {
    it('downloads, records no-data intervals and caches the token', async () => {
      fetchMock.mockImplementation(apiServer());

      const code = await executeDownload(
        downloadOptions(),
        { json: true },
        { env: ENV, cwd: dir, clock: new VirtualClock() }
      );

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(
        await readFile(join(dir, 'out', 'POAL', 'POAL_ismr_202401010000_202401020000.csv'), 'utf-8')
      ).toBe('a,b\n');
      expect(await readFile(join(dir, 'logs', 'no_data_20240101_000000.csv'), 'utf-8')).toBe(
        'station,dataType,rangeStart,rangeEnd\nPOAL,ismr,2024-01-02T00:00:00,2024-01-02T23:59:59\n'
      );
      expect(JSON.parse(await readFile(join(dir, 'token.json'), 'utf-8'))).toEqual({
        value: 'test-token',
        issuedAt: '2024-01-01T00:00:00.000Z',
        expiresAt: '2024-01-01T03:00:00.000Z',
      });
    });

    it('reuses the cached token and skips artifacts from an earlier run', async () => {
      fetchMock.mockImplementation(apiServer());
      const deps = () => ({ env: ENV, cwd: dir, clock: new VirtualClock() });

      await executeDownload(downloadOptions(), { json: true }, deps());
      const second = await executeDownload(downloadOptions(), { json: true }, deps());

      expect(second).toBe(EXIT_CODES.SUCCESS);
      expect(requestsTo('/user/token')).toBe(1);
      expect(requestsTo(FILES_URL)).toBe(1);
      expect(requestsTo('/data/download/ismr')).toBe(3);
    });

    it('exits 4 without requesting data when the login is rejected', async () => {
      fetchMock.mockImplementation(
        apiServer({ login: () => jsonResponse({ detail: 'invalid credentials' }, 401) })
      );

      const code = await executeDownload(
        downloadOptions(),
        { json: true },
        { env: ENV, cwd: dir, clock: new VirtualClock() }
      );

      expect(code).toBe(EXIT_CODES.AUTH_ERROR);
      expect(requestsTo('/data/download')).toBe(0);
    });

    it('exits 1 when the service is under maintenance', async () => {
      fetchMock.mockImplementation(apiServer({ data: () => new Response('', { status: 503 }) }));

      const code = await executeDownload(
        downloadOptions(),
        { json: true },
        { env: ENV, cwd: dir, clock: new VirtualClock() }
      );

      expect(code).toBe(EXIT_CODES.INCOMPLETE);
    });

    it('exits 3 when credentials are missing', async () => {
      const code = await executeDownload(
        downloadOptions(),
        { json: true },
        { env: {}, cwd: dir, clock: new VirtualClock() }
      );

      expect(code).toBe(EXIT_CODES.CONFIG_ERROR);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('exits 3 for an inverted range', async () => {
      const code = await executeDownload(
        downloadOptions({ start: '2024-02-01', end: '2024-01-01' }),
        { json: true },
        { env: ENV, cwd: dir, clock: new VirtualClock() }
      );

      expect(code).toBe(EXIT_CODES.CONFIG_ERROR);
    });
  });

  describe('plan', () => {
    it('lists chunks and marks existing artifacts without any request', async () => {
      const out = join(dir, 'out');
      const existing = join(out, 'POAL', 'POAL_ismr_202401050000_202401090000.csv');
      await mkdir(join(out, 'POAL'), { recursive: true });
      await writeFile(existing, 'x');

      const code = await executePlan(
        { stations: 'POAL', start: '2024-01-01', end: '2024-01-10', maxDays: '4', outputDir: out },
        { json: true },
        { env: {}, cwd: dir }
      );

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(fetchMock).not.toHaveBeenCalled();
      expect(JSON.parse(String(stdout.mock.calls[0][0]))).toEqual([
        {
          index: 0,
          station: 'POAL',
          dataType: 'ismr',
          start: '2024-01-01T00:00:00',
          end: '2024-01-05T00:00:00',
          days: '4.00',
          existing: '',
        },
        {
          index: 1,
          station: 'POAL',
          dataType: 'ismr',
          start: '2024-01-05T00:00:00',
          end: '2024-01-09T00:00:00',
          days: '4.00',
          existing,
        },
        {
          index: 2,
          station: 'POAL',
          dataType: 'ismr',
          start: '2024-01-09T00:00:00',
          end: '2024-01-10T23:59:59',
          days: '2.00',
          existing: '',
        },
      ]);
    });

    it('exits 3 without a time range', async () => {
      const code = await executePlan({ stations: 'POAL' }, { json: true }, { env: {}, cwd: dir });

      expect(code).toBe(EXIT_CODES.CONFIG_ERROR);
    });
  });

  describe('auth', () => {
    it('logs in, reports the cached token and clears it', async () => {
      fetchMock.mockImplementation(apiServer());
      const tokenCache = join(dir, 'token.json');
      const deps = { env: ENV, cwd: dir, clock: new VirtualClock() };

      const login = await executeLogin({ tokenCache, baseUrl: BASE_URL }, { json: true }, deps);
      const status = await executeStatus({ tokenCache }, { json: true }, deps);
      const clear = await executeClear({ tokenCache }, { json: true }, deps);

      expect([login, status, clear]).toEqual([0, 0, 0]);
      expect(messages(info)).toContain('Cached token valid');
      expect(existsSync(tokenCache)).toBe(false);
    });

    it('reports a missing cache', async () => {
      const code = await executeStatus(
        { tokenCache: join(dir, 'absent.json') },
        { json: true },
        { env: {}, cwd: dir }
      );

      expect(code).toBe(EXIT_CODES.SUCCESS);
      expect(messages(info)).toContain('No cached token');
    });
  });
});
