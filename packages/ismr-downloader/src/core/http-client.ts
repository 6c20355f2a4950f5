/**
 * HTTP Client for the ISMR API
 *
 * Thin wrapper over native fetch that the engine builds on:
 * - Configurable timeouts via AbortController
 * - Typed errors: HTTPError (status), HTTPTimeoutError, HTTPNetworkError
 * - Retry-After parsing for throttled responses
 * - Streaming downloads whose timeout covers the whole body, not just headers
 *
 * The client performs exactly one exchange per call. Retrying is the job of
 * RetryPolicy, which sees every attempt and decides per HTTP outcome.
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ timeoutMs: 30000 });
 * const body: unknown = await client.fetchJSON(url, {
 *   method: 'POST',
 *   json: { email, password },
 * });
 * const token = TokenResponseSchema.parse(body);
 * ```
 */

import type { ReadableStream } from 'node:stream/web';
import { createLogger } from './utils/logger.js';

const log = createLogger({ module: 'http-client' });

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeoutMs: number;

  /** Timeout for streamed downloads, headers through last byte (default: 120000) */
  readonly downloadTimeoutMs: number;

  /** User-Agent header */
  readonly userAgent: string;
}

/**
 * Per-request options (override client defaults)
 */
export interface RequestOptions {
  readonly timeoutMs?: number;
  readonly headers?: Record<string, string>;
  readonly method?: 'GET' | 'POST';

  /** JSON body; sets Content-Type */
  readonly json?: unknown;

  /** Query string parameters */
  readonly query?: Record<string, string>;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * Non-2xx HTTP response
 */
export class HTTPError extends Error {
  readonly statusCode: number;
  readonly url: string;

  /** Parsed Retry-After header in milliseconds, if present */
  readonly retryAfterMs?: number;

  constructor(message: string, statusCode: number, url: string, retryAfterMs?: number) {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Request timeout error (AbortController triggered)
 */
export class HTTPTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Network error (connection refused, DNS failure, reset, TLS)
 */
export class HTTPNetworkError extends Error {
  readonly url: string;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`, { cause });
    this.name = 'HTTPNetworkError';
    this.url = url;
  }
}

/**
 * JSON parse error
 */
export class HTTPJSONParseError extends Error {
  readonly url: string;
  readonly responseText: string;

  constructor(url: string, responseText: string, cause: Error) {
    super(`Failed to parse JSON response: ${cause.message}`, { cause });
    this.name = 'HTTPJSONParseError';
    this.url = url;
    this.responseText = responseText.slice(0, 500);
  }
}

// ============================================================================
// Streaming
// ============================================================================

/**
 * Open response body whose timeout stays armed until close()
 */
export interface HTTPStream {
  readonly url: string;
  readonly status: number;
  readonly headers: Headers;
  readonly body: ReadableStream<Uint8Array>;
  readonly contentLength?: number;

  /** True if the download timeout fired (body reads then fail with AbortError) */
  timedOut(): boolean;

  /** Disarm the timeout; call once the body is consumed or abandoned */
  close(): void;
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      timeoutMs: 30000,
      downloadTimeoutMs: 120000,
      userAgent: 'ismr-downloader/1.0',
      ...config,
    };
  }

  /**
   * Perform a request and parse the JSON response
   *
   * The timeout covers the whole exchange, headers through the last body byte.
   *
   * @throws {HTTPError} For non-2xx responses
   * @throws {HTTPTimeoutError} If the exchange exceeds the timeout
   * @throws {HTTPNetworkError} For transport failures, including mid-body resets
   * @throws {HTTPJSONParseError} If the body is not valid JSON
   */
  async fetchJSON(url: string, options?: RequestOptions): Promise<unknown> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const target = withQuery(url, options?.query);

    let text: string;
    try {
      const response = await this.send(target, controller, timeoutMs, options);
      await assertOk(response, target);
      text = await readText(response, target, controller, timeoutMs);
    } finally {
      clearTimeout(timeoutId);
    }

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new HTTPJSONParseError(
        url,
        text,
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  /**
   * Open a streamed download
   *
   * The download timeout keeps running while the caller reads the body.
   * Resolves to null for 204 No Content.
   */
  async openStream(url: string, options?: RequestOptions): Promise<HTTPStream | null> {
    const timeoutMs = options?.timeoutMs ?? this.config.downloadTimeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const target = withQuery(url, options?.query);

    try {
      const response = await this.send(target, controller, timeoutMs, options);
      await assertOk(response, target);

      if (response.status === 204) {
        clearTimeout(timeoutId);
        return null;
      }

      if (!response.body) {
        throw new HTTPError(`HTTP ${response.status}: empty body`, response.status, target);
      }

      const length = Number(response.headers.get('content-length'));

      return {
        url: target,
        status: response.status,
        headers: response.headers,
        body: response.body,
        contentLength: Number.isFinite(length) && length > 0 ? length : undefined,
        timedOut: () => controller.signal.aborted,
        close: () => clearTimeout(timeoutId),
      };
    } catch (error) {
      clearTimeout(timeoutId);
      throw error;
    }
  }

  /**
   * Issue the fetch and translate transport failures into typed errors
   */
  private async send(
    url: string,
    controller: AbortController,
    timeoutMs: number,
    options?: RequestOptions
  ): Promise<Response> {
    const headers: Record<string, string> = {
      'User-Agent': this.config.userAgent,
      Accept: 'application/json',
      ...(options?.json !== undefined ? { 'Content-Type': 'application/json' } : {}),
      ...options?.headers,
    };

    try {
      return await fetch(url, {
        method: options?.method ?? 'GET',
        headers,
        body: options?.json !== undefined ? JSON.stringify(options.json) : undefined,
        redirect: 'follow',
        signal: controller.signal,
      });
    } catch (error) {
      if (controller.signal.aborted) {
        throw new HTTPTimeoutError(url, timeoutMs);
      }

      throw new HTTPNetworkError(url, error instanceof Error ? error : new Error(String(error)));
    }
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Read the whole body while the caller's timeout is still armed
 */
async function readText(
  response: Response,
  url: string,
  controller: AbortController,
  timeoutMs: number
): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    if (controller.signal.aborted) {
      throw new HTTPTimeoutError(url, timeoutMs);
    }
    throw new HTTPNetworkError(url, error instanceof Error ? error : new Error(String(error)));
  }
}

async function assertOk(response: Response, url: string): Promise<void> {
  if (response.ok) {
    return;
  }

  // Drain so the connection can be reused
  try {
    await response.body?.cancel();
  } catch (error) {
    log.debug('Failed to discard error response body', {
      url,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  throw new HTTPError(
    `HTTP ${response.status}: ${response.statusText}`,
    response.status,
    url,
    parseRetryAfter(response.headers.get('retry-after'))
  );
}

function withQuery(url: string, query?: Record<string, string>): string {
  if (!query || Object.keys(query).length === 0) {
    return url;
  }

  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    target.searchParams.set(key, value);
  }
  return target.toString();
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into milliseconds
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (value === null || value.trim() === '') {
    return undefined;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}
