/**
 * ISMR Query Tool API Client
 *
 * The two remote calls the engine makes:
 * - Authentication: POST {base}/user/token with email/password → bearer token
 * - Data fetch: GET {base}/data/download/{dataType}?station&start&end
 *
 * RESPONSE MODES (configured, the API serves one per deployment):
 * - bundle: JSON `{ bundle: { url, filename } }`, `bundle: null` = no data
 * - files:  JSON `{ files: [{ url, filename }] }`, empty list = no data
 * - direct: the body is the artifact, 204 = no data
 *
 * HTTP failures are not handled here; they propagate as HTTPError /
 * HTTPTimeoutError / HTTPNetworkError so RetryPolicy can classify them.
 */

import { basename } from 'node:path';
import { z } from 'zod';
import { AuthError, UnexpectedResponseError, errorMessage } from '../core/errors.js';
import { HTTPClient, HTTPError, type HTTPStream } from '../core/http-client.js';
import { formatApiTimestamp, formatCompactTimestamp } from '../core/time-range.js';
import type { Chunk, Instant } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { AuthGrant, Authenticator } from '../auth/token-store.js';

const log = createLogger({ module: 'api-client' });

// ============================================================================
// Types
// ============================================================================

export const RESPONSE_MODES = ['bundle', 'files', 'direct'] as const;

export type ResponseMode = (typeof RESPONSE_MODES)[number];

/**
 * One artifact announced by the data endpoint
 */
export interface RemoteArtifact {
  /** Server-side file name (sanitized to a bare name) */
  readonly filename: string;

  /** True when open() issues a new HTTP request */
  readonly remote: boolean;

  /** Open the artifact body */
  open(): Promise<HTTPStream>;
}

export type ChunkResponse =
  | { readonly kind: 'no-data' }
  | { readonly kind: 'artifacts'; readonly artifacts: readonly RemoteArtifact[] };

/**
 * Data-fetch port used by the worker pool
 */
export interface DataApi {
  fetchChunk(chunk: Chunk, token: string): Promise<ChunkResponse>;
}

export interface IsmrApiClientConfig {
  /** e.g. https://api-ismrquerytool.fct.unesp.br/api/v1 */
  readonly apiBaseUrl: string;
  readonly email: string;
  readonly password: string;
  readonly mode: ResponseMode;
  readonly http?: HTTPClient;
}

// ============================================================================
// Response Schemas
// ============================================================================

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_at: z.string().nullish(),
});

const ArtifactRefSchema = z.object({
  url: z.string().url(),
  filename: z.string().min(1),
});

const BundleResponseSchema = z.object({
  bundle: ArtifactRefSchema.nullable(),
});

const FilesResponseSchema = z.object({
  files: z.array(ArtifactRefSchema),
});

type ArtifactRef = z.infer<typeof ArtifactRefSchema>;

// ============================================================================
// Client
// ============================================================================

export class IsmrApiClient implements Authenticator, DataApi {
  private readonly config: IsmrApiClientConfig;
  private readonly http: HTTPClient;

  constructor(config: IsmrApiClientConfig) {
    this.config = { ...config, apiBaseUrl: config.apiBaseUrl.replace(/\/+$/, '') };
    this.http = config.http ?? new HTTPClient();
  }

  get loginUrl(): string {
    return `${this.config.apiBaseUrl}/user/token`;
  }

  downloadUrl(chunk: Chunk): string {
    return `${this.config.apiBaseUrl}/data/download/${chunk.dataType}`;
  }

  /**
   * Exchange email/password for a bearer token
   *
   * @throws {AuthError} On non-2xx, transport failure or malformed response
   */
  async authenticate(): Promise<AuthGrant> {
    let body: unknown;
    try {
      body = await this.http.fetchJSON(this.loginUrl, {
        method: 'POST',
        json: { email: this.config.email, password: this.config.password },
      });
    } catch (error) {
      if (error instanceof HTTPError) {
        throw new AuthError(
          `Authentication rejected (HTTP ${error.statusCode})`,
          error.statusCode,
          { cause: error }
        );
      }
      throw new AuthError(`Authentication request failed: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }

    const parsed = TokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthError('Invalid token response: missing access_token');
    }

    return {
      value: parsed.data.access_token,
      expiresAt: parseServerInstant(parsed.data.expires_at),
    };
  }

  /**
   * Ask the data endpoint for one chunk
   *
   * @throws {UnexpectedResponseError} If the body does not match the configured mode
   */
  async fetchChunk(chunk: Chunk, token: string): Promise<ChunkResponse> {
    const url = this.downloadUrl(chunk);
    const options = {
      headers: { Authorization: `Bearer ${token}` },
      query: {
        station: chunk.station,
        start: formatApiTimestamp(chunk.rangeStart),
        end: formatApiTimestamp(chunk.rangeEnd),
      },
    };

    switch (this.config.mode) {
      case 'bundle': {
        const body = await this.http.fetchJSON(url, options);
        const parsed = BundleResponseSchema.safeParse(body);
        if (!parsed.success) {
          throw new UnexpectedResponseError(`Unexpected bundle response: ${preview(body)}`, url);
        }
        return parsed.data.bundle
          ? { kind: 'artifacts', artifacts: [this.remoteArtifact(parsed.data.bundle, url)] }
          : { kind: 'no-data' };
      }

      case 'files': {
        const body = await this.http.fetchJSON(url, options);
        const parsed = FilesResponseSchema.safeParse(body);
        if (!parsed.success) {
          throw new UnexpectedResponseError(`Unexpected files response: ${preview(body)}`, url);
        }
        if (parsed.data.files.length === 0) {
          return { kind: 'no-data' };
        }

        const artifacts = parsed.data.files.map((ref) => this.remoteArtifact(ref, url));
        const names = new Set(artifacts.map((artifact) => artifact.filename));
        if (names.size !== artifacts.length) {
          throw new UnexpectedResponseError(
            `Files response repeats a file name: ${artifacts.map((a) => a.filename).join(', ')}`,
            url
          );
        }
        return { kind: 'artifacts', artifacts };
      }

      case 'direct': {
        const stream = await this.http.openStream(url, options);
        if (!stream) {
          return { kind: 'no-data' };
        }
        let filename: string;
        try {
          filename = safeFilename(
            filenameFromDisposition(stream.headers.get('content-disposition')) ??
              defaultArtifactName(chunk),
            url
          );
        } catch (error) {
          await abandonStream(stream);
          throw error;
        }
        return {
          kind: 'artifacts',
          artifacts: [{ filename, remote: false, open: async () => stream }],
        };
      }
    }
  }

  /**
   * Temporary URLs are fetched without the bearer header
   */
  private remoteArtifact(ref: ArtifactRef, sourceUrl: string): RemoteArtifact {
    return {
      filename: safeFilename(ref.filename, sourceUrl),
      remote: true,
      open: async () => {
        const stream = await this.http.openStream(ref.url);
        if (!stream) {
          throw new UnexpectedResponseError('Artifact URL returned no content', ref.url);
        }
        return stream;
      },
    };
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Parse an expiry reported by the server; zone-less values are UTC
 */
export function parseServerInstant(value: string | null | undefined): Instant | undefined {
  if (!value) {
    return undefined;
  }
  const withZone = /(Z|[+-]\d{2}:?\d{2})$/i.test(value) ? value : `${value}Z`;
  const parsed = Date.parse(withZone);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Extract the file name from a Content-Disposition header
 */
export function filenameFromDisposition(header: string | null): string | undefined {
  if (!header) {
    return undefined;
  }

  const extended = /filename\*\s*=\s*(?:UTF-8'')?([^;]+)/i.exec(header);
  if (extended) {
    try {
      return decodeURIComponent(extended[1].trim().replace(/^"|"$/g, ''));
    } catch (error) {
      log.debug('Malformed filename* parameter, using plain filename', {
        header,
        error: errorMessage(error),
      });
    }
  }

  const plain = /filename\s*=\s*("([^"]*)"|[^;]+)/i.exec(header);
  if (!plain) {
    return undefined;
  }
  return (plain[2] ?? plain[1]).trim() || undefined;
}

/**
 * Name used when a direct response carries no file name
 */
export function defaultArtifactName(chunk: Chunk): string {
  return `${chunk.station}_${chunk.dataType}_${formatCompactTimestamp(chunk.rangeStart)}.bin`;
}

/**
 * Reduce a server-provided name to a bare file name
 *
 * @throws {UnexpectedResponseError} If nothing usable remains
 */
export function safeFilename(name: string, url: string): string {
  const bare = basename(name.replace(/\\/g, '/')).trim();
  if (bare === '' || bare === '.' || bare === '..') {
    throw new UnexpectedResponseError(`Unusable artifact file name: ${name}`, url);
  }
  return bare;
}

/**
 * Release the connection and the download timer of a stream that will not be read
 */
async function abandonStream(stream: HTTPStream): Promise<void> {
  stream.close();
  try {
    await stream.body.cancel();
  } catch (error) {
    log.debug('Failed to cancel response body', { url: stream.url, error: errorMessage(error) });
  }
}

function preview(body: unknown): string {
  return JSON.stringify(body)?.slice(0, 200) ?? String(body);
}
