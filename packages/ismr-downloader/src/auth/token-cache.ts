/**
 * Token Cache
 *
 * Durable storage for the bearer token between runs. The file holds
 * `{ value, issuedAt, expiresAt }` with ISO 8601 timestamps and is replaced
 * atomically on every refresh.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Token } from '../core/types.js';
import { atomicWriteJSON, isNotFound, removeQuietly } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'token-cache' });

/**
 * Storage port used by TokenStore
 */
export interface TokenCache {
  /** Cached token, or null when absent or unreadable */
  load(): Promise<Token | null>;
  save(token: Token): Promise<void>;
  clear(): Promise<void>;
}

const isoInstant = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), 'must be an ISO 8601 timestamp')
  .transform((value) => Date.parse(value));

const CachedTokenSchema = z.object({
  value: z.string().min(1),
  issuedAt: isoInstant,
  expiresAt: isoInstant,
});

/**
 * JSON file token cache
 */
export class FileTokenCache implements TokenCache {
  constructor(readonly path: string) {}

  async load(): Promise<Token | null> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (!isNotFound(error)) {
        log.warn('Failed to read token cache', {
          path: this.path,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      log.warn('Token cache is not valid JSON, ignoring', { path: this.path });
      return null;
    }

    const parsed = CachedTokenSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn('Token cache has unexpected shape, ignoring', {
        path: this.path,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return null;
    }

    return Object.freeze(parsed.data);
  }

  async save(token: Token): Promise<void> {
    await atomicWriteJSON(this.path, {
      value: token.value,
      issuedAt: new Date(token.issuedAt).toISOString(),
      expiresAt: new Date(token.expiresAt).toISOString(),
    });
  }

  async clear(): Promise<void> {
    await removeQuietly(this.path);
  }
}

/**
 * In-memory cache
 */
export class MemoryTokenCache implements TokenCache {
  private token: Token | null;

  constructor(initial: Token | null = null) {
    this.token = initial;
  }

  async load(): Promise<Token | null> {
    return this.token;
  }

  async save(token: Token): Promise<void> {
    this.token = token;
  }

  async clear(): Promise<void> {
    this.token = null;
  }
}
