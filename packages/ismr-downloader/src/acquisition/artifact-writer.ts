/**
 * Artifact Writer
 *
 * Persists chunk artifacts at deterministic destinations:
 *
 *   single artifact:  {outputDir}/{station}/{stem}{ext}
 *   several:          {outputDir}/{station}/{stem}/{filename}
 *
 * where stem = {station}_{dataType}_{YYYYMMDDHHmm}_{YYYYMMDDHHmm}.
 *
 * Writes are staged under dot-prefixed names and renamed into place on
 * commit, so findExisting() only ever sees complete chunks.
 */

import { createWriteStream } from 'node:fs';
import { mkdir, readdir, rename, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { Readable, Transform } from 'node:stream';
import type { ReadableStream } from 'node:stream/web';
import { pipeline } from 'node:stream/promises';
import { ArtifactWriteError, errorMessage } from '../core/errors.js';
import { formatCompactTimestamp } from '../core/time-range.js';
import type { Chunk } from '../core/types.js';
import {
  isFilesystemError,
  isNotFound,
  removeQuietly,
  tempPathFor,
} from '../core/utils/atomic-write.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Staged artifacts of one chunk; nothing is visible until commit()
 */
export interface ArtifactStaging {
  /**
   * Stream one artifact body to its staging location
   *
   * @returns Bytes written
   * @throws {ArtifactWriteError} If the file cannot be written; body read
   *   failures propagate unchanged
   */
  write(filename: string, body: ReadableStream<Uint8Array>): Promise<number>;

  /** Move staged artifacts to their final paths */
  commit(): Promise<readonly string[]>;

  /** Discard staged artifacts */
  abort(): Promise<void>;
}

export interface ArtifactWriter {
  /** Path of an existing artifact for the chunk, or null */
  findExisting(chunk: Chunk): Promise<string | null>;

  /**
   * Start writing a chunk's artifacts
   *
   * @param artifactCount - Number of artifacts the response announced
   */
  stage(chunk: Chunk, artifactCount: number): ArtifactStaging;
}

// ============================================================================
// Naming
// ============================================================================

/**
 * Deterministic base name of a chunk's artifact(s)
 */
export function artifactStem(chunk: Chunk): string {
  return [
    chunk.station,
    chunk.dataType,
    formatCompactTimestamp(chunk.rangeStart),
    formatCompactTimestamp(chunk.rangeEnd),
  ].join('_');
}

/**
 * Extension of a server file name, keeping `.tar` in front of a compression suffix
 */
export function artifactExtension(filename: string): string {
  const match = /(\.tar)?\.[A-Za-z0-9]+$/.exec(filename);
  return match ? match[0] : '';
}

// ============================================================================
// Filesystem Writer
// ============================================================================

export class FsArtifactWriter implements ArtifactWriter {
  constructor(readonly outputDir: string) {}

  stationDir(chunk: Chunk): string {
    return join(this.outputDir, chunk.station);
  }

  async findExisting(chunk: Chunk): Promise<string | null> {
    const dir = this.stationDir(chunk);
    const stem = artifactStem(chunk);

    let entries: string[];
    try {
      entries = await readdir(dir);
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    const match = entries.find((entry) => entry === stem || entry.startsWith(`${stem}.`));
    return match ? join(dir, match) : null;
  }

  stage(chunk: Chunk, artifactCount: number): ArtifactStaging {
    const dir = this.stationDir(chunk);
    const stem = artifactStem(chunk);

    return artifactCount > 1
      ? new DirectoryStaging(join(dir, stem))
      : new SingleFileStaging(dir, stem);
  }
}

/**
 * One artifact, renamed to {stem}{ext}
 */
class SingleFileStaging implements ArtifactStaging {
  private staged: { readonly tempPath: string; readonly finalPath: string } | null = null;

  constructor(
    private readonly dir: string,
    private readonly stem: string
  ) {}

  async write(filename: string, body: ReadableStream<Uint8Array>): Promise<number> {
    if (this.staged) {
      throw new ArtifactWriteError('Single-artifact chunk received a second artifact', this.dir);
    }

    const finalPath = join(this.dir, `${this.stem}${artifactExtension(filename)}`);
    const tempPath = tempPathFor(finalPath);
    this.staged = { tempPath, finalPath };

    await ensureDir(this.dir);
    return streamToFile(body, tempPath);
  }

  async commit(): Promise<readonly string[]> {
    if (!this.staged) return [];

    const { tempPath, finalPath } = this.staged;
    try {
      await rename(tempPath, finalPath);
    } catch (error) {
      throw new ArtifactWriteError(
        `Failed to move artifact into place: ${errorMessage(error)}`,
        finalPath,
        { cause: error }
      );
    }
    this.staged = null;
    return [finalPath];
  }

  async abort(): Promise<void> {
    if (!this.staged) return;
    await removeQuietly(this.staged.tempPath);
    this.staged = null;
  }
}

/**
 * Several artifacts, written into a hidden directory renamed to {stem}/
 */
class DirectoryStaging implements ArtifactStaging {
  private readonly tempDir: string;
  private readonly names: string[] = [];

  constructor(private readonly finalDir: string) {
    this.tempDir = tempPathFor(finalDir);
  }

  async write(filename: string, body: ReadableStream<Uint8Array>): Promise<number> {
    await ensureDir(this.tempDir);
    this.names.push(filename);
    return streamToFile(body, join(this.tempDir, filename));
  }

  async commit(): Promise<readonly string[]> {
    try {
      // A leftover directory from an --overwrite run is replaced as a whole
      await rm(this.finalDir, { recursive: true, force: true });
      await rename(this.tempDir, this.finalDir);
    } catch (error) {
      throw new ArtifactWriteError(
        `Failed to move artifacts into place: ${errorMessage(error)}`,
        this.finalDir,
        { cause: error }
      );
    }
    return this.names.map((name) => join(this.finalDir, name));
  }

  async abort(): Promise<void> {
    await rm(this.tempDir, { recursive: true, force: true });
  }
}

async function ensureDir(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
  } catch (error) {
    throw new ArtifactWriteError(`Cannot create directory: ${errorMessage(error)}`, dir, {
      cause: error,
    });
  }
}

async function streamToFile(body: ReadableStream<Uint8Array>, path: string): Promise<number> {
  let bytes = 0;
  const counter = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      bytes += chunk.length;
      callback(null, chunk);
    },
  });

  try {
    await pipeline(Readable.fromWeb(body), counter, createWriteStream(path, { mode: 0o644 }));
  } catch (error) {
    await removeQuietly(path);

    // Failures reading the body belong to the transport, not the writer
    if (!isFilesystemError(error)) throw error;

    throw new ArtifactWriteError(`Failed to write artifact: ${errorMessage(error)}`, path, {
      cause: error,
    });
  }

  return bytes;
}

// ============================================================================
// In-Memory Writer
// ============================================================================

/**
 * Writer that keeps artifacts in memory, keyed by their would-be path
 */
export class MemoryArtifactWriter implements ArtifactWriter {
  readonly files = new Map<string, Uint8Array>();

  constructor(readonly outputDir: string = 'downloads') {}

  async findExisting(chunk: Chunk): Promise<string | null> {
    const prefix = join(this.outputDir, chunk.station, artifactStem(chunk));
    for (const path of this.files.keys()) {
      if (path === prefix || path.startsWith(`${prefix}.`) || path.startsWith(`${prefix}/`)) {
        return path;
      }
    }
    return null;
  }

  stage(chunk: Chunk, artifactCount: number): ArtifactStaging {
    const stationDir = join(this.outputDir, chunk.station);
    const stem = artifactStem(chunk);
    const staged = new Map<string, Uint8Array>();

    return {
      write: async (filename, body) => {
        const path =
          artifactCount > 1
            ? join(stationDir, stem, filename)
            : join(stationDir, `${stem}${artifactExtension(filename)}`);

        const parts: Uint8Array[] = [];
        for await (const part of body) {
          parts.push(part);
        }

        const data = Buffer.concat(parts);
        staged.set(path, data);
        return data.length;
      },
      commit: async () => {
        for (const [path, data] of staged) {
          this.files.set(path, data);
        }
        const paths = [...staged.keys()];
        staged.clear();
        return paths;
      },
      abort: async () => {
        staged.clear();
      },
    };
  }
}
