/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename so readers (the next run loading the token cache,
 * the skip-existing check) only ever see the old file or the complete new one.
 *
 * **Pattern:**
 * 1. Write to a temporary sibling (PID + timestamp keeps concurrent writers apart)
 * 2. Rename over the target (atomic on POSIX)
 * 3. Remove the temporary file if anything fails
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

/**
 * Temporary sibling path for an atomic write
 *
 * Starts with a dot so directory scans keyed on the final file name never
 * match an in-progress write.
 */
export function tempPathFor(filePath: string): string {
  return join(dirname(filePath), `.${basename(filePath)}.${process.pid}.${Date.now()}.tmp`);
}

/**
 * Atomically write string data to file
 *
 * @throws Error if write or rename fails
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = tempPathFor(filePath);

  try {
    await writeFile(tempPath, data, { encoding, mode: 0o600 });
    await rename(tempPath, filePath);
  } catch (error) {
    await removeQuietly(tempPath);
    throw error;
  }
}

/**
 * Atomically write JSON data to file
 *
 * @example
 * ```typescript
 * await atomicWriteJSON('.ismr-token.json', { value, issuedAt, expiresAt });
 * ```
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number | string = 2
): Promise<void> {
  await atomicWriteFile(filePath, JSON.stringify(data, null, space), 'utf-8');
}

/**
 * Remove a file, treating "already gone" as success
 *
 * Any other failure propagates.
 */
export async function removeQuietly(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (error) {
    if (isNotFound(error)) return;
    throw error;
  }
}

export function isNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

/**
 * True for errors raised by a filesystem call (they carry `syscall`)
 */
export function isFilesystemError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'syscall' in error;
}
