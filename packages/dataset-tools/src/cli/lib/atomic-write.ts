/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename, so a dataset file on disk is always either the
 * previous version or the complete new one.
 *
 * @module cli/lib/atomic-write
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Atomically write string data to file
 *
 * @param filePath - Target file path
 * @param data - String data to write
 * @throws Error if write or rename fails
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  // PID + timestamp keeps concurrent runs apart
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch(() => {
      /* temp file may never have been created */
    });
    throw error;
  }
}

/**
 * Atomically write JSON data to file, pretty-printed with a trailing newline
 *
 * @example
 * ```typescript
 * await atomicWriteJSON('dataset/metadata.json', metadata);
 * ```
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number | string = 2
): Promise<void> {
  await atomicWriteFile(filePath, `${JSON.stringify(data, null, space)}\n`, 'utf-8');
}
