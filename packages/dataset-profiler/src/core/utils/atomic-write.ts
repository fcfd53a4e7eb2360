/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename, so a reader of the target path sees either the
 * previous content or the complete new content.
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Atomically write string data to a file, creating parent directories
 *
 * @throws Error if the write or rename fails; the temp file is removed
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  // PID + timestamp keep concurrent writers apart
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Atomically write JSON data to a file
 *
 * @example
 * ```typescript
 * await atomicWriteJSON('out/roads.json', document);
 * ```
 */
export async function atomicWriteJSON(filePath: string, data: unknown, space: number | string = 2): Promise<void> {
  await atomicWriteFile(filePath, `${JSON.stringify(data, null, space)}\n`);
}
