/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename, atomic on POSIX. A crash mid-write leaves
 * either the old file or the new one, never a partial checkpoint.
 */

import { writeFile, rename, unlink, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Atomically write string data to file
 *
 * @example
 * ```typescript
 * await atomicWriteFile('/data/out.csv', header + rows);
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  // PID + timestamp keeps concurrent runs on different outputs apart
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    // Temp file may never have been created
    await unlink(tempPath).catch(() => undefined);
    throw error;
  }
}

/**
 * Atomically write JSON data to file
 *
 * @example
 * ```typescript
 * await atomicWriteJSON('/data/out.csv.checkpoint.json', { lastCompletedIndex: 999 });
 * ```
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number | string = 2
): Promise<void> {
  const json = JSON.stringify(data, null, space);
  await atomicWriteFile(filePath, json, 'utf-8');
}
