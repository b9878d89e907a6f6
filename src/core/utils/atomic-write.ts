/**
 * Atomic file writes
 *
 * Write to a uniquely named temp file beside the target, then rename over it.
 * Readers see either the previous file or the complete new one.
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

let tempCounter = 0;

/**
 * Atomically write string data to a file
 *
 * @throws the underlying fs error; the temp file is removed first
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  // pid + counter keeps concurrent writers in one process apart
  tempCounter += 1;
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.${tempCounter}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      if (!isMissingFileError(cleanupError)) {
        throw new AggregateError([error, cleanupError], `Atomic write to ${filePath} failed`);
      }
    });
    throw error;
  }
}

/**
 * Atomically write JSON data to a file
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  space: number | string = 2
): Promise<void> {
  const json = JSON.stringify(data, null, space);
  await atomicWriteFile(filePath, json, 'utf-8');
}

export function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
