/**
 * Scoped file reads for range responses.
 */

import { promises as fs } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import type { Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { IoErrorCode, RequestErrorCode, createRangeServeError, type ByteRange } from '@rangeserve/core';
import { isErrnoException } from './http-utils.js';

/**
 * Opens `filePath` for reading, runs `fn` with the handle and closes the handle
 * whichever way `fn` settles.
 *
 * A file that disappeared since it was stat'ed fails with Q001; any other open
 * failure with I001.
 */
export async function withFileHandle<T>(filePath: string, fn: (handle: FileHandle) => Promise<T>): Promise<T> {
  let handle: FileHandle;
  try {
    handle = await fs.open(filePath, 'r');
  } catch (error) {
    const missing = isErrnoException(error) && error.code === 'ENOENT';
    throw createRangeServeError({
      code: missing ? RequestErrorCode.FILE_NOT_FOUND : IoErrorCode.FILE_OPEN_FAILED,
      message: missing ? `File not found: ${filePath}` : `Cannot open file: ${filePath}`,
      location: { filePath },
      cause: error,
    });
  }
  try {
    return await fn(handle);
  } finally {
    await handle.close();
  }
}

/**
 * Streams bytes `range.start..range.end` (inclusive) of an open file into
 * `destination` and ends it. The handle stays open; its owner closes it.
 */
export async function pipeFileRange(handle: FileHandle, range: ByteRange, destination: Writable): Promise<void> {
  const source = handle.createReadStream({ start: range.start, end: range.end, autoClose: false });
  await pipeline(source, destination);
}

/**
 * True when a pipeline failed because the receiving side went away.
 */
export function isPrematureClose(error: unknown): boolean {
  return isErrnoException(error) && ['ERR_STREAM_PREMATURE_CLOSE', 'ECONNRESET', 'EPIPE'].includes(error.code ?? '');
}
