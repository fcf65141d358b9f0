/**
 * Random-access reads of a file served over HTTP with byte ranges.
 *
 * The file size and range support come from one HEAD request. Reads fetch at
 * least `readAheadBytes` at a time and keep the last fetched window in memory,
 * so a run of small sequential reads costs one request per window.
 */

import { ConfigErrorCode, RemoteErrorCode, createConfigError, createRemoteError } from '../errors/index.js';
import type { Logger } from '../logger.js';

export const DEFAULT_READ_AHEAD_BYTES = 1024 * 1024;
export const DEFAULT_REMOTE_TIMEOUT_MS = 30_000;

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface RemoteFileOptions {
  fetch?: FetchFn;
  /** Minimum bytes fetched per range request. */
  readAheadBytes?: number;
  timeoutMs?: number;
  logger?: Partial<Logger>;
}

export interface RemoteFileStats {
  rangeRequests: number;
  bytesDownloaded: number;
  windowHits: number;
}

export interface RemoteFile {
  readonly url: string;
  readonly size: number;
  readonly acceptsRanges: boolean;
  readonly contentType: string | null;
  read(offset: number, length: number): Promise<Buffer>;
  prefetch(length: number): Promise<void>;
  stats(): RemoteFileStats;
}

interface ReadWindow {
  offset: number;
  bytes: Buffer;
}

/**
 * Opens a remote file: issues HEAD and records size and range support.
 */
export async function openRemoteFile(url: string, options: RemoteFileOptions = {}): Promise<RemoteFile> {
  const fetchFn = options.fetch ?? globalThis.fetch;
  const readAheadBytes = options.readAheadBytes ?? DEFAULT_READ_AHEAD_BYTES;
  const timeoutMs = options.timeoutMs ?? DEFAULT_REMOTE_TIMEOUT_MS;
  const logger = options.logger ?? {};

  if (!Number.isSafeInteger(readAheadBytes) || readAheadBytes <= 0) {
    throw createConfigError(ConfigErrorCode.INVALID_READ_WINDOW, `Invalid read-ahead size: ${readAheadBytes}`);
  }

  let head: Response;
  try {
    head = await fetchFn(url, { method: 'HEAD', signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    throw createRemoteError(RemoteErrorCode.REMOTE_HEAD_FAILED, `HEAD request failed: ${url}`, { url, cause: error });
  }
  if (head.status >= 400) {
    throw createRemoteError(RemoteErrorCode.REMOTE_HEAD_FAILED, `HEAD request returned ${head.status}`, { url });
  }

  const size = Number(head.headers.get('content-length') ?? '0');
  if (!Number.isSafeInteger(size) || size < 0) {
    throw createRemoteError(RemoteErrorCode.REMOTE_HEAD_FAILED, 'HEAD response has no usable Content-Length', {
      url,
      context: `Content-Length: ${head.headers.get('content-length')}`,
    });
  }
  const acceptsRanges = (head.headers.get('accept-ranges') ?? '').toLowerCase().includes('bytes');
  const contentType = head.headers.get('content-type');
  logger.debug?.('remote.open', { url, size, acceptsRanges });

  const stats: RemoteFileStats = { rangeRequests: 0, bytesDownloaded: 0, windowHits: 0 };
  let window: ReadWindow | null = null;

  async function fetchRange(offset: number, length: number): Promise<Buffer> {
    const end = offset + length - 1;
    let response: Response;
    try {
      response = await fetchFn(url, {
        headers: { Range: `bytes=${offset}-${end}` },
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw createRemoteError(RemoteErrorCode.REMOTE_RANGE_FAILED, `Range request failed: ${url}`, {
        url,
        context: `bytes=${offset}-${end}`,
        cause: error,
      });
    }
    if (response.status !== 206 && response.status !== 200) {
      throw createRemoteError(RemoteErrorCode.REMOTE_RANGE_FAILED, `Range request returned ${response.status}`, {
        url,
        context: `bytes=${offset}-${end}`,
      });
    }

    const body = Buffer.from(await response.arrayBuffer());
    stats.rangeRequests += 1;
    stats.bytesDownloaded += body.length;

    // A 200 carries the whole file: cut the requested window out of it.
    const bytes = response.status === 200 ? body.subarray(offset, offset + length) : body;
    if (bytes.length < length) {
      throw createRemoteError(
        RemoteErrorCode.REMOTE_SHORT_READ,
        `Expected ${length} bytes, received ${bytes.length}`,
        { url, context: `bytes=${offset}-${end}` },
      );
    }
    return bytes.subarray(0, length);
  }

  function readFromWindow(offset: number, length: number): Buffer | null {
    if (!window) {
      return null;
    }
    const relative = offset - window.offset;
    if (relative < 0 || relative + length > window.bytes.length) {
      return null;
    }
    return window.bytes.subarray(relative, relative + length);
  }

  return {
    url,
    size,
    acceptsRanges,
    contentType,

    async read(offset, length) {
      if (!Number.isSafeInteger(offset) || !Number.isSafeInteger(length) || offset < 0 || length < 0) {
        throw createRemoteError(RemoteErrorCode.REMOTE_OUT_OF_BOUNDS, `Invalid read: offset ${offset}, length ${length}`, {
          url,
        });
      }
      if (length === 0) {
        return Buffer.alloc(0);
      }
      if (offset + length > size) {
        throw createRemoteError(
          RemoteErrorCode.REMOTE_OUT_OF_BOUNDS,
          `Read of ${length} bytes at ${offset} exceeds file size ${size}`,
          { url },
        );
      }

      const cached = readFromWindow(offset, length);
      if (cached) {
        stats.windowHits += 1;
        return Buffer.from(cached);
      }

      const fetchLength = Math.min(Math.max(length, readAheadBytes), size - offset);
      const bytes = await fetchRange(offset, fetchLength);
      window = { offset, bytes };
      logger.debug?.('remote.read', { url, offset, length: fetchLength });
      return Buffer.from(bytes.subarray(0, length));
    },

    async prefetch(length) {
      const fetchLength = Math.min(length, size);
      if (fetchLength <= 0) {
        return;
      }
      window = { offset: 0, bytes: await fetchRange(0, fetchLength) };
    },

    stats() {
      return { ...stats };
    },
  };
}
