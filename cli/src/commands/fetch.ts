import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { openRemoteFile, type FetchFn, type Logger } from '@rangeserve/core';

export interface FetchOptions {
  url: string;
  offset: number;
  length: number;
  /** Writes the slice here instead of returning a preview. */
  out?: string;
  cwd?: string;
  timeoutMs?: number;
  fetch?: FetchFn;
  logger?: Partial<Logger>;
}

export interface FetchResult {
  bytes: Buffer;
  outPath?: string;
}

/**
 * Reads one slice of a served file through the range client.
 */
export async function runFetch(options: FetchOptions): Promise<FetchResult> {
  const remote = await openRemoteFile(options.url, {
    fetch: options.fetch,
    timeoutMs: options.timeoutMs,
    logger: options.logger,
  });
  const bytes = await remote.read(options.offset, options.length);
  if (!options.out) {
    return { bytes };
  }
  const outPath = resolve(options.cwd ?? process.cwd(), options.out);
  await writeFile(outPath, bytes);
  return { bytes, outPath };
}

const BYTES_PER_LINE = 16;

/**
 * Hex dump of `bytes`, labelled with file offsets starting at `offset`.
 * Stops after `maxBytes` and says how many were left out.
 */
export function formatHexPreview(bytes: Uint8Array, offset: number, maxBytes = 256): string[] {
  const shown = bytes.subarray(0, maxBytes);
  const lines: string[] = [];
  for (let i = 0; i < shown.length; i += BYTES_PER_LINE) {
    const row = Array.from(shown.subarray(i, i + BYTES_PER_LINE), (byte) => byte.toString(16).padStart(2, '0'));
    lines.push(`${(offset + i).toString(16).padStart(8, '0')}  ${row.join(' ')}`);
  }
  if (bytes.length > shown.length) {
    lines.push(`... ${bytes.length - shown.length} more bytes`);
  }
  return lines;
}
