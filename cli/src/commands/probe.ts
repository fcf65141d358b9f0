import { openRemoteFile, type FetchFn } from '@rangeserve/core';

export interface ProbeOptions {
  url: string;
  /** Per-request timeout in milliseconds. */
  timeoutMs?: number;
  fetch?: FetchFn;
}

export interface ProbeResult {
  url: string;
  size: number;
  contentType: string | null;
  acceptsRanges: boolean;
}

/**
 * Describes a served file from one HEAD request.
 */
export async function runProbe(options: ProbeOptions): Promise<ProbeResult> {
  const remote = await openRemoteFile(options.url, { fetch: options.fetch, timeoutMs: options.timeoutMs });
  return {
    url: remote.url,
    size: remote.size,
    contentType: remote.contentType,
    acceptsRanges: remote.acceptsRanges,
  };
}
