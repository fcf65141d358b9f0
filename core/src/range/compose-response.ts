/**
 * Picks the status, headers and body interval for a file request.
 */

import type { ByteRange, FileMethod, RangeParseResult, ResponseHeaders, ResponsePlan } from './types.js';

export interface ComposeResponseInput {
  method: FileMethod;
  range: RangeParseResult;
  size: number;
  contentType: string;
}

/**
 * Builds the response plan for `(method, range outcome, size)`.
 *
 * HEAD with an unusable Range header describes the whole file (200) where GET
 * answers 416; HEAD plans never carry a body.
 */
export function composeResponse(input: ComposeResponseInput): ResponsePlan {
  const { method, range, size, contentType } = input;

  switch (range.kind) {
    case 'none':
      return fullPlan(method, size, contentType);
    case 'range': {
      const interval: ByteRange = { start: range.start, end: range.end };
      return {
        kind: 'partial',
        status: 206,
        headers: {
          'Content-Range': formatContentRange(interval, size),
          'Content-Length': String(interval.end - interval.start + 1),
          'Accept-Ranges': 'bytes',
          'Content-Type': contentType,
        },
        body: method === 'GET' ? interval : null,
        range: interval,
      };
    }
    case 'invalid':
      if (method === 'HEAD') {
        return fullPlan(method, size, contentType);
      }
      return { kind: 'range-error', status: 416, headers: {}, body: null, reason: range.reason };
  }
}

export function formatContentRange(range: ByteRange, size: number): string {
  return `bytes ${range.start}-${range.end}/${size}`;
}

function fullPlan(method: FileMethod, size: number, contentType: string): ResponsePlan {
  const headers: ResponseHeaders = {
    'Content-Length': String(size),
    'Accept-Ranges': 'bytes',
    'Content-Type': contentType,
  };
  const body = method === 'GET' && size > 0 ? { start: 0, end: size - 1 } : null;
  return { kind: 'full', status: 200, headers, body };
}
