import type { RequestErrorCode } from '../errors/index.js';

/**
 * Inclusive byte interval, zero-indexed.
 */
export interface ByteRange {
  start: number;
  end: number;
}

export type RangeInvalidCode =
  | typeof RequestErrorCode.MALFORMED_RANGE
  | typeof RequestErrorCode.UNSATISFIABLE_RANGE;

/**
 * Outcome of reading a `Range` header. `none` (no header) and `invalid`
 * (a header that could not be honoured) are distinct states.
 */
export type RangeParseResult =
  | { kind: 'none' }
  | ({ kind: 'range' } & ByteRange)
  | { kind: 'invalid'; code: RangeInvalidCode; reason: string };

export type FileMethod = 'GET' | 'HEAD';

export type ResponseHeaders = Record<string, string>;

/**
 * What the server answers for one file request. `body` is the interval to
 * stream, or null when nothing follows the headers.
 */
export type ResponsePlan =
  | { kind: 'full'; status: 200; headers: ResponseHeaders; body: ByteRange | null }
  | { kind: 'partial'; status: 206; headers: ResponseHeaders; body: ByteRange | null; range: ByteRange }
  | { kind: 'range-error'; status: 416; headers: ResponseHeaders; body: null; reason: string };
