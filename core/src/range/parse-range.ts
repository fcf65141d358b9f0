/**
 * Range header parsing for single byte ranges.
 */

import { RequestErrorCode } from '../errors/index.js';
import type { RangeParseResult } from './types.js';

const DIGITS = /^\d+$/;

/**
 * Parses a `Range` header value against a file of `size` bytes.
 *
 * A missing or empty header means no range. The `bytes=` unit prefix is
 * optional. An empty start means offset 0 and an
 * empty end means the last byte, so `bytes=-500` reads `0-500` rather than the
 * final 500 bytes. An end past the file is clamped to `size - 1`. Never throws:
 * anything that does not describe a satisfiable interval comes back as
 * `{ kind: 'invalid' }`.
 */
export function parseRangeHeader(header: string | undefined, size: number): RangeParseResult {
  if (!header) {
    return { kind: 'none' };
  }

  let spec = header.trim();
  if (spec.toLowerCase().startsWith('bytes=')) {
    spec = spec.slice('bytes='.length);
  }

  const dash = spec.indexOf('-');
  if (dash === -1) {
    return malformed(`no "-" separator in "${header}"`);
  }

  const startText = spec.slice(0, dash).trim();
  const endText = spec.slice(dash + 1).trim();

  const start = startText === '' ? 0 : parseOffset(startText);
  if (start === null) {
    return malformed(`start "${startText}" is not a byte offset`);
  }
  const requestedEnd = endText === '' ? size - 1 : parseOffset(endText);
  if (requestedEnd === null) {
    return malformed(`end "${endText}" is not a byte offset`);
  }

  const end = Math.min(requestedEnd, size - 1);
  if (start >= size || start > end) {
    return {
      kind: 'invalid',
      code: RequestErrorCode.UNSATISFIABLE_RANGE,
      reason: `bytes ${start}-${requestedEnd} not satisfiable for size ${size}`,
    };
  }

  return { kind: 'range', start, end };
}

function parseOffset(text: string): number | null {
  if (!DIGITS.test(text)) {
    return null;
  }
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : null;
}

function malformed(reason: string): RangeParseResult {
  return { kind: 'invalid', code: RequestErrorCode.MALFORMED_RANGE, reason };
}
