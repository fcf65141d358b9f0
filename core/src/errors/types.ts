/**
 * Shared error types for the rangeserve error system.
 *
 * Every error raised on purpose carries a code from `codes.ts` so callers can
 * route on it (the server maps request codes to HTTP statuses, the CLI maps
 * config codes to exit status 1).
 */

import { getErrorCategory, type ErrorCategory } from './codes.js';

/**
 * Location information for an error.
 */
export interface ErrorLocation {
  /** File path (absolute) involved in the failure */
  filePath?: string;
  /** Request path or URL as the client sent it */
  url?: string;
  /** Free-form context (e.g., "Range: bytes=10-2") */
  context?: string;
}

/**
 * Options for constructing a RangeServeError.
 */
export interface RangeServeErrorOptions {
  location?: ErrorLocation;
  suggestion?: string;
  cause?: unknown;
}

/**
 * Base error for everything rangeserve raises deliberately.
 */
export class RangeServeError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly location?: ErrorLocation;
  readonly suggestion?: string;

  constructor(code: string, message: string, options: RangeServeErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'RangeServeError';
    this.code = code;
    this.category = getErrorCategory(code);
    this.location = options.location;
    this.suggestion = options.suggestion;
  }
}

/**
 * Type guard to check if an error is a RangeServeError.
 */
export function isRangeServeError(error: unknown): error is RangeServeError {
  return error instanceof RangeServeError;
}
