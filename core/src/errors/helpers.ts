/**
 * Error creation helpers for the rangeserve error system.
 */

import { RangeServeError, type ErrorLocation } from './types.js';

/**
 * Options for creating a rangeserve error.
 */
export interface CreateErrorOptions {
  /** Error code (e.g., 'Q001', 'C004') */
  code: string;
  /** Error message */
  message: string;
  /** Location information */
  location?: ErrorLocation;
  /** Suggested fix */
  suggestion?: string;
  /** Original error that caused this error */
  cause?: unknown;
}

/**
 * Creates a RangeServeError with the given options.
 *
 * The category is inferred from the error code prefix.
 */
export function createRangeServeError(options: CreateErrorOptions): RangeServeError {
  const { code, message, location, suggestion, cause } = options;
  return new RangeServeError(code, message, { location, suggestion, cause });
}

/**
 * Creates a configuration error (C-code).
 */
export function createConfigError(
  code: string,
  message: string,
  options: {
    filePath?: string;
    context?: string;
    suggestion?: string;
    cause?: unknown;
  } = {},
): RangeServeError {
  return createRangeServeError({
    code,
    message,
    location: {
      filePath: options.filePath,
      context: options.context,
    },
    suggestion: options.suggestion,
    cause: options.cause,
  });
}

/**
 * Creates a remote client error (X-code).
 */
export function createRemoteError(
  code: string,
  message: string,
  options: {
    url?: string;
    context?: string;
    cause?: unknown;
  } = {},
): RangeServeError {
  return createRangeServeError({
    code,
    message,
    location: {
      url: options.url,
      context: options.context,
    },
    cause: options.cause,
  });
}

// =============================================================================
// Error Formatting
// =============================================================================

/**
 * Formats a RangeServeError for display.
 */
export function formatError(error: RangeServeError): string {
  const parts: string[] = [];

  parts.push(`[${error.code}] ${error.message}`);

  if (error.location) {
    const loc = error.location;
    if (loc.filePath) {
      parts.push(`  File: ${loc.filePath}`);
    }
    if (loc.url) {
      parts.push(`  URL: ${loc.url}`);
    }
    if (loc.context) {
      parts.push(`  Context: ${loc.context}`);
    }
  }

  if (error.suggestion) {
    parts.push(`  Suggestion: ${error.suggestion}`);
  }

  return parts.join('\n');
}

/**
 * Formats any thrown value for a one-line log or console message.
 */
export function describeError(error: unknown): string {
  if (error instanceof RangeServeError) {
    return `[${error.code}] ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
