/**
 * Unified error code constants for rangeserve.
 *
 * Code format: {Category}{Number}
 * - Q: Request errors (Q001-Q099)
 * - I: File I/O errors (I001-I099)
 * - C: Configuration and startup errors (C001-C099)
 * - X: Remote range client errors (X001-X099)
 */

// =============================================================================
// Request Error Codes (Q001-Q099)
// =============================================================================

export const RequestErrorCode = {
  // Q001-Q009: Path resolution and dispatch
  FILE_NOT_FOUND: 'Q001',
  NOT_REGULAR_FILE: 'Q002',
  PATH_ESCAPES_ROOT: 'Q003',
  MALFORMED_PATH: 'Q004',
  METHOD_NOT_ALLOWED: 'Q005',

  // Q010-Q019: Range header
  UNSATISFIABLE_RANGE: 'Q010',
  MALFORMED_RANGE: 'Q011',
} as const;

export type RequestErrorCodeValue = (typeof RequestErrorCode)[keyof typeof RequestErrorCode];

// =============================================================================
// I/O Error Codes (I001-I099)
// =============================================================================

export const IoErrorCode = {
  FILE_OPEN_FAILED: 'I001',
  FILE_READ_FAILED: 'I002',
  CLIENT_DISCONNECTED: 'I003',
  FIXTURE_WRITE_FAILED: 'I004',
} as const;

export type IoErrorCodeValue = (typeof IoErrorCode)[keyof typeof IoErrorCode];

// =============================================================================
// Configuration Error Codes (C001-C099)
// =============================================================================

export const ConfigErrorCode = {
  INVALID_PORT: 'C001',
  SERVING_ROOT_NOT_FOUND: 'C002',
  SERVING_ROOT_NOT_DIRECTORY: 'C003',
  PORT_BIND_FAILED: 'C004',
  INVALID_LOG_LEVEL: 'C005',
  INVALID_FIXTURE_SIZE: 'C006',
  INVALID_READ_WINDOW: 'C007',
} as const;

export type ConfigErrorCodeValue = (typeof ConfigErrorCode)[keyof typeof ConfigErrorCode];

// =============================================================================
// Remote Client Error Codes (X001-X099)
// =============================================================================

export const RemoteErrorCode = {
  REMOTE_HEAD_FAILED: 'X001',
  REMOTE_RANGE_FAILED: 'X002',
  REMOTE_SHORT_READ: 'X003',
  REMOTE_OUT_OF_BOUNDS: 'X004',
} as const;

export type RemoteErrorCodeValue = (typeof RemoteErrorCode)[keyof typeof RemoteErrorCode];

// =============================================================================
// Combined Types
// =============================================================================

/**
 * All error codes in the system.
 */
export type ErrorCode =
  | RequestErrorCodeValue
  | IoErrorCodeValue
  | ConfigErrorCodeValue
  | RemoteErrorCodeValue;

/**
 * Maps error code prefixes to their categories.
 */
export const ERROR_CODE_CATEGORIES = {
  Q: 'request',
  I: 'io',
  C: 'config',
  X: 'remote',
} as const;

export type ErrorCategory = (typeof ERROR_CODE_CATEGORIES)[keyof typeof ERROR_CODE_CATEGORIES];

function isCategoryPrefix(prefix: string): prefix is keyof typeof ERROR_CODE_CATEGORIES {
  return prefix in ERROR_CODE_CATEGORIES;
}

/**
 * Gets the category for an error code.
 */
export function getErrorCategory(code: string): ErrorCategory {
  const prefix = code.charAt(0);
  return isCategoryPrefix(prefix) ? ERROR_CODE_CATEGORIES[prefix] : 'io';
}
