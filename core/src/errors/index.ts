/**
 * rangeserve error system.
 *
 * - Q (Request): path, method and Range header problems
 * - I (I/O): file handle and stream failures
 * - C (Config): startup and option validation
 * - X (Remote): the range-reading HTTP client
 */

// Types
export type { ErrorLocation, RangeServeErrorOptions } from './types.js';
export { RangeServeError, isRangeServeError } from './types.js';

// Error Codes
export {
  RequestErrorCode,
  IoErrorCode,
  ConfigErrorCode,
  RemoteErrorCode,
  ERROR_CODE_CATEGORIES,
  getErrorCategory,
} from './codes.js';
export type {
  RequestErrorCodeValue,
  IoErrorCodeValue,
  ConfigErrorCodeValue,
  RemoteErrorCodeValue,
  ErrorCode,
  ErrorCategory,
} from './codes.js';

// Helpers
export type { CreateErrorOptions } from './helpers.js';
export {
  createRangeServeError,
  createConfigError,
  createRemoteError,
  formatError,
  describeError,
} from './helpers.js';
