/**
 * HTTP response helpers for the file server.
 * Each helper finishes the response and returns true to mark the request handled.
 */

import type { ServerResponse } from 'node:http';
import { RequestErrorCode, isRangeServeError } from '@rangeserve/core';

/**
 * Sends a 404 Not Found response.
 */
export function respondNotFound(res: ServerResponse): true {
  res.statusCode = 404;
  res.setHeader('Content-Type', 'text/plain; charset=utf-8');
  res.end('File not found');
  return true;
}

/**
 * Sends a 400 Bad Request response with a message.
 */
export function respondBadRequest(res: ServerResponse, message: string): true {
  res.statusCode = 400;
  res.setHeader('Content-Type', 'text/plain; charset=utf-8');
  res.end(message);
  return true;
}

/**
 * Sends a 403 Forbidden response.
 */
export function respondForbidden(res: ServerResponse): true {
  res.statusCode = 403;
  res.setHeader('Content-Type', 'text/plain; charset=utf-8');
  res.end('Forbidden');
  return true;
}

/**
 * Sends a 405 Method Not Allowed response listing the supported methods.
 */
export function respondMethodNotAllowed(res: ServerResponse): true {
  res.statusCode = 405;
  res.setHeader('Allow', 'GET, HEAD');
  res.setHeader('Content-Type', 'text/plain; charset=utf-8');
  res.end('Method Not Allowed');
  return true;
}

/**
 * Sends a bare 416 Range Not Satisfiable response.
 */
export function respondRangeNotSatisfiable(res: ServerResponse): true {
  res.writeHead(416);
  res.end();
  return true;
}

/**
 * Sends a 500 Internal Server Error response.
 */
export function respondServerError(res: ServerResponse, message = 'Internal Server Error'): true {
  res.statusCode = 500;
  res.setHeader('Content-Type', 'text/plain; charset=utf-8');
  res.end(message);
  return true;
}

/**
 * Answers a failed request according to the error's code. Anything without a
 * request code becomes a 500.
 */
export function respondWithError(res: ServerResponse, error: unknown): true {
  if (!isRangeServeError(error)) {
    return respondServerError(res);
  }
  switch (error.code) {
    case RequestErrorCode.FILE_NOT_FOUND:
    case RequestErrorCode.NOT_REGULAR_FILE:
      return respondNotFound(res);
    case RequestErrorCode.PATH_ESCAPES_ROOT:
      return respondForbidden(res);
    case RequestErrorCode.MALFORMED_PATH:
      return respondBadRequest(res, error.message);
    case RequestErrorCode.METHOD_NOT_ALLOWED:
      return respondMethodNotAllowed(res);
    default:
      return respondServerError(res);
  }
}

/**
 * Narrows a thrown value to a Node system error with a `code`.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}
