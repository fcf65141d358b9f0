/**
 * Request handler for range-aware file serving.
 */

import { promises as fs } from 'node:fs';
import type { IncomingMessage, ServerResponse } from 'node:http';
import {
  IoErrorCode,
  RequestErrorCode,
  composeResponse,
  createRangeServeError,
  describeError,
  inferContentType,
  isRangeServeError,
  parseRangeHeader,
  resolveRequestPath,
  type FileMethod,
  type Logger,
  type ResponsePlan,
} from '@rangeserve/core';
import { respondRangeNotSatisfiable, respondWithError } from './http-utils.js';
import { isPrematureClose, pipeFileRange, withFileHandle } from './stream-utils.js';

export type FileRequestHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

export interface FileRequestHandlerOptions {
  /** Absolute serving root, fixed for the handler's lifetime. */
  root: string;
  logger?: Partial<Logger>;
}

/**
 * Creates the handler for GET and HEAD file requests under `root`. Other
 * methods answer 405.
 */
export function createFileRequestHandler(options: FileRequestHandlerOptions): FileRequestHandler {
  const { root } = options;
  const logger = options.logger ?? {};

  return async (req, res) => {
    const url = req.url ?? '/';
    const method = req.method ?? 'GET';
    let bytes = 0;

    switch (method) {
      case 'GET':
      case 'HEAD':
        bytes = await serveFile(method, url, req, res);
        break;
      default: {
        const error = createRangeServeError({
          code: RequestErrorCode.METHOD_NOT_ALLOWED,
          message: `Method ${method} not allowed`,
          location: { url },
        });
        logger.debug?.('server.request.rejected', { path: url, error: describeError(error) });
        respondWithError(res, error);
      }
    }

    logger.info?.('server.request', { method, path: url, status: res.statusCode, bytes });
  };

  async function serveFile(method: FileMethod, url: string, req: IncomingMessage, res: ServerResponse): Promise<number> {
    let filePath: string;
    let plan: ResponsePlan;
    try {
      filePath = resolveRequestPath(root, url);
      const stat = await statRegularFile(filePath);
      const range = parseRangeHeader(req.headers.range, stat.size);
      plan = composeResponse({ method, range, size: stat.size, contentType: inferContentType(filePath) });
      if (range.kind === 'invalid') {
        logger.debug?.('server.range.invalid', { path: url, code: range.code, reason: range.reason, method });
      }
    } catch (error) {
      logger.debug?.('server.request.rejected', { path: url, error: describeError(error) });
      respondWithError(res, error);
      return 0;
    }

    if (plan.kind === 'range-error') {
      respondRangeNotSatisfiable(res);
      return 0;
    }

    const body = plan.body;
    if (body === null) {
      res.writeHead(plan.status, plan.headers);
      res.end();
      return 0;
    }

    try {
      await withFileHandle(filePath, async (handle) => {
        res.writeHead(plan.status, plan.headers);
        await pipeFileRange(handle, body, res);
      });
      return body.end - body.start + 1;
    } catch (error) {
      if (isPrematureClose(error)) {
        logger.debug?.('server.stream.aborted', { path: url, code: IoErrorCode.CLIENT_DISCONNECTED });
        return 0;
      }
      const failure = isRangeServeError(error)
        ? error
        : createRangeServeError({
            code: IoErrorCode.FILE_READ_FAILED,
            message: `Failed while streaming ${filePath}`,
            location: { filePath, url },
            cause: error,
          });
      logger.error?.('server.stream.failed', { path: url, error: describeError(failure) });
      if (res.headersSent) {
        res.destroy(failure);
      } else {
        respondWithError(res, failure);
      }
      return 0;
    }
  }
}

async function statRegularFile(filePath: string) {
  let stat;
  try {
    stat = await fs.stat(filePath);
  } catch (error) {
    throw createRangeServeError({
      code: RequestErrorCode.FILE_NOT_FOUND,
      message: `File not found: ${filePath}`,
      location: { filePath },
      cause: error,
    });
  }
  if (!stat.isFile()) {
    throw createRangeServeError({
      code: RequestErrorCode.NOT_REGULAR_FILE,
      message: `Not a regular file: ${filePath}`,
      location: { filePath },
    });
  }
  return stat;
}
