/**
 * Starts and stops the range-aware file server.
 */

import http from 'node:http';
import { ConfigErrorCode, createConfigError, describeError, type Logger } from '@rangeserve/core';
import { createFileRequestHandler } from './file-handler.js';
import { respondServerError } from './http-utils.js';

export const DEFAULT_PORT = 8080;

export interface RangeServerOptions {
  /** Absolute, already validated serving root. */
  root: string;
  port?: number;
  /** Interface to bind; all interfaces when omitted. */
  host?: string;
  logger?: Partial<Logger>;
}

export interface RangeServer {
  readonly root: string;
  readonly port: number;
  readonly url: string;
  stop(): Promise<void>;
}

/**
 * Binds the server and resolves once it is listening. A bind failure (port in
 * use, permission denied) rejects with C004.
 */
export async function startRangeServer(options: RangeServerOptions): Promise<RangeServer> {
  const logger = options.logger ?? {};
  const handler = createFileRequestHandler({ root: options.root, logger });

  const server = http.createServer((req, res) => {
    handler(req, res).catch((error: unknown) => {
      logger.error?.('server.request.failed', { path: req.url, error: describeError(error) });
      if (res.headersSent) {
        res.destroy();
      } else {
        respondServerError(res);
      }
    });
  });

  const requestedPort = options.port ?? DEFAULT_PORT;
  await new Promise<void>((resolve, reject) => {
    const onError = (error: Error) => {
      reject(
        createConfigError(ConfigErrorCode.PORT_BIND_FAILED, `Cannot listen on port ${requestedPort}: ${error.message}`, {
          suggestion: 'Pick another port with --port.',
          cause: error,
        }),
      );
    };
    server.once('error', onError);
    server.listen(requestedPort, options.host, () => {
      server.off('error', onError);
      resolve();
    });
  });

  const address = server.address();
  if (address === null || typeof address === 'string') {
    server.close();
    throw createConfigError(ConfigErrorCode.PORT_BIND_FAILED, 'Server is not bound to a TCP port');
  }
  const { port } = address;
  const url = `http://${formatHost(options.host)}:${port}`;
  logger.debug?.('server.listening', { url, root: options.root });

  return {
    root: options.root,
    port,
    url,
    stop: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
        server.closeAllConnections();
      }),
  };
}

function formatHost(host: string | undefined): string {
  if (!host || host === '0.0.0.0' || host === '::') {
    return 'localhost';
  }
  return host.includes(':') ? `[${host}]` : host;
}
