/**
 * Test utilities for the file server tests.
 * Starts a server over a temporary directory and issues raw HTTP requests to it.
 */

import http from 'node:http';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { createFixtureBytes, type Logger } from '@rangeserve/core';
import { startRangeServer, type RangeServer } from './runtime.js';

export interface RawResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: Buffer;
}

/**
 * Sends one request and collects the whole response. The path is sent as
 * given, without normalisation.
 */
export function sendRequest(
  server: RangeServer,
  requestPath: string,
  options: { method?: string; headers?: Record<string, string> } = {},
): Promise<RawResponse> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      {
        host: '127.0.0.1',
        port: server.port,
        path: requestPath,
        method: options.method ?? 'GET',
        headers: options.headers,
        agent: false,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('end', () => resolve({ status: res.statusCode ?? 0, headers: res.headers, body: Buffer.concat(chunks) }));
        res.on('error', reject);
      },
    );
    req.on('error', reject);
    req.end();
  });
}

export interface ServedDirectory {
  root: string;
  server: RangeServer;
  cleanup(): Promise<void>;
}

/**
 * Creates a temporary serving root holding `files` (name → bytes) and starts a
 * server on an ephemeral loopback port.
 */
export async function serveTemporaryDirectory(
  files: Record<string, Buffer | number>,
  logger?: Partial<Logger>,
): Promise<ServedDirectory> {
  const root = await mkdtemp(path.join(tmpdir(), 'rangeserve-server-'));
  for (const [name, content] of Object.entries(files)) {
    const bytes = typeof content === 'number' ? createFixtureBytes(content) : content;
    const filePath = path.join(root, name);
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, bytes);
  }
  const server = await startRangeServer({ root, port: 0, host: '127.0.0.1', logger });
  return {
    root,
    server,
    async cleanup() {
      await server.stop();
      await rm(root, { recursive: true, force: true });
    },
  };
}
