import http from 'node:http';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createFixtureBytes, findFixtureMismatch, openRemoteFile } from '@rangeserve/core';
import { startRangeServer, type RangeServer } from './runtime.js';
import { sendRequest, serveTemporaryDirectory, type ServedDirectory } from './test-utils.js';

describe('startRangeServer', () => {
  const cleanups: Array<() => Promise<void>> = [];

  afterEach(async () => {
    while (cleanups.length > 0) {
      const cleanup = cleanups.pop();
      await cleanup?.();
    }
  });

  async function serve(files: Record<string, Buffer | number>, logger?: Parameters<typeof serveTemporaryDirectory>[1]) {
    const served = await serveTemporaryDirectory(files, logger);
    cleanups.push(() => served.cleanup());
    return served;
  }

  it('reports the bound port and a loopback url', async () => {
    const { server } = await serve({ 'a.h5': 8 });

    expect(server.port).toBeGreaterThan(0);
    expect(server.url).toBe(`http://127.0.0.1:${server.port}`);
  });

  it('uses localhost in the url when bound to every interface', async () => {
    const { root } = await serve({});
    const server = await startRangeServer({ root, port: 0 });
    cleanups.push(() => server.stop());

    expect(server.url).toBe(`http://localhost:${server.port}`);
  });

  it('fails with C004 when the port is taken', async () => {
    const { root, server } = await serve({});

    await expect(startRangeServer({ root, port: server.port, host: '127.0.0.1' })).rejects.toMatchObject({
      code: 'C004',
      suggestion: 'Pick another port with --port.',
    });
  });

  it('stops accepting connections after stop', async () => {
    const { root } = await serve({ 'a.h5': 8 });
    const server: RangeServer = await startRangeServer({ root, port: 0, host: '127.0.0.1' });

    expect((await sendRequest(server, '/a.h5')).status).toBe(200);
    await server.stop();

    await expect(sendRequest(server, '/a.h5')).rejects.toMatchObject({ code: 'ECONNREFUSED' });
  });

  it('logs a client that disconnects mid-body', async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), error: vi.fn() };
    const served: ServedDirectory = await serve({ 'large.h5': 32 * 1024 * 1024 }, logger);

    await new Promise<void>((resolve, reject) => {
      const req = http.request(
        { host: '127.0.0.1', port: served.server.port, path: '/large.h5', agent: false },
        (res) => {
          res.once('data', () => {
            req.destroy();
            resolve();
          });
        },
      );
      req.on('error', (error: NodeJS.ErrnoException) => {
        if (error.code !== 'ECONNRESET') {
          reject(error);
        }
      });
      req.end();
    });

    await vi.waitFor(() =>
      expect(logger.debug).toHaveBeenCalledWith('server.stream.aborted', { path: '/large.h5', code: 'I003' }),
    );
    expect(logger.error).not.toHaveBeenCalled();
  });
});

describe('remote file client against the server', () => {
  let served: ServedDirectory | undefined;

  afterEach(async () => {
    await served?.cleanup();
    served = undefined;
  });

  it('reads windows of a served file', async () => {
    served = await serve3MiB();
    const remote = await openRemoteFile(`${served.server.url}/cells.h5ad`);

    expect(remote.size).toBe(3 * 1024 * 1024);
    expect(remote.acceptsRanges).toBe(true);
    expect(remote.contentType).toBe('application/x-hdf5');

    const head = await remote.read(0, 4096);
    const tail = await remote.read(remote.size - 100, 100);

    expect(findFixtureMismatch(head, 0)).toBe(-1);
    expect(findFixtureMismatch(tail, remote.size - 100)).toBe(-1);
    expect(remote.stats().rangeRequests).toBe(2);
  });

  it('rejects reads past the end', async () => {
    served = await serve3MiB();
    const remote = await openRemoteFile(`${served.server.url}/cells.h5ad`);

    await expect(remote.read(remote.size - 1, 2)).rejects.toMatchObject({ code: 'X004' });
  });

  it('fails to open a missing file', async () => {
    served = await serve3MiB();

    await expect(openRemoteFile(`${served.server.url}/missing.h5ad`)).rejects.toMatchObject({ code: 'X001' });
  });

  async function serve3MiB(): Promise<ServedDirectory> {
    return serveTemporaryDirectory({ 'cells.h5ad': createFixtureBytes(3 * 1024 * 1024) });
  }
});
