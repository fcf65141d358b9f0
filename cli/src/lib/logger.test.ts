import chalk from 'chalk';
import { beforeAll, describe, expect, it, vi } from 'vitest';
import { createCliLogger } from './logger.js';

function createSink() {
  return { log: vi.fn<(line: string) => void>(), error: vi.fn<(line: string) => void>() };
}

describe('createCliLogger', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('writes info with its metadata to stdout', () => {
    const sink = createSink();
    const logger = createCliLogger({ sink });

    logger.info('server.request', { method: 'GET', path: '/a.h5', status: 206, bytes: 10 });

    expect(sink.log).toHaveBeenCalledWith('[info] server.request method=GET path=/a.h5 status=206 bytes=10');
    expect(sink.error).not.toHaveBeenCalled();
  });

  it('sends warnings and errors to stderr', () => {
    const sink = createSink();
    const logger = createCliLogger({ sink });

    logger.warn('slow');
    logger.error('server.stream.failed', { error: '[I002] boom' });

    expect(sink.error).toHaveBeenNthCalledWith(1, '[warn] slow');
    expect(sink.error).toHaveBeenNthCalledWith(2, '[error] server.stream.failed error=[I002] boom');
  });

  it('drops debug at the default level', () => {
    const sink = createSink();

    createCliLogger({ sink }).debug('server.listening');

    expect(sink.log).not.toHaveBeenCalled();
  });

  it('keeps debug when asked for it', () => {
    const sink = createSink();

    createCliLogger({ level: 'debug', sink }).debug('server.listening', { url: 'http://localhost:8080' });

    expect(sink.log).toHaveBeenCalledWith('[debug] server.listening url=http://localhost:8080');
  });

  it('drops info at the error level', () => {
    const sink = createSink();
    const logger = createCliLogger({ level: 'error', sink });

    logger.info('server.request');
    logger.warn('slow');

    expect(sink.log).not.toHaveBeenCalled();
    expect(sink.error).not.toHaveBeenCalled();
  });
});
