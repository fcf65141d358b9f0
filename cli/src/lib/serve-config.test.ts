import { describe, expect, it } from 'vitest';
import { resolveLogLevel, resolveServeConfig } from './serve-config.js';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('resolveServeConfig', () => {
  it('defaults to port 8080 and the working directory', () => {
    expect(resolveServeConfig({}, {})).toEqual({ port: 8080, directory: '.' });
  });

  it('reads defaults from the environment', () => {
    const env = { RANGESERVE_PORT: '9000', RANGESERVE_DIRECTORY: '/data/h5' };

    expect(resolveServeConfig({}, env)).toEqual({ port: 9000, directory: '/data/h5' });
  });

  it('lets flags win over the environment', () => {
    const env = { RANGESERVE_PORT: '9000', RANGESERVE_DIRECTORY: '/data/h5' };

    expect(resolveServeConfig({ port: 8123, directory: 'fixtures' }, env)).toEqual({
      port: 8123,
      directory: 'fixtures',
    });
  });

  it('ignores blank environment values', () => {
    expect(resolveServeConfig({}, { RANGESERVE_PORT: ' ', RANGESERVE_DIRECTORY: '' })).toEqual({
      port: 8080,
      directory: '.',
    });
  });

  it('accepts port 0 for an ephemeral port', () => {
    expect(resolveServeConfig({ port: 0 }, {}).port).toBe(0);
  });

  it.each([-1, 65536, 80.5, Number.NaN])('rejects port flag %s', (port) => {
    expect(thrownBy(() => resolveServeConfig({ port }, {}))).toMatchObject({ code: 'C001' });
  });

  it('rejects a non-numeric port in the environment', () => {
    expect(thrownBy(() => resolveServeConfig({}, { RANGESERVE_PORT: '80a' }))).toMatchObject({
      code: 'C001',
      message: 'Invalid port "80a"',
    });
  });
});

describe('resolveLogLevel', () => {
  it('defaults to info', () => {
    expect(resolveLogLevel(undefined)).toBe('info');
    expect(resolveLogLevel('')).toBe('info');
  });

  it('accepts known levels in any case', () => {
    expect(resolveLogLevel('debug')).toBe('debug');
    expect(resolveLogLevel('WARN')).toBe('warn');
  });

  it('rejects unknown levels', () => {
    expect(thrownBy(() => resolveLogLevel('verbose'))).toMatchObject({
      code: 'C005',
      message: 'Invalid log level "verbose"',
    });
  });
});
