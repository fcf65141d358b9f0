import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { loadEnv } from './env-loader.js';
import { existsSync } from 'node:fs';
import { config as dotenvConfig } from 'dotenv';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
}));

vi.mock('dotenv', () => ({
  config: vi.fn(),
}));

describe('loadEnv', () => {
  const mockExistsSync = vi.mocked(existsSync);
  const mockDotenvConfig = vi.mocked(dotenvConfig);

  beforeEach(() => {
    vi.clearAllMocks();
    mockDotenvConfig.mockReturnValue({ parsed: undefined });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should return empty loaded array when no .env files exist', () => {
    mockExistsSync.mockReturnValue(false);

    const result = loadEnv({ cwd: '/srv/data' });

    expect(result.loaded).toEqual([]);
    expect(mockDotenvConfig).not.toHaveBeenCalled();
  });

  it('should load the cwd .env without overriding existing variables', () => {
    mockExistsSync.mockReturnValue(true);
    mockDotenvConfig.mockReturnValue({ parsed: { RANGESERVE_PORT: '9000' } });

    const result = loadEnv({ cwd: '/srv/data' });

    expect(result.loaded).toEqual(['/srv/data/.env']);
    expect(mockDotenvConfig).toHaveBeenCalledWith({ path: '/srv/data/.env', override: false });
  });

  it('should not record files that dotenv could not parse', () => {
    mockExistsSync.mockReturnValue(true);

    const result = loadEnv({ cwd: '/srv/data' });

    expect(result.loaded).toEqual([]);
  });

  it('should report loaded files at debug level', () => {
    mockExistsSync.mockReturnValue(true);
    mockDotenvConfig.mockReturnValue({ parsed: {} });
    const debug = vi.fn();

    loadEnv({ cwd: '/srv/data', logger: { debug } });

    expect(debug).toHaveBeenCalledWith('env.loaded', { path: '/srv/data/.env' });
  });
});
