import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';
import type { Logger } from './logger.js';

export interface EnvLoaderOptions {
  /** Directory whose `.env` is loaded. Defaults to `process.cwd()`. */
  cwd?: string;
  logger?: Partial<Logger>;
}

export interface EnvLoaderResult {
  loaded: string[];
}

/**
 * Load environment variables from the working directory's `.env` file.
 *
 * Never overrides a variable that is already set, so the real environment
 * always wins over the file.
 */
export function loadEnv(options: EnvLoaderOptions = {}): EnvLoaderResult {
  const cwd = options.cwd ?? process.cwd();
  const envPath = resolve(cwd, '.env');
  const loaded: string[] = [];

  if (existsSync(envPath)) {
    const result = dotenvConfig({ path: envPath, override: false });
    if (result.parsed) {
      loaded.push(envPath);
      options.logger?.debug?.('env.loaded', { path: envPath });
    }
  }

  return { loaded };
}
