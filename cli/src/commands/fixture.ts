import { resolve } from 'node:path';
import { assertFixtureSize, writeFixture } from '@rangeserve/core';

export interface FixtureOptions {
  out: string;
  size: number;
  cwd?: string;
}

export interface FixtureResult {
  path: string;
  size: number;
}

/**
 * Writes a deterministic fixture file whose byte at offset `i` is `i % 251`.
 */
export async function runFixture(options: FixtureOptions): Promise<FixtureResult> {
  assertFixtureSize(options.size);
  const path = resolve(options.cwd ?? process.cwd(), options.out);
  await writeFixture(path, options.size);
  return { path, size: options.size };
}
