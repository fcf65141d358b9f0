/**
 * Deterministic binary fixtures for range-read tests.
 *
 * The byte at offset `i` is `i % FIXTURE_MODULUS`. The modulus is prime so
 * that a slice read from the wrong offset does not line up with the expected
 * pattern at any power-of-two boundary.
 */

import { promises as fs } from 'node:fs';
import { ConfigErrorCode, IoErrorCode, createConfigError, createRangeServeError } from './errors/index.js';

export const FIXTURE_MODULUS = 251;

const WRITE_CHUNK_BYTES = 1024 * 1024;

/**
 * Returns the fixture bytes in `[offset, offset + length)`.
 */
export function createFixtureBytes(length: number, offset = 0): Buffer {
  const bytes = Buffer.allocUnsafe(length);
  for (let i = 0; i < length; i += 1) {
    bytes[i] = (offset + i) % FIXTURE_MODULUS;
  }
  return bytes;
}

/**
 * Index of the first byte that does not match the fixture pattern, or -1.
 */
export function findFixtureMismatch(bytes: Uint8Array, offset = 0): number {
  for (let i = 0; i < bytes.length; i += 1) {
    if (bytes[i] !== (offset + i) % FIXTURE_MODULUS) {
      return i;
    }
  }
  return -1;
}

export function assertFixtureSize(size: number): void {
  if (!Number.isSafeInteger(size) || size < 0) {
    throw createConfigError(ConfigErrorCode.INVALID_FIXTURE_SIZE, `Invalid fixture size: ${size}`, {
      suggestion: 'Use a whole number of bytes, zero or more.',
    });
  }
}

/**
 * Writes a fixture of `size` bytes to `filePath`, replacing any existing file.
 */
export async function writeFixture(filePath: string, size: number): Promise<void> {
  assertFixtureSize(size);
  let handle;
  try {
    handle = await fs.open(filePath, 'w');
  } catch (error) {
    throw createRangeServeError({
      code: IoErrorCode.FIXTURE_WRITE_FAILED,
      message: `Cannot create fixture file: ${filePath}`,
      location: { filePath },
      cause: error,
    });
  }
  try {
    for (let offset = 0; offset < size; offset += WRITE_CHUNK_BYTES) {
      const chunk = createFixtureBytes(Math.min(WRITE_CHUNK_BYTES, size - offset), offset);
      await handle.write(chunk, 0, chunk.length, offset);
    }
  } catch (error) {
    throw createRangeServeError({
      code: IoErrorCode.FIXTURE_WRITE_FAILED,
      message: `Cannot write fixture file: ${filePath}`,
      location: { filePath },
      cause: error,
    });
  } finally {
    await handle.close();
  }
}
