import { promises as fs } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createFixtureBytes, findFixtureMismatch, writeFixture } from './fixtures.js';

describe('createFixtureBytes', () => {
  it('produces i % 251 from offset 0', () => {
    const bytes = createFixtureBytes(4);
    expect(Array.from(bytes)).toEqual([0, 1, 2, 3]);
  });

  it('wraps at the modulus', () => {
    const bytes = createFixtureBytes(3, 250);
    expect(Array.from(bytes)).toEqual([250, 0, 1]);
  });

  it('returns an empty buffer for length 0', () => {
    expect(createFixtureBytes(0).length).toBe(0);
  });
});

describe('findFixtureMismatch', () => {
  it('returns -1 for a matching slice', () => {
    expect(findFixtureMismatch(createFixtureBytes(600, 500), 500)).toBe(-1);
  });

  it('locates the first wrong byte', () => {
    const bytes = createFixtureBytes(10, 20);
    bytes[7] = 0xff;
    expect(findFixtureMismatch(bytes, 20)).toBe(7);
  });

  it('detects a slice read from the wrong offset', () => {
    expect(findFixtureMismatch(createFixtureBytes(10, 21), 20)).toBe(0);
  });
});

describe('writeFixture', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'rangeserve-fixture-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the requested number of patterned bytes', async () => {
    const file = path.join(dir, 'fixture.h5');
    await writeFixture(file, 1000);

    const bytes = await readFile(file);
    expect(bytes.length).toBe(1000);
    expect(findFixtureMismatch(bytes)).toBe(-1);
  });

  it('writes files larger than one chunk', async () => {
    const file = path.join(dir, 'large.h5');
    const size = 1024 * 1024 + 17;
    await writeFixture(file, size);

    expect((await stat(file)).size).toBe(size);
    const bytes = await readFile(file);
    expect(findFixtureMismatch(bytes.subarray(1024 * 1024 - 5), 1024 * 1024 - 5)).toBe(-1);
  });

  it('writes an empty file for size 0', async () => {
    const file = path.join(dir, 'empty.bin');
    await writeFixture(file, 0);
    expect((await stat(file)).size).toBe(0);
  });

  it('rejects negative and fractional sizes', async () => {
    await expect(writeFixture(path.join(dir, 'bad.bin'), -1)).rejects.toMatchObject({ code: 'C006' });
    await expect(writeFixture(path.join(dir, 'bad.bin'), 1.5)).rejects.toMatchObject({ code: 'C006' });
  });

  it('reports an unwritable destination', async () => {
    await expect(writeFixture(path.join(dir, 'missing', 'f.bin'), 10)).rejects.toMatchObject({ code: 'I004' });
  });

  it('reports a failed write and still closes the file', async () => {
    const realOpen = fs.open.bind(fs);
    let opened: FileHandle | undefined;
    vi.spyOn(fs, 'open').mockImplementationOnce(async (filePath, flags, mode) => {
      const handle = await realOpen(filePath, flags, mode);
      const diskFull = Object.assign(new Error('no space left on device'), { code: 'ENOSPC' });
      vi.spyOn(handle, 'write').mockRejectedValue(diskFull);
      opened = handle;
      return handle;
    });
    const file = path.join(dir, 'full.bin');

    await expect(writeFixture(file, 10)).rejects.toMatchObject({
      code: 'I004',
      message: `Cannot write fixture file: ${file}`,
    });
    expect(opened?.fd).toBe(-1);
  });
});
