import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { atomicWriteFile } from '../../../output/atomic-write.js';

describe('atomicWriteFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'atomic-write-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates parent directories and leaves no temp file', async () => {
    const target = join(dir, 'out', 'summary.csv');

    await atomicWriteFile(target, 'state\n');

    expect(await readFile(target, 'utf-8')).toBe('state\n');
    expect(await readdir(join(dir, 'out'))).toEqual(['summary.csv']);
  });

  it('removes the temp file when the rename fails', async () => {
    const target = join(dir, 'taken');
    await mkdir(target);

    await expect(atomicWriteFile(target, 'data')).rejects.toThrow();
    expect(await readdir(dir)).toEqual(['taken']);
  });
});
