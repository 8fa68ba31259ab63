import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  type DirectoryBatch,
  type DirectoryLister,
  assertDirectory,
  compareNames,
  listDirectory,
  walkDirectory,
} from './directory-walker.js';
import { AppError } from './logger.js';
import { makeTempDir, memorySink, quietLogger, removeTempDir, writeTree } from '../tests/helpers/fs-fixture.js';

async function collect(iterator: AsyncGenerator<DirectoryBatch>): Promise<DirectoryBatch[]> {
  const batches: DirectoryBatch[] = [];
  for await (const batch of iterator) {
    batches.push(batch);
  }
  return batches;
}

describe('directory walker', () => {
  let tmpDir = '';

  beforeEach(() => {
    tmpDir = makeTempDir();
    writeTree(tmpDir, {
      'b.txt': 'b',
      'a.txt': 'a',
      '.hidden': 'h',
      beta: { 'inner.txt': 'i', deep: { 'leaf.txt': 'l' } },
      alpha: {},
    });
  });

  afterEach(() => {
    removeTempDir(tmpDir);
  });

  it('compares names by code unit', () => {
    expect(['b', 'B', 'a', '_'].sort(compareNames)).toEqual(['B', '_', 'a', 'b']);
    expect(compareNames('same', 'same')).toBe(0);
  });

  it('lists one level, sorted, including dot files', async () => {
    const listing = await listDirectory(tmpDir, []);

    expect(listing).toEqual({
      files: ['.hidden', 'a.txt', 'b.txt'],
      directories: ['alpha', 'beta'],
    });
  });

  it('applies exclude patterns to names', async () => {
    const listing = await listDirectory(tmpDir, ['*.txt']);

    expect(listing.files).toEqual(['.hidden']);
    expect(listing.directories).toEqual(['alpha', 'beta']);
  });

  it('skips symbolic links', async () => {
    fs.symlinkSync(path.join(tmpDir, 'a.txt'), path.join(tmpDir, 'link-to-a'));
    fs.symlinkSync(path.join(tmpDir, 'beta'), path.join(tmpDir, 'link-to-beta'));

    const listing = await listDirectory(tmpDir, []);

    expect(listing.files).toEqual(['.hidden', 'a.txt', 'b.txt']);
    expect(listing.directories).toEqual(['alpha', 'beta']);
  });

  it('yields only the root when not recursive', async () => {
    const batches = await collect(walkDirectory(tmpDir, { recursive: false, logger: quietLogger() }));

    expect(batches).toHaveLength(1);
    expect(batches[0]).toEqual({
      directory: tmpDir,
      files: [path.join(tmpDir, '.hidden'), path.join(tmpDir, 'a.txt'), path.join(tmpDir, 'b.txt')],
      directories: [path.join(tmpDir, 'alpha'), path.join(tmpDir, 'beta')],
    });
  });

  it('visits directories in pre-order when recursive', async () => {
    const batches = await collect(walkDirectory(tmpDir, { recursive: true, logger: quietLogger() }));

    expect(batches.map(batch => batch.directory)).toEqual([
      tmpDir,
      path.join(tmpDir, 'alpha'),
      path.join(tmpDir, 'beta'),
      path.join(tmpDir, 'beta', 'deep'),
    ]);
    expect(batches[3].files).toEqual([path.join(tmpDir, 'beta', 'deep', 'leaf.txt')]);
  });

  it('logs a directory it cannot list and carries on with its siblings', async () => {
    const sink = memorySink();
    const broken = path.join(tmpDir, 'alpha');
    const lister: DirectoryLister = async (directory, exclude) => {
      if (directory === broken) {
        throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
      }
      return listDirectory(directory, exclude);
    };

    const batches = await collect(
      walkDirectory(tmpDir, { recursive: true, logger: quietLogger(sink), lister })
    );

    expect(batches.map(batch => batch.directory)).toEqual([
      tmpDir,
      path.join(tmpDir, 'beta'),
      path.join(tmpDir, 'beta', 'deep'),
    ]);
    const warning = sink.entries.find(entry => entry.level === 'warn');
    expect(warning?.message).toBe(`failed to list "${broken}", skipping its contents`);
    expect(warning?.data).toEqual({ error: 'EACCES: permission denied', code: 'EACCES' });
  });

  describe('assertDirectory', () => {
    it('accepts a directory', async () => {
      await expect(assertDirectory(tmpDir)).resolves.toBeUndefined();
    });

    it('rejects a regular file', async () => {
      const file = path.join(tmpDir, 'a.txt');
      await expect(assertDirectory(file)).rejects.toThrow(`invalid target "${file}": not a directory`);
    });

    it('rejects a missing path with INVALID_TARGET', async () => {
      const error = await assertDirectory(path.join(tmpDir, 'missing')).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(AppError);
      if (error instanceof AppError) {
        expect(error.code).toBe('INVALID_TARGET');
      }
    });
  });
});
