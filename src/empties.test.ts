import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ChangeLedger } from './change-ledger.js';
import { listDirectory, type DirectoryLister } from './directory-walker.js';
import { removeEmpty } from './empties.js';
import { listTree, makeTempDir, quietLogger, removeTempDir, writeTree } from '../tests/helpers/fs-fixture.js';

describe('removeEmpty', () => {
  let tmpDir = '';

  beforeEach(() => {
    tmpDir = makeTempDir();
    writeTree(tmpDir, {
      'zero.txt': '',
      'kept.txt': 'content',
      hollow: { nested: { 'blank.md': '' } },
      occupied: { 'note.txt': 'hello', 'nothing.log': '' },
      bare: {},
    });
  });

  afterEach(() => {
    removeTempDir(tmpDir);
  });

  it('checks only the top level and its immediate subdirectories when not recursive', async () => {
    const ledger = new ChangeLedger();

    const result = await removeEmpty(tmpDir, { dryRun: false, recursive: false }, { ledger, logger: quietLogger() });

    expect(result).toEqual({ root: tmpDir, filesRemoved: 1, directoriesRemoved: 1, failures: 0 });
    expect(ledger.changes).toEqual([
      { id: 0, operation: 'empties', executed: true, path: path.join(tmpDir, 'zero.txt'), kind: 'file' },
      { id: 1, operation: 'empties', executed: true, path: path.join(tmpDir, 'bare'), kind: 'directory' },
    ]);
    expect(fs.existsSync(path.join(tmpDir, 'bare'))).toBe(false);
    expect(fs.existsSync(path.join(tmpDir, 'hollow', 'nested', 'blank.md'))).toBe(true);
    expect(fs.existsSync(path.join(tmpDir, 'occupied', 'nothing.log'))).toBe(true);
  });

  it('removes empty files and then directories left empty, deepest first', async () => {
    const ledger = new ChangeLedger();

    const result = await removeEmpty(tmpDir, { dryRun: false, recursive: true }, { ledger, logger: quietLogger() });

    expect(result.filesRemoved).toBe(3);
    expect(result.directoriesRemoved).toBe(3);
    expect(ledger.byOperation('empties').map(change => [change.kind, change.path])).toEqual([
      ['file', path.join(tmpDir, 'zero.txt')],
      ['file', path.join(tmpDir, 'hollow', 'nested', 'blank.md')],
      ['file', path.join(tmpDir, 'occupied', 'nothing.log')],
      ['directory', path.join(tmpDir, 'hollow', 'nested')],
      ['directory', path.join(tmpDir, 'hollow')],
      ['directory', path.join(tmpDir, 'bare')],
    ]);
    expect(listTree(tmpDir)).toEqual(['kept.txt', 'occupied/', 'occupied/note.txt']);
  });

  it('never removes the root', async () => {
    const root = path.join(tmpDir, 'bare');

    const result = await removeEmpty(root, { dryRun: false, recursive: true }, { ledger: new ChangeLedger(), logger: quietLogger() });

    expect(result.directoriesRemoved).toBe(0);
    expect(fs.existsSync(root)).toBe(true);
  });

  it('plans the same changes in a dry run without removing anything', async () => {
    const before = listTree(tmpDir);
    const dryLedger = new ChangeLedger();

    const dry = await removeEmpty(tmpDir, { dryRun: true, recursive: true }, { ledger: dryLedger, logger: quietLogger() });

    expect(listTree(tmpDir)).toEqual(before);
    expect(dry).toEqual({ root: tmpDir, filesRemoved: 0, directoriesRemoved: 0, failures: 0 });
    expect(dryLedger.changes.every(change => !change.executed)).toBe(true);

    const applyLedger = new ChangeLedger();
    await removeEmpty(tmpDir, { dryRun: false, recursive: true }, { ledger: applyLedger, logger: quietLogger() });

    const paths = (ledger: ChangeLedger) => ledger.byOperation('empties').map(change => change.path);
    expect(paths(dryLedger)).toEqual(paths(applyLedger));
  });

  it('keeps a directory holding something the walk skipped', async () => {
    const skipped = path.join(tmpDir, 'hollow', 'nested');
    const lister: DirectoryLister = async (directory, exclude) => {
      if (directory === skipped) {
        throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
      }
      return listDirectory(directory, exclude);
    };

    await removeEmpty(tmpDir, { dryRun: false, recursive: true }, { ledger: new ChangeLedger(), logger: quietLogger(), lister });

    expect(fs.existsSync(path.join(skipped, 'blank.md'))).toBe(true);
    expect(fs.existsSync(path.join(tmpDir, 'hollow'))).toBe(true);
  });

  it('does nothing on a second run', async () => {
    await removeEmpty(tmpDir, { dryRun: false, recursive: true }, { ledger: new ChangeLedger(), logger: quietLogger() });
    const ledger = new ChangeLedger();

    await removeEmpty(tmpDir, { dryRun: false, recursive: true }, { ledger, logger: quietLogger() });

    expect(ledger.size).toBe(0);
  });
});
