/**
 * Empty-file pass: removes zero-byte files, then directories left with nothing in them.
 */

import { readdir, rmdir, stat, unlink } from 'fs/promises';
import { join } from 'path';
import type { ChangeLedger } from './change-ledger.js';
import { type DirectoryLister, assertDirectory, walkDirectory } from './directory-walker.js';
import { type Logger, describeSystemError } from './logger.js';

export interface EmptiesOptions {
  dryRun: boolean;
  recursive: boolean;
  exclude?: string[];
}

export interface EmptiesContext {
  ledger: ChangeLedger;
  logger: Logger;
  lister?: DirectoryLister;
}

export interface EmptiesRunResult {
  root: string;
  filesRemoved: number;
  directoriesRemoved: number;
  failures: number;
}

export async function removeEmpty(
  root: string,
  options: EmptiesOptions,
  context: EmptiesContext
): Promise<EmptiesRunResult> {
  const { ledger, logger } = context;
  const result: EmptiesRunResult = { root, filesRemoved: 0, directoriesRemoved: 0, failures: 0 };
  // Paths removed, or under dry-run scheduled for removal, during this pass.
  const gone = new Set<string>();
  const subdirectories: string[] = [];

  await assertDirectory(root);

  for await (const batch of walkDirectory(root, {
    recursive: options.recursive,
    exclude: options.exclude,
    logger,
    lister: context.lister,
  })) {
    for (const path of batch.files) {
      let size: number;
      try {
        size = (await stat(path)).size;
      } catch (error) {
        logger.warn(`cannot stat "${path}"`, { error: describeSystemError(error).message });
        continue;
      }
      if (size !== 0) continue;

      logger.info(`remove empty file "${path}"`);
      if (options.dryRun) {
        ledger.record({ operation: 'empties', executed: false, path, kind: 'file' });
        gone.add(path);
        continue;
      }

      try {
        await unlink(path);
        ledger.record({ operation: 'empties', executed: true, path, kind: 'file' });
        gone.add(path);
        result.filesRemoved += 1;
      } catch (error) {
        const details = describeSystemError(error);
        logger.error(`failed to remove "${path}"`, error);
        ledger.record({ operation: 'empties', executed: false, path, kind: 'file', ...details });
        result.failures += 1;
      }
    }

    subdirectories.push(...batch.directories);
  }

  // Each directory was listed after its parent, so reversed order reaches children first.
  for (const directory of subdirectories.reverse()) {
    let names: string[];
    try {
      names = await readdir(directory);
    } catch (error) {
      const details = describeSystemError(error);
      logger.error(`failed to list directory "${directory}"`, error);
      ledger.record({ operation: 'empties', executed: false, path: directory, kind: 'directory', ...details });
      result.failures += 1;
      continue;
    }

    if (!names.every((name) => gone.has(join(directory, name)))) continue;

    logger.info(`remove empty directory "${directory}"`);
    if (options.dryRun) {
      ledger.record({ operation: 'empties', executed: false, path: directory, kind: 'directory' });
      gone.add(directory);
      continue;
    }

    try {
      await rmdir(directory);
      ledger.record({ operation: 'empties', executed: true, path: directory, kind: 'directory' });
      gone.add(directory);
      result.directoriesRemoved += 1;
    } catch (error) {
      const details = describeSystemError(error);
      logger.error(`failed to remove "${directory}"`, error);
      ledger.record({ operation: 'empties', executed: false, path: directory, kind: 'directory', ...details });
      result.failures += 1;
    }
  }

  return result;
}
