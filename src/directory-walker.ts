/**
 * Depth-first directory traversal shared by every clean-up operation.
 */

import { stat } from 'fs/promises';
import { join } from 'path';
import fg from 'fast-glob';
import { AppError, type Logger, describeSystemError } from './logger.js';

export interface DirectoryBatch {
  directory: string;
  /** Immediate regular files, absolute, sorted by name. */
  files: string[];
  /** Immediate subdirectories, absolute, sorted by name. */
  directories: string[];
}

export interface DirectoryListing {
  files: string[];
  directories: string[];
}

/**
 * Lists one directory level. Returns entry names, not paths.
 */
export type DirectoryLister = (directory: string, exclude: string[]) => Promise<DirectoryListing>;

export interface WalkOptions {
  recursive: boolean;
  logger: Logger;
  /** Glob patterns matched against entry names. */
  exclude?: string[];
  lister?: DirectoryLister;
}

export function compareNames(left: string, right: string): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * One level of a directory through fast-glob. Symbolic links come back as links (never as the
 * directory or file they point to) and are dropped along with sockets and FIFOs.
 */
export const listDirectory: DirectoryLister = async (directory, exclude) => {
  const entries = await fg('*', {
    cwd: directory,
    deep: 1,
    dot: true,
    onlyFiles: false,
    objectMode: true,
    followSymbolicLinks: false,
    ignore: exclude,
    suppressErrors: false,
  });

  const files: string[] = [];
  const directories: string[] = [];

  for (const entry of entries) {
    if (entry.dirent.isSymbolicLink()) continue;
    if (entry.dirent.isDirectory()) {
      directories.push(entry.name);
    } else if (entry.dirent.isFile()) {
      files.push(entry.name);
    }
  }

  return {
    files: files.sort(compareNames),
    directories: directories.sort(compareNames),
  };
};

/**
 * Yields one batch per visited directory, root first, pre-order. A directory that cannot be
 * listed is logged and its subtree skipped; the walk carries on with its siblings.
 */
export async function* walkDirectory(root: string, options: WalkOptions): AsyncGenerator<DirectoryBatch> {
  const lister = options.lister ?? listDirectory;
  const exclude = options.exclude ?? [];
  const stack: string[] = [root];

  while (stack.length > 0) {
    const directory = stack.pop();
    if (directory === undefined) break;

    let listing: DirectoryListing;
    try {
      listing = await lister(directory, exclude);
    } catch (error) {
      const details = describeSystemError(error);
      options.logger.warn(`failed to list "${directory}", skipping its contents`, {
        error: details.message,
        code: details.code,
      });
      continue;
    }

    const batch: DirectoryBatch = {
      directory,
      files: listing.files.map((name) => join(directory, name)),
      directories: listing.directories.map((name) => join(directory, name)),
    };

    options.logger.debug(`working in "${directory}"`, {
      files: batch.files.length,
      directories: batch.directories.length,
    });

    yield batch;

    if (!options.recursive) break;

    // Reverse so the first subdirectory by name is visited next.
    for (let i = batch.directories.length - 1; i >= 0; i--) {
      stack.push(batch.directories[i]);
    }
  }
}

/**
 * Reject a walk root that is missing or not a directory.
 */
export async function assertDirectory(path: string): Promise<void> {
  let isDirectory = false;
  try {
    isDirectory = (await stat(path)).isDirectory();
  } catch (error) {
    throw new AppError(`invalid target "${path}": ${describeSystemError(error).message}`, 'INVALID_TARGET', 1, { path });
  }
  if (!isDirectory) {
    throw new AppError(`invalid target "${path}": not a directory`, 'INVALID_TARGET', 1, { path });
  }
}
