/**
 * Duplicate removal: walk a tree, fingerprint same-size files, group identical content,
 * keep one survivor per group and delete the rest.
 */

import { stat, unlink } from 'fs/promises';
import pLimit from 'p-limit';
import type { ChangeLedger } from './change-ledger.js';
import { DuplicateGrouper } from './duplicate-grouper.js';
import { type DirectoryLister, assertDirectory, walkDirectory } from './directory-walker.js';
import { DEFAULT_CHUNK_SIZE, type HashAlgorithm, UNREADABLE, fingerprintFile } from './fingerprint.js';
import { type Logger, describeSystemError, isMissingFileError } from './logger.js';
import { ProgressTracker } from './progress.js';
import { selectSurvivor } from './survivor-selector.js';

export interface FileStat {
  size: number;
  mtimeMs: number;
  isFile(): boolean;
}

/**
 * The filesystem calls the resolver mutates through.
 */
export interface FileOps {
  stat(path: string): Promise<FileStat>;
  unlink(path: string): Promise<void>;
}

export const nodeFileOps: FileOps = {
  stat: (path) => stat(path),
  unlink: (path) => unlink(path),
};

export interface DuplicateOptions {
  dryRun: boolean;
  recursive: boolean;
  exclude?: string[];
  algorithm?: HashAlgorithm;
  chunkSize?: number;
  concurrency?: number;
  /** Where to draw a fingerprint progress line, if anywhere. */
  progressStream?: NodeJS.WritableStream;
}

export interface DuplicateContext {
  ledger: ChangeLedger;
  logger: Logger;
  fileOps?: FileOps;
  lister?: DirectoryLister;
}

export type RemovalOutcome = 'removed' | 'failed' | 'missing' | 'skipped-dry-run';

export interface Removal {
  path: string;
  outcome: RemovalOutcome;
  /** Bytes freed by this removal; zero unless removed. */
  bytes: number;
}

export interface ResolvedGroup {
  digest: string;
  size: number;
  kept: string;
  removals: Removal[];
}

export interface DuplicateRunResult {
  root: string;
  filesScanned: number;
  filesHashed: number;
  bytesFreed: number;
  groups: ResolvedGroup[];
}

interface Candidate {
  path: string;
  size: number;
  mtimeMs: number;
}

export const DEFAULT_CONCURRENCY = 4;

async function collectCandidates(
  root: string,
  options: DuplicateOptions,
  context: DuplicateContext,
  fileOps: FileOps
): Promise<{ candidates: Candidate[]; filesScanned: number }> {
  const candidates: Candidate[] = [];
  let filesScanned = 0;

  for await (const batch of walkDirectory(root, {
    recursive: options.recursive,
    exclude: options.exclude,
    logger: context.logger,
    lister: context.lister,
  })) {
    for (const path of batch.files) {
      filesScanned += 1;
      let fileStat: FileStat;
      try {
        fileStat = await fileOps.stat(path);
      } catch (error) {
        context.logger.warn(`cannot stat "${path}", excluded from duplicate search`, {
          error: describeSystemError(error).message,
        });
        continue;
      }

      if (!fileStat.isFile() || fileStat.size === 0) {
        continue;
      }

      candidates.push({ path, size: fileStat.size, mtimeMs: fileStat.mtimeMs });
    }
  }

  return { candidates, filesScanned };
}

/**
 * Fingerprint every candidate that shares its size with another one. The grouper is only
 * filled once every fingerprint has settled, in walk order.
 */
async function groupCandidates(
  candidates: Candidate[],
  options: DuplicateOptions,
  logger: Logger
): Promise<{ grouper: DuplicateGrouper; hashed: number }> {
  const sizeCounts = new Map<number, number>();
  for (const candidate of candidates) {
    sizeCounts.set(candidate.size, (sizeCounts.get(candidate.size) ?? 0) + 1);
  }

  const toHash = candidates.filter((candidate) => (sizeCounts.get(candidate.size) ?? 0) > 1);
  const limit = pLimit(Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY));
  const progress = options.progressStream && toHash.length > 0
    ? new ProgressTracker({ total: toHash.length, label: 'Fingerprinting', stream: options.progressStream })
    : undefined;

  const fingerprints = await Promise.all(
    toHash.map((candidate) =>
      limit(async () => {
        const result = await fingerprintFile(candidate.path, {
          algorithm: options.algorithm,
          chunkSize: options.chunkSize ?? DEFAULT_CHUNK_SIZE,
        });
        progress?.increment();
        return result;
      })
    )
  );
  progress?.complete();

  const grouper = new DuplicateGrouper();
  toHash.forEach((candidate, index) => {
    const fingerprint = fingerprints[index];
    if (fingerprint === UNREADABLE) {
      logger.warn(`cannot read "${candidate.path}", excluded from duplicate search`);
      return;
    }
    grouper.add(candidate.path, fingerprint);
  });

  return { grouper, hashed: toHash.length };
}

async function removeDuplicate(
  path: string,
  kept: string,
  options: DuplicateOptions,
  context: DuplicateContext,
  fileOps: FileOps
): Promise<Removal> {
  const { ledger, logger } = context;
  logger.info(`"${kept}": remove duplicate "${path}"`);

  if (options.dryRun) {
    ledger.record({ operation: 'duplicates', executed: false, path, original: kept });
    return { path, outcome: 'skipped-dry-run', bytes: 0 };
  }

  let size: number;
  try {
    size = (await fileOps.stat(path)).size;
  } catch (error) {
    if (isMissingFileError(error)) {
      logger.error(`"${kept}": duplicate "${path}" does not exist`);
      ledger.record({
        operation: 'duplicates',
        executed: false,
        path,
        original: kept,
        message: 'duplicate does not exist',
      });
      return { path, outcome: 'missing', bytes: 0 };
    }
    const details = describeSystemError(error);
    logger.error(`"${kept}": failed to remove "${path}"`, error, { code: details.code });
    ledger.record({ operation: 'duplicates', executed: false, path, original: kept, ...details });
    return { path, outcome: 'failed', bytes: 0 };
  }

  try {
    await fileOps.unlink(path);
  } catch (error) {
    const details = describeSystemError(error);
    logger.error(`"${kept}": failed to remove "${path}"`, error, { code: details.code });
    ledger.record({ operation: 'duplicates', executed: false, path, original: kept, ...details });
    return { path, outcome: 'failed', bytes: 0 };
  }

  ledger.record({ operation: 'duplicates', executed: true, path, original: kept });
  return { path, outcome: 'removed', bytes: size };
}

/**
 * Find and remove duplicate files under `root`. Per-file failures end up in the ledger and the
 * log; only an invalid root rejects.
 */
export async function removeDuplicates(
  root: string,
  options: DuplicateOptions,
  context: DuplicateContext
): Promise<DuplicateRunResult> {
  const fileOps = context.fileOps ?? nodeFileOps;
  const logger = context.logger;

  await assertDirectory(root);

  const { candidates, filesScanned } = await collectCandidates(root, options, context, fileOps);
  const { grouper, hashed } = await groupCandidates(candidates, options, logger);
  const mtimes = new Map(candidates.map((candidate) => [candidate.path, candidate.mtimeMs] as const));

  const groups: ResolvedGroup[] = [];
  let bytesFreed = 0;

  for (const group of grouper.groups()) {
    const selection = selectSurvivor(
      group.paths.map((path) => ({ path, mtimeMs: mtimes.get(path) ?? 0 }))
    );
    logger.info(`"${selection.kept}": ${selection.remove.length} duplicates found`);

    const removals: Removal[] = [];
    for (const path of selection.remove) {
      const removal = await removeDuplicate(path, selection.kept, options, context, fileOps);
      bytesFreed += removal.bytes;
      removals.push(removal);
    }

    groups.push({ digest: group.digest, size: group.size, kept: selection.kept, removals });
  }

  logger.debug(`duplicate search of "${root}" finished`, {
    filesScanned,
    filesHashed: hashed,
    groups: groups.length,
    bytesFreed,
  });

  return { root, filesScanned, filesHashed: hashed, bytesFreed, groups };
}
