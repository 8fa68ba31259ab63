/**
 * Naming pass: normalizes inconsistent file names in place.
 */

import { lstat, rename } from 'fs/promises';
import { basename, join } from 'path';
import type { NamingStyle } from '@tidyfs/contracts';
import type { ChangeLedger } from './change-ledger.js';
import { type DirectoryLister, assertDirectory, walkDirectory } from './directory-walker.js';
import { type Logger, describeSystemError, isMissingFileError } from './logger.js';
import { splitExtension } from './survivor-selector.js';

export const NAMING_STYLES: readonly NamingStyle[] = ['capitalized', 'titlecase', 'lowercase', 'uppercase'];

export interface NameRules {
  style?: NamingStyle | null;
  /** Single character that replaces spaces in the stem. */
  spaceChar?: string | null;
}

export interface NamingOptions extends NameRules {
  dryRun: boolean;
  recursive: boolean;
  exclude?: string[];
}

export interface NamingContext {
  ledger: ChangeLedger;
  logger: Logger;
  lister?: DirectoryLister;
}

export interface NamingRunResult {
  root: string;
  renamed: number;
  skipped: number;
  failures: number;
}

const EDGE_CHARACTERS = /^[ _-]+|[ _-]+$/g;
// Anything but an alphanumeric (or a bracket facing the period) directly around a period.
const ADJACENT_TO_PERIOD = /([^A-Z\d)\]])?\.([^A-Z\d(\[])?/gi;

export function isNamingStyle(value: unknown): value is NamingStyle {
  return NAMING_STYLES.some((style) => style === value);
}

function isCased(char: string): boolean {
  return char.toLowerCase() !== char.toUpperCase();
}

export function toTitleCase(value: string): string {
  let previousCased = false;
  let result = '';
  for (const char of value) {
    const cased = isCased(char);
    result += cased ? (previousCased ? char.toLowerCase() : char.toUpperCase()) : char;
    previousCased = cased;
  }
  return result;
}

export function applyStyle(value: string, style: NamingStyle): string {
  switch (style) {
    case 'capitalized':
      return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
    case 'titlecase':
      return toTitleCase(value);
    case 'lowercase':
      return value.toLowerCase();
    case 'uppercase':
      return value.toUpperCase();
  }
}

/**
 * Normalized form of a single file name (no directory part).
 */
export function normalizeFilename(name: string, rules: NameRules = {}): string {
  const parts = splitExtension(name);
  let stem = parts.stem;

  if (stem !== '') {
    stem = stem.replace(EDGE_CHARACTERS, '');
    stem = stem.split(/\s+/).filter(Boolean).join(' ');
    if (rules.style) {
      stem = applyStyle(stem, rules.style);
    }
    if (rules.spaceChar) {
      stem = stem.split(' ').join(rules.spaceChar);
    }
  }

  const extension = parts.extension.replace(/ /g, '').toLowerCase();
  return `${stem}${extension}`.replace(ADJACENT_TO_PERIOD, '.');
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch (error) {
    if (isMissingFileError(error)) return false;
    throw error;
  }
}

export async function normalizeNames(
  root: string,
  options: NamingOptions,
  context: NamingContext
): Promise<NamingRunResult> {
  const { ledger, logger } = context;
  const result: NamingRunResult = { root, renamed: 0, skipped: 0, failures: 0 };

  await assertDirectory(root);

  for await (const batch of walkDirectory(root, {
    recursive: options.recursive,
    exclude: options.exclude,
    logger,
    lister: context.lister,
  })) {
    const claimed = new Set<string>();

    for (const src of batch.files) {
      const name = basename(src);
      const normalized = normalizeFilename(name, options);

      if (normalized === name) {
        logger.debug(`"${src}": no change`);
        continue;
      }

      const dest = join(batch.directory, normalized);

      if (normalized === '') {
        logger.warn(`"${src}": normalized name is empty, leaving it alone`);
        ledger.record({ operation: 'naming', executed: false, src, dest, message: 'normalized name is empty' });
        result.skipped += 1;
        continue;
      }

      logger.info(`"${src}": rename "${normalized}"`);

      try {
        if (claimed.has(dest) || (await pathExists(dest))) {
          logger.warn(`"${src}": destination already exists`);
          ledger.record({ operation: 'naming', executed: false, src, dest, message: 'destination already exists' });
          result.skipped += 1;
          continue;
        }
        claimed.add(dest);

        if (options.dryRun) {
          ledger.record({ operation: 'naming', executed: false, src, dest });
          continue;
        }

        await rename(src, dest);
        ledger.record({ operation: 'naming', executed: true, src, dest });
        result.renamed += 1;
      } catch (error) {
        const details = describeSystemError(error);
        logger.error(`failed to rename "${src}"`, error);
        ledger.record({ operation: 'naming', executed: false, src, dest, ...details });
        result.failures += 1;
      }
    }
  }

  return result;
}
