#!/usr/bin/env node
/**
 * tidyfs: remove duplicate files, remove empty files and directories, normalize file names.
 */

import { realpathSync } from 'fs';
import path from 'path';
import { performance } from 'perf_hooks';
import { fileURLToPath } from 'url';
import { config as loadEnv } from 'dotenv';
import type { OperationName } from '@tidyfs/contracts';
import { ChangeLedger } from './change-ledger.js';
import {
  type AppConfig,
  type ConfigOverrides,
  ConfigManager,
  DEFAULT_CONFIG_PATH,
  OPERATION_ORDER,
  isOperationName,
} from './config.js';
import { assertDirectory } from './directory-walker.js';
import { removeDuplicates } from './duplicates.js';
import { removeEmpty } from './empties.js';
import { AppError, Logger, type LogSink, handleError, isLogLevel } from './logger.js';
import { isNamingStyle, normalizeNames } from './naming.js';
import { formatDuration } from './progress.js';

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;

export interface CliOptions {
  operations: string[];
  targets: string[];
  changelogPath?: string;
  dryRun: boolean;
  recursive: boolean;
  progress: boolean;
  style?: string;
  spaceChar?: string;
  level?: string;
  configPath?: string;
  concurrency?: string;
  exclude?: string[];
  help: boolean;
}

export interface RunDependencies {
  env?: NodeJS.ProcessEnv;
  sink?: LogSink;
  progressStream?: NodeJS.WritableStream;
}

export const USAGE = `
Usage:
  tidyfs --op duplicates,empties,naming [options] <target...>

Operations run in this order, whatever order they are listed in:
  duplicates   remove files whose content is identical to another file's
  empties      remove zero-byte files and empty directories
  naming       normalize inconsistent file names

Options:
  -o, --op LIST          Comma-separated operations (required)
  -c, --changelog PATH   Write a JSON report of every change to PATH
  -d, --dry              Record what would change without touching anything
  -r, --recurse          Enter subdirectories
  -s, --style NAME       Naming style: capitalized, titlecase, lowercase, uppercase
  -S, --space CHAR       Replace spaces in file names with CHAR
  -l, --level LEVEL      Log level: debug, info, warn, error (default: info)
      --config PATH      YAML or JSON config file (default: ${DEFAULT_CONFIG_PATH})
      --concurrency N    Files fingerprinted at once (default: 4)
      --exclude LIST     Comma-separated glob patterns of names to skip
      --progress         Show fingerprinting progress
  -h, --help             Show this help
`;

function splitList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(Boolean);
}

/**
 * Structural parsing only: unknown flags and missing values are usage errors, while the values
 * themselves are checked later so a bad one can be skipped instead of ending the run.
 */
export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = {
    operations: [],
    targets: [],
    dryRun: false,
    recursive: false,
    progress: false,
    help: false,
  };

  const takeValue = (flag: string, index: number): string => {
    const value = argv[index];
    if (value === undefined) {
      throw new AppError(`Missing value for ${flag}`, 'USAGE', EXIT_USAGE);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '-o':
      case '--op':
        options.operations.push(...splitList(takeValue(arg, ++i)));
        break;
      case '-c':
      case '--changelog':
        options.changelogPath = takeValue(arg, ++i);
        break;
      case '-d':
      case '--dry':
        options.dryRun = true;
        break;
      case '-r':
      case '--recurse':
        options.recursive = true;
        break;
      case '-s':
      case '--style':
        options.style = takeValue(arg, ++i);
        break;
      case '-S':
      case '--space':
        options.spaceChar = takeValue(arg, ++i);
        break;
      case '-l':
      case '--level':
        options.level = takeValue(arg, ++i);
        break;
      case '--config':
        options.configPath = takeValue(arg, ++i);
        break;
      case '--concurrency':
        options.concurrency = takeValue(arg, ++i);
        break;
      case '--exclude':
        options.exclude = [...(options.exclude ?? []), ...splitList(takeValue(arg, ++i))];
        break;
      case '--progress':
        options.progress = true;
        break;
      case '-h':
      case '--help':
        options.help = true;
        break;
      case '--':
        options.targets.push(...argv.slice(i + 1));
        i = argv.length;
        break;
      default:
        if (arg.startsWith('-') && arg.length > 1) {
          throw new AppError(`Unknown argument: ${arg}`, 'USAGE', EXIT_USAGE);
        }
        options.targets.push(arg);
    }
  }

  if (options.help) {
    return options;
  }

  if (options.operations.length === 0) {
    throw new AppError('Missing required argument: --op', 'USAGE', EXIT_USAGE);
  }

  if (options.targets.length === 0) {
    throw new AppError('At least one target directory is required', 'USAGE', EXIT_USAGE);
  }

  return options;
}

/**
 * Turn command-line values into config overrides, warning about (and dropping) bad ones.
 */
export function overridesFromOptions(options: CliOptions, logger: Logger): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  const operations: OperationName[] = [];
  for (const raw of options.operations) {
    const name = raw.toLowerCase();
    if (isOperationName(name)) {
      operations.push(name);
    } else {
      logger.warn(`ignoring unknown operation "${raw}"`);
    }
  }
  overrides.operations = operations;

  if (options.dryRun) overrides.dryRun = true;
  if (options.recursive) overrides.recursive = true;
  if (options.progress) overrides.progress = true;
  if (options.changelogPath !== undefined) overrides.changelogPath = options.changelogPath;
  if (options.exclude !== undefined) overrides.walk = { exclude: options.exclude };

  if (options.level !== undefined) {
    const level = options.level.toLowerCase();
    if (isLogLevel(level)) overrides.logLevel = level;
    else logger.warn(`ignoring unknown log level "${options.level}"`);
  }

  if (options.concurrency !== undefined) {
    const concurrency = Number(options.concurrency);
    if (Number.isInteger(concurrency) && concurrency > 0) {
      overrides.duplicates = { concurrency };
    } else {
      logger.warn(`ignoring invalid concurrency "${options.concurrency}"`);
    }
  }

  const naming: ConfigOverrides['naming'] = {};
  if (options.style !== undefined) {
    const style = options.style.trim().toLowerCase();
    if (isNamingStyle(style)) naming.style = style;
    else logger.warn(`ignoring unknown style "${options.style}"`);
  }
  if (options.spaceChar !== undefined) {
    naming.spaceChar = options.spaceChar;
  }
  if (Object.keys(naming).length > 0) overrides.naming = naming;

  return overrides;
}

async function runOperation(
  operation: OperationName,
  target: string,
  config: AppConfig,
  ledger: ChangeLedger,
  logger: Logger,
  progressStream?: NodeJS.WritableStream
): Promise<number> {
  const context = { ledger, logger: logger.child(operation) };
  const common = { dryRun: config.dryRun, recursive: config.recursive, exclude: config.walk.exclude };

  switch (operation) {
    case 'duplicates': {
      const result = await removeDuplicates(
        target,
        {
          ...common,
          algorithm: config.duplicates.algorithm,
          chunkSize: config.duplicates.chunkSize,
          concurrency: config.duplicates.concurrency,
          progressStream: config.progress ? progressStream : undefined,
        },
        context
      );
      return result.bytesFreed;
    }
    case 'empties':
      await removeEmpty(target, common, context);
      return 0;
    case 'naming':
      await normalizeNames(target, { ...common, ...config.naming }, context);
      return 0;
  }
}

/**
 * Run the CLI and resolve to the process exit code.
 */
export async function run(argv: string[], deps: RunDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;

  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (error instanceof AppError && error.code === 'USAGE') {
      console.error(`❌ ${error.message}`);
      console.log(USAGE);
      return error.exitCode;
    }
    throw error;
  }

  if (options.help) {
    console.log(USAGE);
    return EXIT_OK;
  }

  const envLevel = env.TIDYFS_LOG_LEVEL?.toLowerCase();
  const logger = new Logger({
    context: 'tidyfs',
    level: isLogLevel(envLevel) ? envLevel : 'info',
    sink: deps.sink,
  });
  if (options.level !== undefined) {
    const level = options.level.toLowerCase();
    if (isLogLevel(level)) logger.setMinLevel(level);
  }

  const manager = new ConfigManager(logger, options.configPath ?? env.TIDYFS_CONFIG ?? DEFAULT_CONFIG_PATH);
  if (isLogLevel(envLevel)) {
    manager.apply({ logLevel: envLevel });
  }
  manager.apply(overridesFromOptions(options, logger));
  const config = manager.repair();
  logger.setMinLevel(config.logLevel);

  const operations = OPERATION_ORDER.filter(operation => config.operations.includes(operation));
  if (operations.length === 0) {
    logger.warn('no valid operations selected, nothing to do');
  }
  if (config.dryRun) logger.info('dry run enabled');
  if (config.recursive) logger.info('recursive search enabled');

  const targets: string[] = [];
  for (const target of options.targets) {
    try {
      await assertDirectory(target);
      targets.push(target);
    } catch (error) {
      handleError(error, logger);
    }
  }

  const ledger = new ChangeLedger();
  const start = new Date();
  const stopwatch = performance.now();
  let bytesFreed = 0;

  for (const operation of operations) {
    logger.info(`operation: ${operation}`);
    for (const target of targets) {
      try {
        bytesFreed += await runOperation(operation, target, config, ledger, logger, deps.progressStream ?? process.stdout);
      } catch (error) {
        handleError(error, logger);
      }
    }
  }

  const durationMs = performance.now() - stopwatch;
  logger.info(`${ledger.size} changes in ${formatDuration(durationMs)}`, { bytesFreed });

  if (!config.changelogPath) {
    logger.info('no changelog specified, report not written');
    return EXIT_OK;
  }

  logger.info(`writing changelog to "${config.changelogPath}"`);
  try {
    await ledger.save(config.changelogPath, { start, durationMs, dryRun: config.dryRun, bytesFreed });
  } catch (error) {
    return handleError(error, logger).exitCode;
  }

  return EXIT_OK;
}

async function main(): Promise<void> {
  loadEnv();
  process.exitCode = await run(process.argv.slice(2));
}

function isDirectRun(): boolean {
  if (!process.argv[1]) return false;
  try {
    return realpathSync(process.argv[1]) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);
  }
}

if (isDirectRun()) {
  main().catch(error => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
