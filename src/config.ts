/**
 * Configuration system with YAML and JSON support
 */

import { readFileSync, existsSync } from 'fs';
import YAML from 'js-yaml';
import type { NamingStyle, OperationName } from '@tidyfs/contracts';
import { DEFAULT_CONCURRENCY } from './duplicates.js';
import { DEFAULT_CHUNK_SIZE, type HashAlgorithm, MAX_CHUNK_SIZE, isHashAlgorithm } from './fingerprint.js';
import { AppError, type LogLevel, type Logger, isLogLevel } from './logger.js';
import { isNamingStyle } from './naming.js';

export const OPERATION_ORDER: readonly OperationName[] = ['duplicates', 'empties', 'naming'];

export interface WalkConfig {
  exclude: string[];
}

export interface DuplicatesConfig {
  algorithm: HashAlgorithm;
  chunkSize: number;
  concurrency: number;
}

export interface NamingConfig {
  style: NamingStyle | null;
  spaceChar: string | null;
}

export interface AppConfig {
  operations: OperationName[];
  dryRun: boolean;
  recursive: boolean;
  changelogPath: string | null;
  logLevel: LogLevel;
  progress: boolean;
  walk: WalkConfig;
  duplicates: DuplicatesConfig;
  naming: NamingConfig;
}

/**
 * What a config file or the command line may supply; every section is partial.
 */
export interface ConfigOverrides {
  operations?: OperationName[];
  dryRun?: boolean;
  recursive?: boolean;
  changelogPath?: string | null;
  logLevel?: LogLevel;
  progress?: boolean;
  walk?: Partial<WalkConfig>;
  duplicates?: Partial<DuplicatesConfig>;
  naming?: Partial<NamingConfig>;
}

export const DEFAULT_CONFIG: AppConfig = {
  operations: [],
  dryRun: false,
  recursive: false,
  changelogPath: null,
  logLevel: 'info',
  progress: false,
  walk: {
    exclude: []
  },
  duplicates: {
    algorithm: 'sha256',
    chunkSize: DEFAULT_CHUNK_SIZE,
    concurrency: DEFAULT_CONCURRENCY
  },
  naming: {
    style: null,
    spaceChar: null
  }
};

export const DEFAULT_CONFIG_PATH = './tidyfs.config.yaml';

function cloneConfig(config: AppConfig): AppConfig {
  return structuredClone(config);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isValidChunkSize(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= MAX_CHUNK_SIZE;
}

export function isOperationName(value: unknown): value is OperationName {
  return OPERATION_ORDER.some(operation => operation === value);
}

/**
 * Merge overrides into a config (overrides take precedence, section by section)
 */
export function mergeConfig(base: AppConfig, overrides: ConfigOverrides): AppConfig {
  const merged = cloneConfig(base);

  if (overrides.operations !== undefined) merged.operations = [...overrides.operations];
  if (overrides.dryRun !== undefined) merged.dryRun = overrides.dryRun;
  if (overrides.recursive !== undefined) merged.recursive = overrides.recursive;
  if (overrides.changelogPath !== undefined) merged.changelogPath = overrides.changelogPath;
  if (overrides.logLevel !== undefined) merged.logLevel = overrides.logLevel;
  if (overrides.progress !== undefined) merged.progress = overrides.progress;
  if (overrides.walk) merged.walk = { ...merged.walk, ...overrides.walk };
  if (overrides.duplicates) merged.duplicates = { ...merged.duplicates, ...overrides.duplicates };
  if (overrides.naming) merged.naming = { ...merged.naming, ...overrides.naming };

  return merged;
}

/**
 * Read the recognised keys of a parsed config document. Values of the wrong shape are kept as
 * problems rather than thrown, so one bad key never discards the rest of the file.
 */
export function parseConfigDocument(document: unknown): { overrides: ConfigOverrides; problems: string[] } {
  const overrides: ConfigOverrides = {};
  const problems: string[] = [];

  if (document === null || document === undefined) {
    return { overrides, problems };
  }
  if (!isRecord(document)) {
    problems.push('config root must be a mapping');
    return { overrides, problems };
  }

  const { operations, dryRun, recursive, changelogPath, logLevel, progress, walk, duplicates, naming } = document;

  if (operations !== undefined) {
    const list: unknown[] | null = Array.isArray(operations)
      ? operations
      : typeof operations === 'string' ? operations.split(',') : null;
    if (list === null) {
      problems.push('operations must be a list or a comma-separated string');
    } else {
      overrides.operations = [];
      for (const item of list) {
        const name = typeof item === 'string' ? item.trim().toLowerCase() : item;
        if (isOperationName(name)) {
          overrides.operations.push(name);
        } else {
          problems.push(`unknown operation "${String(item)}"`);
        }
      }
    }
  }

  if (dryRun !== undefined) {
    if (typeof dryRun === 'boolean') overrides.dryRun = dryRun;
    else problems.push('dryRun must be a boolean');
  }
  if (recursive !== undefined) {
    if (typeof recursive === 'boolean') overrides.recursive = recursive;
    else problems.push('recursive must be a boolean');
  }
  if (progress !== undefined) {
    if (typeof progress === 'boolean') overrides.progress = progress;
    else problems.push('progress must be a boolean');
  }
  if (changelogPath !== undefined) {
    if (changelogPath === null || typeof changelogPath === 'string') overrides.changelogPath = changelogPath;
    else problems.push('changelogPath must be a string');
  }
  if (logLevel !== undefined) {
    if (isLogLevel(logLevel)) overrides.logLevel = logLevel;
    else problems.push(`unknown log level "${String(logLevel)}"`);
  }

  if (walk !== undefined) {
    if (!isRecord(walk)) {
      problems.push('walk must be a mapping');
    } else if (walk.exclude === undefined) {
      overrides.walk = {};
    } else {
      const raw: unknown[] = Array.isArray(walk.exclude) ? walk.exclude : [];
      const patterns = raw.filter((item): item is string => typeof item === 'string');
      if (Array.isArray(walk.exclude) && patterns.length === raw.length) {
        overrides.walk = { exclude: patterns };
      } else {
        problems.push('walk.exclude must be a list of glob patterns');
      }
    }
  }

  if (duplicates !== undefined) {
    if (!isRecord(duplicates)) {
      problems.push('duplicates must be a mapping');
    } else {
      overrides.duplicates = {};
      if (duplicates.algorithm !== undefined) {
        if (isHashAlgorithm(duplicates.algorithm)) overrides.duplicates.algorithm = duplicates.algorithm;
        else problems.push(`unsupported hash algorithm "${String(duplicates.algorithm)}"`);
      }
      if (duplicates.chunkSize !== undefined) {
        if (typeof duplicates.chunkSize === 'number') overrides.duplicates.chunkSize = duplicates.chunkSize;
        else problems.push('duplicates.chunkSize must be a number');
      }
      if (duplicates.concurrency !== undefined) {
        if (typeof duplicates.concurrency === 'number') overrides.duplicates.concurrency = duplicates.concurrency;
        else problems.push('duplicates.concurrency must be a number');
      }
    }
  }

  if (naming !== undefined) {
    if (!isRecord(naming)) {
      problems.push('naming must be a mapping');
    } else {
      overrides.naming = {};
      if (naming.style !== undefined) {
        const style = typeof naming.style === 'string' ? naming.style.trim().toLowerCase() : naming.style;
        if (style === null || isNamingStyle(style)) overrides.naming.style = style;
        else problems.push(`unknown naming style "${String(naming.style)}"`);
      }
      if (naming.spaceChar !== undefined) {
        if (naming.spaceChar === null || typeof naming.spaceChar === 'string') overrides.naming.spaceChar = naming.spaceChar;
        else problems.push('naming.spaceChar must be a string');
      }
    }
  }

  return { overrides, problems };
}

/**
 * Configuration manager
 */
export class ConfigManager {
  private config: AppConfig;
  private configPath: string;
  private logger: Logger;
  private problems: string[] = [];

  constructor(logger: Logger, configPath: string = DEFAULT_CONFIG_PATH) {
    this.configPath = configPath;
    this.logger = logger.child('config');
    this.config = this.loadConfig();
  }

  /**
   * Load configuration from file or use defaults
   */
  private loadConfig(): AppConfig {
    if (!existsSync(this.configPath)) {
      this.logger.debug(`Config file not found: ${this.configPath}, using defaults`);
      return cloneConfig(DEFAULT_CONFIG);
    }

    try {
      const content = readFileSync(this.configPath, 'utf-8');
      let document: unknown;

      if (this.configPath.endsWith('.json')) {
        document = JSON.parse(content);
      } else if (this.configPath.endsWith('.yaml') || this.configPath.endsWith('.yml')) {
        document = YAML.load(content);
      } else {
        throw new AppError(`Unsupported config format: ${this.configPath}`, 'INVALID_CONFIG', 1, { path: this.configPath });
      }

      const { overrides, problems } = parseConfigDocument(document);
      for (const problem of problems) {
        this.logger.warn(`ignoring config value: ${problem}`, { path: this.configPath });
      }
      this.problems.push(...problems);

      this.logger.debug(`Loaded configuration from ${this.configPath}`);
      return mergeConfig(DEFAULT_CONFIG, overrides);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Failed to load config: ${message}`);
      this.problems.push(message);
      return cloneConfig(DEFAULT_CONFIG);
    }
  }

  getAll(): AppConfig {
    return cloneConfig(this.config);
  }

  /**
   * Apply overrides (environment, command line) on top of the loaded file
   */
  apply(overrides: ConfigOverrides): AppConfig {
    this.config = mergeConfig(this.config, overrides);
    return this.getAll();
  }

  /**
   * Problems met while reading the file
   */
  getProblems(): string[] {
    return [...this.problems];
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { duplicates, naming } = this.config;

    if (!Number.isInteger(duplicates.concurrency) || duplicates.concurrency < 1) {
      errors.push('duplicates.concurrency must be a positive integer');
    }

    if (!isValidChunkSize(duplicates.chunkSize)) {
      errors.push(`duplicates.chunkSize must be an integer between 1 and ${MAX_CHUNK_SIZE}`);
    }

    if (naming.spaceChar !== null && [...naming.spaceChar].length !== 1) {
      errors.push('naming.spaceChar must be exactly one character');
    }

    return {
      valid: errors.length === 0,
      errors
    };
  }

  /**
   * Replace every invalid value with its default, logging each one.
   * Returns the repaired configuration.
   */
  repair(): AppConfig {
    const { errors } = this.validate();
    if (errors.length === 0) return this.getAll();

    const { duplicates, naming } = this.config;
    if (!Number.isInteger(duplicates.concurrency) || duplicates.concurrency < 1) {
      duplicates.concurrency = DEFAULT_CONFIG.duplicates.concurrency;
    }
    if (!isValidChunkSize(duplicates.chunkSize)) {
      duplicates.chunkSize = DEFAULT_CONFIG.duplicates.chunkSize;
    }
    if (naming.spaceChar !== null && [...naming.spaceChar].length !== 1) {
      naming.spaceChar = null;
    }

    for (const error of errors) {
      this.logger.error(`invalid configuration: ${error}; using the default`);
    }
    return this.getAll();
  }
}
