/**
 * Programmatic entry point. The CLI in ./cli.ts is a thin layer over these.
 */

export type {
  ChangeReport,
  DuplicateChange,
  EmptyChange,
  LedgerEntry,
  NamingStyle,
  OperationName,
  RenameChange,
} from '@tidyfs/contracts';

export { ChangeLedger, REPORT_FORMAT_VERSION } from './change-ledger.js';
export type { ChangeInput, RunSummary } from './change-ledger.js';
export { ConfigManager, DEFAULT_CONFIG, OPERATION_ORDER, mergeConfig, parseConfigDocument } from './config.js';
export type { AppConfig, ConfigOverrides } from './config.js';
export { assertDirectory, listDirectory, walkDirectory } from './directory-walker.js';
export type { DirectoryBatch, DirectoryLister, WalkOptions } from './directory-walker.js';
export { DuplicateGrouper } from './duplicate-grouper.js';
export type { DuplicateGroup } from './duplicate-grouper.js';
export { nodeFileOps, removeDuplicates } from './duplicates.js';
export type { DuplicateOptions, DuplicateRunResult, FileOps, RemovalOutcome, ResolvedGroup } from './duplicates.js';
export { removeEmpty } from './empties.js';
export type { EmptiesOptions, EmptiesRunResult } from './empties.js';
export { UNREADABLE, fingerprintFile } from './fingerprint.js';
export type { Fingerprint, FingerprintResult, HashAlgorithm } from './fingerprint.js';
export { AppError, Logger } from './logger.js';
export type { LogEntry, LogLevel, LogSink } from './logger.js';
export { normalizeFilename, normalizeNames } from './naming.js';
export type { NamingOptions, NamingRunResult } from './naming.js';
export { selectSurvivor, splitExtension } from './survivor-selector.js';
export type { SurvivorSelection } from './survivor-selector.js';
export { run } from './cli.js';
