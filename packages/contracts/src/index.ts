export type OperationName = 'duplicates' | 'empties' | 'naming';

export type NamingStyle = 'capitalized' | 'titlecase' | 'lowercase' | 'uppercase';

/**
 * Failure details attached to a change that was not carried out.
 * `errno` and `code` are only present when the operating system reported the failure.
 */
export interface ChangeFailure {
  message?: string;
  errno?: number;
  code?: string;
}

interface ChangeBase extends ChangeFailure {
  id: number;
  executed: boolean;
}

export interface DuplicateChange extends ChangeBase {
  operation: 'duplicates';
  path: string;
  original: string;
}

export interface EmptyChange extends ChangeBase {
  operation: 'empties';
  path: string;
  kind: 'file' | 'directory';
}

export interface RenameChange extends ChangeBase {
  operation: 'naming';
  src: string;
  dest: string;
}

export type LedgerEntry = DuplicateChange | EmptyChange | RenameChange;

export type ReportFormatVersion = 3;

export interface ChangeReport {
  version: ReportFormatVersion;
  start: string;
  durationMs: number;
  dryRun: boolean;
  bytesFreed: number;
  changes: LedgerEntry[];
}
