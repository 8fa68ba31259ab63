/**
 * Append-only record of every filesystem mutation the run attempted, carried out or not.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { ChangeReport, LedgerEntry, OperationName } from '@tidyfs/contracts';
import { AppError, toError } from './logger.js';

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type ChangeInput = DistributiveOmit<LedgerEntry, 'id'>;

export const REPORT_FORMAT_VERSION = 3;

export const EXIT_LEDGER_WRITE_FAILED = 2;

export interface RunSummary {
  start: Date;
  durationMs: number;
  dryRun: boolean;
  bytesFreed: number;
}

export class ChangeLedger {
  private readonly entries: LedgerEntry[] = [];
  private counter = 0;

  /**
   * Append a change. The ledger assigns the id; the stored entry is frozen.
   */
  record(change: ChangeInput): LedgerEntry {
    const entry: LedgerEntry = Object.freeze({ id: this.counter, ...change });
    this.entries.push(entry);
    this.counter += 1;
    return entry;
  }

  get changes(): readonly LedgerEntry[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  byOperation<O extends OperationName>(operation: O): Extract<LedgerEntry, { operation: O }>[] {
    return this.entries.filter(
      (entry): entry is Extract<LedgerEntry, { operation: O }> => entry.operation === operation
    );
  }

  toReport(summary: RunSummary): ChangeReport {
    return {
      version: REPORT_FORMAT_VERSION,
      start: summary.start.toISOString(),
      durationMs: summary.durationMs,
      dryRun: summary.dryRun,
      bytesFreed: summary.bytesFreed,
      changes: [...this.entries]
    };
  }

  /**
   * Write the report as pretty-printed JSON. A failure here is fatal for the run.
   */
  async save(path: string, summary: RunSummary): Promise<ChangeReport> {
    const report = this.toReport(summary);
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
    } catch (error) {
      throw new AppError(
        `Could not write changelog to "${path}": ${toError(error).message}`,
        'LEDGER_WRITE_FAILED',
        EXIT_LEDGER_WRITE_FAILED,
        { path }
      );
    }
    return report;
  }
}
