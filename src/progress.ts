/**
 * Progress line for long fingerprinting runs, plus duration formatting for the run summary
 */

export interface ProgressOptions {
  total: number;
  label?: string;
  stream?: NodeJS.WritableStream;
  updateIntervalMs?: number;
}

export interface ProgressStats {
  current: number;
  total: number;
  percent: number;
  elapsed: number;
  rate: number;
  isComplete: boolean;
}

/**
 * Format a millisecond duration: `850.00ms`, `12.50s`, `2.25min`.
 */
export function formatDuration(milliseconds: number): string {
  if (milliseconds <= 1000) return `${milliseconds.toFixed(2)}ms`;
  if (milliseconds <= 60000) return `${(milliseconds / 1000).toFixed(2)}s`;
  return `${(milliseconds / 60000).toFixed(2)}min`;
}

/**
 * Simple progress tracker for CLI operations
 */
export class ProgressTracker {
  private current = 0;
  private total: number;
  private label: string;
  private stream: NodeJS.WritableStream;
  private startTime = Date.now();
  private lastUpdate = 0;
  private updateIntervalMs: number;

  constructor(options: ProgressOptions) {
    this.total = options.total;
    this.label = options.label || 'Progress';
    this.stream = options.stream ?? process.stdout;
    this.updateIntervalMs = options.updateIntervalMs ?? 100;
  }

  increment(amount: number = 1): void {
    this.current = Math.min(this.current + amount, this.total);
    this.updateDisplay();
  }

  complete(): void {
    this.current = this.total;
    this.lastUpdate = 0;
    this.updateDisplay();
    this.stream.write('\n');
  }

  getStats(): ProgressStats {
    const elapsed = (Date.now() - this.startTime) / 1000;
    const rate = elapsed > 0 ? this.current / elapsed : 0;

    return {
      current: this.current,
      total: this.total,
      percent: this.total > 0 ? (this.current / this.total) * 100 : 100,
      elapsed: Math.round(elapsed),
      rate: Math.round(rate * 10) / 10,
      isComplete: this.current >= this.total
    };
  }

  private createBar(width: number = 20): string {
    const filled = this.total > 0 ? Math.round((this.current / this.total) * width) : width;
    return '[' + '█'.repeat(filled) + '░'.repeat(width - filled) + ']';
  }

  private updateDisplay(): void {
    const now = Date.now();
    if (now - this.lastUpdate < this.updateIntervalMs && this.current < this.total) {
      return;
    }
    this.lastUpdate = now;

    const stats = this.getStats();
    const parts = [
      `${this.label}:`,
      this.createBar(),
      `${this.current}/${this.total}`,
      `${Math.round(stats.percent)}%`
    ];

    if (stats.current > 0 && stats.current < stats.total) {
      parts.push(`${stats.rate} files/s`);
    }

    this.stream.write('\r\x1b[2K' + parts.join(' '));
  }
}
