import type { MetricsSnapshot, ProcessingErrorEntry } from '@invoice-bridge/contracts';
import { systemClock, type Clock } from '@invoice-bridge/shared';

/**
 * Success and error counters for the current summary period.
 *
 * All methods are synchronous, so a snapshot and the reset that follows it
 * cannot interleave with a record call.
 */
export class ProcessingMetrics {
  private successCount = 0;
  private errors: ProcessingErrorEntry[] = [];
  private since: Date;

  constructor(private readonly clock: Clock = systemClock) {
    this.since = clock.now();
  }

  recordSuccess(): void {
    this.successCount++;
  }

  recordError(fileName: string, message: string): void {
    this.errors.push({ timestamp: this.clock.now().toISOString(), fileName, message });
  }

  hasActivity(): boolean {
    return this.successCount > 0 || this.errors.length > 0;
  }

  snapshot(): MetricsSnapshot {
    return {
      successCount: this.successCount,
      errorCount: this.errors.length,
      since: this.since.toISOString(),
      errors: this.errors.map((entry) => ({ ...entry })),
    };
  }

  /**
   * Snapshot, then start a new period at `now`.
   */
  takeAndReset(now: Date = this.clock.now()): MetricsSnapshot {
    const snapshot = this.snapshot();
    this.successCount = 0;
    this.errors = [];
    this.since = now;
    return snapshot;
  }
}
