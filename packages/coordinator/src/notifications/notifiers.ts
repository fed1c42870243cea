/**
 * Stock notifiers.
 *
 * Delivery to mail or chat plugs in by implementing ProcessingNotifier; these
 * cover the no-op default, log output and fan-out.
 *
 * @packageDocumentation
 */

import type {
  DailySummaryEvent,
  FileFailedEvent,
  FileSucceededEvent,
  ProcessingNotifier,
} from '@invoice-bridge/contracts';
import type { Logger } from '@invoice-bridge/shared';

/**
 * Notifier that dispatches to several notifiers.
 */
export class CompositeNotifier implements ProcessingNotifier {
  private readonly notifiers: ProcessingNotifier[];

  constructor(notifiers: ProcessingNotifier[]) {
    this.notifiers = notifiers;
  }

  async onFileSucceeded(event: FileSucceededEvent): Promise<void> {
    await Promise.all(this.notifiers.map(async (n) => n.onFileSucceeded?.(event)));
  }

  async onFileFailed(event: FileFailedEvent): Promise<void> {
    await Promise.all(this.notifiers.map(async (n) => n.onFileFailed?.(event)));
  }

  async onDailySummary(event: DailySummaryEvent): Promise<void> {
    await Promise.all(this.notifiers.map(async (n) => n.onDailySummary?.(event)));
  }

  async flush(): Promise<void> {
    await Promise.all(this.notifiers.map(async (n) => n.flush?.()));
  }
}

/**
 * No-op notifier (default when notifications are disabled).
 */
export class NoopNotifier implements ProcessingNotifier {
  // All methods are optional
}

/**
 * Writes every notification to the log.
 */
export class LoggingNotifier implements ProcessingNotifier {
  constructor(private readonly logger: Logger) {}

  onFileSucceeded(event: FileSucceededEvent): void {
    this.logger.info('Notification: file processed', {
      fileName: event.fileName,
      outputFileName: event.outputFileName,
      durationMs: event.durationMs,
    });
  }

  onFileFailed(event: FileFailedEvent): void {
    this.logger.warn('Notification: file failed', {
      fileName: event.fileName,
      code: event.code,
      message: event.message,
    });
  }

  onDailySummary(event: DailySummaryEvent): void {
    this.logger.info('Notification: daily summary', {
      periodStart: event.periodStart,
      periodEnd: event.periodEnd,
      successCount: event.successCount,
      errorCount: event.errorCount,
    });
  }
}
