/**
 * Notification events and hooks.
 *
 * The coordinator publishes these events to an outbound channel. Delivery
 * (email, chat, ...) lives outside the core and plugs in by implementing
 * ProcessingNotifier.
 *
 * @packageDocumentation
 */

import type { ProcessingErrorEntry } from '../processing/outcome.js';

/**
 * Emitted after a file was transformed and its source routed.
 */
export interface FileSucceededEvent {
  type: 'file-succeeded';
  timestamp: string;
  fileName: string;
  outputFileName: string;
  /** Archive file name, or null when the source was deleted */
  archiveFileName: string | null;
  durationMs: number;
}

/**
 * Emitted after a file failed and was quarantined.
 */
export interface FileFailedEvent {
  type: 'file-failed';
  timestamp: string;
  fileName: string;
  message: string;
  /** Error code from the error hierarchy, e.g. "FORMAT_ERROR" */
  code: string;
  /** Stack or other diagnostic text */
  detail?: string;
  /** Quarantined file name, or null if the move itself failed */
  errorFileName: string | null;
}

/**
 * Emitted when the daily summary time has passed and there was activity.
 */
export interface DailySummaryEvent {
  type: 'daily-summary';
  timestamp: string;
  periodStart: string;
  periodEnd: string;
  successCount: number;
  errorCount: number;
  errors: ProcessingErrorEntry[];
}

export type NotificationEvent = FileSucceededEvent | FileFailedEvent | DailySummaryEvent;

/**
 * Receiver of processing notifications.
 *
 * All methods are optional and may be async. Errors thrown here are logged
 * by the channel and never change a file's outcome.
 *
 * @example
 * ```typescript
 * class MailNotifier implements ProcessingNotifier {
 *   async onFileFailed(event: FileFailedEvent) {
 *     await this.mailer.send(renderFailure(event));
 *   }
 * }
 * ```
 */
export interface ProcessingNotifier {
  onFileSucceeded?(event: FileSucceededEvent): void | Promise<void>;

  onFileFailed?(event: FileFailedEvent): void | Promise<void>;

  onDailySummary?(event: DailySummaryEvent): void | Promise<void>;

  /**
   * Flush any buffered deliveries (called on shutdown).
   */
  flush?(): Promise<void>;
}
