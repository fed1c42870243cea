import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { FileOutcome } from '@invoice-bridge/contracts';
import { decodeSourceText, parseSalesInvoice } from '@invoice-bridge/parser';
import {
  LockError,
  errorCode,
  errorMessage,
  formatFileTimestamp,
  formatLocalDate,
  type Clock,
  type Logger,
} from '@invoice-bridge/shared';
import { renderInvoiceXml, type ChecksumFunction } from '@invoice-bridge/transformer';
import { isNotFound } from '../fs/errno.js';
import {
  waitForUnlock,
  type FileLockProbe,
  type LockRetryPolicy,
  type LockWaitResult,
  type Sleep,
} from '../lock/lock-probe.js';
import type { ProcessingMetrics } from '../metrics/processing-metrics.js';
import type { NotificationChannel } from '../notifications/notification-channel.js';
import type { FileRouter } from '../routing/file-router.js';

export interface FileProcessorDependencies {
  router: FileRouter;
  probe: FileLockProbe;
  lockRetry: LockRetryPolicy;
  sleep: Sleep;
  clock: Clock;
  metrics: ProcessingMetrics;
  channel: NotificationChannel;
  logger: Logger;
  checksum?: ChecksumFunction;
}

/**
 * Runs one input file through lock check, transform and routing.
 *
 * Never throws: every failure becomes a `failure` outcome, and the source is
 * either routed or left in place.
 */
export class FileProcessor {
  constructor(private readonly deps: FileProcessorDependencies) {}

  async process(filePath: string): Promise<FileOutcome> {
    const fileName = basename(filePath);
    const logger = this.deps.logger.child({ fileName });

    let lock: LockWaitResult;
    try {
      lock = await waitForUnlock(filePath, this.deps.probe, this.deps.lockRetry, this.deps.sleep, logger);
    } catch (error) {
      logger.error('Could not check whether the file is locked, leaving it in place', {
        error: errorMessage(error),
      });
      return { status: 'abandoned', fileName, attempts: 1 };
    }
    if (lock.status === 'missing') {
      logger.debug('File no longer present, skipping');
      return { status: 'vanished', fileName };
    }
    if (lock.status === 'locked') {
      const error = new LockError(
        `File is still locked after ${lock.attempts} attempts, leaving it for the next scan`,
        lock.attempts,
      );
      logger.warn(error.message, { code: error.code, attempts: error.attempts });
      return { status: 'abandoned', fileName, attempts: lock.attempts };
    }

    const startedAt = this.deps.clock.now();
    const timestamp = formatFileTimestamp(startedAt);
    logger.info('Processing file');

    let source: Buffer;
    try {
      source = await readFile(filePath);
    } catch (error) {
      if (isNotFound(error)) {
        logger.debug('File disappeared before it could be read');
        return { status: 'vanished', fileName };
      }
      return this.fail(filePath, fileName, timestamp, error, logger);
    }

    try {
      const record = parseSalesInvoice(decodeSourceText(source), { processingDate: formatLocalDate(startedAt) });
      const xml = renderInvoiceXml(record, this.deps.checksum ? { checksum: this.deps.checksum } : {});
      const { outputPath, archivePath } = await this.deps.router.commit(filePath, xml, timestamp);

      const durationMs = this.deps.clock.now().getTime() - startedAt.getTime();
      this.deps.metrics.recordSuccess();
      logger.info('File transformed', {
        outputFileName: basename(outputPath),
        archiveFileName: archivePath === null ? null : basename(archivePath),
        lines: record.lineItems.length,
        durationMs,
      });

      this.deps.channel.publish({
        type: 'file-succeeded',
        timestamp: this.deps.clock.now().toISOString(),
        fileName,
        outputFileName: basename(outputPath),
        archiveFileName: archivePath === null ? null : basename(archivePath),
        durationMs,
      });
      this.logTotals(logger);

      return { status: 'success', fileName, outputPath, archivePath };
    } catch (error) {
      return this.fail(filePath, fileName, timestamp, error, logger);
    }
  }

  private async fail(
    filePath: string,
    fileName: string,
    timestamp: string,
    error: unknown,
    logger: Logger,
  ): Promise<FileOutcome> {
    const message = errorMessage(error);
    const code = errorCode(error);

    this.deps.metrics.recordError(fileName, message);
    logger.error('Failed to process file', { code, error: message });

    let errorPath: string | null = null;
    try {
      errorPath = await this.deps.router.quarantine(filePath, message, timestamp, this.deps.clock.now());
      logger.info('Moved failed file to error directory', { errorFileName: basename(errorPath) });
    } catch (quarantineError) {
      logger.error('Could not move failed file to error directory, leaving it in place', {
        error: errorMessage(quarantineError),
      });
    }

    this.deps.channel.publish({
      type: 'file-failed',
      timestamp: this.deps.clock.now().toISOString(),
      fileName,
      message,
      code,
      ...(error instanceof Error && error.stack !== undefined ? { detail: error.stack } : {}),
      errorFileName: errorPath === null ? null : basename(errorPath),
    });
    this.logTotals(logger);

    return { status: 'failure', fileName, message, code, errorPath };
  }

  private logTotals(logger: Logger): void {
    const { successCount, errorCount } = this.deps.metrics.snapshot();
    logger.debug('Running totals', { successCount, errorCount });
  }
}
