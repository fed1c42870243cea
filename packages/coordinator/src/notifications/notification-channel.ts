import type { NotificationEvent, ProcessingNotifier } from '@invoice-bridge/contracts';
import { errorMessage, type Logger } from '@invoice-bridge/shared';
import { SerialQueue } from '../queue/serial-queue.js';

/**
 * Outbound notification queue.
 *
 * `publish()` returns immediately; a separate drain task delivers events to
 * the notifier in order. A notifier that throws or hangs only delays later
 * notifications, never file processing.
 */
export class NotificationChannel {
  private readonly queue: SerialQueue<NotificationEvent>;
  private closed = false;

  constructor(
    private readonly notifier: ProcessingNotifier,
    private readonly logger: Logger,
  ) {
    this.queue = new SerialQueue<NotificationEvent>(
      (event) => this.deliver(event),
      (error, event) => {
        this.logger.warn('Notifier failed', { type: event.type, error: errorMessage(error) });
      },
    );
  }

  /**
   * Queue an event. Returns false once the channel is closed.
   */
  publish(event: NotificationEvent): boolean {
    if (this.closed) {
      this.logger.debug('Notification dropped after close', { type: event.type });
      return false;
    }
    this.queue.push(event);
    return true;
  }

  get pendingCount(): number {
    return this.queue.size;
  }

  get busy(): boolean {
    return this.queue.busy;
  }

  whenIdle(): Promise<void> {
    return this.queue.whenIdle();
  }

  /**
   * Deliver everything already queued, then flush the notifier.
   */
  async close(): Promise<void> {
    this.closed = true;
    await this.queue.whenIdle();
    try {
      await this.notifier.flush?.();
    } catch (error) {
      this.logger.warn('Notifier flush failed', { error: errorMessage(error) });
    }
  }

  open(): void {
    this.closed = false;
  }

  private async deliver(event: NotificationEvent): Promise<void> {
    switch (event.type) {
      case 'file-succeeded':
        await this.notifier.onFileSucceeded?.(event);
        break;
      case 'file-failed':
        await this.notifier.onFileFailed?.(event);
        break;
      case 'daily-summary':
        await this.notifier.onDailySummary?.(event);
        break;
    }
  }
}
