import { resolve } from 'node:path';
import type { DiscoveryTrigger } from '@invoice-bridge/contracts';
import { errorMessage, type Logger } from '@invoice-bridge/shared';
import { SerialQueue } from './serial-queue.js';

/**
 * A claimed input file waiting for (or under) processing
 */
export interface WorkItem {
  /** Absolute, resolved path; also the claim key */
  path: string;
  trigger: DiscoveryTrigger;
}

export type WorkHandler<R = void> = (item: WorkItem) => Promise<R>;

/**
 * Called once the claim is released, so a follow-up claim on the same path
 * succeeds from inside it
 */
export type SettledHandler<R = void> = (item: WorkItem, result: PromiseSettledResult<R>) => void;

/**
 * Single-worker queue with an in-flight claim set.
 *
 * Every discovery trigger enqueues here. A path stays claimed from enqueue
 * until its handler settles, so a file seen by the startup scan, the watcher
 * and the poll at once is handled exactly once.
 */
export class WorkQueue<R = void> {
  private readonly claims = new Set<string>();
  private readonly queue: SerialQueue<WorkItem>;
  private inFlight: WorkItem | null = null;
  private accepting = true;

  constructor(
    private readonly handler: WorkHandler<R>,
    private readonly logger: Logger,
    private readonly onSettled?: SettledHandler<R>,
  ) {
    this.queue = new SerialQueue<WorkItem>(
      (item) => this.run(item),
      (error, item) => {
        this.logger.error('Unhandled error in work queue', {
          fileName: item.path,
          error: errorMessage(error),
        });
      },
    );
  }

  /**
   * Claim and queue a path. Returns false when the path is already claimed
   * or the queue is closed.
   */
  enqueue(filePath: string, trigger: DiscoveryTrigger): boolean {
    const key = resolve(filePath);
    if (!this.accepting || this.claims.has(key)) {
      return false;
    }

    this.claims.add(key);
    this.queue.push({ path: key, trigger });
    return true;
  }

  isClaimed(filePath: string): boolean {
    return this.claims.has(resolve(filePath));
  }

  get pendingCount(): number {
    return this.queue.size;
  }

  get busy(): boolean {
    return this.queue.busy;
  }

  get current(): WorkItem | null {
    return this.inFlight;
  }

  whenIdle(): Promise<void> {
    return this.queue.whenIdle();
  }

  open(): void {
    this.accepting = true;
  }

  /**
   * Stop accepting work, drop items that have not started and wait for the
   * one in flight. Returns the dropped items.
   */
  async close(): Promise<WorkItem[]> {
    this.accepting = false;
    const dropped = this.queue.clear();
    for (const item of dropped) {
      this.claims.delete(item.path);
    }
    await this.queue.whenIdle();
    return dropped;
  }

  private async run(item: WorkItem): Promise<void> {
    this.inFlight = item;
    let result: PromiseSettledResult<R>;
    try {
      result = { status: 'fulfilled', value: await this.handler(item) };
    } catch (error) {
      result = { status: 'rejected', reason: error };
    }
    this.inFlight = null;
    this.claims.delete(item.path);

    this.onSettled?.(item, result);
    if (result.status === 'rejected') {
      throw result.reason;
    }
  }
}
