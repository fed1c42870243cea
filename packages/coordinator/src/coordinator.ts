/**
 * File Lifecycle Coordinator
 *
 * Discovers input files (startup scan, live watch, periodic poll), funnels
 * them through one claimed work queue and routes each to output + archive or
 * to quarantine. Notifications leave through an outbound channel; counters
 * live in a metrics object read by the daily summary check.
 *
 * @packageDocumentation
 */

import { join, resolve } from 'node:path';
import type {
  DailySummaryEvent,
  DiscoveryTrigger,
  FileOutcome,
  MetricsSnapshot,
  ProcessingNotifier,
} from '@invoice-bridge/contracts';
import {
  consoleSink,
  createLogger,
  dailyFileSink,
  errorMessage,
  systemClock,
  teeSink,
  type Clock,
  type Logger,
} from '@invoice-bridge/shared';
import type { ChecksumFunction } from '@invoice-bridge/transformer';
import type { ProcessorConfig } from './config/processor-config.js';
import { DirectoryWatcher } from './discovery/directory-watcher.js';
import { listFiles } from './fs/list-files.js';
import { ExclusiveOpenProbe, sleep, type FileLockProbe, type Sleep } from './lock/lock-probe.js';
import { ProcessingMetrics } from './metrics/processing-metrics.js';
import { NotificationChannel } from './notifications/notification-channel.js';
import { NoopNotifier } from './notifications/notifiers.js';
import { FileProcessor } from './processor/file-processor.js';
import { WorkQueue, type WorkItem } from './queue/work-queue.js';
import { FileRouter, ensureDirectory } from './routing/file-router.js';
import { isInputFileName } from './routing/file-names.js';
import { DailySummarySchedule } from './summary/daily-summary.js';

export interface FileLifecycleCoordinatorOptions {
  config: Readonly<ProcessorConfig>;
  /** Defaults to NoopNotifier */
  notifier?: ProcessingNotifier;
  /** Defaults to console plus a daily file in `config.logDirectory` */
  logger?: Logger;
  clock?: Clock;
  lockProbe?: FileLockProbe;
  /** Wait used between lock retries */
  sleep?: Sleep;
  checksum?: ChecksumFunction;
  /** Observer for every finished work item */
  onOutcome?: (outcome: FileOutcome, item: WorkItem) => void;
}

export interface StopOptions {
  /** Overrides `config.flushSummaryOnStop` */
  flushSummary?: boolean;
}

interface OutcomeWaiter {
  resolve(outcome: FileOutcome): void;
  reject(error: Error): void;
}

/**
 * Logger writing to the console and to `{logDirectory}/invoice-bridge_yyyy-MM-dd.log`
 */
export function createProcessorLogger(config: Readonly<ProcessorConfig>): Logger {
  return createLogger({
    level: config.logLevel,
    sink: teeSink(consoleSink, dailyFileSink({ directory: config.logDirectory })),
  });
}

export class FileLifecycleCoordinator {
  private readonly config: Readonly<ProcessorConfig>;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly metrics: ProcessingMetrics;
  private readonly channel: NotificationChannel;
  private readonly router: FileRouter;
  private readonly processor: FileProcessor;
  private readonly queue: WorkQueue<FileOutcome>;
  private readonly watcher: DirectoryWatcher;
  private readonly schedule: DailySummarySchedule | null;
  private readonly onOutcome: ((outcome: FileOutcome, item: WorkItem) => void) | undefined;
  private readonly waiters = new Map<string, OutcomeWaiter[]>();
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private summaryTimer: ReturnType<typeof setInterval> | null = null;
  private started = false;

  constructor(options: FileLifecycleCoordinatorOptions) {
    const { config } = options;
    this.config = config;
    this.logger = options.logger ?? createProcessorLogger(config);
    this.clock = options.clock ?? systemClock;
    this.onOutcome = options.onOutcome;

    this.metrics = new ProcessingMetrics(this.clock);
    this.channel = new NotificationChannel(options.notifier ?? new NoopNotifier(), this.logger);
    this.router = new FileRouter(
      {
        outputDirectory: config.outputDirectory,
        archiveDirectory: config.archiveDirectory,
        errorDirectory: config.errorDirectory,
        archiveProcessedFiles: config.archiveProcessedFiles,
      },
      this.logger,
    );
    this.processor = new FileProcessor({
      router: this.router,
      probe: options.lockProbe ?? new ExclusiveOpenProbe(),
      lockRetry: config.lockRetry,
      sleep: options.sleep ?? sleep,
      clock: this.clock,
      metrics: this.metrics,
      channel: this.channel,
      logger: this.logger,
      ...(options.checksum ? { checksum: options.checksum } : {}),
    });
    this.queue = new WorkQueue(
      (item) => this.processor.process(item.path),
      this.logger,
      (item, result) => {
        this.settle(item, result);
      },
    );
    this.watcher = new DirectoryWatcher({
      directory: config.inputDirectory,
      debounceMs: config.debounceMs,
      onFile: (filePath) => {
        this.enqueue(filePath, 'watch');
      },
      logger: this.logger,
    });

    const { enabled, dailySummary, dailySummaryTime } = config.notifications;
    this.schedule = enabled && dailySummary ? new DailySummarySchedule(dailySummaryTime, this.clock.now()) : null;
  }

  get running(): boolean {
    return this.started;
  }

  /**
   * Prepare directories, process the backlog and start the watch, poll and
   * summary timers.
   */
  async start(): Promise<void> {
    if (this.started) return;

    this.queue.open();
    this.channel.open();
    await ensureDirectory(this.config.inputDirectory);
    await this.router.ensureDirectories();
    await this.router.removeStaleTempFiles();
    this.started = true;

    this.logger.info('File processor starting', {
      inputDirectory: this.config.inputDirectory,
      outputDirectory: this.config.outputDirectory,
      archiveProcessedFiles: this.config.archiveProcessedFiles,
      pollIntervalSeconds: this.config.pollIntervalSeconds,
    });

    const backlog = await this.scan('startup-scan');
    if (backlog > 0) {
      this.logger.info('Found existing files to process', { count: backlog });
    }

    this.watcher.start();
    this.pollTimer = setInterval(() => {
      this.poll();
    }, this.config.pollIntervalSeconds * 1000);
    if (this.schedule) {
      this.summaryTimer = setInterval(() => {
        this.checkDailySummary();
      }, this.config.summaryCheckIntervalMs);
    }
  }

  /**
   * Stop discovery, drop queued work that has not started, let the file in
   * flight finish, then drain notifications.
   */
  async stop(options: StopOptions = {}): Promise<void> {
    const wasStarted = this.started;
    this.started = false;
    this.watcher.stop();
    if (this.pollTimer) clearInterval(this.pollTimer);
    if (this.summaryTimer) clearInterval(this.summaryTimer);
    this.pollTimer = null;
    this.summaryTimer = null;

    const dropped = await this.queue.close();
    for (const item of dropped) {
      this.settleWaiters(item.path, (waiter) => {
        waiter.reject(new Error(`Processing of ${item.path} cancelled: coordinator stopped`));
      });
    }
    if (dropped.length > 0) {
      this.logger.info('Dropped queued files on stop', { count: dropped.length });
    }

    if (options.flushSummary ?? this.config.flushSummaryOnStop) {
      this.publishSummary(this.clock.now());
    }

    await this.channel.close();
    if (wasStarted) {
      this.logger.info('File processor stopped');
    }
  }

  /**
   * Enqueue every input file currently in the input directory. Returns how
   * many were newly claimed.
   */
  async scan(trigger: DiscoveryTrigger = 'manual'): Promise<number> {
    let enqueued = 0;
    for (const name of await listFiles(this.config.inputDirectory)) {
      if (isInputFileName(name) && this.enqueue(join(this.config.inputDirectory, name), trigger)) {
        enqueued++;
      }
    }
    return enqueued;
  }

  /**
   * Claim a path for processing. False when it is already queued or in
   * flight, or the coordinator is stopping.
   */
  enqueue(filePath: string, trigger: DiscoveryTrigger = 'manual'): boolean {
    const accepted = this.queue.enqueue(filePath, trigger);
    if (accepted) {
      this.logger.debug('File queued', { path: resolve(filePath), trigger });
    }
    return accepted;
  }

  /**
   * Run a file through the lifecycle and resolve with its outcome. Shares the
   * claim with every other trigger: if the file is already queued or in
   * flight, this resolves with that attempt's outcome.
   */
  processFile(filePath: string): Promise<FileOutcome> {
    const key = resolve(filePath);
    const outcome = new Promise<FileOutcome>((resolveOutcome, rejectOutcome) => {
      const waiters = this.waiters.get(key) ?? [];
      waiters.push({ resolve: resolveOutcome, reject: rejectOutcome });
      this.waiters.set(key, waiters);
    });

    if (!this.queue.enqueue(key, 'manual') && !this.queue.isClaimed(key)) {
      this.settleWaiters(key, (waiter) => {
        waiter.reject(new Error(`Cannot process ${key}: coordinator is stopping`));
      });
    }
    return outcome;
  }

  /**
   * Publish the daily summary when it is due and there was activity.
   * Returns the published event, or null.
   */
  checkDailySummary(now: Date = this.clock.now()): DailySummaryEvent | null {
    const schedule = this.schedule;
    if (schedule === null || !schedule.isDue(now)) {
      return null;
    }
    schedule.advance(now);
    return this.publishSummary(now);
  }

  /**
   * Resolves once no file is queued or in flight and all notifications are
   * delivered.
   */
  async whenIdle(): Promise<void> {
    do {
      await this.queue.whenIdle();
      await this.channel.whenIdle();
    } while (this.queue.busy || this.channel.busy);
  }

  getMetrics(): MetricsSnapshot {
    return this.metrics.snapshot();
  }

  private poll(): void {
    this.scan('poll').then(
      (count) => {
        if (count > 0) {
          this.logger.debug('Poll found files', { count });
        }
      },
      (error: unknown) => {
        this.logger.warn('Poll scan failed', { error: errorMessage(error) });
      },
    );
  }

  private publishSummary(now: Date): DailySummaryEvent | null {
    if (!this.metrics.hasActivity()) {
      this.logger.debug('No activity since the last summary');
      return null;
    }

    const snapshot = this.metrics.takeAndReset(now);
    const event: DailySummaryEvent = {
      type: 'daily-summary',
      timestamp: now.toISOString(),
      periodStart: snapshot.since,
      periodEnd: now.toISOString(),
      successCount: snapshot.successCount,
      errorCount: snapshot.errorCount,
      errors: snapshot.errors,
    };
    this.channel.publish(event);
    this.logger.info('Daily summary published', {
      successCount: event.successCount,
      errorCount: event.errorCount,
    });
    return event;
  }

  private settle(item: WorkItem, result: PromiseSettledResult<FileOutcome>): void {
    if (result.status === 'rejected') {
      const reason: unknown = result.reason;
      const failure = reason instanceof Error ? reason : new Error(errorMessage(reason));
      this.settleWaiters(item.path, (waiter) => {
        waiter.reject(failure);
      });
      return;
    }

    const outcome = result.value;
    this.settleWaiters(item.path, (waiter) => {
      waiter.resolve(outcome);
    });
    this.onOutcome?.(outcome, item);
  }

  private settleWaiters(key: string, settle: (waiter: OutcomeWaiter) => void): void {
    const waiters = this.waiters.get(key);
    if (!waiters) return;
    this.waiters.delete(key);
    for (const waiter of waiters) {
      settle(waiter);
    }
  }
}
