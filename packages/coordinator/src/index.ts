/**
 * @invoice-bridge/coordinator
 *
 * File Lifecycle Coordinator: discovery, claiming, lock retry, transform and
 * routing of SalesInvoicePrint files.
 *
 * @packageDocumentation
 */

export {
  FileLifecycleCoordinator,
  createProcessorLogger,
  type FileLifecycleCoordinatorOptions,
  type StopOptions,
} from './coordinator.js';

// Configuration
export {
  DEFAULT_PROCESSOR_CONFIG,
  buildProcessorConfig,
  readProcessorSettingsFile,
  settingsToOverrides,
  type EffectiveProcessorConfig,
  type LockRetrySettings,
  type NotificationSettings,
  type ProcessorConfig,
  type ProcessorConfigOverrides,
} from './config/processor-config.js';

// Building blocks
export { WorkQueue, type WorkItem, type WorkHandler, type SettledHandler } from './queue/work-queue.js';
export {
  ExclusiveOpenProbe,
  DEFAULT_SETTLE_MS,
  waitForUnlock,
  sleep,
  type FileLockProbe,
  type LockProbeResult,
  type LockRetryPolicy,
  type LockWaitResult,
  type ExclusiveOpenProbeOptions,
  type Sleep,
} from './lock/lock-probe.js';
export { FileRouter, moveFile, errorSidecarText, type CommitResult, type RoutingOptions } from './routing/file-router.js';
export {
  outputFileName,
  archiveFileName,
  errorFileName,
  errorSidecarFileName,
  isInputFileName,
} from './routing/file-names.js';
export { ProcessingMetrics } from './metrics/processing-metrics.js';
export { NotificationChannel } from './notifications/notification-channel.js';
export { CompositeNotifier, LoggingNotifier, NoopNotifier } from './notifications/notifiers.js';
export { DailySummarySchedule } from './summary/daily-summary.js';
export { DirectoryWatcher, type DirectoryWatcherOptions } from './discovery/directory-watcher.js';
export { FileProcessor, type FileProcessorDependencies } from './processor/file-processor.js';
