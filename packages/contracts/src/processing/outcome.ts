/**
 * Lifecycle states a file passes through.
 *
 * Discovered -> LockCheck -> (Retrying <-> LockCheck | Abandoned)
 *   -> Processing -> (Success | Failure)
 *
 * Vanished covers a claimed path that was already routed by the time the
 * worker reached it.
 */
export type FileLifecycleState =
  | 'discovered'
  | 'lock-check'
  | 'retrying'
  | 'abandoned'
  | 'processing'
  | 'success'
  | 'failure'
  | 'vanished';

/**
 * How a file was discovered
 */
export type DiscoveryTrigger = 'startup-scan' | 'watch' | 'poll' | 'manual';

/**
 * Terminal outcome of one processing attempt.
 */
export type FileOutcome =
  | {
      status: 'success';
      fileName: string;
      outputPath: string;
      /** null when the source was deleted instead of archived */
      archivePath: string | null;
    }
  | {
      status: 'failure';
      fileName: string;
      message: string;
      code: string;
      /** null when the source could not be moved to the error directory */
      errorPath: string | null;
    }
  | {
      status: 'abandoned';
      fileName: string;
      attempts: number;
    }
  | {
      status: 'vanished';
      fileName: string;
    };

/**
 * Error recorded for the daily summary
 */
export interface ProcessingErrorEntry {
  timestamp: string;
  fileName: string;
  message: string;
}

/**
 * Point-in-time view of the processing counters
 */
export interface MetricsSnapshot {
  successCount: number;
  errorCount: number;
  /** When the counters were last reset (ISO timestamp) */
  since: string;
  errors: ProcessingErrorEntry[];
}
