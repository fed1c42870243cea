import { open, type FileHandle } from 'node:fs/promises';
import type { Logger } from '@invoice-bridge/shared';
import { errnoCode } from '../fs/errno.js';

export type LockProbeResult = 'available' | 'locked' | 'missing';

/**
 * Checks whether another process still holds a file
 */
export interface FileLockProbe {
  probe(filePath: string): Promise<LockProbeResult>;
}

const LOCKED_CODES = new Set(['EBUSY', 'EACCES', 'EPERM', 'EAGAIN']);

/** Default window a file must stay unchanged for */
export const DEFAULT_SETTLE_MS = 200;

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface ExclusiveOpenProbeOptions {
  /** How long size and mtime must stay unchanged; not used on win32 */
  settleMs?: number;
  wait?: Sleep;
  platform?: NodeJS.Platform;
}

/**
 * Opens the file for read/write. Sharing violations (Windows) and permission
 * errors count as locked.
 *
 * POSIX systems have no mandatory locks, so elsewhere the file must also keep
 * its size and mtime across `settleMs` while held open; a writer still
 * appending reads as locked.
 */
export class ExclusiveOpenProbe implements FileLockProbe {
  private readonly settleMs: number;
  private readonly wait: Sleep;
  private readonly checkStability: boolean;

  constructor(options: ExclusiveOpenProbeOptions = {}) {
    this.settleMs = options.settleMs ?? DEFAULT_SETTLE_MS;
    this.wait = options.wait ?? sleep;
    this.checkStability = (options.platform ?? process.platform) !== 'win32';
  }

  async probe(filePath: string): Promise<LockProbeResult> {
    let handle: FileHandle;
    try {
      handle = await open(filePath, 'r+');
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ENOENT') return 'missing';
      if (code !== undefined && LOCKED_CODES.has(code)) return 'locked';
      throw error;
    }

    try {
      if (!this.checkStability) {
        return 'available';
      }
      const before = await handle.stat();
      await this.wait(this.settleMs);
      const after = await handle.stat();
      return before.size === after.size && before.mtimeMs === after.mtimeMs ? 'available' : 'locked';
    } finally {
      await handle.close();
    }
  }
}

export interface LockRetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

export type LockWaitResult =
  | { status: 'available'; attempts: number }
  | { status: 'missing'; attempts: number }
  | { status: 'locked'; attempts: number };

/**
 * Probe until the file is free, waiting `attempt × baseDelayMs` after each
 * locked attempt. Gives up after `maxAttempts` probes.
 */
export async function waitForUnlock(
  filePath: string,
  probe: FileLockProbe,
  policy: LockRetryPolicy,
  wait: Sleep,
  logger: Logger,
): Promise<LockWaitResult> {
  for (let attempt = 1; ; attempt++) {
    const result = await probe.probe(filePath);
    if (result !== 'locked') {
      return { status: result, attempts: attempt };
    }
    if (attempt >= policy.maxAttempts) {
      return { status: 'locked', attempts: attempt };
    }

    const delay = attempt * policy.baseDelayMs;
    logger.debug('File is locked, retrying', { attempt, delayMs: delay });
    await wait(delay);
  }
}
