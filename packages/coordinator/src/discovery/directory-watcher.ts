import { watch, type FSWatcher } from 'node:fs';
import { join } from 'node:path';
import { errorMessage, type Logger } from '@invoice-bridge/shared';
import { isInputFileName } from '../routing/file-names.js';

export interface DirectoryWatcherOptions {
  directory: string;
  /** Quiet period per file before `onFile` fires */
  debounceMs: number;
  onFile: (filePath: string) => void;
  logger: Logger;
}

/**
 * Live watch of the input directory.
 *
 * Create and rename events for `.xml` names are debounced per file so a
 * writer that is still appending does not trigger processing on every chunk.
 */
export class DirectoryWatcher {
  private watcher: FSWatcher | null = null;
  private readonly timers = new Map<string, ReturnType<typeof setTimeout>>();

  constructor(private readonly options: DirectoryWatcherOptions) {}

  get watching(): boolean {
    return this.watcher !== null;
  }

  get pendingCount(): number {
    return this.timers.size;
  }

  start(): void {
    if (this.watcher) return;

    const watcher = watch(this.options.directory, (_eventType, fileName) => {
      if (fileName) {
        this.handleChange(fileName);
      }
    });
    watcher.on('error', (error) => {
      this.options.logger.warn('Directory watch error', {
        directory: this.options.directory,
        error: errorMessage(error),
      });
    });
    this.watcher = watcher;
    this.options.logger.debug('Watching input directory', { directory: this.options.directory });
  }

  /**
   * Record a change to `fileName` (relative to the watched directory).
   */
  handleChange(fileName: string): void {
    if (!isInputFileName(fileName)) return;

    const existing = this.timers.get(fileName);
    if (existing) {
      clearTimeout(existing);
    }
    this.timers.set(
      fileName,
      setTimeout(() => {
        this.timers.delete(fileName);
        this.options.onFile(join(this.options.directory, fileName));
      }, this.options.debounceMs),
    );
  }

  stop(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.watcher?.close();
    this.watcher = null;
  }
}
