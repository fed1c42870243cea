import { copyFile, mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { WriteError, errorMessage, formatLocalDateTime, type Logger } from '@invoice-bridge/shared';
import { errnoCode, isNotFound } from '../fs/errno.js';
import { listFiles } from '../fs/list-files.js';
import {
  TEMP_SUFFIX,
  archiveFileName,
  errorFileName,
  errorSidecarFileName,
  outputFileName,
  tempOutputFileName,
} from './file-names.js';

export interface RoutingOptions {
  outputDirectory: string;
  archiveDirectory: string;
  errorDirectory: string;
  archiveProcessedFiles: boolean;
}

export interface CommitResult {
  outputPath: string;
  /** null when the source was deleted */
  archivePath: string | null;
}

/**
 * Move a file, falling back to copy + unlink across devices.
 */
export async function moveFile(sourcePath: string, destinationPath: string): Promise<void> {
  try {
    await rename(sourcePath, destinationPath);
  } catch (error) {
    if (errnoCode(error) !== 'EXDEV') {
      throw error;
    }
    await copyFile(sourcePath, destinationPath);
    await unlink(sourcePath);
  }
}

export async function ensureDirectory(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Diagnostic text written beside a quarantined file
 */
export function errorSidecarText(sourceFileName: string, message: string, at: Date): string {
  return `Error processing file: ${sourceFileName}\nTimestamp: ${formatLocalDateTime(at)}\nError: ${message}\n`;
}

/**
 * Places outputs and routes source files.
 *
 * `commit()` is all-or-nothing from the caller's point of view: either the
 * output exists and the source is archived/deleted, or the output is gone
 * again and the source is still in the input directory.
 */
export class FileRouter {
  constructor(
    private readonly options: RoutingOptions,
    private readonly logger: Logger,
  ) {}

  async ensureDirectories(): Promise<void> {
    await ensureDirectory(this.options.outputDirectory);
    await ensureDirectory(this.options.errorDirectory);
    if (this.options.archiveProcessedFiles) {
      await ensureDirectory(this.options.archiveDirectory);
    }
  }

  /**
   * Delete partial outputs left behind by an interrupted commit.
   */
  async removeStaleTempFiles(): Promise<number> {
    let removed = 0;
    for (const name of await listFiles(this.options.outputDirectory)) {
      if (name.startsWith('.') && name.endsWith(TEMP_SUFFIX)) {
        await this.discard(join(this.options.outputDirectory, name));
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.info('Removed stale partial outputs', { count: removed });
    }
    return removed;
  }

  /**
   * Write the output under its final name, then archive or delete the source.
   *
   * @throws WriteError after rolling back the output
   */
  async commit(sourcePath: string, xml: string, timestamp: string): Promise<CommitResult> {
    const sourceName = basename(sourcePath);
    const finalName = outputFileName(sourceName, timestamp);
    const outputPath = join(this.options.outputDirectory, finalName);
    const tempPath = join(this.options.outputDirectory, tempOutputFileName(finalName));

    try {
      await ensureDirectory(this.options.outputDirectory);
      await writeFile(tempPath, xml, 'utf8');
      await rename(tempPath, outputPath);
    } catch (error) {
      await this.discard(tempPath);
      throw new WriteError(`Cannot write output file ${finalName}: ${errorMessage(error)}`, outputPath, {
        cause: error,
      });
    }

    if (!this.options.archiveProcessedFiles) {
      try {
        await unlink(sourcePath);
      } catch (error) {
        await this.discard(outputPath);
        throw new WriteError(`Cannot delete source file: ${errorMessage(error)}`, sourcePath, { cause: error });
      }
      this.logger.debug('Deleted source file', { fileName: sourceName });
      return { outputPath, archivePath: null };
    }

    const archivePath = join(this.options.archiveDirectory, archiveFileName(sourceName, timestamp));
    try {
      await ensureDirectory(this.options.archiveDirectory);
      await moveFile(sourcePath, archivePath);
    } catch (error) {
      await this.discard(outputPath);
      throw new WriteError(`Cannot archive source file: ${errorMessage(error)}`, sourcePath, { cause: error });
    }
    return { outputPath, archivePath };
  }

  /**
   * Move a failed source to the error directory and write its sidecar.
   * Returns the quarantined path.
   */
  async quarantine(sourcePath: string, message: string, timestamp: string, at: Date): Promise<string> {
    const sourceName = basename(sourcePath);
    const errorPath = join(this.options.errorDirectory, errorFileName(sourceName, timestamp));

    await ensureDirectory(this.options.errorDirectory);
    await moveFile(sourcePath, errorPath);

    const sidecarPath = join(this.options.errorDirectory, errorSidecarFileName(sourceName, timestamp));
    try {
      await writeFile(sidecarPath, errorSidecarText(sourceName, message, at), 'utf8');
    } catch (error) {
      this.logger.warn('Could not write error details file', {
        fileName: sourceName,
        error: errorMessage(error),
      });
    }
    return errorPath;
  }

  private async discard(filePath: string): Promise<void> {
    try {
      await unlink(filePath);
    } catch (error) {
      if (!isNotFound(error)) {
        this.logger.warn('Could not remove file', { path: filePath, error: errorMessage(error) });
      }
    }
  }
}
