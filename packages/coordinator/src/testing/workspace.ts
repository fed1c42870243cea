import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLogger, type Logger, type LogLevel } from '@invoice-bridge/shared';

/**
 * Temporary directory tree for coordinator tests
 */
export interface TestWorkspace {
  root: string;
  input: string;
  output: string;
  archive: string;
  error: string;
  logs: string;
  list(directory: string): Promise<string[]>;
  dispose(): Promise<void>;
}

export async function createWorkspace(): Promise<TestWorkspace> {
  const root = await mkdtemp(join(tmpdir(), 'invoice-bridge-'));
  return {
    root,
    input: join(root, 'input'),
    output: join(root, 'output'),
    archive: join(root, 'archive'),
    error: join(root, 'error'),
    logs: join(root, 'logs'),
    async list(directory: string): Promise<string[]> {
      try {
        return (await readdir(directory)).sort();
      } catch {
        return [];
      }
    },
    dispose: () => rm(root, { recursive: true, force: true }),
  };
}

export interface CapturedLine {
  level: LogLevel;
  line: string;
}

/**
 * Logger that records lines instead of printing them
 */
export function captureLogger(): { logger: Logger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  const logger = createLogger({
    level: 'debug',
    sink: { write: (level, line) => lines.push({ level, line }) },
  });
  return { logger, lines };
}
