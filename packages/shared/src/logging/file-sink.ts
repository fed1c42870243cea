import { appendFileSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { formatLocalDate, systemClock, type Clock } from '../time/clock.js';
import type { LogLevel, LogSink } from './logger.js';

export interface DailyFileSinkOptions {
  directory: string;
  /** File name prefix; files are `{prefix}_yyyy-MM-dd.log` */
  prefix?: string;
  clock?: Clock;
}

/**
 * Appends each line to a per-day log file in `directory`.
 *
 * Writes are synchronous so lines from one event-loop turn stay in order and
 * nothing is lost on exit. A failed write goes to stderr.
 */
export function dailyFileSink(options: DailyFileSinkOptions): LogSink {
  const prefix = options.prefix ?? 'invoice-bridge';
  const clock = options.clock ?? systemClock;
  mkdirSync(options.directory, { recursive: true });

  return {
    write(_level: LogLevel, line: string) {
      const filePath = join(options.directory, `${prefix}_${formatLocalDate(clock.now())}.log`);
      try {
        appendFileSync(filePath, `${line}\n`, 'utf8');
      } catch (error) {
        process.stderr.write(`Cannot write log file ${filePath}: ${String(error)}\n`);
      }
    },
  };
}

/**
 * Sink that forwards every line to several sinks.
 */
export function teeSink(...sinks: LogSink[]): LogSink {
  return {
    write(level: LogLevel, line: string) {
      for (const sink of sinks) {
        sink.write(level, line);
      }
    },
  };
}
