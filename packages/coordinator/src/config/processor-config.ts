import { readFile } from 'node:fs/promises';
import {
  ConfigurationError,
  computeConfigHash,
  errorMessage,
  isLogLevel,
  parseTimeOfDay,
  type LogLevel,
} from '@invoice-bridge/shared';

/**
 * Notification toggles and schedule
 */
export interface NotificationSettings {
  enabled: boolean;
  /** Send the daily summary (only when notifications are enabled) */
  dailySummary: boolean;
  /** Local `HH:mm` */
  dailySummaryTime: string;
}

/**
 * Exclusive-open retry budget
 */
export interface LockRetrySettings {
  maxAttempts: number;
  /** Wait before retry N is `N × baseDelayMs` */
  baseDelayMs: number;
}

/**
 * Everything the coordinator needs to run.
 */
export interface ProcessorConfig {
  inputDirectory: string;
  outputDirectory: string;
  archiveDirectory: string;
  errorDirectory: string;
  logDirectory: string;
  /** Archive the source after a successful transform; delete it otherwise */
  archiveProcessedFiles: boolean;
  pollIntervalSeconds: number;
  notifications: NotificationSettings;
  lockRetry: LockRetrySettings;
  /** Quiet period after a watch event before the file is enqueued */
  debounceMs: number;
  summaryCheckIntervalMs: number;
  /** Publish a final summary on stop when there was activity */
  flushSummaryOnStop: boolean;
  logLevel: LogLevel;
}

/**
 * Partial configuration layer. Later layers win.
 */
export interface ProcessorConfigOverrides {
  inputDirectory?: string;
  outputDirectory?: string;
  archiveDirectory?: string;
  errorDirectory?: string;
  logDirectory?: string;
  archiveProcessedFiles?: boolean;
  pollIntervalSeconds?: number;
  notifications?: Partial<NotificationSettings>;
  lockRetry?: Partial<LockRetrySettings>;
  debounceMs?: number;
  summaryCheckIntervalMs?: number;
  flushSummaryOnStop?: boolean;
  logLevel?: LogLevel;
}

export const DEFAULT_PROCESSOR_CONFIG: ProcessorConfig = {
  inputDirectory: 'data/input',
  outputDirectory: 'data/output',
  archiveDirectory: 'data/archive',
  errorDirectory: 'data/error',
  logDirectory: 'data/logs',
  archiveProcessedFiles: true,
  pollIntervalSeconds: 5,
  notifications: {
    enabled: false,
    dailySummary: true,
    dailySummaryTime: '17:00',
  },
  lockRetry: {
    maxAttempts: 5,
    baseDelayMs: 1000,
  },
  debounceMs: 500,
  summaryCheckIntervalMs: 60_000,
  flushSummaryOnStop: false,
  logLevel: 'info',
};

/**
 * Effective configuration result.
 */
export interface EffectiveProcessorConfig {
  config: Readonly<ProcessorConfig>;
  /** SHA-256 of the canonical JSON of `config` */
  configHash: string;
}

function applyLayer(target: ProcessorConfig, layer: ProcessorConfigOverrides): void {
  if (layer.inputDirectory !== undefined) target.inputDirectory = layer.inputDirectory;
  if (layer.outputDirectory !== undefined) target.outputDirectory = layer.outputDirectory;
  if (layer.archiveDirectory !== undefined) target.archiveDirectory = layer.archiveDirectory;
  if (layer.errorDirectory !== undefined) target.errorDirectory = layer.errorDirectory;
  if (layer.logDirectory !== undefined) target.logDirectory = layer.logDirectory;
  if (layer.archiveProcessedFiles !== undefined) target.archiveProcessedFiles = layer.archiveProcessedFiles;
  if (layer.pollIntervalSeconds !== undefined) target.pollIntervalSeconds = layer.pollIntervalSeconds;
  if (layer.debounceMs !== undefined) target.debounceMs = layer.debounceMs;
  if (layer.summaryCheckIntervalMs !== undefined) target.summaryCheckIntervalMs = layer.summaryCheckIntervalMs;
  if (layer.flushSummaryOnStop !== undefined) target.flushSummaryOnStop = layer.flushSummaryOnStop;
  if (layer.logLevel !== undefined) target.logLevel = layer.logLevel;

  const { notifications, lockRetry } = layer;
  if (notifications) {
    if (notifications.enabled !== undefined) target.notifications.enabled = notifications.enabled;
    if (notifications.dailySummary !== undefined) target.notifications.dailySummary = notifications.dailySummary;
    if (notifications.dailySummaryTime !== undefined) {
      target.notifications.dailySummaryTime = notifications.dailySummaryTime;
    }
  }
  if (lockRetry) {
    if (lockRetry.maxAttempts !== undefined) target.lockRetry.maxAttempts = lockRetry.maxAttempts;
    if (lockRetry.baseDelayMs !== undefined) target.lockRetry.baseDelayMs = lockRetry.baseDelayMs;
  }
}

function validate(config: ProcessorConfig): string[] {
  const issues: string[] = [];

  const directories = {
    inputDirectory: config.inputDirectory,
    outputDirectory: config.outputDirectory,
    archiveDirectory: config.archiveDirectory,
    errorDirectory: config.errorDirectory,
    logDirectory: config.logDirectory,
  };
  for (const [key, value] of Object.entries(directories)) {
    if (value.trim().length === 0) {
      issues.push(`${key} must not be empty`);
    }
  }

  if (!Number.isFinite(config.pollIntervalSeconds) || config.pollIntervalSeconds < 1) {
    issues.push('pollIntervalSeconds must be at least 1');
  }
  if (parseTimeOfDay(config.notifications.dailySummaryTime) === null) {
    issues.push(`notifications.dailySummaryTime must be HH:mm, got "${config.notifications.dailySummaryTime}"`);
  }
  if (!Number.isInteger(config.lockRetry.maxAttempts) || config.lockRetry.maxAttempts < 1) {
    issues.push('lockRetry.maxAttempts must be a positive integer');
  }
  if (!Number.isFinite(config.lockRetry.baseDelayMs) || config.lockRetry.baseDelayMs < 0) {
    issues.push('lockRetry.baseDelayMs must not be negative');
  }
  if (!Number.isFinite(config.debounceMs) || config.debounceMs < 0) {
    issues.push('debounceMs must not be negative');
  }
  if (!Number.isFinite(config.summaryCheckIntervalMs) || config.summaryCheckIntervalMs < 1) {
    issues.push('summaryCheckIntervalMs must be positive');
  }

  return issues;
}

/**
 * Build the effective configuration by merging:
 * 1. Defaults
 * 2. Each layer in turn (typically the settings file, then explicit overrides)
 *
 * @throws ConfigurationError listing every failed check
 */
export function buildProcessorConfig(...layers: Array<ProcessorConfigOverrides | undefined>): EffectiveProcessorConfig {
  const merged: ProcessorConfig = {
    ...DEFAULT_PROCESSOR_CONFIG,
    notifications: { ...DEFAULT_PROCESSOR_CONFIG.notifications },
    lockRetry: { ...DEFAULT_PROCESSOR_CONFIG.lockRetry },
  };

  for (const layer of layers) {
    if (layer) {
      applyLayer(merged, layer);
    }
  }

  const issues = validate(merged);
  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid processor configuration: ${issues.join('; ')}`, issues);
  }

  Object.freeze(merged.notifications);
  Object.freeze(merged.lockRetry);

  return {
    config: Object.freeze(merged),
    configHash: computeConfigHash(merged),
  };
}

// Settings file

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class SectionReader {
  constructor(
    private readonly section: Record<string, unknown>,
    private readonly sectionName: string,
    private readonly issues: string[],
  ) {}

  string(key: string): string | undefined {
    const value = this.section[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'string') return value;
    this.issues.push(`${this.sectionName}.${key} must be a string`);
    return undefined;
  }

  boolean(key: string): boolean | undefined {
    const value = this.section[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'boolean') return value;
    this.issues.push(`${this.sectionName}.${key} must be a boolean`);
    return undefined;
  }

  number(key: string): number | undefined {
    const value = this.section[key];
    if (value === undefined || value === null) return undefined;
    if (typeof value === 'number') return value;
    this.issues.push(`${this.sectionName}.${key} must be a number`);
    return undefined;
  }
}

function sectionReader(
  settings: Record<string, unknown>,
  name: string,
  issues: string[],
): SectionReader | null {
  const section = settings[name];
  if (section === undefined) return null;
  if (!isRecord(section)) {
    issues.push(`${name} must be an object`);
    return null;
  }
  return new SectionReader(section, name, issues);
}

/**
 * Convert parsed settings JSON (`FolderSettings`, `EmailSettings` and an
 * optional `Logging.LogLevel`) into a configuration layer. Unknown keys are
 * ignored; keys of the wrong type are reported.
 *
 * @throws ConfigurationError when any known key has the wrong type
 */
export function settingsToOverrides(settings: unknown): ProcessorConfigOverrides {
  if (!isRecord(settings)) {
    throw new ConfigurationError('Settings must be a JSON object', ['root must be an object']);
  }

  const issues: string[] = [];
  const overrides: ProcessorConfigOverrides = {};

  const folders = sectionReader(settings, 'FolderSettings', issues);
  if (folders) {
    const inputDirectory = folders.string('InputFolder');
    const outputDirectory = folders.string('OutputFolder');
    const archiveDirectory = folders.string('ArchiveFolder');
    const errorDirectory = folders.string('ErrorFolder');
    const logDirectory = folders.string('LogFolder');
    const archiveProcessedFiles = folders.boolean('ArchiveProcessedFiles');
    const pollIntervalSeconds = folders.number('PollingIntervalSeconds');

    if (inputDirectory !== undefined) overrides.inputDirectory = inputDirectory;
    if (outputDirectory !== undefined) overrides.outputDirectory = outputDirectory;
    if (archiveDirectory !== undefined) overrides.archiveDirectory = archiveDirectory;
    if (errorDirectory !== undefined) overrides.errorDirectory = errorDirectory;
    if (logDirectory !== undefined) overrides.logDirectory = logDirectory;
    if (archiveProcessedFiles !== undefined) overrides.archiveProcessedFiles = archiveProcessedFiles;
    if (pollIntervalSeconds !== undefined) overrides.pollIntervalSeconds = pollIntervalSeconds;
  }

  const email = sectionReader(settings, 'EmailSettings', issues);
  if (email) {
    const notifications: Partial<NotificationSettings> = {};
    const enabled = email.boolean('EnableEmailNotifications');
    const dailySummary = email.boolean('SendDailySummary');
    const dailySummaryTime = email.string('DailySummaryTime');

    if (enabled !== undefined) notifications.enabled = enabled;
    if (dailySummary !== undefined) notifications.dailySummary = dailySummary;
    if (dailySummaryTime !== undefined) notifications.dailySummaryTime = dailySummaryTime;
    if (Object.keys(notifications).length > 0) overrides.notifications = notifications;
  }

  const logging = sectionReader(settings, 'Logging', issues);
  if (logging) {
    const level = logging.string('LogLevel');
    if (level !== undefined) {
      const normalized = level.toLowerCase();
      if (isLogLevel(normalized)) {
        overrides.logLevel = normalized;
      } else {
        issues.push(`Logging.LogLevel must be one of debug, info, warn, error, got "${level}"`);
      }
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid settings: ${issues.join('; ')}`, issues);
  }

  return overrides;
}

/**
 * Read a JSON settings file and convert it into a configuration layer.
 *
 * @throws ConfigurationError when the file cannot be read or parsed
 */
export async function readProcessorSettingsFile(filePath: string): Promise<ProcessorConfigOverrides> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read settings file: ${errorMessage(error)}`, [], { filePath });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Settings file is not valid JSON: ${errorMessage(error)}`, [], { filePath });
  }

  return settingsToOverrides(parsed);
}
