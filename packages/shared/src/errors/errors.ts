/**
 * Base error class for the invoice bridge
 */
export class InvoiceBridgeError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InvoiceBridgeError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Source document is not well-formed XML or has the wrong root element.
 * Fatal for the file; it is quarantined.
 */
export class FormatError extends InvoiceBridgeError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'FORMAT_ERROR', context, options);
    this.name = 'FormatError';
  }
}

/**
 * Output could not be written or the source could not be routed.
 */
export class WriteError extends InvoiceBridgeError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, 'WRITE_ERROR', { path }, options);
    this.name = 'WriteError';
    this.path = path;
  }
}

/**
 * File stayed locked for the whole retry budget.
 */
export class LockError extends InvoiceBridgeError {
  readonly attempts: number;

  constructor(message: string, attempts: number, context?: Record<string, unknown>) {
    super(message, 'LOCK_ERROR', { ...context, attempts });
    this.name = 'LockError';
    this.attempts = attempts;
  }
}

/**
 * Error thrown for configuration issues
 */
export class ConfigurationError extends InvoiceBridgeError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Error code for any thrown value (INTERNAL_ERROR for foreign errors)
 */
export function errorCode(error: unknown): string {
  return error instanceof InvoiceBridgeError ? error.code : 'INTERNAL_ERROR';
}

/**
 * Human-readable message for any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
