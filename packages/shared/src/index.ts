/**
 * @invoice-bridge/shared
 *
 * Shared utilities for the invoice bridge.
 *
 * @packageDocumentation
 */

export {
  createLogger,
  consoleSink,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LogSink,
  type LoggerOptions,
} from './logging/logger.js';
export { dailyFileSink, teeSink, type DailyFileSinkOptions } from './logging/file-sink.js';
export {
  InvoiceBridgeError,
  FormatError,
  WriteError,
  LockError,
  ConfigurationError,
  errorCode,
  errorMessage,
} from './errors/errors.js';
export { canonicalStringify, computeConfigHash } from './crypto/canonical-hash.js';
export { fnv1a32, invoiceChecksum, CHECKSUM_MODULUS } from './crypto/checksum.js';

// Decimal arithmetic
export {
  add,
  isPositive,
  round,
  parseInvariantDecimal,
  type RoundingMode,
  DEFAULT_ROUNDING_MODE,
} from './decimal/decimal-utils.js';

// Clock and calendar
export {
  systemClock,
  fixedClock,
  formatFileTimestamp,
  formatLocalDate,
  formatLocalDateTime,
  parseDayMonthYear,
  daysBetween,
  parseTimeOfDay,
  nextOccurrence,
  type Clock,
  type TimeOfDay,
} from './time/clock.js';
