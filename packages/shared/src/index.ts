/**
 * @invoice-bridge/shared
 *
 * Shared utilities for the conversion engine.
 *
 * @packageDocumentation
 */

export { createLogger, type Logger, type LogContext, type LogLevel, type LoggerOptions } from './logging/logger.js';
export {
  InvoiceBridgeError,
  ConfigurationError,
  SourceReadError,
  ValidationServiceError,
} from './errors/errors.js';

// Decimal strings
export {
  stripTrailingZeros,
  isZero,
  isNegative,
  negate,
  isValidDecimalAmount,
} from './decimal/decimal-utils.js';

// Diagnostics
export { DiagnosticSink, createDiagnostic, type DiagnosticDetails } from './diagnostics/diagnostic-sink.js';
export {
  buildDiagnosticsSummary,
  type DiagnosticsSummaryOptions,
  type DiagnosticsSummary,
  type TopCodeEntry,
} from './diagnostics/summary-builder.js';

// Builders
export { assignDefined, hasText } from './utils/assign.js';
