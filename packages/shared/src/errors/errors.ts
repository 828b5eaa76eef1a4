/**
 * Base error class for the conversion engine.
 * Mapping code never throws; these errors are raised only at the outer
 * surfaces (configuration resolution, reading input, external services).
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
 * Error thrown for invalid configuration values
 */
export class ConfigurationError extends InvoiceBridgeError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Error thrown when the conversion input cannot be obtained (e.g. unreadable file)
 */
export class SourceReadError extends InvoiceBridgeError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'SOURCE_READ_ERROR', context, { cause });
    this.name = 'SourceReadError';
  }
}

/**
 * Error thrown when an external validation service fails to produce a report
 */
export class ValidationServiceError extends InvoiceBridgeError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'VALIDATION_SERVICE_ERROR', context, { cause });
    this.name = 'ValidationServiceError';
  }
}
