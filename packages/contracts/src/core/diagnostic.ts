/**
 * Severity levels for diagnostics
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * Category of the diagnostic
 */
export type DiagnosticCategory =
  | 'structure' // Mandatory source block missing, conversion aborted
  | 'field' // A single field or entry could not be mapped
  | 'ambiguity' // The source allows more than one reading
  | 'format' // Input is not readable CII
  | 'validation'; // Reported by an external validation service

/**
 * A single diagnostic produced while reading, converting or validating a document
 */
export interface Diagnostic {
  /**
   * Stable code for this diagnostic type
   * Examples: 'DATE-PARSE-FAILED', 'PAYMENT-MEANS-ACCOUNT-MISSING'
   */
  code: string;

  /**
   * Human-readable message
   */
  message: string;

  severity: DiagnosticSeverity;

  category: DiagnosticCategory;

  /**
   * Component that produced the diagnostic (e.g. 'converter', 'cii-reader')
   */
  source: string;

  /**
   * Element path in the source document, outermost element first
   */
  path?: readonly string[];

  /**
   * Additional context (e.g. the offending code value)
   */
  context?: Record<string, unknown>;
}

/**
 * Outcome of a resolver: a value, or the diagnostic explaining why there is none.
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: Diagnostic };
