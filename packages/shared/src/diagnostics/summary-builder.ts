/**
 * Diagnostics Summary Builder
 *
 * Aggregates conversion diagnostics into a compact summary of codes and
 * counts. The summary carries no messages or context, so it can be logged
 * without leaking invoice content.
 */

import type { Diagnostic, DiagnosticSeverity } from '@invoice-bridge/contracts';

/**
 * Options for building diagnostics summary
 */
export interface DiagnosticsSummaryOptions {
  /**
   * Maximum number of diagnostics to process.
   * @default 500
   */
  maxDiagnostics?: number;

  /**
   * Maximum number of top codes to include in summary.
   * @default 10
   */
  maxTopCodes?: number;
}

/**
 * A diagnostic code occurrence in the summary
 */
export interface TopCodeEntry {
  code: string;

  /**
   * Highest severity seen for this code
   */
  severity: DiagnosticSeverity;

  count: number;
}

/**
 * Aggregated diagnostics summary
 */
export interface DiagnosticsSummary {
  /**
   * Most frequent codes, sorted by count descending
   */
  topCodes: TopCodeEntry[];

  totalBySeverity: Record<DiagnosticSeverity, number>;

  /**
   * Whether the diagnostics were truncated due to limits
   */
  truncated: boolean;

  /**
   * Total number of diagnostics processed
   */
  totalCount: number;
}

const DEFAULT_OPTIONS: Required<DiagnosticsSummaryOptions> = {
  maxDiagnostics: 500,
  maxTopCodes: 10,
};

/**
 * Build a diagnostics summary.
 *
 * @example
 * const summary = buildDiagnosticsSummary(result.diagnostics);
 * logger.debug('Conversion finished', { errors: summary.totalBySeverity.error });
 */
export function buildDiagnosticsSummary(
  diagnostics: readonly Diagnostic[],
  options?: DiagnosticsSummaryOptions,
): DiagnosticsSummary {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  const totalBySeverity: Record<DiagnosticSeverity, number> = {
    error: 0,
    warning: 0,
    info: 0,
  };

  // code -> { severity, count }
  const codeMap = new Map<string, { severity: DiagnosticSeverity; count: number }>();

  const limit = opts.maxDiagnostics;
  const truncated = diagnostics.length > limit;
  const toProcess = truncated ? diagnostics.slice(0, limit) : diagnostics;

  for (const diag of toProcess) {
    totalBySeverity[diag.severity]++;

    const code = diag.code.toUpperCase();
    const existing = codeMap.get(code);
    if (existing) {
      existing.count++;
      existing.severity = higherSeverity(existing.severity, diag.severity);
    } else {
      codeMap.set(code, { severity: diag.severity, count: 1 });
    }
  }

  const topCodes = Array.from(codeMap.entries())
    .map(([code, data]) => ({ code, severity: data.severity, count: data.count }))
    .sort((a, b) => {
      if (b.count !== a.count) {
        return b.count - a.count;
      }
      return severityRank(b.severity) - severityRank(a.severity);
    })
    .slice(0, opts.maxTopCodes);

  return {
    topCodes,
    totalBySeverity,
    truncated,
    totalCount: toProcess.length,
  };
}

function higherSeverity(a: DiagnosticSeverity, b: DiagnosticSeverity): DiagnosticSeverity {
  return severityRank(a) >= severityRank(b) ? a : b;
}

/**
 * Numeric rank for severity (higher = more severe)
 */
function severityRank(severity: DiagnosticSeverity): number {
  switch (severity) {
    case 'error':
      return 3;
    case 'warning':
      return 2;
    case 'info':
      return 1;
  }
}
