import type { Diagnostic, DiagnosticCategory, DiagnosticSeverity } from '@invoice-bridge/contracts';

/**
 * Optional details attached to a recorded diagnostic
 */
export interface DiagnosticDetails {
  path?: readonly string[];
  context?: Record<string, unknown>;
}

/**
 * Append-only, ordered diagnostic collector.
 *
 * One sink is created per conversion call and passed by reference through
 * the whole call tree, so the resulting order is the traversal order.
 */
export class DiagnosticSink {
  private readonly entries: Diagnostic[] = [];

  constructor(private readonly source: string) {}

  /**
   * Append a fully built diagnostic
   */
  add(diagnostic: Diagnostic): void {
    this.entries.push(diagnostic);
  }

  addAll(diagnostics: readonly Diagnostic[]): void {
    for (const diagnostic of diagnostics) {
      this.entries.push(diagnostic);
    }
  }

  error(code: string, message: string, category: DiagnosticCategory, details?: DiagnosticDetails): Diagnostic {
    return this.record('error', code, message, category, details);
  }

  warning(code: string, message: string, category: DiagnosticCategory, details?: DiagnosticDetails): Diagnostic {
    return this.record('warning', code, message, category, details);
  }

  info(code: string, message: string, category: DiagnosticCategory, details?: DiagnosticDetails): Diagnostic {
    return this.record('info', code, message, category, details);
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.entries;
  }

  /**
   * Copy of the recorded diagnostics
   */
  toArray(): Diagnostic[] {
    return [...this.entries];
  }

  private record(
    severity: DiagnosticSeverity,
    code: string,
    message: string,
    category: DiagnosticCategory,
    details?: DiagnosticDetails,
  ): Diagnostic {
    const diagnostic = createDiagnostic(this.source, severity, code, message, category, details);
    this.entries.push(diagnostic);
    return diagnostic;
  }
}

/**
 * Build a diagnostic, leaving out absent optional fields
 */
export function createDiagnostic(
  source: string,
  severity: DiagnosticSeverity,
  code: string,
  message: string,
  category: DiagnosticCategory,
  details?: DiagnosticDetails,
): Diagnostic {
  const diagnostic: Diagnostic = { code, message, severity, category, source };
  if (details?.path !== undefined) {
    diagnostic.path = details.path;
  }
  if (details?.context !== undefined) {
    diagnostic.context = details.context;
  }
  return diagnostic;
}
