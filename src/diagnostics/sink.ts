/**
 * Diagnostics Sink
 * @module diagnostics/sink
 *
 * Scoped and non-fatal findings are reported through a sink that is created
 * per pipeline run and passed to every stage. Fatal errors are thrown instead.
 */

import type { ErrorCode } from '../errors';
import type { StructuredLogger } from '../logging';

// ============================================================================
// Types
// ============================================================================

export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A finding accumulated during a pipeline run
 */
export interface Diagnostic {
  readonly code: ErrorCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  /** Module path the finding is scoped to (root = '') */
  readonly module: string;
  /** What the finding is about: a reference, a local name, an address */
  readonly subject: string;
  readonly location?: DiagnosticLocation;
}

export interface DiagnosticLocation {
  readonly file: string;
  readonly line: number;
}

/**
 * Receives diagnostics from pipeline stages
 */
export interface DiagnosticsSink {
  report(diagnostic: Diagnostic): void;
}

// ============================================================================
// Implementations
// ============================================================================

function diagnosticKey(diagnostic: Diagnostic): string {
  return `${diagnostic.code}\u0000${diagnostic.module}\u0000${diagnostic.subject}`;
}

/**
 * Accumulates diagnostics in report order, dropping repeats of the same
 * code, module and subject
 */
export class CollectingDiagnosticsSink implements DiagnosticsSink {
  private readonly entries: Diagnostic[] = [];
  private readonly seen = new Set<string>();

  report(diagnostic: Diagnostic): void {
    const key = diagnosticKey(diagnostic);
    if (this.seen.has(key)) {
      return;
    }
    this.seen.add(key);
    this.entries.push(diagnostic);
  }

  list(): Diagnostic[] {
    return [...this.entries];
  }

  count(severity?: DiagnosticSeverity): number {
    if (!severity) {
      return this.entries.length;
    }
    return this.entries.filter((d) => d.severity === severity).length;
  }
}

/**
 * Logs every diagnostic before forwarding it
 */
export class LoggingDiagnosticsSink implements DiagnosticsSink {
  constructor(
    private readonly delegate: DiagnosticsSink,
    private readonly logger: StructuredLogger
  ) {}

  report(diagnostic: Diagnostic): void {
    const payload = {
      event: 'diagnostic',
      code: diagnostic.code,
      module: diagnostic.module,
      subject: diagnostic.subject,
      location: diagnostic.location,
    };

    switch (diagnostic.severity) {
      case 'error':
        this.logger.error(payload, diagnostic.message);
        break;
      case 'warning':
        this.logger.warn(payload, diagnostic.message);
        break;
      case 'info':
        this.logger.debug(payload, diagnostic.message);
        break;
    }

    this.delegate.report(diagnostic);
  }
}
