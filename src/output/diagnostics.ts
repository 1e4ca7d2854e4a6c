/**
 * Diagnostics
 *
 * Sink through which the output transaction reports unsupported
 * destinations, discarded outputs, commit failures and undo failures.
 *
 * @module output/diagnostics
 */

import chalk from 'chalk';

/**
 * Diagnostic severity, lowest first.
 */
export type Severity = 'debug' | 'info' | 'warn' | 'error';

/**
 * A single reported diagnostic.
 */
export interface Diagnostic {
  severity: Severity;
  message: string;
  /** Identifier or path the diagnostic is about */
  location?: string;
}

/**
 * Receives diagnostics from the output transaction.
 */
export interface DiagnosticSink {
  report(diagnostic: Diagnostic): void;
}

/**
 * Options for the console sink.
 */
export interface ConsoleSinkOptions {
  /** Print debug diagnostics */
  verbose?: boolean;
  /** Suppress debug and info diagnostics */
  quiet?: boolean;
}

/**
 * Format a diagnostic as a single line, without color.
 *
 * @example
 * ```typescript
 * formatDiagnostic({ severity: 'error', message: 'boom', location: 'out.xml' });
 * // 'error: out.xml: boom'
 * ```
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const location = diagnostic.location ? `${diagnostic.location}: ` : '';
  return `${diagnostic.severity}: ${location}${diagnostic.message}`;
}

/**
 * Create a sink that writes to the console with chalk styling.
 */
export function createConsoleSink(options: ConsoleSinkOptions = {}): DiagnosticSink {
  return {
    report(diagnostic: Diagnostic): void {
      const line = formatDiagnostic(diagnostic);

      switch (diagnostic.severity) {
        case 'debug':
          if (options.verbose && !options.quiet) {
            console.log(chalk.dim(`[DEBUG] ${line}`));
          }
          break;
        case 'info':
          if (!options.quiet) {
            console.log(line);
          }
          break;
        case 'warn':
          console.warn(chalk.yellow(line));
          break;
        case 'error':
          console.error(chalk.red(line));
          break;
      }
    },
  };
}

/**
 * Sink that keeps every diagnostic in memory.
 */
export class CollectingSink implements DiagnosticSink {
  readonly diagnostics: Diagnostic[] = [];

  report(diagnostic: Diagnostic): void {
    this.diagnostics.push(diagnostic);
  }

  /**
   * Diagnostics of the given severity, in report order.
   */
  bySeverity(severity: Severity): Diagnostic[] {
    return this.diagnostics.filter((d) => d.severity === severity);
  }

  hasErrors(): boolean {
    return this.diagnostics.some((d) => d.severity === 'error');
  }
}

/**
 * Forward every diagnostic to several sinks.
 */
export function teeSink(...sinks: DiagnosticSink[]): DiagnosticSink {
  return {
    report(diagnostic: Diagnostic): void {
      for (const sink of sinks) {
        sink.report(diagnostic);
      }
    },
  };
}
