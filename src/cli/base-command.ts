/**
 * Base Command
 *
 * Shared state for CLI commands: the global flags, exit codes, console
 * output that honours --verbose/--quiet, and the diagnostic sink handed to
 * output transactions.
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import type { Diagnostic, DiagnosticSink } from '../output/diagnostics.js';
import { formatDiagnostic } from '../output/diagnostics.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Print debug diagnostics */
  verbose?: boolean;
  /** Print only warnings, errors and requested data */
  quiet?: boolean;
  /** False when --no-color is given */
  color?: boolean;
}

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Emit failed; nothing was written */
  ERROR: 1,
  /** Invalid plan or conflicting flags */
  USAGE_ERROR: 2,
  /** Plan file not found */
  NOT_FOUND: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Console output for a command run. Transaction diagnostics are routed
 * through report() so they obey the same verbose/quiet rules.
 */
export class BaseCommand implements DiagnosticSink {
  readonly options: GlobalOptions;

  constructor(options: GlobalOptions) {
    this.options = options;

    if (options.color === false || process.stdout.isTTY !== true) {
      chalk.level = 0;
    }
  }

  debug(message: string): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`));
    }
  }

  info(message: string): void {
    if (!this.options.quiet) {
      console.log(message);
    }
  }

  /**
   * Print an error and exit.
   *
   * @param errorOrCode - Exit code, or an Error whose stack is shown in verbose mode
   */
  error(message: string, errorOrCode?: Error | ExitCode): never {
    console.error(chalk.red(`Error: ${message}`));

    if (errorOrCode instanceof Error) {
      if (this.options.verbose) {
        console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
      }
      process.exit(EXIT_CODES.ERROR);
    }
    process.exit(errorOrCode ?? EXIT_CODES.ERROR);
  }

  /**
   * Print data as indented JSON, regardless of --quiet.
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Print a transaction diagnostic. Errors do not exit; the command
   * decides the outcome once the transaction is over.
   */
  report(diagnostic: Diagnostic): void {
    const line = formatDiagnostic(diagnostic);

    switch (diagnostic.severity) {
      case 'debug':
        this.debug(line);
        break;
      case 'info':
        this.info(line);
        break;
      case 'warn':
        console.warn(chalk.yellow(line));
        break;
      case 'error':
        console.error(chalk.red(line));
        break;
    }
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }
}

/**
 * The BaseCommand stored on the program by the preAction hook, or a
 * default one when the command runs outside the full program.
 */
export function getBaseCommand(cmd: { opts(): Record<string, unknown> }): BaseCommand {
  const base = cmd.opts()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    return new BaseCommand({});
  }
  return base;
}
