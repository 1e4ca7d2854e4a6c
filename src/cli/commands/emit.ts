/**
 * Emit Command
 *
 * Writes every document of an emit plan through a single output
 * transaction: either all documents land on disk or none do.
 *
 * @module cli/commands/emit
 */

import type { Command } from 'commander';
import * as path from 'node:path';
import { config } from '../../config/index.js';
import { EmitPlanSchema, type EmitDocument, type EmitPlan } from '../../schemas/emit-plan.js';
import type { ProducedOutput } from '../../schemas/produced-output.js';
import type { WriterSettingsInput } from '../../schemas/writer-settings.js';
import { fileExists, readJson } from '../../storage/files.js';
import { CollectingSink, teeSink, type DiagnosticSink } from '../../output/diagnostics.js';
import { isAbsoluteUri, toBaseUrl } from '../../output/location.js';
import { runOutputTransaction } from '../../output/transaction.js';
import type { ResultDocumentWriter } from '../../output/writer.js';
import { getBaseCommand, EXIT_CODES, type BaseCommand } from '../base-command.js';
import { createSpinner } from '../formatters/progress.js';
import { formatProducedOutputs } from '../formatters/outputs.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the emit command.
 */
export interface EmitCommandOptions {
  /** Primary output path (overrides the plan) */
  primary?: string;
  /** Base output URI (overrides the plan) */
  base?: string;
  /** Commit even if some documents could not be staged */
  allowMissing?: boolean;
  /** Print the produced outputs as JSON */
  json?: boolean;
}

/**
 * Options for emitPlan().
 */
export interface EmitOptions {
  /** Directory relative plan paths resolve against */
  planDir: string;
  primary?: string;
  base?: string;
  allowMissing?: boolean;
  sink: DiagnosticSink;
  /** Called before each document is staged */
  onDocument?: (document: EmitDocument, index: number) => void;
}

export type EmitPlanErrorCode = 'not-found' | 'invalid' | 'unstaged';

/**
 * Emit plan could not be loaded or fully staged.
 */
export class EmitPlanError extends Error {
  constructor(
    message: string,
    public readonly code: EmitPlanErrorCode
  ) {
    super(message);
    this.name = 'EmitPlanError';
  }
}

// ============================================================================
// Plan Handling
// ============================================================================

/**
 * Load and validate an emit plan.
 *
 * @throws EmitPlanError if the file is missing or does not match the schema
 */
export async function loadEmitPlan(planPath: string): Promise<EmitPlan> {
  if (!(await fileExists(planPath))) {
    throw new EmitPlanError(`Emit plan not found: ${planPath}`, 'not-found');
  }

  let data: unknown;
  try {
    data = await readJson(planPath);
  } catch (error) {
    throw new EmitPlanError(error instanceof Error ? error.message : String(error), 'invalid');
  }

  const result = EmitPlanSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new EmitPlanError(`Invalid emit plan ${planPath}: ${issues}`, 'invalid');
  }

  return result.data;
}

/**
 * Resolve a plan path or URI against the plan directory.
 */
function resolvePlanLocation(planDir: string, location: string): string {
  if (isAbsoluteUri(location)) {
    return location;
  }
  const resolved = path.resolve(planDir, location);
  return /[\\/]$/.test(location) ? `${resolved}${path.sep}` : resolved;
}

/**
 * Writer settings for a document, with the configured default encoding.
 */
function documentSettings(document: EmitDocument): WriterSettingsInput {
  return {
    ...document.settings,
    encoding: document.settings?.encoding ?? config.defaultEncoding,
  };
}

async function writeContent(writer: ResultDocumentWriter, content: EmitDocument['content']): Promise<void> {
  if (typeof content === 'string') {
    await writer.write(content);
    return;
  }
  for (const line of content) {
    await writer.writeLine(line);
  }
}

/**
 * Write every document of a plan in one output transaction.
 *
 * The base output URI is, in order of preference: the `base` option, the
 * plan's `baseOutputUri`, the primary output, the plan directory.
 *
 * @returns The produced outputs
 * @throws EmitPlanError if a document could not be staged and
 *   `allowMissing` is not set; nothing is written in that case
 */
export async function emitPlan(plan: EmitPlan, options: EmitOptions): Promise<readonly ProducedOutput[]> {
  const primarySource = options.primary ?? plan.primary;
  const primary = primarySource === undefined ? undefined : path.resolve(options.planDir, primarySource);

  const baseSource = options.base ?? plan.baseOutputUri;
  const baseOutputUri =
    baseSource !== undefined
      ? toBaseUrl(resolvePlanLocation(options.planDir, baseSource))
      : toBaseUrl(primary ?? `${path.resolve(options.planDir)}${path.sep}`);

  const collected = new CollectingSink();
  const sink = teeSink(options.sink, collected);

  return runOutputTransaction({ baseOutputUri, primaryDestination: primary, sink }, async (transaction) => {
    let unstaged = 0;

    for (const [index, document] of plan.documents.entries()) {
      options.onDocument?.(document, index);

      const errorsBefore = collected.bySeverity('error').length;
      const writer = await transaction.resolve(document.href, documentSettings(document));
      if (writer === null) {
        if (collected.bySeverity('error').length > errorsBefore) {
          unstaged++;
        }
        continue;
      }

      try {
        await writeContent(writer, document.content);
      } finally {
        await writer.close();
      }
    }

    if (unstaged > 0 && !options.allowMissing) {
      throw new EmitPlanError(
        `${unstaged} document(s) could not be staged; nothing was written`,
        'unstaged'
      );
    }
  });
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the emit command.
 *
 * @param program - Commander program instance
 */
export function registerEmitCommand(program: Command): void {
  program
    .command('emit <plan>')
    .description('Write all documents of an emit plan, or none of them')
    .option('-p, --primary <path>', 'Primary output path (overrides the plan)')
    .option('-b, --base <uri>', 'Base output URI for relative hrefs (overrides the plan)')
    .option('--allow-missing', 'Commit even if some documents could not be staged')
    .option('--json', 'Print the produced outputs as JSON')
    .action(async (planPath: string, options: EmitCommandOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      await handleEmit(planPath, options, base);
    });
}

/**
 * Handle the emit command.
 */
async function handleEmit(planPath: string, options: EmitCommandOptions, base: BaseCommand): Promise<void> {
  const resolvedPlanPath = path.resolve(planPath);

  let plan: EmitPlan;
  try {
    plan = await loadEmitPlan(resolvedPlanPath);
  } catch (error) {
    if (error instanceof EmitPlanError) {
      base.error(error.message, error.code === 'not-found' ? EXIT_CODES.NOT_FOUND : EXIT_CODES.USAGE_ERROR);
    }
    throw error;
  }

  base.debug(`Loaded emit plan with ${plan.documents.length} document(s)`);

  const spinner = createSpinner('Staging documents...', { silent: base.isQuiet() || options.json === true });
  spinner.start();

  let outputs: readonly ProducedOutput[];
  try {
    outputs = await emitPlan(plan, {
      planDir: path.dirname(resolvedPlanPath),
      // Overrides given on the command line are relative to the working directory
      primary: options.primary === undefined ? undefined : path.resolve(options.primary),
      base: options.base === undefined ? undefined : resolvePlanLocation(process.cwd(), options.base),
      allowMissing: options.allowMissing,
      sink: base,
      onDocument: (document, index) => {
        spinner.update(`Staging ${document.href || '(primary)'} [${index + 1}/${plan.documents.length}]`);
      },
    });
  } catch (error) {
    spinner.fail('Emit failed; staged documents were discarded');
    base.error(error instanceof Error ? error.message : String(error), EXIT_CODES.ERROR);
  }

  spinner.succeed('Documents committed');

  if (options.json) {
    base.json(outputs);
  } else {
    base.info(formatProducedOutputs(outputs, process.cwd()));
  }
}
