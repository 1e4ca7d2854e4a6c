/**
 * Output Transaction
 *
 * Owns the result documents of one processing run. Every document is
 * streamed into a staging file next to its destination; complete() moves
 * them all into place, while dispose() without a successful complete()
 * removes every staging file and leaves existing destinations untouched.
 *
 * Not safe for concurrent use: resolve() calls must be serialized by the
 * caller.
 *
 * @module output/transaction
 */

import * as path from 'node:path';
import { config } from '../config/index.js';
import { WriterSettingsSchema, type WriterSettingsInput } from '../schemas/writer-settings.js';
import type { ProducedOutput } from '../schemas/produced-output.js';
import { fileExists } from '../storage/files.js';
import { executeCommitAction, executeUndoAction, type CommitResult } from './actions.js';
import { createConsoleSink, type DiagnosticSink } from './diagnostics.js';
import { CommitError, TransactionStateError, describeError } from './errors.js';
import { isSameLocation, resolveLocation, schemeOf, toBaseUrl, toLocalPath } from './location.js';
import { allocateStagingFile } from './staging.js';
import type {
  CommitAction,
  OutputTransactionOptions,
  StagedWrite,
  TransactionState,
  UndoAction,
} from './types.js';
import { ResultDocumentWriter } from './writer.js';

/**
 * Transactional manager for the result documents of one run.
 *
 * @example
 * ```typescript
 * const transaction = new OutputTransaction({
 *   baseOutputUri: '/work/build/out.xml',
 *   primaryDestination: '/work/build/out.xml',
 * });
 * try {
 *   const main = await transaction.resolve('', { mediaType: 'application/xml' });
 *   await main?.write('<out/>');
 *   await main?.close();
 *   const outputs = await transaction.complete();
 * } finally {
 *   await transaction.dispose();
 * }
 * ```
 */
export class OutputTransaction {
  private readonly baseOutputUri: URL;
  private readonly primaryDestination: string | undefined;
  private readonly sink: DiagnosticSink;
  private readonly backupSuffix: string;
  private readonly maxStagingAttempts: number;
  private readonly randomName: (() => string) | undefined;

  /** Staged writes not yet committed, in resolve order */
  private readonly pending: StagedWrite[] = [];
  private readonly outputs: ProducedOutput[] = [];
  private published: readonly ProducedOutput[] = [];
  private currentState: TransactionState = 'open';
  private resolving = false;

  constructor(options: OutputTransactionOptions) {
    this.baseOutputUri = toBaseUrl(options.baseOutputUri);
    this.primaryDestination =
      options.primaryDestination === undefined ? undefined : path.resolve(options.primaryDestination);
    this.sink = options.sink ?? createConsoleSink();
    this.backupSuffix = options.backupSuffix ?? config.staging.backupSuffix;
    this.maxStagingAttempts = options.maxStagingAttempts ?? config.staging.maxAttempts;
    this.randomName = options.randomName;
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  get state(): TransactionState {
    return this.currentState;
  }

  /**
   * Outputs written by complete(); empty until the transaction is committed.
   */
  get producedOutputs(): readonly ProducedOutput[] {
    return this.published;
  }

  /**
   * Pending commit actions, in the order they will run.
   */
  get commitLog(): readonly CommitAction[] {
    return this.pending.map((write) => write.commit);
  }

  /**
   * Pending undo actions, in staging order.
   */
  get undoLog(): readonly UndoAction[] {
    return this.pending.map((write) => write.undo);
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  /**
   * Stage a result document and return a writer for it.
   *
   * @param identifier - URI reference resolved against the base output URI;
   *   a reference to the base itself names the primary output
   * @param settings - Writer settings for the document
   * @returns A writer over a new staging file, or null when the document is
   *   discarded (no primary destination) or its location cannot be written
   * @throws StagingAllocationError if no staging file can be created
   * @throws TransactionStateError outside the open state
   */
  async resolve(identifier: string, settings: WriterSettingsInput = {}): Promise<ResultDocumentWriter | null> {
    this.assertOpen('resolve');
    if (this.resolving) {
      throw new TransactionStateError('resolve while another resolve is pending', this.currentState);
    }

    this.resolving = true;
    try {
      return await this.stage(identifier, settings);
    } finally {
      this.resolving = false;
    }
  }

  /**
   * Commit every staged write in resolve order.
   *
   * Writers the producer left open are closed first. If a commit fails, the
   * outputs committed before it stay in place and the error is rethrown;
   * dispose() then cleans up the rest.
   *
   * @returns The produced outputs
   * @throws CommitError if moving a staged write into place fails
   */
  async complete(): Promise<readonly ProducedOutput[]> {
    this.assertOpen('complete');
    this.currentState = 'completing';

    while (this.pending.length > 0) {
      const write = this.pending[0];

      let result: CommitResult;
      try {
        await write.writer.close();
        result = await executeCommitAction(write.commit, {
          onBackupCreated: () => {
            write.backupCreated = true;
          },
        });
      } catch (error) {
        this.currentState = 'failed';
        const message = `Failed to commit result document: ${describeError(error)}`;
        this.sink.report({ severity: 'error', message, location: write.destinationPath });
        throw new CommitError(message, write.destinationPath, { cause: error });
      }

      this.pending.shift();

      if (result.backupCleanupError !== undefined && write.commit.kind === 'replaceWithBackup') {
        this.sink.report({
          severity: 'warn',
          message: `Failed to remove backup ${write.commit.backupPath}: ${describeError(result.backupCleanupError)}`,
          location: write.destinationPath,
        });
      }
    }

    this.currentState = 'committed';
    this.published = [...this.outputs];
    return this.published;
  }

  /**
   * Release the transaction. Without a successful complete(), every staged
   * write that was not committed is undone; failures are reported to the
   * sink and do not stop the remaining undo actions.
   *
   * A no-op after complete().
   */
  async dispose(): Promise<void> {
    if (this.currentState === 'committed') {
      return;
    }
    if (this.currentState === 'aborted' || this.currentState === 'completing') {
      throw new TransactionStateError('dispose', this.currentState);
    }

    const pending = this.pending.splice(0);
    for (const write of pending) {
      try {
        await write.writer.close();
      } catch (error) {
        this.sink.report({
          severity: 'warn',
          message: `Failed to close staging file ${write.stagingPath}: ${describeError(error)}`,
          location: write.destinationPath,
        });
      }

      try {
        await executeUndoAction(this.undoFor(write));
      } catch (error) {
        this.sink.report({
          severity: 'error',
          message: `Failed to undo result document: ${describeError(error)}`,
          location: write.destinationPath,
        });
      }
    }

    this.currentState = 'aborted';
  }

  /**
   * Undo action to run for a write on abort. A backup path the commit never
   * wrote to may hold an unrelated file, so only the staging file goes.
   */
  private undoFor(write: StagedWrite): UndoAction {
    if (write.undo.kind === 'restoreBackup' && !write.backupCreated) {
      return { kind: 'deleteStagingFile', stagingPath: write.stagingPath };
    }
    return write.undo;
  }

  // ==========================================================================
  // Staging
  // ==========================================================================

  private async stage(identifier: string, input: WriterSettingsInput): Promise<ResultDocumentWriter | null> {
    const settings = WriterSettingsSchema.parse(input);

    const destinationPath = this.toDestination(identifier);
    if (destinationPath === null) {
      return null;
    }

    this.sink.report({ severity: 'debug', message: 'Creating result document', location: destinationPath });

    const destinationExisted = await fileExists(destinationPath);
    const staging = await allocateStagingFile(destinationPath, {
      randomName: this.randomName,
      maxAttempts: this.maxStagingAttempts,
    });

    const writer = new ResultDocumentWriter(staging.handle, staging.path, settings);

    const backupPath = `${destinationPath}${this.backupSuffix}`;
    const stagingPath = staging.path;

    const undo: UndoAction = destinationExisted
      ? { kind: 'restoreBackup', stagingPath, destinationPath, backupPath }
      : { kind: 'deleteStagingFile', stagingPath };

    const commit: CommitAction = destinationExisted
      ? { kind: 'replaceWithBackup', stagingPath, destinationPath, backupPath }
      : { kind: 'move', stagingPath, destinationPath };

    const output: ProducedOutput = {
      path: destinationPath,
      mediaType: settings.mediaType,
      encoding: settings.encoding,
    };

    this.pending.push({
      identifier,
      stagingPath,
      destinationPath,
      destinationExisted,
      writer,
      commit,
      undo,
      backupCreated: false,
      output,
    });
    this.outputs.push(output);

    return writer;
  }

  /**
   * Map an identifier to the local path it should be written to, or null
   * (after reporting why) when it cannot be written.
   */
  private toDestination(identifier: string): string | null {
    let location: URL;
    try {
      location = resolveLocation(this.baseOutputUri, identifier);
    } catch (error) {
      this.sink.report({
        severity: 'error',
        message: `Cannot create result document: ${describeError(error)}`,
        location: identifier,
      });
      return null;
    }

    if (schemeOf(location) !== 'file') {
      this.sink.report({
        severity: 'error',
        message: `Cannot create result document: only local file destinations are supported`,
        location: identifier,
      });
      return null;
    }

    if (isSameLocation(location, this.baseOutputUri)) {
      if (this.primaryDestination === undefined) {
        this.sink.report({
          severity: 'info',
          message: 'Discarding primary result document',
          location: identifier,
        });
        return null;
      }
      return this.primaryDestination;
    }

    try {
      return toLocalPath(location);
    } catch (error) {
      this.sink.report({
        severity: 'error',
        message: `Cannot create result document: ${describeError(error)}`,
        location: identifier,
      });
      return null;
    }
  }

  private assertOpen(operation: string): void {
    if (this.currentState !== 'open') {
      throw new TransactionStateError(operation, this.currentState);
    }
  }
}

/**
 * Producer callback run inside runOutputTransaction().
 */
export type OutputProducer = (transaction: OutputTransaction) => Promise<void>;

/**
 * Run a producer inside a transaction: complete on success, dispose on
 * every exit path.
 *
 * @returns The produced outputs
 * @throws Whatever the producer throws, after all staged writes are undone
 */
export async function runOutputTransaction(
  options: OutputTransactionOptions,
  producer: OutputProducer
): Promise<readonly ProducedOutput[]> {
  const transaction = new OutputTransaction(options);
  try {
    await producer(transaction);
    return await transaction.complete();
  } finally {
    await transaction.dispose();
  }
}
