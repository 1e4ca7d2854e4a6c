/**
 * Output Transaction Types
 *
 * Deferred commit/undo actions are plain tagged variants rather than
 * captured callbacks; the transaction records them while staging and
 * executes them through ./actions.ts.
 *
 * @module output/types
 */

import type { ProducedOutput } from '../schemas/produced-output.js';
import type { DiagnosticSink } from './diagnostics.js';
import type { ResultDocumentWriter } from './writer.js';

// ============================================================================
// Actions
// ============================================================================

/**
 * Makes a staged write visible at its destination.
 *
 * - move: destination did not exist; rename staging file into place
 * - replaceWithBackup: destination existed; back it up, replace, drop backup
 */
export type CommitAction =
  | {
      kind: 'move';
      stagingPath: string;
      destinationPath: string;
    }
  | {
      kind: 'replaceWithBackup';
      stagingPath: string;
      destinationPath: string;
      backupPath: string;
    };

/**
 * Reverses a staged write that was not committed.
 *
 * - deleteStagingFile: remove the staging file
 * - restoreBackup: remove the staging file and put back the backup the
 *   commit made; before the commit got that far it only removes the staging file
 */
export type UndoAction =
  | {
      kind: 'deleteStagingFile';
      stagingPath: string;
    }
  | {
      kind: 'restoreBackup';
      stagingPath: string;
      destinationPath: string;
      backupPath: string;
    };

// ============================================================================
// Staged Writes
// ============================================================================

/**
 * One pending output owned by a transaction.
 */
export interface StagedWrite {
  /** Identifier passed to resolve() */
  identifier: string;
  /** Temporary file receiving the content */
  stagingPath: string;
  /** Final location of the document */
  destinationPath: string;
  /** Whether the destination existed when the write was staged */
  destinationExisted: boolean;
  /** Writer handed to the producer */
  writer: ResultDocumentWriter;
  commit: CommitAction;
  undo: UndoAction;
  /** Whether the commit has copied the destination to its backup path */
  backupCreated: boolean;
  output: ProducedOutput;
}

// ============================================================================
// Transaction
// ============================================================================

/**
 * Lifecycle of an output transaction.
 *
 * open -> committed | aborted; a failed complete() moves to failed, which
 * only dispose() can leave.
 */
export type TransactionState = 'open' | 'completing' | 'failed' | 'committed' | 'aborted';

/**
 * Options for creating an output transaction.
 */
export interface OutputTransactionOptions {
  /** Location relative identifiers resolve against (file URL or local path) */
  baseOutputUri: string | URL;
  /** Path of the primary output; omit when the run has none */
  primaryDestination?: string;
  /** Where diagnostics go (defaults to the console sink) */
  sink?: DiagnosticSink;
  /** Suffix of the backup kept while an existing destination is replaced */
  backupSuffix?: string;
  /** Staging name attempts before allocation gives up */
  maxStagingAttempts?: number;
  /** Staging file name generator */
  randomName?: () => string;
}

