/**
 * Output Transactions
 *
 * Stage the result documents of a run in temporary files and commit them
 * all together, or undo them all.
 *
 * @module output
 */

export { OutputTransaction, runOutputTransaction, type OutputProducer } from './transaction.js';
export { ResultDocumentWriter } from './writer.js';
export {
  CollectingSink,
  createConsoleSink,
  formatDiagnostic,
  teeSink,
  type ConsoleSinkOptions,
  type Diagnostic,
  type DiagnosticSink,
  type Severity,
} from './diagnostics.js';
export { CommitError, StagingAllocationError, TransactionStateError } from './errors.js';
export {
  executeCommitAction,
  executeUndoAction,
  type CommitHooks,
  type CommitResult,
} from './actions.js';
export { allocateStagingFile, randomFileName, type StagingFile, type StagingOptions } from './staging.js';
export {
  isAbsoluteUri,
  isSameLocation,
  resolveLocation,
  schemeOf,
  toBaseUrl,
  toLocalPath,
  type LocationScheme,
} from './location.js';
export type {
  CommitAction,
  OutputTransactionOptions,
  StagedWrite,
  TransactionState,
  UndoAction,
} from './types.js';
export {
  WriterSettingsSchema,
  ProducedOutputSchema,
  type WriterSettings,
  type WriterSettingsInput,
  type ProducedOutput,
} from '../schemas/index.js';
