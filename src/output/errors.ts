/**
 * Output Transaction Errors
 *
 * @module output/errors
 */

import type { TransactionState } from './types.js';

/**
 * Staging file could not be created for a destination.
 */
export class StagingAllocationError extends Error {
  constructor(
    message: string,
    public readonly destinationPath: string,
    public readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StagingAllocationError';
  }
}

/**
 * A commit action failed during complete(). Outputs committed before it stay
 * committed.
 */
export class CommitError extends Error {
  constructor(
    message: string,
    public readonly destinationPath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CommitError';
  }
}

/**
 * An operation was invoked in a state that does not allow it.
 */
export class TransactionStateError extends Error {
  constructor(
    public readonly operation: string,
    public readonly state: TransactionState
  ) {
    super(`Cannot ${operation}: transaction is ${state}`);
    this.name = 'TransactionStateError';
  }
}

/**
 * Describe an unknown thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
