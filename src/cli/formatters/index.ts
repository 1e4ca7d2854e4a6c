/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export { ProgressSpinner, createSpinner, formatDuration, type SpinnerOptions } from './progress.js';

// Produced output formatters
export { formatProducedOutput, formatProducedOutputs } from './outputs.js';
