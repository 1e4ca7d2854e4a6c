/**
 * Produced Output Formatters
 *
 * Render the list of documents written by a completed transaction.
 *
 * @module cli/formatters/outputs
 */

import * as path from 'node:path';
import type { ProducedOutput } from '../../schemas/produced-output.js';

/**
 * Format one produced output as `path (media type, encoding)`.
 *
 * @param output - Output descriptor
 * @param relativeTo - Directory paths are shown relative to, if given
 */
export function formatProducedOutput(output: ProducedOutput, relativeTo?: string): string {
  const displayPath = relativeTo ? path.relative(relativeTo, output.path) : output.path;
  return `${displayPath} (${output.mediaType ?? 'unspecified media type'}, ${output.encoding})`;
}

/**
 * Format the full produced-output list with a count header.
 *
 * @example
 * ```typescript
 * formatProducedOutputs([{ path: '/w/out.xml', mediaType: 'application/xml', encoding: 'UTF-8' }], '/w');
 * // 'Wrote 1 document:\n  out.xml (application/xml, UTF-8)'
 * ```
 */
export function formatProducedOutputs(outputs: readonly ProducedOutput[], relativeTo?: string): string {
  if (outputs.length === 0) {
    return 'No documents written.';
  }

  const noun = outputs.length === 1 ? 'document' : 'documents';
  const lines = outputs.map((output) => `  ${formatProducedOutput(output, relativeTo)}`);
  return [`Wrote ${outputs.length} ${noun}:`, ...lines].join('\n');
}
