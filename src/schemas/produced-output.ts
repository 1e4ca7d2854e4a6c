/**
 * Produced Output Schema
 *
 * Descriptor for a document written by a completed transaction.
 *
 * @module schemas/produced-output
 */

import { z } from 'zod';

export const ProducedOutputSchema = z.object({
  /** Absolute path of the committed destination */
  path: z.string().min(1),

  /** Media type from the writer settings, if any */
  mediaType: z.string().min(1).optional(),

  /** Character encoding name from the writer settings */
  encoding: z.string().min(1),
});

export type ProducedOutput = z.infer<typeof ProducedOutputSchema>;
