/**
 * Zod Schemas
 *
 * Central export point for the schema definitions used by the output
 * transaction and the CLI.
 *
 * @module schemas
 */

export {
  EncodingNameSchema,
  NewlineSchema,
  WriterSettingsSchema,
  DEFAULT_WRITER_SETTINGS,
  toBufferEncoding,
  type Newline,
  type WriterSettings,
  type WriterSettingsInput,
} from './writer-settings.js';

export { ProducedOutputSchema, type ProducedOutput } from './produced-output.js';

export {
  EmitDocumentSchema,
  EmitPlanSchema,
  type EmitDocument,
  type EmitPlan,
} from './emit-plan.js';
