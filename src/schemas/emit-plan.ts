/**
 * Emit Plan Schema
 *
 * JSON document consumed by `outcommit emit`. Lists every document that
 * one run writes; all of them are committed together or not at all.
 *
 * @example
 * ```json
 * {
 *   "baseOutputUri": "build/out.xml",
 *   "primary": "build/out.xml",
 *   "documents": [
 *     { "href": "", "content": "<out/>", "settings": { "mediaType": "application/xml" } },
 *     { "href": "report.xml", "content": ["<report>", "</report>"] }
 *   ]
 * }
 * ```
 *
 * @module schemas/emit-plan
 */

import { z } from 'zod';
import { WriterSettingsSchema } from './writer-settings.js';

/**
 * One document in an emit plan.
 *
 * `href` is resolved against the plan's base output URI; the empty string
 * names the primary output. Array content is written line by line.
 */
export const EmitDocumentSchema = z.object({
  href: z.string(),
  content: z.union([z.string(), z.array(z.string())]),
  settings: WriterSettingsSchema.partial().optional(),
});

export type EmitDocument = z.infer<typeof EmitDocumentSchema>;

export const EmitPlanSchema = z.object({
  /** Base location for relative hrefs (file URL or path); defaults to the primary */
  baseOutputUri: z.string().min(1).optional(),

  /** Path of the primary output; omitted when the run has none */
  primary: z.string().min(1).optional(),

  documents: z.array(EmitDocumentSchema).min(1, 'Emit plan must list at least one document'),
});

export type EmitPlan = z.infer<typeof EmitPlanSchema>;
