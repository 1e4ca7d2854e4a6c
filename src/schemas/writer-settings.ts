/**
 * Writer Settings Schema
 *
 * Serialization options applied to the stream returned for each
 * result document: media type, character encoding and indentation.
 *
 * @module schemas/writer-settings
 */

import { z } from 'zod';

// ============================================================================
// Encoding Names
// ============================================================================

/**
 * Character encoding names accepted in writer settings, keyed by their
 * normalized (upper-case) spelling, mapped to the Node.js buffer encoding.
 */
const ENCODING_ALIASES: Record<string, BufferEncoding> = {
  'UTF-8': 'utf8',
  UTF8: 'utf8',
  'UTF-16': 'utf16le',
  'UTF-16LE': 'utf16le',
  'UCS-2': 'utf16le',
  'ISO-8859-1': 'latin1',
  LATIN1: 'latin1',
  'US-ASCII': 'ascii',
  ASCII: 'ascii',
};

/**
 * Map an encoding name to the buffer encoding used to write it.
 *
 * @param name - Encoding name such as "UTF-8" or "iso-8859-1"
 * @returns The buffer encoding, or undefined if the name is not supported
 */
export function toBufferEncoding(name: string): BufferEncoding | undefined {
  return ENCODING_ALIASES[name.trim().toUpperCase()];
}

/**
 * Encoding name. Case-insensitive; must be one of the supported encodings.
 */
export const EncodingNameSchema = z
  .string()
  .min(1)
  .refine((name) => toBufferEncoding(name) !== undefined, (name) => ({
    message: `Unsupported encoding: ${name}`,
  }));

// ============================================================================
// Writer Settings Schema
// ============================================================================

export const NewlineSchema = z.enum(['\n', '\r\n']);

export type Newline = z.infer<typeof NewlineSchema>;

/**
 * Writer settings for a single result document.
 */
export const WriterSettingsSchema = z.object({
  /** Media type reported for the produced document (e.g. application/xml) */
  mediaType: z.string().min(1).optional(),

  /** Character encoding of the written bytes */
  encoding: EncodingNameSchema.default('UTF-8'),

  /** Whether writeLine() indents lines by depth */
  indent: z.boolean().default(false),

  /** Spaces per indentation level */
  indentSize: z.number().int().min(0).max(16).default(2),

  /** Line terminator used by writeLine() */
  newline: NewlineSchema.default('\n'),

  /** Emit a byte order mark before the first chunk */
  byteOrderMark: z.boolean().default(false),
});

export type WriterSettings = z.infer<typeof WriterSettingsSchema>;
export type WriterSettingsInput = z.input<typeof WriterSettingsSchema>;

/**
 * Default settings when the caller supplies none.
 */
export const DEFAULT_WRITER_SETTINGS: WriterSettings = WriterSettingsSchema.parse({});
