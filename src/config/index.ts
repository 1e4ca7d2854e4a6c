/**
 * Configuration Module
 *
 * Loads and validates environment variables for outcommit.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { EncodingNameSchema } from '../schemas/writer-settings.js';

// Environment schema with optional values and defaults
const envSchema = z.object({
  // Staging file allocation
  OUTCOMMIT_MAX_STAGING_ATTEMPTS: z.coerce.number().int().positive().default(100),

  // Suffix appended to a destination while it is being replaced
  OUTCOMMIT_BACKUP_SUFFIX: z
    .string()
    .min(1)
    .refine((suffix) => !suffix.includes('/') && !suffix.includes('\\'), {
      message: 'Backup suffix must not contain path separators',
    })
    .default('.bak'),

  // Encoding used when writer settings do not name one
  OUTCOMMIT_DEFAULT_ENCODING: EncodingNameSchema.default('UTF-8'),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

/**
 * Build the configuration object from an environment map.
 *
 * @param source - Environment variables (defaults to process.env)
 * @throws ZodError if a variable is present but invalid
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env) {
  const env: Env = envSchema.parse(source);

  return {
    // Environment
    nodeEnv: env.NODE_ENV,
    isProduction: env.NODE_ENV === 'production',
    isDevelopment: env.NODE_ENV === 'development',
    isTest: env.NODE_ENV === 'test',

    staging: {
      maxAttempts: env.OUTCOMMIT_MAX_STAGING_ATTEMPTS,
      backupSuffix: env.OUTCOMMIT_BACKUP_SUFFIX,
    },

    defaultEncoding: env.OUTCOMMIT_DEFAULT_ENCODING,
  } as const;
}

// Parse environment
const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment variables:');
  console.error(parseResult.error.format());
  process.exit(1);
}

/**
 * Application configuration singleton
 */
export const config = loadConfig();

// Re-export types
export type Config = ReturnType<typeof loadConfig>;
