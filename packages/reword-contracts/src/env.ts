/**
 * Environment variable definitions for reword
 */

import { z } from 'zod';
import { ConfigurationError } from './errors';

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value) => value === '1' || value === 'true' || value === 'yes');

const positiveInt = z.coerce.number().int().positive();

export const RewordEnvSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_API_BASE: z.string().optional(),
  OPENAI_MODEL: z.string().optional(),
  REWORD_TIMEOUT_MS: positiveInt.optional(),
  REWORD_MAX_DIFF_CHARS: positiveInt.optional(),
  REWORD_DEBUG: flag.optional(),
});

export type RewordEnv = z.infer<typeof RewordEnvSchema>;

export const REWORD_ENV_VARS = [
  'OPENAI_API_KEY',
  'OPENAI_API_BASE',
  'OPENAI_MODEL',
  'REWORD_TIMEOUT_MS',
  'REWORD_MAX_DIFF_CHARS',
  'REWORD_DEBUG',
] as const satisfies ReadonlyArray<keyof RewordEnv>;

type RewordEnvVar = (typeof REWORD_ENV_VARS)[number];

/**
 * Validate the variables reword reads; unrelated variables are ignored
 */
export function parseRewordEnv(source: Record<string, string | undefined>): RewordEnv {
  const picked: Partial<Record<RewordEnvVar, string>> = {};
  for (const key of REWORD_ENV_VARS) {
    const value = source[key];
    if (value !== undefined && value !== '') {
      picked[key] = value;
    }
  }

  const result = RewordEnvSchema.safeParse(picked);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment: ${issues.join('; ')}`);
  }
  return result.data;
}
