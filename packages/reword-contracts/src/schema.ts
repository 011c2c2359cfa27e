import { z } from 'zod';

// ============================================================================
// Core Types
// ============================================================================

/**
 * Full or abbreviated commit id
 */
export const ShaSchema = z.string().regex(/^[0-9a-f]{7,64}$/, 'must be a hex commit id');

/**
 * Fixed-offset date-time as printed by `git log --format=%aI`
 */
export const GitDateSchema = z.string().datetime({ offset: true });

/**
 * Commit read from the repository while enumerating a range
 */
export interface CommitRecord {
  sha: string;
  subject: string;
  authorName: string;
  authorEmail: string;
  authorDate: string;
  parents: string[];
  isMerge: boolean;
}

// ============================================================================
// Rewrite Plan
// ============================================================================

/**
 * One commit to rewrite
 */
export const PlanItemSchema = z.object({
  sha: ShaSchema,
  oldMessage: z.string(),
  /** Blank means "keep oldMessage" at apply time */
  newMessage: z.string(),
  authorName: z.string(),
  authorEmail: z.string(),
  authorDate: GitDateSchema,
});

export type PlanItem = z.infer<typeof PlanItemSchema>;

/**
 * Complete rewrite plan, written by `plan` and read by `apply`
 */
export const PlanSchema = z.object({
  schemaVersion: z.literal('1.0'),
  repoPath: z.string(),
  /** Exclusive lower bound; empty means "parent of the first item" */
  base: z.union([z.literal(''), ShaSchema]),
  head: ShaSchema,
  createdAt: z.string().datetime({ offset: true }),
  model: z.string().min(1),
  allowMerges: z.boolean(),
  items: z.array(PlanItemSchema).min(1, 'plan has no items'),
});

export type Plan = z.infer<typeof PlanSchema>;

// ============================================================================
// Command Input/Output Schemas
// ============================================================================

const DURATION_PATTERN = /^(\d+)(ms|s|m)?$/;

/**
 * Per-call timeout: plain milliseconds or a `ms`/`s`/`m` suffixed value
 */
export const DurationSchema = z
  .union([
    z.number().int().positive(),
    z.string().regex(DURATION_PATTERN, 'expected e.g. 25s, 1500ms or 2m'),
  ])
  .transform((value) => (typeof value === 'number' ? value : parseDuration(value)))
  .refine((ms) => ms > 0, 'timeout must be positive');

export function parseDuration(value: string): number {
  const match = DURATION_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid duration: ${value}`);
  }
  const amount = Number(match[1]);
  switch (match[2]) {
    case 's':
      return amount * 1000;
    case 'm':
      return amount * 60_000;
    default:
      return amount;
  }
}

// --- plan ---
export const PlanInputSchema = z.object({
  limit: z.coerce.number().int().positive(),
  range: z.string().optional(),
  model: z.string().min(1),
  allowMerges: z.boolean().default(false),
  out: z.string().min(1),
  timeout: DurationSchema,
  json: z.boolean().default(false),
});

export type PlanInput = z.infer<typeof PlanInputSchema>;

export const PlanOutputSchema = z.object({
  planPath: z.string(),
  plan: PlanSchema,
});

export type PlanOutput = z.infer<typeof PlanOutputSchema>;

// --- apply ---
export const ApplyInputSchema = z.object({
  in: z.string().min(1),
  branch: z.string({ required_error: '--branch is required' }).min(1, '--branch is required'),
  allowMerges: z.boolean().default(false),
  json: z.boolean().default(false),
});

export type ApplyInput = z.infer<typeof ApplyInputSchema>;

// --- show ---
export const ShowInputSchema = z.object({
  in: z.string().min(1),
  json: z.boolean().default(false),
});

export type ShowInput = z.infer<typeof ShowInputSchema>;

// ============================================================================
// Result Types (for core package)
// ============================================================================

export const ApplyResultSchema = z.object({
  branch: z.string(),
  base: z.string(),
  /** True when the plan had no base and it was taken from the first item's parent */
  baseDerived: z.boolean(),
  commits: z.array(
    z.object({
      sourceSha: z.string(),
      sha: z.string(),
      message: z.string(),
    })
  ),
  skipped: z.array(z.string()),
});

export type ApplyResult = z.infer<typeof ApplyResultSchema>;
