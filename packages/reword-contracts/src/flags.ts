/**
 * Declarative flag definitions for reword commands
 *
 * The CLI turns these into commander options; values are then validated by
 * the matching zod input schema in ./schema.
 */

export interface StringFlag {
  type: 'string';
  description: string;
  alias?: string;
  /** Placeholder shown in help, e.g. `<n>` */
  valueName?: string;
  default?: string;
  examples?: readonly string[];
}

export interface BooleanFlag {
  type: 'boolean';
  description: string;
  alias?: string;
  default?: boolean;
}

export type FlagDefinition = StringFlag | BooleanFlag;

export type FlagSet = Readonly<Record<string, FlagDefinition>>;

/**
 * Flags for `reword plan`
 *
 * @example
 * ```bash
 * reword plan --limit 10 --out plan.json
 * reword plan --range v1.2.0..HEAD --timeout 40s
 * ```
 */
export const planFlags = {
  limit: {
    type: 'string',
    alias: 'n',
    valueName: '<n>',
    description: 'Number of commits back from HEAD to rewrite (default: 20)',
  },
  range: {
    type: 'string',
    valueName: '<base..head>',
    description: 'Explicit commit range; overrides --limit',
    examples: ['main..HEAD', 'v1.2.0..feature'],
  },
  model: {
    type: 'string',
    valueName: '<id>',
    description: 'Suggestion model (default: OPENAI_MODEL or gpt-5-nano)',
  },
  'allow-merges': {
    type: 'boolean',
    description: 'Include merge commits (experimental)',
    default: false,
  },
  out: {
    type: 'string',
    alias: 'o',
    valueName: '<file>',
    description: 'Where to write the plan (default: plan.json)',
  },
  timeout: {
    type: 'string',
    valueName: '<duration>',
    description: 'Per-commit suggestion deadline (default: 25s)',
    examples: ['25s', '1500ms', '2m'],
  },
  json: {
    type: 'boolean',
    description: 'Print the plan as JSON instead of a summary',
    default: false,
  },
} as const satisfies FlagSet;

/**
 * Flags for `reword apply`
 *
 * @example
 * ```bash
 * reword apply --branch reworded --in plan.json
 * ```
 */
export const applyFlags = {
  branch: {
    type: 'string',
    alias: 'b',
    valueName: '<name>',
    description: 'New branch to replay onto (must not exist)',
  },
  in: {
    type: 'string',
    alias: 'i',
    valueName: '<file>',
    description: 'Plan to apply (default: plan.json)',
  },
  'allow-merges': {
    type: 'boolean',
    description: 'Replay merge commits against their first parent (experimental)',
    default: false,
  },
  json: {
    type: 'boolean',
    description: 'Print the apply result as JSON',
    default: false,
  },
} as const satisfies FlagSet;

/**
 * Flags for `reword show`
 */
export const showFlags = {
  in: {
    type: 'string',
    alias: 'i',
    valueName: '<file>',
    description: 'Plan to print (default: plan.json)',
  },
  json: {
    type: 'boolean',
    description: 'Print the raw plan JSON',
    default: false,
  },
} as const satisfies FlagSet;
