/**
 * Runtime configuration contract
 *
 * Built once at startup from the environment and passed explicitly to the
 * planner and the suggestion client. Nothing below the CLI reads
 * `process.env`.
 */

import type { RewordEnv } from '../env';

/**
 * Suggestion service configuration
 */
export interface SuggestionConfig {
  /** API credential (OPENAI_API_KEY); required only for planning */
  apiKey?: string;
  /** Alternate endpoint (OPENAI_API_BASE) */
  baseURL?: string;
  /** Model identifier (OPENAI_MODEL, default: gpt-5-nano) */
  model: string;
  /** Per-commit deadline in milliseconds (default: 25000) */
  timeoutMs: number;
  /** Completion budget per suggestion (default: 4000) */
  maxCompletionTokens: number;
}

/**
 * Diff extraction configuration
 */
export interface DiffConfig {
  /** Characters of diff sent per commit before truncation (default: 40000) */
  maxChars: number;
}

/**
 * Plan file defaults
 */
export interface PlanFileConfig {
  /** Plan path used by plan/apply/show (default: plan.json) */
  file: string;
  /** Commits from HEAD when no range is given (default: 20) */
  limit: number;
}

export interface RewordConfig {
  suggestion: SuggestionConfig;
  diff: DiffConfig;
  plan: PlanFileConfig;
  /** Verbose logging (REWORD_DEBUG) */
  debug: boolean;
}

export const DEFAULT_MODEL = 'gpt-5-nano';

export const defaultRewordConfig: RewordConfig = {
  suggestion: {
    apiKey: undefined,
    baseURL: undefined,
    model: DEFAULT_MODEL,
    timeoutMs: 25_000,
    maxCompletionTokens: 4000,
  },
  diff: {
    maxChars: 40_000,
  },
  plan: {
    file: 'plan.json',
    limit: 20,
  },
  debug: false,
};

/**
 * Resolve config with env variable overrides
 *
 * @param env - Validated environment (see parseRewordEnv)
 */
export function resolveRewordConfig(env: RewordEnv = {}): RewordConfig {
  const config: RewordConfig = {
    suggestion: { ...defaultRewordConfig.suggestion },
    diff: { ...defaultRewordConfig.diff },
    plan: { ...defaultRewordConfig.plan },
    debug: defaultRewordConfig.debug,
  };

  const apiKey = env.OPENAI_API_KEY?.trim();
  if (apiKey) {
    config.suggestion.apiKey = apiKey;
  }

  const baseURL = env.OPENAI_API_BASE?.trim();
  if (baseURL) {
    config.suggestion.baseURL = baseURL;
  }

  const model = env.OPENAI_MODEL?.trim();
  if (model) {
    config.suggestion.model = model;
  }

  if (env.REWORD_TIMEOUT_MS !== undefined) {
    config.suggestion.timeoutMs = env.REWORD_TIMEOUT_MS;
  }

  if (env.REWORD_MAX_DIFF_CHARS !== undefined) {
    config.diff.maxChars = env.REWORD_MAX_DIFF_CHARS;
  }

  if (env.REWORD_DEBUG !== undefined) {
    config.debug = env.REWORD_DEBUG;
  }

  return config;
}
