/**
 * reword core
 *
 * Commit enumeration, message planning and plan replay.
 *
 * @module @reword/core
 */

// Types
export * from './types';

// Logging
export {
  createConsoleLogger,
  noopLogger,
  type Logger,
  type LogMeta,
  type ConsoleLoggerOptions,
} from './logger';

// VCS
export { SimpleGitAdapter, type VcsAdapter, type VcsRunOptions } from './vcs';

// Analyzer
export {
  resolveRange,
  listCommits,
  getCommitDiff,
  truncateDiff,
  type ResolvedRange,
} from './analyzer';

// Generator
export {
  generatePlan,
  planAndSave,
  sanitizeMessage,
  OpenAiSuggester,
  ScriptedSuggester,
  FALLBACK_MESSAGE,
  type MessageSuggester,
  type SuggestionRequest,
  type SuggesterFactory,
} from './generator';

// Applier
export {
  PlanApplier,
  applyPlan,
  describeState,
  type ApplyState,
  type ApplyTransition,
} from './applier';

// Storage
export { serializePlan, deserializePlan, savePlan, loadPlan } from './storage';
