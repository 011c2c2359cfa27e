/**
 * Suggestion prompt building
 */

/**
 * Fixed instructions sent ahead of every commit
 */
export const SYSTEM_PROMPT = `You write git commit messages for existing commits.

Rules:
- Use Conventional Commits (feat, fix, docs, style, refactor, perf, test, chore)
  when the change fits one
- First line is a summary of at most 72 characters
- Then one empty line, then bullet points only if the change needs them
- Imperative, present tense ("add", not "added")
- For large diffs, summarize the intent instead of listing every file
- Reply with the message only: no code fences, no headings, no commentary`;

export interface SuggestionPromptInput {
  oldMessage: string;
  diff: string;
}

/**
 * User payload: the commit's current message followed by its diff
 */
export function buildSuggestionPrompt(input: SuggestionPromptInput): string {
  return `Old message:\n"${input.oldMessage}"\n\nDiff (unified, files & hunks):\n${input.diff}`;
}
