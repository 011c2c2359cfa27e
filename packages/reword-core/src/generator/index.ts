/**
 * Generator module
 * @module @reword/core/generator
 */

export { generatePlan, planAndSave, suggestWithTimeout } from './planner';

export { SYSTEM_PROMPT, buildSuggestionPrompt, type SuggestionPromptInput } from './prompt';

export { sanitizeMessage, isDecorationOnly, FALLBACK_MESSAGE } from './sanitize';

export {
  ScriptedSuggester,
  type MessageSuggester,
  type SuggestionRequest,
  type SuggesterFactory,
  type ScriptedReply,
  type ScriptedResponse,
} from './suggester';

export { OpenAiSuggester } from './openai-suggester';
