/**
 * MessageSuggester backed by the OpenAI chat completions API
 */

import OpenAI, { APIError, APIUserAbortError } from 'openai';
import {
  ConfigurationError,
  SuggestionServiceError,
  type SuggestionConfig,
} from '@reword/contracts';
import { buildSuggestionPrompt, SYSTEM_PROMPT } from './prompt';
import type { MessageSuggester, SuggestionRequest } from './suggester';

// Fences and padding some models wrap around the message
const SURROUNDING_NOISE = /^[`\s]+|[`\s]+$/g;

export class OpenAiSuggester implements MessageSuggester {
  private readonly client: OpenAI;

  constructor(private readonly config: SuggestionConfig) {
    if (!config.apiKey) {
      throw new ConfigurationError('OPENAI_API_KEY is not set');
    }
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      maxRetries: 0,
    });
  }

  async suggest(request: SuggestionRequest): Promise<string> {
    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: request.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: buildSuggestionPrompt(request) },
          ],
          max_completion_tokens: this.config.maxCompletionTokens,
        },
        {
          signal: request.signal,
          timeout: this.config.timeoutMs,
        }
      );
      const choice = completion.choices[0];
      if (!choice) {
        throw new SuggestionServiceError('suggestion service returned no choices');
      }
      content = choice.message.content;
    } catch (error) {
      throw this.mapError(error);
    }

    const message = (content ?? '').replace(SURROUNDING_NOISE, '');
    if (!message) {
      throw new SuggestionServiceError('suggestion service returned an empty message');
    }
    return message;
  }

  private mapError(error: unknown): Error {
    if (error instanceof SuggestionServiceError) {
      return error;
    }
    if (error instanceof APIUserAbortError) {
      return new SuggestionServiceError('suggestion request aborted', { cause: error });
    }
    if (error instanceof APIError) {
      const status = error.status === undefined ? '' : ` (${error.status})`;
      return new SuggestionServiceError(`suggestion service error${status}: ${error.message}`, {
        cause: error,
      });
    }
    const reason = error instanceof Error ? error.message : String(error);
    return new SuggestionServiceError(`suggestion request failed: ${reason}`, { cause: error });
  }
}
