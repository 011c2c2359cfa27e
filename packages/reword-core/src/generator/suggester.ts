/**
 * Message suggestion port
 */

import { SuggestionServiceError } from '@reword/contracts';

export interface SuggestionRequest {
  model: string;
  /** Possibly truncated unified diff */
  diff: string;
  oldMessage: string;
  /** Aborted when the per-call deadline expires */
  signal?: AbortSignal;
}

export interface MessageSuggester {
  /** Raw suggested message; sanitizing is the caller's job */
  suggest(request: SuggestionRequest): Promise<string>;
}

/**
 * Builds the suggester once enumeration has succeeded
 */
export type SuggesterFactory = () => MessageSuggester;

export type ScriptedReply = (request: SuggestionRequest) => string | Promise<string>;
export type ScriptedResponse = string | Error | ScriptedReply;

/**
 * Suggester that answers from a script instead of a service
 *
 * Queued responses are consumed in order; a function script answers every
 * request. All requests are recorded.
 */
export class ScriptedSuggester implements MessageSuggester {
  readonly requests: SuggestionRequest[] = [];
  private readonly queue: ScriptedResponse[];
  private readonly reply?: ScriptedReply;

  constructor(script: ScriptedResponse[] | ScriptedReply) {
    if (typeof script === 'function') {
      this.queue = [];
      this.reply = script;
    } else {
      this.queue = [...script];
    }
  }

  async suggest(request: SuggestionRequest): Promise<string> {
    this.requests.push(request);

    const next = this.reply ?? this.queue.shift();
    if (next === undefined) {
      throw new SuggestionServiceError('scripted suggester has no response left');
    }
    if (next instanceof Error) {
      throw next;
    }
    if (typeof next === 'function') {
      return next(request);
    }
    return next;
  }
}
