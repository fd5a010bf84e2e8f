import type { LLMPort, LLMResponse } from '../../ports/LLMPort.js';
import { createLogger } from '../../utils/logger.js';
import { describeError } from '../../utils/errors.js';

export const SUGGESTION_HEADER = '--- Suggestion ---';

export interface SuggestionEnricherOptions {
  /** Called once with a user-facing warning when the suggestion cannot be fetched. */
  onWarning?: (message: string) => void;
  /** Streamed fragments, in order, when the adapter streams. */
  onText?: (fragment: string) => void;
  /** Called after the last streamed fragment, if any arrived. */
  onStreamEnd?: () => void;
}

export function appendSuggestion(text: string, suggestion: string): string {
  const trimmed = suggestion.trim();
  if (!trimmed) {
    return text;
  }
  return `${text}\n\n${SUGGESTION_HEADER}\n${trimmed}`;
}

export class SuggestionEnricher {
  private readonly logger = createLogger({ component: 'SuggestionEnricher' });

  constructor(
    private readonly llmPort: LLMPort,
    private readonly systemPrompt: string,
    private readonly options: SuggestionEnricherOptions = {}
  ) {}

  /** Never rejects: on failure the text comes back unchanged. */
  async enrich(text: string): Promise<string> {
    const { onText, onStreamEnd, onWarning } = this.options;
    let streamed = false;
    const endStream = (): void => {
      if (streamed) {
        onStreamEnd?.();
      }
    };

    let response: LLMResponse;
    try {
      response = await this.llmPort.generateText({
        prompt: text,
        systemPrompt: this.systemPrompt,
        onText: onText
          ? (fragment) => {
              streamed = true;
              onText(fragment);
            }
          : undefined,
      });
    } catch (error) {
      this.logger.debug({ error }, 'Suggestion failed; sending without it');
      endStream();
      onWarning?.(`cannot get a suggestion: ${describeError(error)}`);
      return text;
    }

    endStream();
    return appendSuggestion(text, response.text);
  }
}
