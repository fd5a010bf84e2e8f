import Anthropic from '@anthropic-ai/sdk';
import type { LLMPort, LLMRequest, LLMResponse } from '../../ports/LLMPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { LLMError } from '../../utils/errors.js';

type ClaudeConfig = Pick<Config, 'anthropicApiKey' | 'llmTextModel' | 'llmStream' | 'llmTimeoutMs'>;

function buildSystemParam(systemPrompt: string | undefined): string | undefined {
  return systemPrompt?.trim() ? systemPrompt : undefined;
}

export class ClaudeAdapter implements LLMPort {
  private readonly logger = createLogger({ adapter: 'ClaudeAdapter' });
  private readonly client: Anthropic;
  private readonly model: string;
  private readonly stream: boolean;

  constructor(config: ClaudeConfig) {
    this.client = new Anthropic({ apiKey: config.anthropicApiKey, timeout: config.llmTimeoutMs });
    this.model = config.llmTextModel;
    this.stream = config.llmStream;
    this.logger.debug({ model: this.model, stream: this.stream }, 'Claude adapter initialized');
  }

  async generateText(request: LLMRequest): Promise<LLMResponse> {
    const logger = this.logger.child({ method: 'generateText' });
    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: request.maxTokens ?? 400,
      temperature: request.temperature ?? 0.3,
      system: buildSystemParam(request.systemPrompt),
      messages: [
        {
          role: 'user',
          content: request.prompt,
        },
      ],
    };

    try {
      const response = this.stream
        ? await this.streamMessage(params, request.onText)
        : await this.client.messages.create(params);

      const text = extractText(response);
      const usage = response.usage
        ? { inputTokens: response.usage.input_tokens, outputTokens: response.usage.output_tokens }
        : undefined;

      logger.debug({ usage }, 'Claude generation completed');

      return { text, usage };
    } catch (error) {
      logger.debug({ error }, 'Claude text generation failed');
      throw new LLMError('Claude text generation failed', { cause: error });
    }
  }

  private async streamMessage(
    params: Anthropic.MessageCreateParamsNonStreaming,
    onText: ((fragment: string) => void) | undefined
  ): Promise<Anthropic.Message> {
    const stream = this.client.messages.stream(params);
    if (onText) {
      stream.on('text', (fragment) => onText(fragment));
    }
    return stream.finalMessage();
  }
}

function extractText(response: Anthropic.Message): string {
  return response.content
    .map((block) => (block.type === 'text' ? block.text : ''))
    .join('');
}
