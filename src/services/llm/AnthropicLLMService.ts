import Anthropic from '@anthropic-ai/sdk';
import type { LLMConfig } from '../../config/validation.js';
import { logger } from '../../utils/logger.js';
import { LLMServiceError } from '../../utils/errors.js';
import type { CompletionRequest, CompletionResponse, LLMService } from './LLMService.interface.js';

const JSON_INSTRUCTION = '\n\nRespond with a single JSON object and nothing else.';

export class AnthropicLLMService implements LLMService {
  private client: Anthropic;

  constructor(private readonly options: LLMConfig) {
    this.client = new Anthropic({
      apiKey: options.apiKey,
    });
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.messages.create({
        model: this.options.model,
        max_tokens: 10,
        messages: [{ role: 'user', content: 'test' }],
      });
      return true;
    } catch {
      return false;
    }
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    try {
      logger.debug(
        { model: this.options.model, promptLength: request.userPrompt.length },
        'Sending completion request to Anthropic'
      );

      const system =
        request.responseFormat === 'json' ? request.systemPrompt + JSON_INSTRUCTION : request.systemPrompt;

      const message = await this.client.messages.create({
        model: this.options.model,
        max_tokens: request.maxTokens ?? this.options.maxTokens,
        temperature: request.temperature ?? this.options.temperature,
        system,
        messages: [{ role: 'user', content: request.userPrompt }],
      });

      const text = message.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('');
      if (!text) {
        throw new LLMServiceError('Empty response from Anthropic');
      }

      return {
        text,
        model: message.model,
        tokensUsed: message.usage.input_tokens + message.usage.output_tokens,
      };
    } catch (error) {
      logger.error({ error }, 'Anthropic completion failed');
      if (error instanceof LLMServiceError) {
        throw error;
      }
      throw new LLMServiceError('Anthropic API error', error);
    }
  }
}
