import type OpenAI from 'openai';
import type { LLMConfig } from '../../config/validation.js';
import { logger } from '../../utils/logger.js';
import { LLMServiceError } from '../../utils/errors.js';
import type { CompletionRequest, CompletionResponse, LLMService } from './LLMService.interface.js';

/** Chat completions against OpenAI or any OpenAI-compatible endpoint (OpenRouter). */
export class OpenAILLMService implements LLMService {
  constructor(
    private readonly client: OpenAI,
    private readonly options: LLMConfig
  ) {}

  async testConnection(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch {
      return false;
    }
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    try {
      logger.debug(
        {
          provider: this.options.provider,
          model: this.options.model,
          promptLength: request.userPrompt.length,
          responseFormat: request.responseFormat ?? 'text',
        },
        'Sending completion request'
      );

      const completion = await this.client.chat.completions.create({
        model: this.options.model,
        messages: [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.userPrompt },
        ],
        temperature: request.temperature ?? this.options.temperature,
        max_tokens: request.maxTokens ?? this.options.maxTokens,
        response_format: request.responseFormat === 'json' ? { type: 'json_object' } : undefined,
      });

      const content = completion.choices[0]?.message?.content;
      if (!content) {
        throw new LLMServiceError(`Empty response from ${this.options.provider}`);
      }

      return {
        text: content,
        model: completion.model,
        tokensUsed: completion.usage?.total_tokens,
      };
    } catch (error) {
      logger.error({ error, provider: this.options.provider }, 'Completion failed');
      if (error instanceof LLMServiceError) {
        throw error;
      }
      throw new LLMServiceError(`${this.options.provider} API error`, error);
    }
  }
}
