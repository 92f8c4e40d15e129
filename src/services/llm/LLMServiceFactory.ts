import type { LLMConfig } from '../../config/validation.js';
import { logger } from '../../utils/logger.js';
import type { LLMService } from './LLMService.interface.js';
import { OpenAILLMService } from './OpenAILLMService.js';
import { AnthropicLLMService } from './AnthropicLLMService.js';
import { OpenAIClientFactory } from './OpenAIClientFactory.js';

export class LLMServiceFactory {
  static createLLMService(options: LLMConfig): LLMService {
    switch (options.provider) {
      case 'openai':
      case 'openrouter':
        logger.info({ provider: options.provider, model: options.model }, 'Initializing OpenAI-compatible LLM service');
        return new OpenAILLMService(OpenAIClientFactory.create(options), options);
      case 'anthropic':
        logger.info({ model: options.model }, 'Initializing Anthropic LLM service');
        return new AnthropicLLMService(options);
    }
  }
}
