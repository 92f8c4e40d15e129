import OpenAI from 'openai';
import type { LLMConfig } from '../../config/validation.js';

const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export class OpenAIClientFactory {
  static create(options: LLMConfig): OpenAI {
    const clientConfig: { apiKey: string; baseURL?: string; timeout?: number; maxRetries?: number } = {
      apiKey: options.apiKey,
      timeout: 60_000,
      maxRetries: 2,
    };

    if (options.provider === 'openrouter') {
      clientConfig.baseURL = OPENROUTER_BASE_URL;
    }

    return new OpenAI(clientConfig);
  }
}
