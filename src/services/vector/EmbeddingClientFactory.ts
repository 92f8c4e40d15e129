import OpenAI from 'openai';
import type { EmbeddingConfig } from '../../config/validation.js';

export class EmbeddingClientFactory {
  static create(options: EmbeddingConfig): OpenAI {
    if (options.provider === 'azure') {
      if (!options.endpoint || !options.apiVersion) {
        throw new Error('Azure OpenAI configuration required: AZURE_OPENAI_ENDPOINT, AZURE_OPENAI_API_VERSION');
      }
      return new OpenAI({
        apiKey: options.apiKey,
        baseURL: `${options.endpoint}/openai/deployments/${options.model}`,
        defaultQuery: { 'api-version': options.apiVersion },
        defaultHeaders: { 'api-key': options.apiKey },
      });
    }

    return new OpenAI({ apiKey: options.apiKey, timeout: 60_000, maxRetries: 2 });
  }
}
