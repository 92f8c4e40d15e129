export interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  /** `json` asks the provider for a single JSON object. */
  responseFormat?: 'text' | 'json';
  maxTokens?: number;
  temperature?: number;
}

export interface CompletionResponse {
  text: string;
  model: string;
  tokensUsed?: number;
}

export interface LLMService {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
  testConnection(): Promise<boolean>;
}
