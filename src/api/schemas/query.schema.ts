export const queryRequestSchema = {
  type: 'object',
  required: ['question'],
  additionalProperties: false,
  properties: {
    question: { type: 'string', minLength: 1, maxLength: 2000, pattern: '\\S' },
    include_citations: { type: 'boolean' },
    top_k: { type: 'integer', minimum: 1, maximum: 50 },
  },
} as const;

export interface QueryRequestBody {
  question: string;
  include_citations?: boolean;
  top_k?: number;
}
