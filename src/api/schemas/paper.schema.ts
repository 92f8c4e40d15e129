export const paperParamsSchema = {
  type: 'object',
  required: ['id'],
  properties: {
    id: { type: 'string', minLength: 1 },
  },
} as const;

export const indexPaperRequestSchema = {
  type: 'object',
  required: ['filename', 'text'],
  properties: {
    filename: { type: 'string', minLength: 1 },
    text: { type: 'string', minLength: 1 },
    paperId: { type: 'string', minLength: 1 },
    title: { type: 'string' },
    year: { type: 'string' },
    doi: { type: 'string' },
    authors: { type: 'array', items: { type: 'string', minLength: 1 } },
    concepts: { type: 'array', items: { type: 'string', minLength: 1 } },
  },
} as const;

export const indexPaperResponseSchema = {
  type: 'object',
  properties: {
    paperId: { type: 'string' },
    title: { type: 'string' },
    year: { type: 'string' },
    chunks: { type: 'number' },
    processingTime: { type: 'string' },
  },
} as const;
