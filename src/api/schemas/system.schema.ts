export const healthResponseSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['ok', 'degraded'] },
    timestamp: { type: 'string' },
    environment: { type: 'string' },
    services: {
      type: 'object',
      properties: {
        neo4j: { type: 'boolean' },
        qdrant: { type: 'boolean' },
        llm: { type: 'boolean' },
      },
    },
  },
} as const;

export const statsResponseSchema = {
  type: 'object',
  properties: {
    papers: { type: 'number' },
    authors: { type: 'number' },
    concepts: { type: 'number' },
    chunks: { type: 'number' },
  },
} as const;
