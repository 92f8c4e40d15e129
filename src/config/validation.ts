import { z } from 'zod';

export const configSchema = z.object({
  server: z.object({
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    port: z.number().int().positive().default(3000),
    host: z.string().min(1).default('0.0.0.0'),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }),
  neo4j: z.object({
    uri: z.string().min(1),
    user: z.string().min(1),
    password: z.string().min(1),
    database: z.string().min(1).optional(),
    queryTimeoutMs: z.number().int().positive().default(30_000),
  }),
  qdrant: z.object({
    url: z.string().url(),
    apiKey: z.string().min(1).optional(),
    collection: z.string().min(1).default('scientific_papers'),
  }),
  llm: z.object({
    provider: z.enum(['openai', 'anthropic', 'openrouter']),
    apiKey: z.string().min(1),
    model: z.string().min(1),
    maxTokens: z.number().int().positive().default(2000),
    temperature: z.number().min(0).max(2).default(0.1),
  }),
  embedding: z
    .object({
      provider: z.enum(['openai', 'azure']).default('openai'),
      apiKey: z.string().min(1),
      model: z.string().min(1).default('text-embedding-3-small'),
      endpoint: z.string().url().optional(),
      apiVersion: z.string().min(1).optional(),
      dimension: z.number().int().positive().default(1536),
    })
    .superRefine((value, ctx) => {
      if (value.provider !== 'azure') return;
      if (!value.endpoint) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['endpoint'], message: 'Required for azure embeddings' });
      }
      if (!value.apiVersion) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['apiVersion'], message: 'Required for azure embeddings' });
      }
    }),
  reranker: z.object({
    provider: z.enum(['llm', 'lexical']).default('llm'),
    batchSize: z.number().int().positive().max(50).default(10),
  }),
  retrieval: z.object({
    topK: z.number().int().positive().max(50).default(8),
    candidateMultiplier: z.number().int().min(2).max(10).default(2),
    graphLookup: z.boolean().default(true),
  }),
  chunking: z.object({
    maxTokens: z.number().int().positive().default(512),
    overlapTokens: z.number().int().nonnegative().default(50),
  }),
});

export type Config = z.infer<typeof configSchema>;
export type Neo4jConfig = Config['neo4j'];
export type QdrantConfig = Config['qdrant'];
export type LLMConfig = Config['llm'];
export type EmbeddingConfig = Config['embedding'];
export type RerankerConfig = Config['reranker'];
export type RetrievalConfig = Config['retrieval'];
export type ChunkingConfig = Config['chunking'];
