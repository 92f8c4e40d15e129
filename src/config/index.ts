import 'dotenv/config';
import { existsSync } from 'fs';
import { ZodError } from 'zod';
import { configSchema, type Config } from './validation.js';

const toInt = (value: string | undefined): number | undefined =>
  value ? parseInt(value, 10) : undefined;

const toFloat = (value: string | undefined): number | undefined =>
  value ? parseFloat(value) : undefined;

const orUndefined = (value: string | undefined): string | undefined =>
  value && value.trim().length > 0 ? value : undefined;

function llmApiKey(provider: string | undefined): string {
  switch (provider) {
    case 'anthropic':
      return process.env.ANTHROPIC_API_KEY || '';
    case 'openrouter':
      return process.env.OPENROUTER_API_KEY || '';
    default:
      return process.env.OPENAI_API_KEY || '';
  }
}

function loadConfig(): Config {
  if (!existsSync('.env') && process.env.NODE_ENV !== 'test') {
    console.error('\n❌ Missing .env file\n');
    console.error('Create .env from template:');
    console.error('  cp .env.example .env\n');
    process.exit(1);
  }

  const rawConfig = {
    server: {
      nodeEnv: orUndefined(process.env.NODE_ENV),
      port: toInt(process.env.PORT),
      host: orUndefined(process.env.HOST),
      logLevel: orUndefined(process.env.LOG_LEVEL),
    },
    neo4j: {
      uri: process.env.NEO4J_URI || '',
      user: process.env.NEO4J_USER || '',
      password: process.env.NEO4J_PASSWORD || '',
      database: orUndefined(process.env.NEO4J_DATABASE),
      queryTimeoutMs: toInt(process.env.NEO4J_QUERY_TIMEOUT_MS),
    },
    qdrant: {
      url: process.env.QDRANT_URL || '',
      apiKey: orUndefined(process.env.QDRANT_API_KEY),
      collection: orUndefined(process.env.QDRANT_COLLECTION),
    },
    llm: {
      provider: orUndefined(process.env.LLM_PROVIDER),
      apiKey: llmApiKey(process.env.LLM_PROVIDER),
      model: process.env.LLM_MODEL || '',
      maxTokens: toInt(process.env.LLM_MAX_TOKENS),
      temperature: toFloat(process.env.LLM_TEMPERATURE),
    },
    embedding: {
      provider: orUndefined(process.env.EMBEDDING_PROVIDER),
      apiKey: process.env.EMBEDDING_API_KEY || process.env.OPENAI_API_KEY || '',
      model: orUndefined(process.env.EMBEDDING_MODEL),
      endpoint: orUndefined(process.env.AZURE_OPENAI_ENDPOINT),
      apiVersion: orUndefined(process.env.AZURE_OPENAI_API_VERSION),
      dimension: toInt(process.env.EMBEDDING_DIMENSION),
    },
    reranker: {
      provider: orUndefined(process.env.RERANKER_PROVIDER),
      batchSize: toInt(process.env.RERANKER_BATCH_SIZE),
    },
    retrieval: {
      topK: toInt(process.env.RETRIEVAL_TOP_K),
      candidateMultiplier: toInt(process.env.RETRIEVAL_CANDIDATE_MULTIPLIER),
      graphLookup: process.env.RETRIEVAL_GRAPH_LOOKUP !== 'false',
    },
    chunking: {
      maxTokens: toInt(process.env.CHUNK_MAX_TOKENS),
      overlapTokens: toInt(process.env.CHUNK_OVERLAP_TOKENS),
    },
  };

  try {
    return configSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('\n❌ Invalid configuration:\n');
      error.issues.forEach(issue => {
        const field = issue.path.join('.');
        console.error(`  ${field}: ${issue.message}`);
      });
      console.error('\nCheck .env file and compare with .env.example\n');
    } else {
      console.error('Config error:', error);
    }
    process.exit(1);
  }
}

export const config = loadConfig();
