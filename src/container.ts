import type { Config } from './config/validation.js';
import { logger } from './utils/logger.js';
import { Neo4jRepository } from './services/graph/Neo4jRepository.js';
import { QdrantVectorStore } from './services/vector/QdrantVectorStore.js';
import { EmbeddingClientFactory } from './services/vector/EmbeddingClientFactory.js';
import { EmbeddingService } from './services/vector/EmbeddingService.js';
import { ChunkingService } from './services/vector/ChunkingService.js';
import { LLMServiceFactory } from './services/llm/LLMServiceFactory.js';
import type { LLMService } from './services/llm/LLMService.interface.js';
import type { RelevanceScorer } from './services/retrieval/RelevanceScorer.interface.js';
import { LLMRelevanceScorer } from './services/retrieval/scorers/LLMRelevanceScorer.js';
import { LexicalRelevanceScorer } from './services/retrieval/scorers/LexicalRelevanceScorer.js';
import { GraphLookup } from './services/retrieval/GraphLookup.js';
import { VectorSearch } from './services/retrieval/VectorSearch.js';
import { Reranker } from './services/retrieval/Reranker.js';
import { HybridRetriever } from './services/retrieval/HybridRetriever.js';
import { ResponseHandler } from './services/response/ResponseHandler.js';
import { QueryService } from './services/query/QueryService.js';
import { PaperIndexer } from './services/ingestion/PaperIndexer.js';

export interface Container {
  config: Config;
  graphRepo: Neo4jRepository;
  vectorStore: QdrantVectorStore;
  llmService: LLMService;
  queryService: QueryService;
  paperIndexer: PaperIndexer;
  close(): Promise<void>;
}

function createScorer(config: Config, llmService: LLMService): RelevanceScorer {
  switch (config.reranker.provider) {
    case 'llm':
      return new LLMRelevanceScorer(llmService, config.reranker.batchSize);
    case 'lexical':
      return new LexicalRelevanceScorer();
  }
}

/** Builds every long-lived handle once and wires it into the services that need it. */
export async function createContainer(config: Config): Promise<Container> {
  logger.info('Initializing services...');

  // Graph lookup is advisory, so the pipeline starts on vector search alone when Neo4j is down.
  const graphRepo = new Neo4jRepository(config.neo4j);
  try {
    await graphRepo.connect();
  } catch (error) {
    logger.warn({ error }, 'Neo4j unavailable, continuing without graph lookup');
  }

  const vectorStore = new QdrantVectorStore(config.qdrant, config.embedding.dimension);
  try {
    await vectorStore.connect();
  } catch (error) {
    await graphRepo.disconnect();
    throw error;
  }

  const llmService = LLMServiceFactory.createLLMService(config.llm);
  const embeddingService = new EmbeddingService(
    EmbeddingClientFactory.create(config.embedding),
    config.embedding.model
  );
  const chunker = new ChunkingService(config.chunking.maxTokens, config.chunking.overlapTokens);

  const retriever = new HybridRetriever(
    new GraphLookup(graphRepo),
    new VectorSearch(embeddingService, vectorStore),
    new Reranker(createScorer(config, llmService)),
    config.retrieval
  );

  const queryService = new QueryService(retriever, llmService, new ResponseHandler(), config.retrieval.topK);
  const paperIndexer = new PaperIndexer(graphRepo, vectorStore, embeddingService, chunker);

  logger.info({ reranker: config.reranker.provider, llm: config.llm.provider }, 'Services initialized');

  return {
    config,
    graphRepo,
    vectorStore,
    llmService,
    queryService,
    paperIndexer,
    async close() {
      await graphRepo.disconnect();
      await vectorStore.disconnect();
      chunker.dispose();
    },
  };
}
