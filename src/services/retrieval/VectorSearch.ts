import { logger } from '../../utils/logger.js';
import type { ScoredChunk } from '../../domain/entities/index.js';
import type { EmbeddingService } from '../vector/EmbeddingService.js';
import type { VectorStore } from '../vector/VectorStore.interface.js';

export class VectorSearch {
  constructor(
    private readonly embeddingService: Pick<EmbeddingService, 'generateEmbedding'>,
    private readonly vectorStore: Pick<VectorStore, 'search'>
  ) {}

  async search(query: string, limit: number): Promise<ScoredChunk[]> {
    const embedding = await this.embeddingService.generateEmbedding(query);
    const results = await this.vectorStore.search(embedding, limit);
    logger.debug({ limit, returned: results.length }, 'Vector candidates');
    return results.slice(0, limit);
  }
}
