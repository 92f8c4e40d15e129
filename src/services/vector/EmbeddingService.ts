import type OpenAI from 'openai';
import { logger } from '../../utils/logger.js';
import { EmbeddingError } from '../../utils/errors.js';

const MAX_BATCH_SIZE = 2048;

export class EmbeddingService {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string
  ) {}

  async generateEmbeddings(texts: string[]): Promise<number[][]> {
    if (texts.some(t => t.trim().length === 0)) {
      throw new EmbeddingError('Cannot embed empty text');
    }
    if (texts.length === 0) {
      return [];
    }

    try {
      const embeddings: number[][] = [];

      for (let i = 0; i < texts.length; i += MAX_BATCH_SIZE) {
        const batch = texts.slice(i, i + MAX_BATCH_SIZE);
        const response = await this.client.embeddings.create({
          model: this.model,
          input: batch,
        });
        embeddings.push(...response.data.map(item => item.embedding));

        if (texts.length > MAX_BATCH_SIZE) {
          logger.debug(
            { batch: Math.floor(i / MAX_BATCH_SIZE) + 1, processed: embeddings.length, total: texts.length },
            'Batch embeddings progress'
          );
        }
      }

      logger.debug({ count: embeddings.length, dimension: embeddings[0]?.length }, 'Generated embeddings');
      return embeddings;
    } catch (error) {
      logger.error({ error, count: texts.length }, 'Failed to generate embeddings');
      throw new EmbeddingError('Embedding generation failed', error);
    }
  }

  async generateEmbedding(text: string): Promise<number[]> {
    const [embedding] = await this.generateEmbeddings([text]);
    if (!embedding) {
      throw new EmbeddingError('Embedding provider returned no vector');
    }
    return embedding;
  }
}
