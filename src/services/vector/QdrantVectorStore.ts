import { QdrantClient } from '@qdrant/js-client-rest';
import type { QdrantConfig } from '../../config/validation.js';
import { logger } from '../../utils/logger.js';
import { VectorStoreError } from '../../utils/errors.js';
import type { IndexedChunk, ScoredChunk } from '../../domain/entities/index.js';
import { chunkPayloadSchema, type ChunkPayload, type VectorStore } from './VectorStore.interface.js';

const UPSERT_BATCH_SIZE = 100;

export class QdrantVectorStore implements VectorStore {
  private client: QdrantClient | null = null;
  private collectionName: string;

  constructor(
    private readonly options: QdrantConfig,
    private readonly dimension: number
  ) {
    this.collectionName = options.collection;
  }

  async connect(): Promise<void> {
    try {
      this.client = new QdrantClient({ url: this.options.url, apiKey: this.options.apiKey });

      const collections = await this.client.getCollections();
      const exists = collections.collections.some(c => c.name === this.collectionName);

      if (!exists) {
        await this.client.createCollection(this.collectionName, {
          vectors: {
            size: this.dimension,
            distance: 'Cosine',
          },
        });
        await this.client.createPayloadIndex(this.collectionName, {
          field_name: 'paperId',
          field_schema: 'keyword',
          wait: true,
        });
        logger.info({ collection: this.collectionName }, 'Created Qdrant collection');
      }

      logger.info({ collection: this.collectionName }, 'Connected to Qdrant');
    } catch (error) {
      logger.error({ error }, 'Failed to connect to Qdrant');
      throw new VectorStoreError('Qdrant connection failed', error);
    }
  }

  async disconnect(): Promise<void> {
    this.client = null;
    logger.info('Disconnected from Qdrant');
  }

  async testConnection(): Promise<boolean> {
    if (!this.client) return false;
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }

  private getClient(): QdrantClient {
    if (!this.client) {
      throw new VectorStoreError('Qdrant client not initialized');
    }
    return this.client;
  }

  async search(vector: number[], limit: number): Promise<ScoredChunk[]> {
    const client = this.getClient();
    try {
      const response = await client.search(this.collectionName, {
        vector,
        limit,
        with_payload: true,
      });

      const results: ScoredChunk[] = [];
      for (const point of response) {
        const parsed = chunkPayloadSchema.safeParse(point.payload ?? {});
        if (!parsed.success) {
          logger.warn({ id: point.id, issues: parsed.error.issues.length }, 'Skipping point with malformed payload');
          continue;
        }
        results.push({
          chunk: { id: String(point.id), ...parsed.data },
          score: point.score,
        });
      }

      logger.debug({ limit, returned: results.length }, 'Vector search');
      return results;
    } catch (error) {
      logger.error({ error, limit }, 'Vector search failed');
      throw new VectorStoreError('Vector search failed', error);
    }
  }

  async upsertChunks(chunks: IndexedChunk[]): Promise<void> {
    const client = this.getClient();
    try {
      for (let i = 0; i < chunks.length; i += UPSERT_BATCH_SIZE) {
        const batch = chunks.slice(i, i + UPSERT_BATCH_SIZE);
        const points = batch.map(chunk => {
          const payload: ChunkPayload = {
            paperId: chunk.paperId,
            filename: chunk.filename,
            title: chunk.title,
            text: chunk.text,
            chunkIndex: chunk.chunkIndex,
          };
          return { id: chunk.id, vector: chunk.vector, payload };
        });

        await client.upsert(this.collectionName, { wait: true, points });
      }

      logger.debug({ count: chunks.length }, 'Upserted chunks to Qdrant');
    } catch (error) {
      logger.error({ error, count: chunks.length }, 'Failed to upsert chunks');
      throw new VectorStoreError('Vector upsert failed', error);
    }
  }

  async deleteByPaperId(paperId: string): Promise<void> {
    const client = this.getClient();
    try {
      await client.delete(this.collectionName, {
        wait: true,
        filter: {
          must: [{ key: 'paperId', match: { value: paperId } }],
        },
      });

      logger.debug({ paperId }, 'Deleted chunks by paperId');
    } catch (error) {
      logger.error({ error, paperId }, 'Failed to delete chunks');
      throw new VectorStoreError('Vector deletion failed', error);
    }
  }

  async countChunks(): Promise<number> {
    const client = this.getClient();
    try {
      const response = await client.count(this.collectionName, { exact: true });
      return response.count;
    } catch (error) {
      logger.error({ error }, 'Failed to count chunks');
      throw new VectorStoreError('Vector count failed', error);
    }
  }
}
