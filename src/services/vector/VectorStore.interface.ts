import { z } from 'zod';
import type { IndexedChunk, ScoredChunk } from '../../domain/entities/index.js';

export const chunkPayloadSchema = z.object({
  paperId: z.string().min(1),
  filename: z.string().min(1).default('unknown'),
  title: z.string().default(''),
  text: z.string(),
  chunkIndex: z.number().int().nonnegative().default(0),
});

export type ChunkPayload = z.infer<typeof chunkPayloadSchema>;

export interface VectorStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  testConnection(): Promise<boolean>;

  /** Nearest chunks to `vector`, highest similarity first. */
  search(vector: number[], limit: number): Promise<ScoredChunk[]>;
  upsertChunks(chunks: IndexedChunk[]): Promise<void>;
  deleteByPaperId(paperId: string): Promise<void>;
  countChunks(): Promise<number>;
}
