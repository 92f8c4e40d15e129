import { describe, it, expect, vi } from 'vitest';
import { PaperIndexer } from '../../src/services/ingestion/PaperIndexer.js';
import type { TextChunk } from '../../src/services/vector/ChunkingService.js';
import type { IndexedChunk } from '../../src/domain/entities/index.js';
import { EmbeddingError, ValidationError } from '../../src/utils/errors.js';
import { InMemoryGraphRepository } from '../helpers/fakes.js';

const TEXT = 'Header\nSediment transport in regulated rivers of central Mexico\nBody text.';

const setup = (chunks: TextChunk[], vectors: number[][] = chunks.map((_, i) => [i, 1])) => {
  const calls: string[] = [];
  const upserted: IndexedChunk[] = [];
  const graph = new InMemoryGraphRepository();
  const vectorStore = {
    deleteByPaperId: vi.fn(async (paperId: string) => {
      calls.push(`delete:${paperId}`);
    }),
    upsertChunks: vi.fn(async (batch: IndexedChunk[]) => {
      calls.push(`upsert:${batch.length}`);
      upserted.push(...batch);
    }),
  };
  const embedding = { generateEmbeddings: vi.fn().mockResolvedValue(vectors) };
  const chunker = { chunkText: vi.fn().mockReturnValue(chunks) };
  const indexer = new PaperIndexer(graph, vectorStore, embedding, chunker);
  return { indexer, graph, vectorStore, embedding, calls, upserted };
};

const twoChunks: TextChunk[] = [
  { text: 'first window', index: 0, tokens: 2 },
  { text: 'second window', index: 1, tokens: 2 },
];

describe('PaperIndexer', () => {
  it('replaces the paper vectors and merges the graph node', async () => {
    const { indexer, graph, calls, upserted, embedding } = setup(twoChunks);

    const result = await indexer.indexPaper({
      filename: 'river-study-2019.pdf',
      text: TEXT,
      title: 'Short',
      authors: ['Maria Lopez'],
      concepts: ['sediment'],
    });

    expect(result).toMatchObject({
      paperId: 'paper_river-study-2019',
      title: 'Sediment transport in regulated rivers of central Mexico',
      year: '2019',
      chunks: 2,
    });
    expect(result.processingTime).toMatch(/^\d+\.\ds$/);
    expect(embedding.generateEmbeddings).toHaveBeenCalledWith(['first window', 'second window']);
    expect(calls).toEqual(['delete:paper_river-study-2019', 'upsert:2']);
    expect(upserted.map(c => [c.paperId, c.filename, c.chunkIndex, c.vector])).toEqual([
      ['paper_river-study-2019', 'river-study-2019.pdf', 0, [0, 1]],
      ['paper_river-study-2019', 'river-study-2019.pdf', 1, [1, 1]],
    ]);
    expect(await graph.getPaperMetadata('paper_river-study-2019')).toEqual({
      id: 'paper_river-study-2019',
      title: 'Sediment transport in regulated rivers of central Mexico',
      filename: 'river-study-2019.pdf',
      doi: undefined,
      year: '2019',
      authors: ['Maria Lopez'],
      concepts: ['sediment'],
    });
  });

  it('keeps a usable title, a supplied id and a supplied year', async () => {
    const { indexer } = setup(twoChunks);

    const result = await indexer.indexPaper({
      paperId: 'custom-id',
      filename: 'river-study-2019.pdf',
      text: TEXT,
      title: 'Ecological Restoration of Streams',
      year: '2014',
    });

    expect(result).toMatchObject({ paperId: 'custom-id', title: 'Ecological Restoration of Streams', year: '2014' });
  });

  it('refuses a paper that yields no chunks without touching the stores', async () => {
    const { indexer, vectorStore, graph } = setup([]);

    await expect(indexer.indexPaper({ filename: 'a.pdf', text: '   ' })).rejects.toBeInstanceOf(ValidationError);
    expect(vectorStore.deleteByPaperId).not.toHaveBeenCalled();
    expect(graph.papers.size).toBe(0);
  });

  it('refuses a vector count that does not match the chunks', async () => {
    const { indexer, vectorStore } = setup(twoChunks, [[1, 1]]);

    await expect(indexer.indexPaper({ filename: 'a.pdf', text: TEXT })).rejects.toBeInstanceOf(EmbeddingError);
    expect(vectorStore.deleteByPaperId).not.toHaveBeenCalled();
  });

  it('validates the input', async () => {
    const { indexer } = setup(twoChunks);

    await expect(indexer.indexPaper({ filename: '', text: TEXT })).rejects.toThrow('Invalid paper input');
  });
});
