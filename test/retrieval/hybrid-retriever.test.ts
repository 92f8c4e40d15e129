import { describe, it, expect, vi } from 'vitest';
import { HybridRetriever } from '../../src/services/retrieval/HybridRetriever.js';
import { Reranker } from '../../src/services/retrieval/Reranker.js';
import { VectorSearch } from '../../src/services/retrieval/VectorSearch.js';
import { VectorStoreError } from '../../src/utils/errors.js';
import type { ScoredChunk } from '../../src/domain/entities/index.js';
import { scored } from '../helpers/fakes.js';

const setup = (candidates: ScoredChunk[], scores: number[] = [], graphLookup = true) => {
  const lookup = {
    findCandidatePaperIds: vi.fn().mockResolvedValue({ available: true, paperIds: new Set(['paper_x']) }),
  };
  const vectorSearch = { search: vi.fn().mockResolvedValue(candidates) };
  const scorer = { score: vi.fn().mockResolvedValue(scores) };
  const retriever = new HybridRetriever(lookup, vectorSearch, new Reranker(scorer), {
    candidateMultiplier: 2,
    graphLookup,
  });
  return { retriever, lookup, vectorSearch, scorer };
};

describe('HybridRetriever', () => {
  it('runs vector search, diversity filter and rerank in sequence', async () => {
    const { retriever, vectorSearch } = setup(
      [scored('a.pdf', 0.9), scored('a.pdf', 0.8), scored('b.pdf', 0.7), scored('c.pdf', 0.6)],
      [1, 5]
    );

    const result = await retriever.retrieve('river restoration', 2);

    expect(vectorSearch.search).toHaveBeenCalledWith('river restoration', 4);
    expect(result.evidence.map(e => [e.chunk.filename, e.score])).toEqual([
      ['b.pdf', 5],
      ['a.pdf', 1],
    ]);
    expect(result.stats).toEqual({ vectorCandidates: 4, diverseCandidates: 2 });
  });

  it('reports graph candidates without filtering the evidence', async () => {
    const { retriever } = setup([scored('a.pdf', 0.9)], [3]);

    const result = await retriever.retrieve('What did Maria Lopez find?', 8);

    expect(result.graph).toEqual({ available: true, candidatePaperIds: ['paper_x'] });
    expect(result.evidence.map(e => e.chunk.paperId)).toEqual(['paper_a.pdf']);
  });

  it('skips the graph when lookup is disabled', async () => {
    const { retriever, lookup } = setup([], [], false);

    const result = await retriever.retrieve('query', 8);

    expect(lookup.findCandidatePaperIds).not.toHaveBeenCalled();
    expect(result.graph).toEqual({ available: false, candidatePaperIds: [] });
  });

  it('returns empty evidence for an empty vector result without scoring', async () => {
    const { retriever, scorer } = setup([]);

    const result = await retriever.retrieve('query', 8);

    expect(result.evidence).toEqual([]);
    expect(scorer.score).not.toHaveBeenCalled();
  });

  it('propagates vector store failures', async () => {
    const embedding = { generateEmbedding: vi.fn().mockResolvedValue([0.1, 0.2]) };
    const store = { search: vi.fn().mockRejectedValue(new VectorStoreError('Vector search failed')) };
    const retriever = new HybridRetriever(
      { findCandidatePaperIds: vi.fn().mockResolvedValue({ available: false, paperIds: new Set() }) },
      new VectorSearch(embedding, store),
      new Reranker({ score: vi.fn() }),
      { candidateMultiplier: 2, graphLookup: true }
    );

    await expect(retriever.retrieve('query', 8)).rejects.toBeInstanceOf(VectorStoreError);
  });
});
