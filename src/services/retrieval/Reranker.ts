import { logger } from '../../utils/logger.js';
import { RerankerError } from '../../utils/errors.js';
import type { ScoredChunk } from '../../domain/entities/index.js';
import type { RelevanceScorer } from './RelevanceScorer.interface.js';

const sortKey = (score: number): number => (Number.isNaN(score) ? Number.NEGATIVE_INFINITY : score);

const byScoreDescending = (a: ScoredChunk, b: ScoredChunk): number => {
  const left = sortKey(a.score);
  const right = sortKey(b.score);
  if (left === right) return 0;
  return left > right ? -1 : 1;
};

export class Reranker {
  constructor(private readonly scorer: RelevanceScorer) {}

  async rerank(query: string, candidates: ScoredChunk[], k: number): Promise<ScoredChunk[]> {
    if (candidates.length === 0) {
      return [];
    }

    let scores: number[];
    try {
      scores = await this.scorer.score(
        query,
        candidates.map(c => c.chunk.text)
      );
    } catch (error) {
      if (error instanceof RerankerError) throw error;
      throw new RerankerError('Relevance scoring failed', error);
    }

    if (scores.length !== candidates.length) {
      throw new RerankerError('Scorer returned a score count that does not match the candidates', {
        expected: candidates.length,
        received: scores.length,
      });
    }

    // Array.prototype.sort is stable, so ties keep their diversity order.
    const rescored = candidates
      .map((candidate, i) => ({ chunk: candidate.chunk, score: scores[i] ?? Number.NaN }))
      .sort(byScoreDescending);

    const top = rescored.slice(0, k);
    logger.debug({ candidates: candidates.length, returned: top.length }, 'Reranked candidates');
    return top;
  }
}
