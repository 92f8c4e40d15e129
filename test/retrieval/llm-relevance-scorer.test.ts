import { describe, it, expect } from 'vitest';
import { LLMRelevanceScorer } from '../../src/services/retrieval/scorers/LLMRelevanceScorer.js';
import { RerankerError } from '../../src/utils/errors.js';
import { FakeLLMService } from '../helpers/fakes.js';

describe('LLMRelevanceScorer', () => {
  it('clamps scores to 0-10, keeps the first score per index and scores omitted passages 0', async () => {
    const llm = new FakeLLMService(
      JSON.stringify({
        scores: [
          { index: 1, score: 12 },
          { index: 0, score: 7 },
          { index: 0, score: 3 },
        ],
      })
    );

    const scores = await new LLMRelevanceScorer(llm).score('nitrate', ['p0', 'p1', 'p2']);

    expect(scores).toEqual([7, 10, 0]);
  });

  it('scores passages in batches and requests JSON output', async () => {
    const llm = new FakeLLMService(
      JSON.stringify({ scores: [{ index: 0, score: 4 }, { index: 1, score: -1 }] }),
      JSON.stringify({ scores: [{ index: 0, score: 8 }] })
    );

    const scores = await new LLMRelevanceScorer(llm, 2).score('nitrate', ['p0', 'p1', 'p2']);

    expect(scores).toEqual([4, 0, 8]);
    expect(llm.requests).toHaveLength(2);
    expect(llm.requests[0]?.responseFormat).toBe('json');
    expect(llm.requests[1]?.userPrompt).toContain('<passage index="0">\np2\n</passage>');
  });

  it('rejects a reply that is not JSON', async () => {
    const scorer = new LLMRelevanceScorer(new FakeLLMService('passage 0 is great'));

    await expect(scorer.score('q', ['p0'])).rejects.toBeInstanceOf(RerankerError);
  });

  it('rejects JSON of the wrong shape', async () => {
    const scorer = new LLMRelevanceScorer(new FakeLLMService(JSON.stringify({ scores: [{ index: 0 }] })));

    await expect(scorer.score('q', ['p0'])).rejects.toThrow('Relevance scorer returned an unexpected shape');
  });
});
