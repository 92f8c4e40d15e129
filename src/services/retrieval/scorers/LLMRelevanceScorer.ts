import { z } from 'zod';
import { logger } from '../../../utils/logger.js';
import { RerankerError } from '../../../utils/errors.js';
import type { LLMService } from '../../llm/LLMService.interface.js';
import {
  RELEVANCE_SCORING_SYSTEM_PROMPT,
  RELEVANCE_SCORING_USER_PROMPT,
} from '../../llm/prompts/relevance-scoring.js';
import type { RelevanceScorer } from '../RelevanceScorer.interface.js';

const MAX_PASSAGE_CHARS = 2000;
const MIN_SCORE = 0;
const MAX_SCORE = 10;

const scoringResponseSchema = z.object({
  scores: z.array(
    z.object({
      index: z.number().int(),
      score: z.number(),
    })
  ),
});

const clamp = (value: number): number => Math.max(MIN_SCORE, Math.min(MAX_SCORE, value));

/**
 * Uses the chat model as a cross-encoder: each batch of passages is judged
 * against the query in a single JSON completion.
 */
export class LLMRelevanceScorer implements RelevanceScorer {
  constructor(
    private readonly llm: Pick<LLMService, 'complete'>,
    private readonly batchSize = 10
  ) {}

  async score(query: string, passages: string[]): Promise<number[]> {
    const scores: number[] = [];

    for (let i = 0; i < passages.length; i += this.batchSize) {
      const batch = passages.slice(i, i + this.batchSize);
      scores.push(...(await this.scoreBatch(query, batch)));
    }

    return scores;
  }

  private async scoreBatch(query: string, passages: string[]): Promise<number[]> {
    const truncated = passages.map(text =>
      text.length > MAX_PASSAGE_CHARS ? `${text.substring(0, MAX_PASSAGE_CHARS)}...[truncated]` : text
    );

    const response = await this.llm.complete({
      systemPrompt: RELEVANCE_SCORING_SYSTEM_PROMPT,
      userPrompt: RELEVANCE_SCORING_USER_PROMPT(query, truncated),
      responseFormat: 'json',
      temperature: 0,
    });

    let raw: unknown;
    try {
      raw = JSON.parse(response.text);
    } catch (error) {
      throw new RerankerError('Relevance scorer returned invalid JSON', error);
    }

    const parsed = scoringResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new RerankerError('Relevance scorer returned an unexpected shape', parsed.error.issues);
    }

    const byIndex = new Map<number, number>();
    for (const entry of parsed.data.scores) {
      if (!byIndex.has(entry.index)) {
        byIndex.set(entry.index, clamp(entry.score));
      }
    }

    const missing = passages.length - passages.filter((_, idx) => byIndex.has(idx)).length;
    if (missing > 0) {
      logger.warn({ missing, batch: passages.length }, 'Scorer omitted passages, scoring them 0');
    }

    return passages.map((_, idx) => byIndex.get(idx) ?? MIN_SCORE);
  }
}
