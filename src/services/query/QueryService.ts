import { logger } from '../../utils/logger.js';
import { generateId } from '../../utils/uuid.js';
import { ValidationError } from '../../utils/errors.js';
import type { AnswerPayload, ScoredChunk } from '../../domain/entities/index.js';
import type { LLMService } from '../llm/LLMService.interface.js';
import {
  ANSWER_SYNTHESIS_SYSTEM_PROMPT,
  ANSWER_SYNTHESIS_USER_PROMPT,
} from '../llm/prompts/answer-synthesis.js';
import type { HybridRetriever, RetrievalResult } from '../retrieval/HybridRetriever.js';
import type { ResponseHandler } from '../response/ResponseHandler.js';
import { classifyQuery, QueryType } from './QueryClassifier.js';
import type { AskRequest, QueryResult, RetrievalSummary } from './types.js';

export const NO_SOURCES_ANSWER =
  'No sources were found in the paper collection for this question. Try rephrasing it or using more specific terms.';

export const DATA_ANALYSIS_ANSWER =
  'This looks like a data analysis question. Data analysis needs a dataset (CSV or Excel) to work on; ask a question about the paper collection instead, or run the analysis with your dataset.';

/** Sources kept when a question mixes document and data intent. */
export const HYBRID_SOURCE_LIMIT = 3;

const firstSources = (evidence: ScoredChunk[], limit: number): ScoredChunk[] => {
  const filenames = new Set<string>();
  return evidence.filter(({ chunk }) => {
    if (filenames.has(chunk.filename)) return true;
    if (filenames.size >= limit) return false;
    filenames.add(chunk.filename);
    return true;
  });
};

const summarize = (retrieval: RetrievalResult): RetrievalSummary => ({
  graphAvailable: retrieval.graph.available,
  graphCandidates: retrieval.graph.candidatePaperIds.length,
  vectorCandidates: retrieval.stats.vectorCandidates,
  evidence: retrieval.evidence.length,
});

export class QueryService {
  constructor(
    private readonly retriever: Pick<HybridRetriever, 'retrieve'>,
    private readonly llm: Pick<LLMService, 'complete'>,
    private readonly responseHandler: ResponseHandler,
    private readonly defaultTopK = 8
  ) {}

  async ask(request: AskRequest): Promise<QueryResult> {
    const startTime = Date.now();
    const queryId = generateId('query');
    const { question, includeCitations = true, topK = this.defaultTopK } = request;
    if (question.trim().length === 0) {
      throw new ValidationError('Question must not be blank');
    }
    const type = classifyQuery(question);

    logger.info({ queryId, type, topK }, 'Processing query');

    const meta = () => ({ queryId, question, processingTimeMs: Date.now() - startTime });
    const withCitations = (payload: AnswerPayload): AnswerPayload =>
      includeCitations ? payload : { ...payload, citations: [] };

    if (type === QueryType.DATA_ANALYSIS) {
      return {
        type,
        ...this.responseHandler.process([], DATA_ANALYSIS_ANSWER),
        ...meta(),
      };
    }

    const retrieval = await this.retriever.retrieve(question, topK);
    const answerText = await this.synthesize(question, retrieval.evidence);

    if (type === QueryType.HYBRID) {
      const restricted = firstSources(retrieval.evidence, HYBRID_SOURCE_LIMIT);
      return {
        type,
        ...withCitations(this.responseHandler.process(restricted, answerText)),
        retrieval: summarize(retrieval),
        ...meta(),
      };
    }

    const payload = withCitations(this.responseHandler.process(retrieval.evidence, answerText));
    logger.info(
      { queryId, sources: payload.num_sources, reliability: payload.traceability_report.reliability_score },
      'Query answered'
    );

    return {
      type,
      ...payload,
      retrieval: summarize(retrieval),
      ...meta(),
    };
  }

  private async synthesize(question: string, evidence: ScoredChunk[]): Promise<string> {
    if (evidence.length === 0) {
      return NO_SOURCES_ANSWER;
    }

    const passages = this.responseHandler.contextPassages(evidence);
    const completion = await this.llm.complete({
      systemPrompt: ANSWER_SYNTHESIS_SYSTEM_PROMPT,
      userPrompt: ANSWER_SYNTHESIS_USER_PROMPT(question, passages),
    });

    logger.debug({ model: completion.model, tokensUsed: completion.tokensUsed }, 'Answer synthesized');
    return completion.text;
  }
}
