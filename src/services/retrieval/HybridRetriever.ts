import type { RetrievalConfig } from '../../config/validation.js';
import { logger } from '../../utils/logger.js';
import type { ScoredChunk } from '../../domain/entities/index.js';
import { extractEntities } from './EntityExtractor.js';
import type { GraphLookup } from './GraphLookup.js';
import type { VectorSearch } from './VectorSearch.js';
import type { Reranker } from './Reranker.js';
import { diversifyByFilename } from './DiversityFilter.js';

export interface RetrievalResult {
  evidence: ScoredChunk[];
  graph: {
    available: boolean;
    candidatePaperIds: string[];
  };
  stats: {
    vectorCandidates: number;
    diverseCandidates: number;
  };
}

/**
 * Graph lookup (advisory) → vector search → one chunk per file → rerank.
 * Graph candidates are reported but never used to filter or boost.
 */
export class HybridRetriever {
  constructor(
    private readonly graphLookup: Pick<GraphLookup, 'findCandidatePaperIds'>,
    private readonly vectorSearch: Pick<VectorSearch, 'search'>,
    private readonly reranker: Pick<Reranker, 'rerank'>,
    private readonly options: Pick<RetrievalConfig, 'candidateMultiplier' | 'graphLookup'>
  ) {}

  async retrieve(query: string, topK = 8): Promise<RetrievalResult> {
    let graph: RetrievalResult['graph'] = { available: false, candidatePaperIds: [] };
    if (this.options.graphLookup) {
      const lookup = await this.graphLookup.findCandidatePaperIds(extractEntities(query));
      graph = { available: lookup.available, candidatePaperIds: [...lookup.paperIds] };
    }

    const candidates = await this.vectorSearch.search(query, this.options.candidateMultiplier * topK);
    const diverse = diversifyByFilename(candidates, topK);
    const evidence = await this.reranker.rerank(query, diverse, topK);

    logger.info(
      {
        graphAvailable: graph.available,
        graphCandidates: graph.candidatePaperIds.length,
        vectorCandidates: candidates.length,
        diverseCandidates: diverse.length,
        evidence: evidence.length,
      },
      'Hybrid retrieval'
    );

    return {
      evidence,
      graph,
      stats: { vectorCandidates: candidates.length, diverseCandidates: diverse.length },
    };
  }
}
