import type { AnswerPayload } from '../../domain/entities/index.js';
import type { QueryType } from './QueryClassifier.js';

export interface AskRequest {
  question: string;
  includeCitations?: boolean;
  topK?: number;
}

export interface RetrievalSummary {
  graphAvailable: boolean;
  graphCandidates: number;
  vectorCandidates: number;
  evidence: number;
}

interface ResultMeta {
  queryId: string;
  question: string;
  processingTimeMs: number;
}

export interface DocumentSearchResult extends AnswerPayload, ResultMeta {
  type: QueryType.DOCUMENT_SEARCH;
  retrieval: RetrievalSummary;
}

export interface HybridResult extends AnswerPayload, ResultMeta {
  type: QueryType.HYBRID;
  retrieval: RetrievalSummary;
}

export interface DataAnalysisResult extends AnswerPayload, ResultMeta {
  type: QueryType.DATA_ANALYSIS;
}

export type QueryResult = DocumentSearchResult | HybridResult | DataAnalysisResult;
