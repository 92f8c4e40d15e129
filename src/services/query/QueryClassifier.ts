export enum QueryType {
  DOCUMENT_SEARCH = 'document_search',
  DATA_ANALYSIS = 'data_analysis',
  HYBRID = 'hybrid',
}

const DATA_KEYWORDS = [
  'analyze',
  'chart',
  'graph',
  'plot',
  'correlation',
  'statistics',
  'dataset',
  'csv',
  'excel',
  'data',
  'trend',
  'distribution',
  'mean',
  'median',
  'variance',
  'outlier',
  'regression',
];

const DOCUMENT_KEYWORDS = [
  'research',
  'paper',
  'study',
  'restoration',
  'river',
  'water',
  'treatment',
  'technique',
  'method',
  'approach',
  'literature',
];

const countMatches = (text: string, keywords: string[]): number =>
  keywords.filter(keyword => text.includes(keyword)).length;

/** Keyword-count heuristic. Keywords match as substrings of the lowercased question. */
export const classifyQuery = (query: string, hasDataset = false): QueryType => {
  if (hasDataset) {
    return QueryType.DATA_ANALYSIS;
  }

  const lower = query.toLowerCase();
  const dataMatches = countMatches(lower, DATA_KEYWORDS);
  const docMatches = countMatches(lower, DOCUMENT_KEYWORDS);

  if (dataMatches > docMatches && dataMatches >= 2) {
    return QueryType.DATA_ANALYSIS;
  }
  if (docMatches > dataMatches) {
    return QueryType.DOCUMENT_SEARCH;
  }
  if (dataMatches > 0 && docMatches > 0) {
    return QueryType.HYBRID;
  }
  return QueryType.DOCUMENT_SEARCH;
};
