import { describe, it, expect } from 'vitest';
import { formatManifestSummary, formatQueryResult } from '../../src/cli/format.js';
import { QueryType } from '../../src/services/query/QueryClassifier.js';
import type { QueryResult } from '../../src/services/query/types.js';

const result: QueryResult = {
  type: QueryType.DOCUMENT_SEARCH,
  queryId: 'query-1',
  question: 'What is NDCI?',
  processingTimeMs: 12,
  answer: 'NDCI measures chlorophyll [1].',
  sources: [
    { number: 1, filename: 'a.pdf', title: 'Chlorophyll Indices', preview: 'p...' },
    { number: 2, filename: 'b.pdf', title: 'Lake Monitoring', preview: 'p...' },
  ],
  citations: ['[1] Chlorophyll Indices (a.pdf)', '[2] Lake Monitoring (b.pdf)'],
  num_sources: 2,
  traceability_report: { total_references: 1, valid_references: [1], reliability_score: 80, has_traceability: true },
  retrieval: { graphAvailable: true, graphCandidates: 0, vectorCandidates: 4, evidence: 2 },
};

describe('formatQueryResult', () => {
  it('prints the answer, numbered sources and reliability', () => {
    expect(formatQueryResult(result).split('\n')).toEqual([
      '',
      'Answer:',
      'NDCI measures chlorophyll [1].',
      '',
      'Sources (2):',
      '[1] Chlorophyll Indices',
      '[2] Lake Monitoring',
      '',
      'Reliability: 80/100',
      '='.repeat(80),
    ]);
  });
});

describe('formatManifestSummary', () => {
  it('lists counts and each failure', () => {
    const text = formatManifestSummary({
      total: 2,
      indexed: [{ paperId: 'paper_a', title: 'A', chunks: 3, processingTime: '0.1s' }],
      failed: [{ filename: 'b.pdf', error: 'Vector upsert failed' }],
    });

    expect(text.split('\n')).toEqual([
      '',
      'Summary:',
      '  Total:   2',
      '  Indexed: 1',
      '  Failed:  1',
      '    b.pdf: Vector upsert failed',
    ]);
  });
});
