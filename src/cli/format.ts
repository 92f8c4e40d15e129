import type { QueryResult } from '../services/query/types.js';
import type { ManifestSummary } from '../services/ingestion/ManifestIndexer.js';

const SEPARATOR = '='.repeat(80);

export const formatQueryResult = (result: QueryResult): string => {
  const lines = ['', 'Answer:', result.answer, '', `Sources (${result.num_sources}):`];
  for (const source of result.sources) {
    lines.push(`[${source.number}] ${source.title}`);
  }
  if (result.num_sources > 0) {
    lines.push('', `Reliability: ${result.traceability_report.reliability_score}/100`);
  }
  lines.push(SEPARATOR);
  return lines.join('\n');
};

export const formatManifestSummary = (summary: ManifestSummary): string => {
  const lines = [
    '',
    'Summary:',
    `  Total:   ${summary.total}`,
    `  Indexed: ${summary.indexed.length}`,
    `  Failed:  ${summary.failed.length}`,
  ];
  for (const failure of summary.failed) {
    lines.push(`    ${failure.filename}: ${failure.error}`);
  }
  return lines.join('\n');
};
