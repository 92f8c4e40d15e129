import { logger } from '../../utils/logger.js';
import type { PaperIndexer } from './PaperIndexer.js';
import type { IndexResult, PaperInput } from './types.js';

export interface ManifestProgress {
  current: number;
  total: number;
  filename: string;
}

export interface ManifestFailure {
  filename: string;
  error: string;
}

export interface ManifestSummary {
  total: number;
  indexed: IndexResult[];
  failed: ManifestFailure[];
}

/** Indexes papers one at a time; a failing paper is recorded and the batch continues. */
export async function indexManifest(
  indexer: Pick<PaperIndexer, 'indexPaper'>,
  papers: PaperInput[],
  onProgress?: (progress: ManifestProgress) => void
): Promise<ManifestSummary> {
  const summary: ManifestSummary = { total: papers.length, indexed: [], failed: [] };

  for (const [i, paper] of papers.entries()) {
    onProgress?.({ current: i + 1, total: papers.length, filename: paper.filename });
    try {
      summary.indexed.push(await indexer.indexPaper(paper));
    } catch (error) {
      logger.error({ error, filename: paper.filename }, 'Failed to index paper');
      summary.failed.push({
        filename: paper.filename,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return summary;
}
