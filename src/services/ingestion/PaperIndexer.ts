import { logger } from '../../utils/logger.js';
import { generatePointId } from '../../utils/uuid.js';
import { EmbeddingError, ValidationError } from '../../utils/errors.js';
import type { IndexedChunk, Paper } from '../../domain/entities/index.js';
import type { GraphRepository } from '../graph/GraphRepository.interface.js';
import type { VectorStore } from '../vector/VectorStore.interface.js';
import type { EmbeddingService } from '../vector/EmbeddingService.js';
import type { ChunkingService } from '../vector/ChunkingService.js';
import { extractTitleFromText, extractYear, isUsableTitle, paperIdFromFilename } from './paperMetadata.js';
import { paperInputSchema, type IndexResult, type PaperInput } from './types.js';

/**
 * Write path for already-extracted papers: chunk, embed, replace the paper's
 * vectors, then merge the paper node with its authors and concepts.
 */
export class PaperIndexer {
  constructor(
    private readonly graphRepo: Pick<GraphRepository, 'upsertPaper'>,
    private readonly vectorStore: Pick<VectorStore, 'deleteByPaperId' | 'upsertChunks'>,
    private readonly embeddingService: Pick<EmbeddingService, 'generateEmbeddings'>,
    private readonly chunker: Pick<ChunkingService, 'chunkText'>
  ) {}

  async indexPaper(input: PaperInput): Promise<IndexResult> {
    const startTime = Date.now();
    const parsed = paperInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Invalid paper input', parsed.error.issues);
    }
    const data = parsed.data;

    const paper: Paper = {
      id: data.paperId ?? paperIdFromFilename(data.filename),
      title: isUsableTitle(data.title) ? data.title : extractTitleFromText(data.text),
      filename: data.filename,
      doi: data.doi,
      year: data.year ?? extractYear(data.filename),
      authors: data.authors,
      concepts: data.concepts,
    };

    logger.info({ paperId: paper.id, filename: paper.filename }, 'Indexing paper');

    const textChunks = this.chunker.chunkText(data.text);
    if (textChunks.length === 0) {
      throw new ValidationError('Paper has no indexable text', { filename: data.filename });
    }

    const vectors = await this.embeddingService.generateEmbeddings(textChunks.map(c => c.text));
    if (vectors.length !== textChunks.length) {
      throw new EmbeddingError('Embedding count does not match chunk count', {
        chunks: textChunks.length,
        embeddings: vectors.length,
      });
    }

    const chunks: IndexedChunk[] = textChunks.map((chunk, i) => ({
      id: generatePointId(),
      text: chunk.text,
      paperId: paper.id,
      filename: paper.filename,
      title: paper.title,
      chunkIndex: chunk.index,
      vector: vectors[i] ?? [],
    }));

    await this.vectorStore.deleteByPaperId(paper.id);
    await this.vectorStore.upsertChunks(chunks);
    await this.graphRepo.upsertPaper(paper);

    const result: IndexResult = {
      paperId: paper.id,
      title: paper.title,
      year: paper.year,
      chunks: chunks.length,
      processingTime: `${((Date.now() - startTime) / 1000).toFixed(1)}s`,
    };
    logger.info(result, 'Paper indexed');
    return result;
  }
}
