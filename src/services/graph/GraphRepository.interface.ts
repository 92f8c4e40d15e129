import type { Paper, PaperMetadata, GraphStats } from '../../domain/entities/index.js';

export interface GraphRepository {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  testConnection(): Promise<boolean>;

  /** Papers WRITTEN_BY an author whose name contains `author`, case-insensitive. */
  findPaperIdsByAuthor(author: string): Promise<string[]>;
  /** Papers ABOUT a concept containing `keyword`, or whose title contains it, case-insensitive. */
  findPaperIdsByTopic(keyword: string): Promise<string[]>;

  getPaperMetadata(paperId: string): Promise<PaperMetadata | null>;
  upsertPaper(paper: Paper): Promise<void>;
  getGraphStats(): Promise<GraphStats>;
}
