import type { Chunk, GraphStats, Paper, PaperMetadata, ScoredChunk } from '../../src/domain/entities/index.js';
import type { GraphRepository } from '../../src/services/graph/GraphRepository.interface.js';
import type {
  CompletionRequest,
  CompletionResponse,
  LLMService,
} from '../../src/services/llm/LLMService.interface.js';

export const makeChunk = (overrides: Partial<Chunk> = {}): Chunk => ({
  id: 'chunk-1',
  text: 'River restoration improves habitat quality.',
  paperId: 'paper_a',
  filename: 'a.pdf',
  title: 'A Study of River Restoration Methods',
  chunkIndex: 0,
  ...overrides,
});

export const scored = (filename: string, score: number, text = `Passage from ${filename}`): ScoredChunk => ({
  chunk: makeChunk({ id: `${filename}-${score}`, filename, paperId: `paper_${filename}`, text }),
  score,
});

/** Replies with queued texts in order, then repeats the last one. */
export class FakeLLMService implements LLMService {
  readonly requests: CompletionRequest[] = [];
  private replies: string[];

  constructor(...replies: string[]) {
    this.replies = replies;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(request);
    const text = this.replies.length > 1 ? (this.replies.shift() ?? '') : (this.replies[0] ?? '');
    return { text, model: 'fake-model', tokensUsed: 0 };
  }

  async testConnection(): Promise<boolean> {
    return true;
  }
}

/** In-memory graph with the same case-insensitive matching as the Cypher queries. */
export class InMemoryGraphRepository implements GraphRepository {
  readonly papers = new Map<string, Paper>();
  connected = true;

  async connect(): Promise<void> {
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }

  async testConnection(): Promise<boolean> {
    return this.connected;
  }

  async findPaperIdsByAuthor(author: string): Promise<string[]> {
    const needle = author.toLowerCase();
    return [...this.papers.values()]
      .filter(p => p.authors.some(a => a.toLowerCase().includes(needle)))
      .map(p => p.id);
  }

  async findPaperIdsByTopic(keyword: string): Promise<string[]> {
    const needle = keyword.toLowerCase();
    return [...this.papers.values()]
      .filter(
        p => p.concepts.some(c => c.toLowerCase().includes(needle)) || p.title.toLowerCase().includes(needle)
      )
      .map(p => p.id);
  }

  async getPaperMetadata(paperId: string): Promise<PaperMetadata | null> {
    return this.papers.get(paperId) ?? null;
  }

  async upsertPaper(paper: Paper): Promise<void> {
    this.papers.set(paper.id, paper);
  }

  async getGraphStats(): Promise<GraphStats> {
    const papers = [...this.papers.values()];
    return {
      papers: papers.length,
      authors: new Set(papers.flatMap(p => p.authors)).size,
      concepts: new Set(papers.flatMap(p => p.concepts)).size,
    };
  }
}
