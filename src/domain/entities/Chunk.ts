export interface Chunk {
  id: string;
  text: string;
  paperId: string;
  filename: string;
  title: string;
  chunkIndex: number;
}

export interface IndexedChunk extends Chunk {
  vector: number[];
}

/** A chunk with the score of the stage that last ranked it (vector similarity or rerank). */
export interface ScoredChunk {
  chunk: Chunk;
  score: number;
}
