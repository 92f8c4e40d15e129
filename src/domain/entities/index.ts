export type { Chunk, IndexedChunk, ScoredChunk } from './Chunk.js';
export type { Paper, PaperMetadata, GraphStats } from './Paper.js';
export type { Source, TraceabilityReport, AnswerPayload } from './Answer.js';
export type { EntitySet } from './EntitySet.js';
