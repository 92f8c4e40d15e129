import type { ScoredChunk } from '../../domain/entities/index.js';

/** Keeps the first candidate per filename, in input order, up to `k`. */
export const diversifyByFilename = (candidates: ScoredChunk[], k: number): ScoredChunk[] => {
  const seen = new Set<string>();
  const diverse: ScoredChunk[] = [];

  for (const candidate of candidates) {
    if (diverse.length >= k) break;
    if (seen.has(candidate.chunk.filename)) continue;
    seen.add(candidate.chunk.filename);
    diverse.push(candidate);
  }

  return diverse;
};
