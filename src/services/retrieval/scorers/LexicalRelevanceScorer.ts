import type { RelevanceScorer } from '../RelevanceScorer.interface.js';

const K1 = 1.2;
const B = 0.75;

export const tokenize = (text: string): string[] => text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];

/** Okapi BM25 with the candidate batch as the corpus. */
export class LexicalRelevanceScorer implements RelevanceScorer {
  async score(query: string, passages: string[]): Promise<number[]> {
    const queryTerms = [...new Set(tokenize(query))];
    const documents = passages.map(tokenize);
    const totalDocs = documents.length;
    if (totalDocs === 0) return [];

    const avgLength = documents.reduce((sum, doc) => sum + doc.length, 0) / totalDocs;

    const documentFrequency = new Map<string, number>();
    for (const term of queryTerms) {
      documentFrequency.set(term, documents.filter(doc => doc.includes(term)).length);
    }

    return documents.map(doc => {
      const termFrequency = new Map<string, number>();
      for (const token of doc) {
        termFrequency.set(token, (termFrequency.get(token) ?? 0) + 1);
      }
      const lengthRatio = avgLength > 0 ? doc.length / avgLength : 1;

      let score = 0;
      for (const term of queryTerms) {
        const tf = termFrequency.get(term) ?? 0;
        if (tf === 0) continue;
        const df = documentFrequency.get(term) ?? 0;
        const idf = Math.log(1 + (totalDocs - df + 0.5) / (df + 0.5));
        score += (idf * tf * (K1 + 1)) / (tf + K1 * (1 - B + B * lengthRatio));
      }
      return score;
    });
  }
}
