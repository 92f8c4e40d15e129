export interface RelevanceScorer {
  /** One score per passage, in passage order. Higher is more relevant. */
  score(query: string, passages: string[]): Promise<number[]>;
}
