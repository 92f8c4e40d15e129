export interface Source {
  number: number;
  filename: string;
  title: string;
  preview: string;
}

export interface TraceabilityReport {
  total_references: number;
  valid_references: number[];
  reliability_score: number;
  has_traceability: boolean;
}

/** Caller-facing answer shape; field names are part of the HTTP contract. */
export interface AnswerPayload {
  answer: string;
  sources: Source[];
  citations: string[];
  num_sources: number;
  traceability_report: TraceabilityReport;
}
