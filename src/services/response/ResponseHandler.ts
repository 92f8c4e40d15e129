import { logger } from '../../utils/logger.js';
import type { ContextPassage } from '../llm/prompts/answer-synthesis.js';
import { truncate } from '../../utils/text.js';
import type { AnswerPayload, ScoredChunk, Source } from '../../domain/entities/index.js';
import { DEFAULT_TITLE_OVERRIDES, resolveTitle, type TitleOverrides } from './titles.js';
import { buildTraceabilityReport, repairReferences } from './references.js';

const PREVIEW_LENGTH = 150;

export const formatCitation = (source: Source): string => `[${source.number}] ${source.title} (${source.filename})`;

/**
 * Turns retrieved evidence and a raw model answer into the caller-facing
 * payload: numbered sources, repaired `[N]` markers, citations and a
 * traceability report.
 */
export class ResponseHandler {
  private readonly overrides: TitleOverrides;

  constructor(extraOverrides: TitleOverrides = {}) {
    this.overrides = { ...DEFAULT_TITLE_OVERRIDES, ...extraOverrides };
  }

  buildSources(evidence: ScoredChunk[]): Source[] {
    const seen = new Set<string>();
    const sources: Source[] = [];

    for (const { chunk } of evidence) {
      if (seen.has(chunk.filename)) continue;
      seen.add(chunk.filename);
      sources.push({
        number: sources.length + 1,
        filename: chunk.filename,
        title: resolveTitle(chunk.filename, chunk.title, this.overrides),
        preview: truncate(chunk.text, PREVIEW_LENGTH),
      });
    }

    return sources;
  }

  /** Evidence as numbered prompt passages, numbered exactly like `buildSources`. */
  contextPassages(evidence: ScoredChunk[]): ContextPassage[] {
    const seen = new Set<string>();
    const passages: ContextPassage[] = [];

    for (const { chunk } of evidence) {
      if (seen.has(chunk.filename)) continue;
      seen.add(chunk.filename);
      passages.push({
        number: passages.length + 1,
        title: resolveTitle(chunk.filename, chunk.title, this.overrides),
        text: chunk.text,
      });
    }

    return passages;
  }

  process(evidence: ScoredChunk[], answerText: string): AnswerPayload {
    const sources = this.buildSources(evidence);
    const answer = repairReferences(answerText, sources.length);
    const traceability = buildTraceabilityReport(answerText, answer, sources.length);

    logger.debug(
      {
        sources: sources.length,
        totalReferences: traceability.total_references,
        validReferences: traceability.valid_references,
      },
      'Processed answer references'
    );

    return {
      answer,
      sources,
      citations: sources.map(formatCitation),
      num_sources: sources.length,
      traceability_report: traceability,
    };
  }
}
