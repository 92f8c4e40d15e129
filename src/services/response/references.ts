import type { TraceabilityReport } from '../../domain/entities/index.js';

const MARKER = /\[(\d+)\]/g;

const inRange = (n: number, numSources: number): boolean => n >= 1 && n <= numSources;

/** Every `[N]` marker number in order of appearance. */
export const extractReferences = (text: string): number[] =>
  Array.from(text.matchAll(MARKER), match => Number(match[1]));

/**
 * Deletes markers that do not point at a source; in-range markers are left as they are.
 * Deleting `[9]` from `[[9]5]` joins a new `[5]`, so passes repeat until nothing changes.
 */
export const repairReferences = (text: string, numSources: number): string => {
  let repaired = text;
  let previous: string;
  do {
    previous = repaired;
    repaired = previous.replace(MARKER, (marker: string, digits: string) =>
      inRange(Number(digits), numSources) ? marker : ''
    );
  } while (repaired !== previous);
  return repaired;
};

export const reliabilityScore = (distinctValid: number): number =>
  distinctValid > 0 ? Math.min(60 + 20 * distinctValid, 100) : 20;

export const buildTraceabilityReport = (
  rawAnswer: string,
  cleanedAnswer: string,
  numSources: number
): TraceabilityReport => {
  const total = extractReferences(rawAnswer).length;
  const valid = [...new Set(extractReferences(cleanedAnswer).filter(n => inRange(n, numSources)))].sort(
    (a, b) => a - b
  );

  return {
    total_references: total,
    valid_references: valid,
    reliability_score: reliabilityScore(valid.length),
    has_traceability: total > 0,
  };
};
