import { describe, it, expect } from 'vitest';
import { ResponseHandler } from '../../src/services/response/ResponseHandler.js';
import type { ScoredChunk } from '../../src/domain/entities/index.js';
import { makeChunk } from '../helpers/fakes.js';

const evidenceFrom = (...specs: Array<{ filename: string; title?: string; text?: string }>): ScoredChunk[] =>
  specs.map((spec, i) => ({
    chunk: makeChunk({
      id: `c${i}`,
      filename: spec.filename,
      title: spec.title ?? `Title of ${spec.filename}`,
      text: spec.text ?? `Text of ${spec.filename}`,
    }),
    score: 1 - i / 10,
  }));

describe('ResponseHandler', () => {
  const handler = new ResponseHandler();

  it('drops out-of-range markers and reports traceability', () => {
    const evidence = evidenceFrom({ filename: 'a.pdf' }, { filename: 'b.pdf' }, { filename: 'c.pdf' });

    const payload = handler.process(evidence, 'NDCI measures chlorophyll [1]. It was defined by Mishra [7].');

    expect(payload.answer).toBe('NDCI measures chlorophyll [1]. It was defined by Mishra .');
    expect(payload.num_sources).toBe(3);
    expect(payload.traceability_report).toEqual({
      total_references: 2,
      valid_references: [1],
      reliability_score: 80,
      has_traceability: true,
    });
  });

  it('leaves no out-of-range marker behind when a deletion joins a new one', () => {
    const payload = handler.process(evidenceFrom({ filename: 'a.pdf' }), 'Claim [[9]5].');

    expect(payload.answer).toBe('Claim .');
    expect(payload.traceability_report).toEqual({
      total_references: 1,
      valid_references: [],
      reliability_score: 20,
      has_traceability: true,
    });
  });

  it('returns an empty payload for empty evidence', () => {
    const payload = handler.process([], 'No sources were found.');

    expect(payload.num_sources).toBe(0);
    expect(payload.sources).toEqual([]);
    expect(payload.citations).toEqual([]);
    expect(payload.traceability_report.reliability_score).toBe(20);
    expect(payload.traceability_report.has_traceability).toBe(false);
  });

  it('resolves a known bad filename through the override table', () => {
    const [source] = handler.process(evidenceFrom({ filename: 'v17s1a3.pdf', title: '' }), 'x').sources;

    expect(source?.title).toBe(
      'Análisis multimétrico para evaluar contaminación en el río Lerma y lago de Chapala, México'
    );
  });

  it('numbers sources contiguously, one per filename, from the first chunk of each file', () => {
    const evidence = evidenceFrom(
      { filename: 'a.pdf', text: 'first a' },
      { filename: 'b.pdf' },
      { filename: 'a.pdf', text: 'second a' },
      { filename: 'c.pdf' }
    );

    const { sources, citations } = handler.process(evidence, 'answer');

    expect(sources.map(s => [s.number, s.filename])).toEqual([
      [1, 'a.pdf'],
      [2, 'b.pdf'],
      [3, 'c.pdf'],
    ]);
    expect(sources[0]?.preview).toBe('first a...');
    expect(citations).toEqual([
      '[1] Title of a.pdf (a.pdf)',
      '[2] Title of b.pdf (b.pdf)',
      '[3] Title of c.pdf (c.pdf)',
    ]);
  });

  it('cuts previews at 150 characters', () => {
    const [source] = handler.process(evidenceFrom({ filename: 'a.pdf', text: 'x'.repeat(200) }), 'a').sources;

    expect(source?.preview).toBe(`${'x'.repeat(150)}...`);
  });

  it('numbers prompt passages like the sources', () => {
    const evidence = evidenceFrom({ filename: 'a.pdf' }, { filename: 'a.pdf' }, { filename: 'b.pdf' });

    expect(handler.contextPassages(evidence).map(p => [p.number, p.title])).toEqual([
      [1, 'Title of a.pdf'],
      [2, 'Title of b.pdf'],
    ]);
  });

  it('accepts extra title overrides', () => {
    const custom = new ResponseHandler({ 'a.pdf': 'Override A' });

    expect(custom.process(evidenceFrom({ filename: 'a.pdf' }), 'x').citations).toEqual(['[1] Override A (a.pdf)']);
  });
});
