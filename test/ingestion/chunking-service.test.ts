import { describe, it, expect, afterAll } from 'vitest';
import { ChunkingService } from '../../src/services/vector/ChunkingService.js';
import { ValidationError } from '../../src/utils/errors.js';

describe('ChunkingService', () => {
  const chunker = new ChunkingService(40, 10);

  afterAll(() => {
    chunker.dispose();
  });

  it('counts cl100k tokens', () => {
    expect(chunker.countTokens('hello world')).toBe(2);
  });

  it('returns no chunks for blank text', () => {
    expect(chunker.chunkText(' \n\t ')).toEqual([]);
  });

  it('keeps short text in one chunk with whitespace collapsed', () => {
    const [chunk, ...rest] = chunker.chunkText('Rivers carry sediment.\n\n  Lakes   store it.');

    expect(rest).toEqual([]);
    expect(chunk?.text).toBe('Rivers carry sediment. Lakes store it.');
    expect(chunk?.index).toBe(0);
  });

  it('splits long text into indexed windows that overlap by trailing sentences', () => {
    const sentences = Array.from({ length: 30 }, (_, i) => `Rivers carry sediment ${i}.`);
    const chunks = chunker.chunkText(sentences.join(' '));

    expect(chunks.length).toBeGreaterThan(1);
    expect(chunks.map(c => c.index)).toEqual(chunks.map((_, i) => i));
    for (const sentence of sentences) {
      expect(chunks.some(c => c.text.includes(sentence))).toBe(true);
    }

    const firstSentences = chunks[0]?.text.split(/(?<=\.)\s+/) ?? [];
    const lastOfFirst = firstSentences[firstSentences.length - 1] ?? '';
    expect(chunks[1]?.text.startsWith(lastOfFirst)).toBe(true);
  });

  it('hard-splits a sentence longer than the window', () => {
    const chunks = chunker.chunkText(Array.from({ length: 120 }, (_, i) => `word${i}`).join(' '));

    expect(chunks.length).toBeGreaterThan(1);
  });

  it('never cuts a multi-byte character when hard-splitting', () => {
    const narrow = new ChunkingService(5, 0);
    const sentence = 'cigüeñaañoranzapingüinoñandú🦜'.repeat(6);
    try {
      const chunks = narrow.chunkText(sentence);

      expect(chunks.length).toBeGreaterThan(1);
      expect(chunks.some(c => c.text.includes('\uFFFD'))).toBe(false);
      expect(chunks.map(c => c.text.replaceAll(' ', '')).join('')).toBe(sentence);
    } finally {
      narrow.dispose();
    }
  });

  it('rejects an overlap that is not smaller than the window', () => {
    expect(() => new ChunkingService(10, 10)).toThrow(ValidationError);
  });
});
