import { get_encoding, type Tiktoken } from 'tiktoken';
import { logger } from '../../utils/logger.js';
import { ValidationError } from '../../utils/errors.js';

export interface TextChunk {
  text: string;
  index: number;
  tokens: number;
}

interface Piece {
  text: string;
  tokens: number;
}

/**
 * Splits extracted paper text into sentence-aligned token windows.
 * Consecutive windows share trailing sentences worth up to `overlapTokens`.
 */
export class ChunkingService {
  private encoder: Tiktoken;
  private decoder = new TextDecoder();
  private strictDecoder = new TextDecoder('utf-8', { fatal: true });

  constructor(
    private readonly maxTokens = 512,
    private readonly overlapTokens = 50
  ) {
    if (overlapTokens >= maxTokens) {
      throw new ValidationError('Chunk overlap must be smaller than chunk size', { maxTokens, overlapTokens });
    }
    this.encoder = get_encoding('cl100k_base');
  }

  countTokens(text: string): number {
    return this.encoder.encode(text).length;
  }

  chunkText(text: string): TextChunk[] {
    const pieces = this.toPieces(text);
    const chunks: TextChunk[] = [];

    let window: Piece[] = [];
    let windowTokens = 0;

    for (const piece of pieces) {
      if (window.length > 0 && windowTokens + piece.tokens > this.maxTokens) {
        chunks.push(this.buildChunk(window, chunks.length));
        window = this.overlapTail(window, piece.tokens);
        windowTokens = window.reduce((sum, p) => sum + p.tokens, 0);
      }
      window.push(piece);
      windowTokens += piece.tokens;
    }

    if (window.length > 0) {
      chunks.push(this.buildChunk(window, chunks.length));
    }

    logger.debug({ totalChunks: chunks.length, maxTokens: this.maxTokens }, 'Chunked text');
    return chunks;
  }

  dispose(): void {
    this.encoder.free();
  }

  private toPieces(text: string): Piece[] {
    const normalized = text.replace(/\s+/g, ' ').trim();
    if (!normalized) return [];

    const pieces: Piece[] = [];
    for (const sentence of normalized.split(/(?<=[.!?])\s+/)) {
      const tokens = this.countTokens(` ${sentence}`);
      if (tokens <= this.maxTokens) {
        pieces.push({ text: sentence, tokens });
      } else {
        pieces.push(...this.hardSplit(sentence));
      }
    }
    return pieces;
  }

  /**
   * Cuts on token boundaries that are also UTF-8 character boundaries, so a
   * multi-byte character split across tokens is never decoded in halves.
   */
  private hardSplit(sentence: string): Piece[] {
    const tokens = this.encoder.encode(sentence);
    const pieces: Piece[] = [];
    let start = 0;
    while (start < tokens.length) {
      const [end, decoded] = this.nextCut(tokens, start);
      const text = decoded.trim();
      if (text) {
        pieces.push({ text, tokens: end - start });
      }
      start = end;
    }
    return pieces;
  }

  private nextCut(tokens: Uint32Array, start: number): [number, string] {
    const limit = Math.min(start + this.maxTokens, tokens.length);
    for (let end = limit; end > start; end--) {
      const text = this.decodeWhole(tokens.slice(start, end));
      if (text !== null) return [end, text];
    }
    // No boundary inside the window: grow past it until the character completes.
    for (let end = limit + 1; end < tokens.length; end++) {
      const text = this.decodeWhole(tokens.slice(start, end));
      if (text !== null) return [end, text];
    }
    return [tokens.length, this.decoder.decode(this.encoder.decode(tokens.slice(start)))];
  }

  private decodeWhole(tokens: Uint32Array): string | null {
    try {
      return this.strictDecoder.decode(this.encoder.decode(tokens));
    } catch {
      return null;
    }
  }

  private overlapTail(window: Piece[], nextTokens: number): Piece[] {
    const tail: Piece[] = [];
    let tailTokens = 0;
    for (let i = window.length - 1; i >= 0; i--) {
      const piece = window[i];
      if (tailTokens + piece.tokens > this.overlapTokens) break;
      if (tailTokens + piece.tokens + nextTokens > this.maxTokens) break;
      tail.unshift(piece);
      tailTokens += piece.tokens;
    }
    return tail;
  }

  private buildChunk(window: Piece[], index: number): TextChunk {
    const text = window.map(p => p.text).join(' ');
    return { text, index, tokens: this.countTokens(text) };
  }
}
