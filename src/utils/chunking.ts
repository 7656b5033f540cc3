import { resolveOverlap } from '../types/config.js';
import { ValidationError } from './errors.js';
import { TextProcessor } from './text-processing.js';

export type ChunkingStrategy = 'character' | 'sentence' | 'paragraph';

export interface ChunkingOptions {
  strategy: ChunkingStrategy;
  chunkSize: number;
  /** Characters when >= 1, fraction of `chunkSize` when < 1. */
  overlap: number;
}

export interface TextChunk {
  text: string;
  startPosition: number;
  endPosition: number;
  index: number;
  tokenCount: number;
}

const SENTENCE_END = /[.!?]["')\]]*(?=\s)|\n/g;
const PARAGRAPH_END = /\n\s*\n/g;

/**
 * Sliding-window chunker.
 *
 * Window starts sit on a fixed grid of `chunkSize - overlap`, so the chunk count only
 * depends on the text length. Each window's end is pulled back to the last preferred
 * boundary inside its trailing `overlap` characters; the next window always starts at or
 * before that end, so consecutive chunks overlap and no character is left uncovered.
 */
export class TextChunker {
  private options: ChunkingOptions;
  private overlapChars: number;

  constructor(options: ChunkingOptions) {
    TextChunker.validateOptions(options);
    this.options = options;
    this.overlapChars = resolveOverlap(options.chunkSize, options.overlap);
  }

  get step(): number {
    return this.options.chunkSize - this.overlapChars;
  }

  chunk(text: string): TextChunk[] {
    const cleanedText = TextChunker.preprocessText(text);
    if (cleanedText.length === 0) {
      return [];
    }

    const { chunkSize } = this.options;
    const chunks: TextChunk[] = [];
    let start = 0;

    while (start < cleanedText.length) {
      const hardEnd = Math.min(start + chunkSize, cleanedText.length);
      const end = hardEnd < cleanedText.length
        ? this.findBoundary(cleanedText, start + this.step, hardEnd)
        : hardEnd;

      const chunkText = cleanedText.slice(start, end);
      chunks.push({
        text: chunkText,
        startPosition: start,
        endPosition: end,
        index: chunks.length,
        tokenCount: TextProcessor.estimateTokenCount(chunkText),
      });

      if (end >= cleanedText.length) break;
      start += this.step;
    }

    return chunks;
  }

  /**
   * Expected number of chunks for text of the given (preprocessed) length.
   */
  expectedChunkCount(length: number): number {
    if (length === 0) return 0;
    if (length <= this.options.chunkSize) return 1;
    return Math.ceil((length - this.overlapChars) / this.step);
  }

  /**
   * Last boundary end in `[min, max]`, or `max` when the window has none.
   */
  private findBoundary(text: string, min: number, max: number): number {
    if (this.options.strategy === 'character' || min >= max) {
      return max;
    }

    const patterns = this.options.strategy === 'paragraph'
      ? [PARAGRAPH_END, SENTENCE_END]
      : [SENTENCE_END];

    for (const pattern of patterns) {
      const boundary = lastMatchEnd(text, pattern, min, max);
      if (boundary !== undefined) {
        return boundary;
      }
    }
    return max;
  }

  /**
   * Normalise line endings and runs of blank space without disturbing paragraph structure.
   */
  static preprocessText(text: string): string {
    return text
      .replace(/\r\n/g, '\n')
      .replace(/\r/g, '\n')
      .replace(/[ \t\f\v]+/g, ' ')
      .replace(/ *\n */g, '\n')
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }

  static validateOptions(options: ChunkingOptions): void {
    if (!Number.isInteger(options.chunkSize) || options.chunkSize <= 0) {
      throw new ValidationError('Chunk size must be a positive integer');
    }

    if (!Number.isFinite(options.overlap) || options.overlap < 0) {
      throw new ValidationError('Overlap cannot be negative');
    }

    if (resolveOverlap(options.chunkSize, options.overlap) >= options.chunkSize) {
      throw new ValidationError('Overlap must be smaller than chunk size');
    }

    const validStrategies: ChunkingStrategy[] = ['character', 'sentence', 'paragraph'];
    if (!validStrategies.includes(options.strategy)) {
      throw new ValidationError(`Invalid chunking strategy. Must be one of: ${validStrategies.join(', ')}`);
    }
  }
}

function lastMatchEnd(text: string, pattern: RegExp, min: number, max: number): number | undefined {
  // One extra character so a lookahead can see past `max`.
  const window = text.slice(min, max + 1);
  const regex = new RegExp(pattern.source, 'g');
  let found: number | undefined;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(window)) !== null) {
    const end = min + match.index + match[0].length;
    if (end > min && end <= max) {
      found = end;
    }
    if (match[0].length === 0) {
      regex.lastIndex++;
    }
  }
  return found;
}
