import { describe, it, expect } from 'vitest';
import { TextChunker } from '../src/utils/chunking.js';
import { ValidationError } from '../src/utils/errors.js';

describe('TextChunker', () => {
  it('returns no chunks for empty or blank text', () => {
    const chunker = new TextChunker({ strategy: 'sentence', chunkSize: 500, overlap: 50 });
    expect(chunker.chunk('')).toEqual([]);
    expect(chunker.chunk('  \n\n \t ')).toEqual([]);
  });

  it('keeps short text in a single chunk', () => {
    const chunker = new TextChunker({ strategy: 'sentence', chunkSize: 500, overlap: 50 });
    const chunks = chunker.chunk('  A short note.  ');

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatchObject({ text: 'A short note.', startPosition: 0, endPosition: 13, index: 0, tokenCount: 4 });
  });

  it('slides fixed-size windows over the text with the configured overlap', () => {
    const chunker = new TextChunker({ strategy: 'character', chunkSize: 500, overlap: 50 });
    const text = 'a'.repeat(1500);
    const chunks = chunker.chunk(text);

    expect(chunks.map(chunk => [chunk.startPosition, chunk.endPosition])).toEqual([
      [0, 500],
      [450, 950],
      [900, 1400],
      [1350, 1500],
    ]);
    expect(chunker.expectedChunkCount(text.length)).toBe(4);
  });

  it('treats an overlap below 1 as a fraction of the chunk size', () => {
    const chunker = new TextChunker({ strategy: 'character', chunkSize: 500, overlap: 0.1 });
    expect(chunker.step).toBe(450);
  });

  it('ends windows at sentence boundaries inside the overlap region', () => {
    const chunker = new TextChunker({ strategy: 'sentence', chunkSize: 16, overlap: 8 });
    const chunks = chunker.chunk('Alpha beta. Gamma delta. Epsilon zeta.');

    expect(chunks.map(chunk => chunk.text)).toEqual([
      'Alpha beta.',
      'ta. Gamma delta.',
      'a delta. Epsilon',
      ' Epsilon zeta.',
    ]);
  });

  it('covers every character and overlaps consecutive chunks', () => {
    const chunker = new TextChunker({ strategy: 'paragraph', chunkSize: 120, overlap: 30 });
    const text = Array.from({ length: 12 }, (_, i) => `Paragraph ${i} talks about topic ${i}. It has two sentences.`).join('\n\n');
    const cleaned = TextChunker.preprocessText(text);
    const chunks = chunker.chunk(text);

    expect(chunks[0]?.startPosition).toBe(0);
    expect(chunks[chunks.length - 1]?.endPosition).toBe(cleaned.length);
    for (let i = 1; i < chunks.length; i++) {
      const previous = chunks[i - 1];
      const current = chunks[i];
      expect(current?.startPosition).toBeLessThan(previous?.endPosition ?? 0);
      expect(current?.index).toBe(i);
    }
    expect(chunks).toHaveLength(chunker.expectedChunkCount(cleaned.length));
  });

  it('normalises whitespace without merging paragraphs', () => {
    expect(TextChunker.preprocessText('one\r\ntwo  \t three\n\n\n\nfour')).toBe('one\ntwo three\n\nfour');
  });

  it('rejects an overlap that is not smaller than the chunk size', () => {
    expect(() => new TextChunker({ strategy: 'sentence', chunkSize: 100, overlap: 100 })).toThrow(ValidationError);
    expect(() => new TextChunker({ strategy: 'sentence', chunkSize: 0, overlap: 0 })).toThrow(ValidationError);
  });
});
