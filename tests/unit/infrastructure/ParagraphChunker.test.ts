import { describe, it, expect } from 'vitest';
import { ParagraphChunker } from '../../../src/infrastructure/pages/ParagraphChunker.js';

describe('ParagraphChunker', () => {
  it('should join OCR line breaks and merge short paragraphs up to the limit', () => {
    const chunker = new ParagraphChunker(20);
    expect(chunker.chunk('aaa bbb\nccc\n\nddd\n\n\neee')).toEqual([
      { chunkIndex: 0, text: 'aaa bbb ccc\n\nddd' },
      { chunkIndex: 1, text: 'eee' },
    ]);
  });

  it('should collapse whitespace inside lines', () => {
    const chunker = new ParagraphChunker();
    expect(chunker.chunk('  गंगा   नदी \n  पवित्र है  ')).toEqual([{ chunkIndex: 0, text: 'गंगा नदी पवित्र है' }]);
  });

  it('should split an over-long paragraph on spaces', () => {
    const chunker = new ParagraphChunker(10);
    expect(chunker.chunk('one two three four').map((c) => c.text)).toEqual(['one two', 'three four']);
  });

  it('should keep a single over-long token whole', () => {
    const chunker = new ParagraphChunker(4);
    expect(chunker.chunk('abcdefgh ij').map((c) => c.text)).toEqual(['abcdefgh', 'ij']);
  });

  it('should return nothing for blank input', () => {
    expect(new ParagraphChunker().chunk('\n \n\n  ')).toEqual([]);
  });
});
