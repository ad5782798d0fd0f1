import type { PageChunk } from '../../domain/entities/Page.js';

const DEFAULT_MAX_CHUNK_CHARS = 1200;

/**
 * 段落切分：以空行分段，段內換行合併為空白（OCR 逐行斷行），
 * 再把相鄰的短段落累積到接近 maxChunkChars 為止。
 * 超過上限的單一段落依空白切成多塊；單一超長 token 不再切。
 */
export class ParagraphChunker {
  private readonly maxChars: number;

  constructor(maxChunkChars: number = DEFAULT_MAX_CHUNK_CHARS) {
    this.maxChars = Math.max(1, maxChunkChars);
  }

  chunk(body: string): PageChunk[] {
    const pieces = body
      .split(/\n\s*\n/)
      .map(normalizeParagraph)
      .filter(Boolean)
      .flatMap((para) => this.splitLong(para));

    const chunks: PageChunk[] = [];
    let buffer = '';

    const flush = (): void => {
      if (buffer) {
        chunks.push({ chunkIndex: chunks.length, text: buffer });
      }
    };

    for (const piece of pieces) {
      const candidate = buffer ? `${buffer}\n\n${piece}` : piece;
      if (buffer && candidate.length > this.maxChars) {
        flush();
        buffer = piece;
      } else {
        buffer = candidate;
      }
    }
    flush();

    return chunks;
  }

  private splitLong(paragraph: string): string[] {
    if (paragraph.length <= this.maxChars) return [paragraph];

    const parts: string[] = [];
    let current = '';
    for (const word of paragraph.split(' ')) {
      const candidate = current ? `${current} ${word}` : word;
      if (current && candidate.length > this.maxChars) {
        parts.push(current);
        current = word;
      } else {
        current = candidate;
      }
    }
    if (current) parts.push(current);
    return parts;
  }
}

function normalizeParagraph(paragraph: string): string {
  return paragraph
    .split('\n')
    .map((line) => line.trim().replace(/\s+/g, ' '))
    .filter(Boolean)
    .join(' ');
}
