import { vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type Database from 'better-sqlite3';
import type { EmbeddingPort, EmbeddingResult } from '../../src/domain/ports/EmbeddingPort.js';
import type { LanguageDetectorPort } from '../../src/domain/ports/LanguageDetectorPort.js';
import { Logger } from '../../src/shared/Logger.js';

export const silentLogger = new Logger('test', 'error', () => {});

export function makeTmpDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** 以關鍵字決定向量：[river, temple, seva, 常數]，讓 KNN 排名可預期 */
export function keywordVector(text: string): Float32Array {
  const lower = text.toLowerCase();
  return new Float32Array([
    lower.includes('river') ? 1 : 0,
    lower.includes('temple') ? 1 : 0,
    lower.includes('seva') ? 1 : 0,
    0.1,
  ]);
}

export function createMockEmbedding() {
  const embed = vi.fn(async (texts: string[]): Promise<EmbeddingResult[]> =>
    texts.map((t) => ({ vector: keywordVector(t), tokensUsed: 10 })),
  );
  const embedOne = vi.fn(async (text: string): Promise<EmbeddingResult> => ({
    vector: keywordVector(text),
    tokensUsed: 10,
  }));
  const embedding: EmbeddingPort = {
    providerId: 'mock',
    dimension: 4,
    modelId: 'mock-model',
    embed,
    embedOne,
    isHealthy: async () => true,
  };
  return { embedding, embed, embedOne };
}

/** 依文字中的文字系統判斷語言 */
export const scriptDetector: LanguageDetectorPort = {
  detectorId: 'script',
  detect(text: string): string {
    if (/[\u0A80-\u0AFF]/.test(text)) return 'gu';
    if (/[\u0900-\u097F]/.test(text)) return 'hi';
    return 'en';
  },
};

export interface PageFixture {
  documentId: string;
  pageNumber: number;
  language?: string;
  categories?: Record<string, string | string[]>;
  body: string;
}

export function writePageFile(dir: string, name: string, page: PageFixture): string {
  const lines = ['---', `document_id: ${page.documentId}`, `page_number: ${page.pageNumber}`];
  if (page.language) lines.push(`language: ${page.language}`);
  if (page.categories) {
    lines.push('categories:');
    for (const [key, value] of Object.entries(page.categories)) {
      lines.push(`  ${key}: ${JSON.stringify(value)}`);
    }
  }
  lines.push('---', page.body);

  const filePath = path.join(dir, name);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, lines.join('\n'));
  return filePath;
}

export interface SeedChunk {
  documentId: string;
  pageNumber: number;
  language: 'hi' | 'gu' | 'en';
  text: string;
  metadata?: Record<string, string[]>;
}

/** 直接寫入 pages / chunks，回傳 chunk_id（供 adapter 層級測試） */
export function seedChunk(db: Database.Database, seed: SeedChunk): number {
  const page = db.prepare(`
    INSERT INTO pages(document_id, page_number, original_filename, language, metadata_json, source_path, content_hash, indexed_at)
    VALUES(?, ?, ?, ?, ?, ?, 'hash', ?)
  `).run(
    seed.documentId, seed.pageNumber, `${seed.documentId}.pdf`, seed.language,
    JSON.stringify(seed.metadata ?? {}), `${seed.documentId}-${seed.pageNumber}.md`, Date.now(),
  );
  const chunk = db.prepare('INSERT INTO chunks(page_id, chunk_index, text) VALUES(?, 0, ?)')
    .run(page.lastInsertRowid, seed.text);
  return Number(chunk.lastInsertRowid);
}
