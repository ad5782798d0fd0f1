import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createCatalogue } from '../../src/createCatalogue.js';
import type { Catalogue } from '../../src/createCatalogue.js';
import { loadConfig } from '../../src/config/ConfigLoader.js';
import {
  DetectionFailureError,
  EmbeddingUnavailableError,
  InvalidSearchRequestError,
} from '../../src/domain/errors/DomainErrors.js';
import type { LanguageDetectorPort } from '../../src/domain/ports/LanguageDetectorPort.js';
import { createMockEmbedding, makeTmpDir, scriptDetector, silentLogger, writePageFile } from './helpers.js';
import fs from 'node:fs';
import path from 'node:path';

/**
 * Feature: 多語言混合搜尋
 *
 * 頁面檔經索引後，以印地語、古吉拉特語或英語查詢，
 * 取得融合 lexical 與 vector 分數、依頁面去重的結果。
 */
describe('Catalogue search end to end', () => {
  let tmpDir: string;
  let catalogue: Catalogue;
  let mock: ReturnType<typeof createMockEmbedding>;

  beforeEach(async () => {
    tmpDir = makeTmpDir('catsearch-e2e-');
    const pagesDir = path.join(tmpDir, 'pages');

    writePageFile(pagesDir, 'gita-1.md', {
      documentId: 'gita', pageNumber: 1, language: 'en', categories: { author: 'Vyasa' },
      body: 'The holy river flows past the temple.',
    });
    writePageFile(pagesDir, 'gita-2.md', {
      documentId: 'gita', pageNumber: 2, language: 'en', categories: { author: 'Vyasa' },
      body: 'A quiet temple stands on the hill.',
    });
    writePageFile(pagesDir, 'seva-1.md', {
      documentId: 'seva-path', pageNumber: 1, categories: { author: 'Sant', topics: ['seva', 'dharma'] },
      body: 'સેવા એ જ ધર્મ છે',
    });
    writePageFile(pagesDir, 'ganga-5.md', {
      documentId: 'ganga', pageNumber: 5,
      body: 'गंगा नदी पवित्र है',
    });

    mock = createMockEmbedding();
    const config = loadConfig(tmpDir, { embedding: { dimension: 4 } }, {});
    catalogue = createCatalogue(tmpDir, config, {
      embedding: mock.embedding,
      detector: scriptDetector,
      logger: silentLogger,
      sleep: () => Promise.resolve(),
    });

    const stats = await catalogue.index.build(catalogue.pagesDir);
    expect(stats.pagesProcessed).toBe(4);
  });

  afterEach(() => {
    catalogue.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should rank the page found by both backends first', async () => {
    const response = await catalogue.search.search({ query: 'river' });

    expect(response.searchMode).toBe('hybrid');
    expect(response.language).toBe('en');
    expect(response.totalResults).toBe(4);
    expect(response.results[0]).toMatchObject({
      documentId: 'gita',
      pageNumber: 1,
      originalFilename: null,
      snippet: 'The holy <em>river</em> flows past the temple.',
      highlightWords: ['river'],
      metadata: { author: ['Vyasa'] },
    });
    expect(response.results[0].combinedScore).toBeCloseTo(1.0);
    expect(response.highlightWords).toEqual(['river']);
    expect(response.warnings).toEqual([]);
  });

  it('should search Gujarati pages in the Gujarati column', async () => {
    const response = await catalogue.search.search({ query: 'ધર્મ', mode: 'lexical_only' });

    expect(response.language).toBe('gu');
    expect(response.results.map((r) => r.documentId)).toEqual(['seva-path']);
    expect(response.results[0].snippet).toBe('સેવા એ જ <em>ધર્મ</em> છે');
    expect(response.highlightWords).toEqual(['ધર્મ']);
  });

  it('should search Hindi pages in the Hindi column', async () => {
    const response = await catalogue.search.search({ query: 'नदी', mode: 'lexical_only' });

    expect(response.language).toBe('hi');
    expect(response.results.map((r) => `${r.documentId}#${r.pageNumber}`)).toEqual(['ganga#5']);
  });

  it('should filter by category', async () => {
    const response = await catalogue.search.search({
      query: 'temple',
      categories: { author: ['Vyasa'] },
    });

    expect(response.results.map((r) => r.pageNumber).sort()).toEqual([1, 2]);
    expect(response.results.every((r) => r.documentId === 'gita')).toBe(true);
  });

  describe('when the query language cannot be classified', () => {
    const failing: LanguageDetectorPort = {
      detectorId: 'failing',
      detect: () => { throw new DetectionFailureError('no reliable language'); },
    };
    const unsupported: LanguageDetectorPort = { detectorId: 'french', detect: () => 'fr' };

    it.each([
      ['a failing detector', failing],
      ['an unsupported language', unsupported],
    ])('should search the configured default language for %s', async (_label, detector) => {
      const fallback = createCatalogue(tmpDir, loadConfig(tmpDir, { embedding: { dimension: 4 } }, {}), {
        embedding: mock.embedding,
        detector,
        logger: silentLogger,
      });
      try {
        const response = await fallback.search.search({ query: 'नदी', mode: 'lexical_only' });

        expect(response.language).toBe('hi');
        expect(response.results.map((r) => `${r.documentId}#${r.pageNumber}`)).toEqual(['ganga#5']);
      } finally {
        fallback.close();
      }
    });
  });

  it('should paginate fused results', async () => {
    const first = await catalogue.search.search({ query: 'temple', pageSize: 1, pageNumber: 1 });
    const second = await catalogue.search.search({ query: 'temple', pageSize: 1, pageNumber: 2 });
    const beyond = await catalogue.search.search({ query: 'temple', pageSize: 1, pageNumber: 99 });

    expect(first.results).toHaveLength(1);
    expect(second.results).toHaveLength(1);
    const key = (r: { documentId: string; pageNumber: number }): string => `${r.documentId}#${r.pageNumber}`;
    // gita#2 同時命中兩路且向量距離為 0
    expect(first.results.map(key)).toEqual(['gita#2']);
    expect(second.results.map(key)).toEqual(['gita#1']);
    expect(beyond.results).toEqual([]);
    expect(beyond.totalResults).toBe(first.totalResults);
  });

  it('should fall back to lexical results when the embedding provider is down', async () => {
    mock.embedOne.mockRejectedValue(new EmbeddingUnavailableError('Embedding provider is disabled'));

    const response = await catalogue.search.search({ query: 'river' });

    expect(response.searchMode).toBe('lexical_only');
    expect(response.warnings).toEqual(['Vector search failed: Embedding provider is disabled']);
    expect(response.results.map((r) => r.documentId)).toEqual(['gita']);
  });

  it('should reject invalid requests', async () => {
    await expect(catalogue.search.search({ query: '' })).rejects.toThrow(InvalidSearchRequestError);
  });

  it('should list categories', () => {
    expect(catalogue.metadata.listCategories()).toEqual({
      author: ['Sant', 'Vyasa'],
      topics: ['dharma', 'seva'],
    });
  });
});
