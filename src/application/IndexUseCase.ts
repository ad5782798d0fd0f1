import path from 'node:path';
import type Database from 'better-sqlite3';
import type { DatabaseManager } from '../infrastructure/sqlite/DatabaseManager.js';
import type { FTS5Adapter } from '../infrastructure/sqlite/FTS5Adapter.js';
import type { SqliteVecAdapter } from '../infrastructure/sqlite/SqliteVecAdapter.js';
import type { PageFileParser, ParsedPageFile } from '../infrastructure/pages/PageFileParser.js';
import type { ParagraphChunker } from '../infrastructure/pages/ParagraphChunker.js';
import type { EmbeddingBatcher } from '../infrastructure/embedding/EmbeddingBatcher.js';
import type { PageSourcePort } from '../domain/ports/PageSourcePort.js';
import type { LanguageClassifier } from '../domain/services/LanguageClassifier.js';
import type { PageChunk } from '../domain/entities/Page.js';
import { emptyIndexStats } from './dto/IndexStats.js';
import type { IndexStats } from './dto/IndexStats.js';
import { ContentHash } from '../domain/value-objects/ContentHash.js';
import { groupLanguageCode } from '../domain/value-objects/LanguageFamily.js';
import type { LanguageTag } from '../domain/value-objects/LanguageFamily.js';
import { InvalidPageFileError, SqliteBusyError, isRetryableError } from '../domain/errors/DomainErrors.js';
import { withRetry } from '../shared/RetryPolicy.js';
import { Logger, errorMessage } from '../shared/Logger.js';

export interface IndexOptions {
  /** 忽略 content hash，全部重建 */
  force?: boolean;
}

export interface IndexUseCaseDeps {
  dbManager: DatabaseManager;
  fts5: FTS5Adapter;
  vec: SqliteVecAdapter;
  parser: PageFileParser;
  chunker: ParagraphChunker;
  pages: PageSourcePort;
  batcher: EmbeddingBatcher;
  classifier: LanguageClassifier;
  /** 參與 content hash，換模型後所有頁面都會重建向量 */
  embeddingModelId: string;
  /** embedding.provider 為 'none' 時為 false：只建 lexical 索引，頁面不標記為待補向量 */
  vectorsEnabled?: boolean;
  defaultLanguage: LanguageTag;
  logger?: Logger;
}

interface PageRow {
  page_id: number;
  source_path: string;
  content_hash: string;
}

/**
 * 索引用例：讀取頁面檔，切段落、寫入 pages / chunks / FTS5 / vec0
 *
 * 以頁面檔相對路徑追蹤來源；內容未變的頁面略過，目錄中已不存在的頁面自索引移除。
 * Embedding 失敗不會中止索引（lexical 仍可用），該頁 content_hash 清空以便下次重試。
 */
export class IndexUseCase {
  private readonly db: Database.Database;
  private readonly logger: Logger;

  constructor(private readonly deps: IndexUseCaseDeps) {
    this.db = deps.dbManager.getDb();
    this.logger = deps.logger ?? new Logger('IndexUseCase');
  }

  async build(pagesDir: string, options: IndexOptions = {}): Promise<IndexStats> {
    const start = Date.now();
    const stats = emptyIndexStats();

    if (!(await this.deps.pages.directoryExists(pagesDir))) {
      stats.warnings.push(`Pages directory not found: ${pagesDir}`);
      stats.durationMs = Date.now() - start;
      return stats;
    }

    const files = await this.deps.pages.listPageFiles(pagesDir);
    const seen = new Set<string>();
    let embeddingEnabled = true;

    for (const filePath of files) {
      const sourcePath = path.relative(pagesDir, filePath).replace(/\\/g, '/');
      seen.add(sourcePath);
      try {
        embeddingEnabled = await this.indexFile(filePath, sourcePath, stats, options, embeddingEnabled);
      } catch (err) {
        if (!(err instanceof InvalidPageFileError)) throw err;
        stats.pagesFailed++;
        stats.warnings.push(err.message);
        this.logger.warn('Skipping invalid page file', { sourcePath, error: err.message });
      }
    }

    const stale = this.db.prepare<[], PageRow>(
      'SELECT page_id, source_path, content_hash FROM pages'
    ).all().filter((row) => !seen.has(row.source_path));
    for (const row of stale) {
      await this.writeWithRetry(() => this.deletePage(row.page_id));
      stats.pagesDeleted++;
    }

    stats.durationMs = Date.now() - start;
    this.logger.info('Index build finished', {
      pagesDir,
      processed: stats.pagesProcessed,
      skipped: stats.pagesSkipped,
      deleted: stats.pagesDeleted,
      failed: stats.pagesFailed,
      chunks: stats.chunksCreated,
      durationMs: stats.durationMs,
    });
    return stats;
  }

  /** 回傳之後的頁面是否還要嘗試 embedding */
  private async indexFile(
    filePath: string,
    sourcePath: string,
    stats: IndexStats,
    options: IndexOptions,
    embeddingEnabled: boolean,
  ): Promise<boolean> {
    const raw = await this.deps.pages.readFile(filePath);
    const contentHash = ContentHash.of(raw, this.deps.embeddingModelId);

    const existing = this.db.prepare<[string], PageRow>(
      'SELECT page_id, source_path, content_hash FROM pages WHERE source_path = ?'
    ).get(sourcePath);

    if (!options.force && existing && ContentHash.fromHex(existing.content_hash).equals(contentHash)) {
      stats.pagesSkipped++;
      return embeddingEnabled;
    }

    const parsed = this.deps.parser.parse(raw, sourcePath);
    const language = this.resolveLanguage(parsed);
    const chunks = this.deps.chunker.chunk(parsed.body);

    const { pageId, chunkIds } = await this.writeWithRetry(() => {
      if (existing) this.deletePage(existing.page_id);
      this.replaceSamePage(parsed, sourcePath);
      return this.insertPage(parsed, language, chunks, sourcePath, contentHash.value);
    });

    stats.pagesProcessed++;
    stats.chunksCreated += chunks.length;
    stats.ftsRowsInserted += chunks.length;

    if (chunks.length === 0) return embeddingEnabled;
    if (this.deps.vectorsEnabled === false) return false;
    if (!embeddingEnabled) {
      this.markStale(pageId);
      return false;
    }

    // Embedding 在交易外（非同步 API 呼叫）
    try {
      const results = await this.deps.batcher.embedBatch(chunks.map((c) => c.text));
      const vecRows = chunkIds.flatMap((chunkId, i) => {
        const result = results[i];
        return result ? [{ chunkId, embedding: result.vector }] : [];
      });
      await this.writeWithRetry(() => this.deps.vec.insertRows(vecRows));
      stats.vecRowsInserted += vecRows.length;
      return true;
    } catch (err) {
      stats.embeddingFailed = true;
      stats.warnings.push(`Embedding failed: ${errorMessage(err)}. Lexical index still available.`);
      this.logger.warn('Embedding failed, continuing without vectors', { sourcePath, error: errorMessage(err) });
      this.markStale(pageId);
      return false;
    }
  }

  /** front matter 宣告且受支援的語言優先，否則偵測頁面內容 */
  private resolveLanguage(parsed: ParsedPageFile): LanguageTag {
    if (parsed.language) {
      const declared = groupLanguageCode(parsed.language);
      if (declared) return declared;
      this.logger.warn('Unsupported declared language, detecting from text', {
        documentId: parsed.documentId,
        pageNumber: parsed.pageNumber,
        declared: parsed.language,
      });
    }
    const classified = this.deps.classifier.classify(parsed.body, this.deps.defaultLanguage);
    return groupLanguageCode(classified) ?? this.deps.defaultLanguage;
  }

  /** 另一個檔案已宣告同一 (document_id, page_number) 時，以目前檔案取代 */
  private replaceSamePage(parsed: ParsedPageFile, sourcePath: string): void {
    const clash = this.db.prepare<[string, number], PageRow>(
      'SELECT page_id, source_path, content_hash FROM pages WHERE document_id = ? AND page_number = ?'
    ).get(parsed.documentId, parsed.pageNumber);
    if (!clash) return;

    this.logger.warn('Page declared by more than one file, keeping the latest', {
      documentId: parsed.documentId,
      pageNumber: parsed.pageNumber,
      previous: clash.source_path,
      current: sourcePath,
    });
    this.deletePage(clash.page_id);
  }

  private insertPage(
    parsed: ParsedPageFile,
    language: LanguageTag,
    chunks: PageChunk[],
    sourcePath: string,
    contentHash: string,
  ): { pageId: number; chunkIds: number[] } {
    const pageResult = this.db.prepare(`
      INSERT INTO pages(document_id, page_number, original_filename, language, metadata_json, source_path, content_hash, indexed_at)
      VALUES(?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      parsed.documentId, parsed.pageNumber, parsed.originalFilename, language,
      JSON.stringify(parsed.metadata), sourcePath, contentHash, Date.now(),
    );
    const pageId = Number(pageResult.lastInsertRowid);

    const chunkStmt = this.db.prepare(
      'INSERT INTO chunks(page_id, chunk_index, text) VALUES(?, ?, ?)'
    );
    const chunkIds = chunks.map((chunk) =>
      Number(chunkStmt.run(pageId, chunk.chunkIndex, chunk.text).lastInsertRowid),
    );

    this.deps.fts5.insertRows(chunks.map((chunk, i) => ({
      chunkId: chunkIds[i] ?? 0,
      language,
      text: chunk.text,
    })));

    return { pageId, chunkIds };
  }

  /** 刪除頁面及其 chunk / FTS5 / vec0 資料 */
  private deletePage(pageId: number): void {
    const chunkIds = this.db.prepare<[number], { chunk_id: number }>(
      'SELECT chunk_id FROM chunks WHERE page_id = ?'
    ).all(pageId).map((c) => c.chunk_id);

    if (chunkIds.length > 0) {
      this.deps.fts5.deleteRows(chunkIds);
      this.deps.vec.deleteRows(chunkIds);
    }
    this.db.prepare('DELETE FROM chunks WHERE page_id = ?').run(pageId);
    this.db.prepare('DELETE FROM pages WHERE page_id = ?').run(pageId);
  }

  /** 沒有向量的頁面清掉 hash，下次索引時重建 */
  private markStale(pageId: number): void {
    this.db.prepare("UPDATE pages SET content_hash = '' WHERE page_id = ?").run(pageId);
  }

  /** 寫入包在 transaction 內；SQLITE_BUSY 以退避重試 */
  private writeWithRetry<T>(write: () => T): Promise<T> {
    return withRetry(() => this.deps.dbManager.transaction(write), {
      maxRetries: SqliteBusyError.maxRetries,
      baseDelayMs: SqliteBusyError.baseDelayMs,
      isRetryable: isRetryableError,
      onRetry: (attempt, err, delayMs) => {
        this.logger.warn('Database busy, retrying write', { attempt, delayMs, error: errorMessage(err) });
      },
    });
  }
}
