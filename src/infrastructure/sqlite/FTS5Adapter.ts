import type Database from 'better-sqlite3';
import type { PageHit } from '../../domain/entities/Hit.js';
import type { LexicalQuery, LexicalSearchPort, SearchType } from '../../domain/ports/SearchBackendPort.js';
import type { HighlightMarkers } from '../../domain/services/HighlightExtractor.js';
import { DEFAULT_HIGHLIGHT_MARKERS } from '../../domain/services/HighlightExtractor.js';
import { LexicalBackendError } from '../../domain/errors/DomainErrors.js';
import type { LanguageTag } from '../../domain/value-objects/LanguageFamily.js';
import { FTS_COLUMNS } from './schema.js';
import { buildCategoryFilter, toPageHit } from './pageRows.js';
import type { PageChunkRow } from './pageRows.js';
import { errorMessage } from '../../shared/Logger.js';

export interface FTSRow {
  chunkId: number;
  language: LanguageTag;
  text: string;
}

interface LexicalRow extends PageChunkRow {
  snippet: string;
  bm25_score: number;
}

/** snippet() 每段最多 token 數（FTS5 上限 64） */
const SNIPPET_TOKENS = 64;

/**
 * FTS5 adapter：每個語言一個欄位，段落只寫入其語言的欄位
 * 查詢只針對偵測到的語言欄位；snippet 以 highlight markers 標記命中字詞
 */
export class FTS5Adapter implements LexicalSearchPort {
  constructor(
    private readonly db: Database.Database,
    private readonly markers: HighlightMarkers = DEFAULT_HIGHLIGHT_MARKERS,
  ) {}

  insertRows(rows: FTSRow[]): void {
    const stmt = this.db.prepare(
      'INSERT INTO chunks_fts(rowid, text_content, text_content_hindi, text_content_gujarati) VALUES(?, ?, ?, ?)'
    );
    for (const row of rows) {
      stmt.run(
        row.chunkId,
        row.language === 'en' ? row.text : '',
        row.language === 'hi' ? row.text : '',
        row.language === 'gu' ? row.text : '',
      );
    }
  }

  deleteRows(chunkIds: number[]): void {
    const stmt = this.db.prepare('DELETE FROM chunks_fts WHERE rowid = ?');
    for (const id of chunkIds) {
      stmt.run(id);
    }
  }

  /**
   * BM25 搜尋（分數取負值，越大越好）
   * 同一頁的多個段落各自成為一筆結果，由 fusion 階段合併。
   */
  async searchLexical(query: LexicalQuery): Promise<PageHit[]> {
    const column = FTS_COLUMNS[query.language];
    const match = buildMatchExpression(query.text, column.name, query.proximityDistance, query.searchType);
    if (!match || query.limit <= 0) return [];

    const filter = buildCategoryFilter(query.categories);

    try {
      const rows = this.db.prepare<unknown[], LexicalRow>(`
        SELECT c.chunk_id, p.document_id, p.page_number, p.original_filename, p.language, p.metadata_json,
          snippet(chunks_fts, ${column.index}, ?, ?, '…', ${SNIPPET_TOKENS}) AS snippet,
          bm25(chunks_fts) AS bm25_score
        FROM chunks_fts
        JOIN chunks c ON c.chunk_id = chunks_fts.rowid
        JOIN pages p ON p.page_id = c.page_id
        WHERE chunks_fts MATCH ?${filter.clause}
        ORDER BY bm25_score
        LIMIT ?
      `).all(this.markers.open, this.markers.close, match, ...filter.params, query.limit);

      return rows.map((row) => toPageHit(row, -row.bm25_score, row.snippet));
    } catch (err) {
      throw new LexicalBackendError(`Lexical search failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}

/**
 * 將使用者查詢轉為 FTS5 MATCH 表達式（只查詢 column 欄位）
 *
 * - strict + proximity 0：片語  col : ("a" + "b")
 * - strict + proximity n：    col : (NEAR("a" "b", n))
 * - fuzzy：前綴且全部須出現  col : ("a"* "b"*)
 * 每個 token 以雙引號包裹，避免 FTS5 特殊字元（如 - 被視為 NOT）造成語法錯誤。
 */
export function buildMatchExpression(
  text: string,
  column: string,
  proximityDistance: number,
  searchType: SearchType,
): string {
  const tokens = text
    .split(/\s+/)
    .filter((token) => /[\p{L}\p{N}]/u.test(token))
    .map((token) => `"${token.replace(/"/g, '""')}"`);

  if (tokens.length === 0) return '';

  if (searchType === 'fuzzy') {
    return `${column} : (${tokens.map((t) => `${t}*`).join(' ')})`;
  }
  if (tokens.length === 1) {
    return `${column} : ${tokens[0]}`;
  }
  if (proximityDistance === 0) {
    return `${column} : (${tokens.join(' + ')})`;
  }
  return `${column} : (NEAR(${tokens.join(' ')}, ${proximityDistance}))`;
}
