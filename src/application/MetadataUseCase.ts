import type Database from 'better-sqlite3';

/** 索引狀態 */
export interface CatalogueStatus {
  documents: number;
  pages: number;
  chunks: number;
  vectors: number;
  /** 語言 tag → 頁數 */
  pagesByLanguage: Record<string, number>;
  /** 缺少向量、下次索引時會重建的頁數 */
  pagesPendingEmbedding: number;
  embeddingDimension: number | null;
  lastIndexedAt: string | null;
}

/**
 * 分類 metadata 與索引統計
 * listCategories 供前端建構篩選器（每個 key 的所有可選值）
 */
export class MetadataUseCase {
  constructor(private readonly db: Database.Database) {}

  /** key 與值皆依字典序排序，值不重複 */
  listCategories(): Record<string, string[]> {
    const rows = this.db.prepare<[], { key: string; value: string }>(`
      SELECT DISTINCT m.key AS key, CAST(v.value AS TEXT) AS value
      FROM pages p, json_each(p.metadata_json) AS m, json_each(m.value) AS v
      ORDER BY m.key, value
    `).all();

    const categories: Record<string, string[]> = {};
    for (const { key, value } of rows) {
      (categories[key] ??= []).push(value);
    }
    return categories;
  }

  status(): CatalogueStatus {
    const count = (sql: string): number =>
      this.db.prepare<[], { count: number }>(sql).get()?.count ?? 0;

    const pagesByLanguage: Record<string, number> = {};
    const languageRows = this.db.prepare<[], { language: string; count: number }>(
      'SELECT language, COUNT(*) AS count FROM pages GROUP BY language ORDER BY language',
    ).all();
    for (const { language, count: n } of languageRows) {
      pagesByLanguage[language] = n;
    }

    const dimRow = this.db.prepare<[], { value: string }>(
      "SELECT value FROM schema_meta WHERE key = 'embedding_dimension'",
    ).get();

    const lastRow = this.db.prepare<[], { last: number | null }>(
      'SELECT MAX(indexed_at) AS last FROM pages',
    ).get();

    return {
      documents: count('SELECT COUNT(DISTINCT document_id) AS count FROM pages'),
      pages: count('SELECT COUNT(*) AS count FROM pages'),
      chunks: count('SELECT COUNT(*) AS count FROM chunks'),
      vectors: count('SELECT COUNT(*) AS count FROM chunks_vec'),
      pagesByLanguage,
      pagesPendingEmbedding: count("SELECT COUNT(*) AS count FROM pages WHERE content_hash = ''"),
      embeddingDimension: dimRow ? parseInt(dimRow.value, 10) : null,
      lastIndexedAt: lastRow?.last ? new Date(lastRow.last).toISOString() : null,
    };
  }
}
