export const PRAGMA_SQL = `
PRAGMA journal_mode = WAL;
PRAGMA busy_timeout = 5000;
PRAGMA synchronous = NORMAL;
PRAGMA foreign_keys = ON;
PRAGMA cache_size = -64000;
`;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS pages (
  page_id INTEGER PRIMARY KEY,
  document_id TEXT NOT NULL,
  page_number INTEGER NOT NULL,
  original_filename TEXT,
  language TEXT NOT NULL,
  metadata_json TEXT NOT NULL DEFAULT '{}',
  source_path TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  indexed_at INTEGER NOT NULL,
  UNIQUE(document_id, page_number)
);

CREATE TABLE IF NOT EXISTS chunks (
  chunk_id INTEGER PRIMARY KEY,
  page_id INTEGER NOT NULL,
  chunk_index INTEGER NOT NULL,
  text TEXT NOT NULL,
  FOREIGN KEY(page_id) REFERENCES pages(page_id) ON DELETE CASCADE
);

CREATE VIRTUAL TABLE IF NOT EXISTS chunks_fts USING fts5(
  text_content,
  text_content_hindi,
  text_content_gujarati,
  tokenize="unicode61 remove_diacritics 2 categories 'L* N* Co M*'"
);

CREATE INDEX IF NOT EXISTS idx_pages_document ON pages(document_id);
CREATE INDEX IF NOT EXISTS idx_pages_source_path ON pages(source_path);
CREATE INDEX IF NOT EXISTS idx_chunks_page_id ON chunks(page_id);
`;

/**
 * 每種語言對應的 FTS5 欄位（順序即欄位 index，供 snippet() 使用）
 * 偏向 Devanagari/Gujarati 的 matra 屬於 M* 類別，tokenizer 需把它們當作字元
 */
export const FTS_COLUMNS = {
  en: { name: 'text_content', index: 0 },
  hi: { name: 'text_content_hindi', index: 1 },
  gu: { name: 'text_content_gujarati', index: 2 },
} as const;

/**
 * sqlite-vec 的 vec0 虛擬表需要在 extension 載入後才能建立
 * dimension 由設定決定
 */
export function vecTableSQL(dimension: number): string {
  return `CREATE VIRTUAL TABLE IF NOT EXISTS chunks_vec USING vec0(embedding float[${dimension}]);`;
}
