/**
 * 單一 retrieval backend 回傳的命中結果
 *
 * documentId + pageNumber 構成 identity key；backend 可能缺欄位，
 * 因此三個核心欄位都允許 null / undefined，由 fusion 階段處理。
 */
export interface SourceHit {
  documentId?: string | null;
  pageNumber?: number | null;
  score?: number | null;
  snippet?: string;
}

/** Fusion 後附加的分數欄位 */
export interface FusionScores {
  lexicalScore: number;
  vectorScore: number;
  normalizedLexicalScore: number;
  normalizedVectorScore: number;
  combinedScore: number;
}

export type FusedHit<T extends SourceHit = SourceHit> = T & FusionScores;

/** 分類篩選：metadata key → 允許的值 */
export type CategoryFilter = Record<string, string[]>;

/**
 * SQLite backends 實際產生的命中結果（chunk 粒度，
 * 同一頁可能因多個段落命中而重複出現）
 */
export interface PageHit extends SourceHit {
  documentId: string;
  pageNumber: number;
  score: number;
  snippet: string;
  chunkId: number;
  originalFilename: string | null;
  language: string;
  metadata: Record<string, string[]>;
}
