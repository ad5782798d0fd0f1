import type { LogLevel } from '../shared/Logger.js';
import type { LanguageTag } from '../domain/value-objects/LanguageFamily.js';

/** Embedding 提供者設定（openai = 任何 OpenAI-compatible endpoint） */
export interface EmbeddingConfig {
  provider: 'openai' | 'none';
  model: string;
  dimension: number;
  maxBatchSize: number;
  apiKey?: string;
  baseUrl?: string;
}

/** 搜尋權重設定 */
export interface SearchWeights {
  lexical: number;
  vector: number;
}

/** 搜尋設定 */
export interface SearchConfig {
  /** 未指定 pageSize 時的每頁筆數（1-100） */
  defaultPageSize: number;
  /** 每路 backend 取回的候選數 = pageNumber × pageSize × candidateMultiplier */
  candidateMultiplier: number;
  /** 每路 backend 候選數上限 */
  maxCandidates: number;
  weights: SearchWeights;
  /** 融合方法：linear（正規化後線性加權）或 rrf（Reciprocal Rank Fusion） */
  fusionMethod: 'linear' | 'rrf';
  /** RRF 平滑常數 k（預設 60） */
  rrfK: number;
  /** 請求未帶 proximityDistance 時，lexical NEAR 查詢使用的距離 */
  defaultProximity: number;
  highlightMarkers: {
    open: string;
    close: string;
  };
}

/** 索引設定 */
export interface IndexConfig {
  dbPath: string;
  /** 頁面文字檔目錄（相對於專案根目錄） */
  pagesDir: string;
  /** 段落合併上限（字元數） */
  maxChunkChars: number;
}

/** 語言分類設定 */
export interface LanguageConfig {
  /** 偵測失敗 / 空字串 / 不支援語言時使用的 tag */
  defaultLanguage: LanguageTag;
}

export interface LoggingConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface CatalogueSearchConfig {
  version: number;
  index: IndexConfig;
  embedding: EmbeddingConfig;
  search: SearchConfig;
  language: LanguageConfig;
  logging: LoggingConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof CatalogueSearchConfig]?: CatalogueSearchConfig[K] extends object
    ? Partial<CatalogueSearchConfig[K]>
    : CatalogueSearchConfig[K];
};
