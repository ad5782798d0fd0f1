import type { FusedHit, PageHit } from '../../domain/entities/Hit.js';
import type { LanguageTag } from '../../domain/value-objects/LanguageFamily.js';
import type { SearchMode } from './SearchRequest.js';

/** 單筆結果：fusion 分數 + 該筆 snippet 的高亮字詞 */
export type SearchResultItem = FusedHit<PageHit> & {
  highlightWords: string[];
};

/** 搜尋回應 */
export interface SearchResponse {
  results: SearchResultItem[];
  /** 分頁前的唯一 (documentId, pageNumber) 數 */
  totalResults: number;
  pageSize: number;
  pageNumber: number;
  /** 查詢語言（決定 lexical 查詢的欄位） */
  language: LanguageTag;
  /** 實際執行的模式（backend 失敗時會降級） */
  searchMode: SearchMode;
  fusionMethod: string;
  /** 整頁的高亮字詞；snippet 皆無標記時取自查詢本身 */
  highlightWords: string[];
  durationMs: number;
  warnings: string[];
}
