import type { CategoryFilter, PageHit } from '../entities/Hit.js';
import type { LanguageTag } from '../value-objects/LanguageFamily.js';

export type SearchType = 'strict' | 'fuzzy';

export interface LexicalQuery {
  text: string;
  /** 決定查詢哪一個語言欄位 */
  language: LanguageTag;
  /** 0 = 精確片語；其餘為 NEAR 距離 */
  proximityDistance: number;
  searchType: SearchType;
  categories: CategoryFilter;
  limit: number;
}

export interface VectorQuery {
  categories: CategoryFilter;
  limit: number;
}

export interface LexicalSearchPort {
  searchLexical(query: LexicalQuery): Promise<PageHit[]>;
}

export interface VectorSearchPort {
  searchKNN(queryVector: Float32Array, query: VectorQuery): Promise<PageHit[]>;
}
