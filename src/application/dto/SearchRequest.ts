import { z } from 'zod';

export const SEARCH_MODES = ['hybrid', 'lexical_only', 'vector_only'] as const;
export type SearchMode = (typeof SEARCH_MODES)[number];

export const SEARCH_TYPES = ['strict', 'fuzzy'] as const;

/**
 * 搜尋請求
 * proximityDistance：0 = 精確片語；其他值或未指定 = 單字 / NEAR 比對
 */
export const SearchRequestSchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty'),
  proximityDistance: z.number().int().nonnegative().nullable().optional(),
  pageSize: z.number().int().min(1).max(100).optional(),
  pageNumber: z.number().int().min(1).optional(),
  mode: z.enum(SEARCH_MODES).optional(),
  searchType: z.enum(SEARCH_TYPES).optional(),
  /** metadata key → 允許的值（同一 key 內 OR，不同 key 之間 AND） */
  categories: z.record(z.array(z.string())).optional(),
});

export type SearchRequest = z.infer<typeof SearchRequestSchema>;
