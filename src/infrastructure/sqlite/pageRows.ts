import type { CategoryFilter, PageHit } from '../../domain/entities/Hit.js';

/** pages + chunks join 後的共同欄位 */
export interface PageChunkRow {
  chunk_id: number | bigint;
  document_id: string;
  page_number: number;
  original_filename: string | null;
  language: string;
  metadata_json: string;
}

export interface SqlFragment {
  clause: string;
  params: string[];
}

/**
 * 分類篩選 → SQL EXISTS 子句（需要 pages 表別名為 p）
 * 同一 key 內的值為 OR，不同 key 之間為 AND；空陣列的 key 不參與篩選。
 */
export function buildCategoryFilter(categories: CategoryFilter): SqlFragment {
  const clauses: string[] = [];
  const params: string[] = [];

  for (const [key, values] of Object.entries(categories)) {
    if (values.length === 0) continue;
    const placeholders = values.map(() => '?').join(', ');
    clauses.push(
      `EXISTS (SELECT 1 FROM json_each(p.metadata_json) AS m, json_each(m.value) AS v ` +
      `WHERE m.key = ? AND v.value IN (${placeholders}))`,
    );
    params.push(key, ...values);
  }

  return {
    clause: clauses.map((c) => ` AND ${c}`).join(''),
    params,
  };
}

/** metadata_json → Record<string, string[]>；非字串值一律轉字串 */
export function parseMetadata(json: string): Record<string, string[]> {
  const parsed: unknown = JSON.parse(json);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return {};
  }

  const metadata: Record<string, string[]> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (Array.isArray(value)) {
      metadata[key] = value.map((v) => String(v));
    } else if (value !== null && value !== undefined) {
      metadata[key] = [String(value)];
    }
  }
  return metadata;
}

export function toPageHit(row: PageChunkRow, score: number, snippet: string): PageHit {
  return {
    documentId: row.document_id,
    pageNumber: row.page_number,
    score,
    snippet,
    chunkId: Number(row.chunk_id),
    originalFilename: row.original_filename,
    language: row.language,
    metadata: parseMetadata(row.metadata_json),
  };
}
