import type Database from 'better-sqlite3';
import type { PageHit } from '../../domain/entities/Hit.js';
import type { VectorQuery, VectorSearchPort } from '../../domain/ports/SearchBackendPort.js';
import { VectorBackendError } from '../../domain/errors/DomainErrors.js';
import { buildCategoryFilter, toPageHit } from './pageRows.js';
import type { PageChunkRow } from './pageRows.js';
import { errorMessage } from '../../shared/Logger.js';

export interface VecRow {
  chunkId: number;
  embedding: Float32Array;
}

interface ChunkTextRow extends PageChunkRow {
  text: string;
}

/** vec0 的 k 上限 */
const MAX_KNN = 4096;
/** 有分類篩選時先多取幾倍再過濾 */
const FILTER_OVERFETCH = 4;
/** vector 命中沒有標記，snippet 取段落開頭 */
const SNIPPET_CHARS = 300;

function toBlob(vec: Float32Array): Buffer {
  return Buffer.from(vec.buffer, vec.byteOffset, vec.byteLength);
}

/**
 * sqlite-vec adapter：管理 vec0 虛擬表的插入、刪除與 KNN 查詢
 * 回傳相似度（1 / (1 + distance)），越大越好
 *
 * 注意：sqlite-vec v0.1.x 的 PK 型別檢查要求 SQLite INTEGER，
 * better-sqlite3 的 JS number 會被綁為 REAL，需用 BigInt 才會綁為 INTEGER。
 */
export class SqliteVecAdapter implements VectorSearchPort {
  constructor(private readonly db: Database.Database) {}

  insertRows(rows: VecRow[]): void {
    const stmt = this.db.prepare(
      'INSERT INTO chunks_vec(rowid, embedding) VALUES(?, ?)'
    );
    for (const row of rows) {
      stmt.run(BigInt(row.chunkId), toBlob(row.embedding));
    }
  }

  deleteRows(chunkIds: number[]): void {
    const stmt = this.db.prepare('DELETE FROM chunks_vec WHERE rowid = ?');
    for (const id of chunkIds) {
      stmt.run(BigInt(id));
    }
  }

  /** KNN 查詢後回到 chunks / pages 取欄位並套用分類篩選 */
  async searchKNN(queryVector: Float32Array, query: VectorQuery): Promise<PageHit[]> {
    if (query.limit <= 0) return [];

    const filter = buildCategoryFilter(query.categories);
    const k = Math.min(filter.params.length > 0 ? query.limit * FILTER_OVERFETCH : query.limit, MAX_KNN);

    try {
      const neighbours = this.db.prepare<[Buffer, number], { chunk_id: number | bigint; distance: number }>(`
        SELECT rowid AS chunk_id, distance
        FROM chunks_vec
        WHERE embedding MATCH ?
          AND k = ?
        ORDER BY distance
      `).all(toBlob(queryVector), k);

      if (neighbours.length === 0) return [];

      const similarity = new Map<number, number>();
      for (const n of neighbours) {
        similarity.set(Number(n.chunk_id), 1.0 / (1.0 + n.distance));
      }

      const ids = [...similarity.keys()];
      const rows = this.db.prepare<unknown[], ChunkTextRow>(`
        SELECT c.chunk_id, c.text, p.document_id, p.page_number, p.original_filename, p.language, p.metadata_json
        FROM chunks c
        JOIN pages p ON p.page_id = c.page_id
        WHERE c.chunk_id IN (${ids.map(() => '?').join(', ')})${filter.clause}
      `).all(...ids, ...filter.params);

      return rows
        .map((row) => toPageHit(row, similarity.get(Number(row.chunk_id)) ?? 0, row.text.slice(0, SNIPPET_CHARS)))
        .sort((a, b) => b.score - a.score || a.chunkId - b.chunkId)
        .slice(0, query.limit);
    } catch (err) {
      throw new VectorBackendError(`Vector search failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
