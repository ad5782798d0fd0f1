/** 索引操作統計 */
export interface IndexStats {
  pagesProcessed: number;
  pagesSkipped: number;
  pagesDeleted: number;
  pagesFailed: number;
  chunksCreated: number;
  ftsRowsInserted: number;
  vecRowsInserted: number;
  embeddingFailed: boolean;
  warnings: string[];
  durationMs: number;
}

export function emptyIndexStats(): IndexStats {
  return {
    pagesProcessed: 0,
    pagesSkipped: 0,
    pagesDeleted: 0,
    pagesFailed: 0,
    chunksCreated: 0,
    ftsRowsInserted: 0,
    vecRowsInserted: 0,
    embeddingFailed: false,
    warnings: [],
    durationMs: 0,
  };
}
