/**
 * Fusion 合併後、計算最終分數前的候選紀錄
 *
 * merge / normalize / paginate 由 ResultFusionRanker 負責，
 * strategy 只決定如何把兩路訊號合成單一 combinedScore。
 */
export interface FusionCandidate {
  /** identity key（見 HitIdentity） */
  key: string;
  /** 首次出現順序（lexical 清單在前、vector 清單在後），作為 tie-break */
  order: number;
  lexicalScore: number;
  vectorScore: number;
  normalizedLexicalScore: number;
  normalizedVectorScore: number;
  /** 在去重後的 lexical 排名（0-based），未出現於該路為 null */
  lexicalRank: number | null;
  vectorRank: number | null;
}

export interface FusionStrategy {
  readonly name: string;
  combine(candidate: FusionCandidate): number;
}

/** Per-query max normalization；max <= 0 時該路貢獻為 0 */
export function normalizeByMax(score: number, max: number): number {
  return max > 0 ? score / max : 0;
}
