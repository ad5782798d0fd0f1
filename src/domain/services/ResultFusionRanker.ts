import type { FusedHit, SourceHit } from '../entities/Hit.js';
import { HitIdentity } from '../value-objects/HitIdentity.js';
import { HybridScore } from '../value-objects/HybridScore.js';
import { normalizeByMax } from '../value-objects/FusionStrategy.js';
import type { FusionCandidate, FusionStrategy } from '../value-objects/FusionStrategy.js';
import { Logger } from '../../shared/Logger.js';

export interface PageRequest {
  /** 每頁筆數；0 得到空頁（totalCount 仍正確） */
  pageSize: number;
  /** 1-based */
  pageNumber: number;
}

export interface FusionPage<T extends SourceHit> {
  hits: FusedHit<T>[];
  /** 分頁前的唯一紀錄數 */
  totalCount: number;
}

type Source = 'lexical' | 'vector';

interface MergedRecord<T extends SourceHit> {
  key: string;
  order: number;
  hit: T;
  lexicalScore: number;
  vectorScore: number;
  inLexical: boolean;
  inVector: boolean;
}

/**
 * Lexical + vector 結果融合
 *
 * 管線：
 *   (1) 以 (documentId, pageNumber) 合併，同一路重複時取最高分；非分數欄位以首次出現為準
 *   (2) 以合併後集合的各路最大值正規化
 *   (3) 交由 FusionStrategy 計算 combinedScore
 *   (4) combinedScore 降冪，同分以首次出現順序決定
 *   (5) 1-based 分頁
 * 純函式運算，不保留跨呼叫狀態。
 */
export class ResultFusionRanker {
  private readonly logger: Logger;

  constructor(
    private readonly strategy: FusionStrategy = new HybridScore(),
    logger?: Logger,
  ) {
    this.logger = logger ?? new Logger('ResultFusionRanker');
  }

  get strategyName(): string {
    return this.strategy.name;
  }

  fuse<T extends SourceHit>(
    lexicalHits: readonly T[],
    vectorHits: readonly T[],
    page: PageRequest,
  ): FusionPage<T> {
    const ranked = this.rank(lexicalHits, vectorHits);
    const hits = paginate(ranked, page);

    this.logger.info('Fused search results', {
      strategy: this.strategy.name,
      lexicalHits: lexicalHits.length,
      vectorHits: vectorHits.length,
      totalCount: ranked.length,
      pageNumber: page.pageNumber,
      pageSize: page.pageSize,
      returned: hits.length,
    });

    return { hits, totalCount: ranked.length };
  }

  /** 未分頁的完整排序結果 */
  rank<T extends SourceHit>(lexicalHits: readonly T[], vectorHits: readonly T[]): FusedHit<T>[] {
    const merged = new Map<string, MergedRecord<T>>();
    this.mergeInto(merged, lexicalHits, 'lexical');
    this.mergeInto(merged, vectorHits, 'vector');

    const records = [...merged.values()];
    if (records.length === 0) return [];

    let maxLexical = 0;
    let maxVector = 0;
    for (const r of records) {
      if (r.lexicalScore > maxLexical) maxLexical = r.lexicalScore;
      if (r.vectorScore > maxVector) maxVector = r.vectorScore;
    }

    const lexicalRanks = rankWithin(records, 'lexical');
    const vectorRanks = rankWithin(records, 'vector');

    const fused = records.map((r) => {
      const candidate: FusionCandidate = {
        key: r.key,
        order: r.order,
        lexicalScore: r.lexicalScore,
        vectorScore: r.vectorScore,
        normalizedLexicalScore: normalizeByMax(r.lexicalScore, maxLexical),
        normalizedVectorScore: normalizeByMax(r.vectorScore, maxVector),
        lexicalRank: lexicalRanks.get(r.key) ?? null,
        vectorRank: vectorRanks.get(r.key) ?? null,
      };
      const combinedScore = this.strategy.combine(candidate);
      return { order: r.order, hit: toFusedHit(r.hit, candidate, combinedScore) };
    });

    fused.sort((a, b) => {
      const diff = b.hit.combinedScore - a.hit.combinedScore;
      return diff !== 0 ? diff : a.order - b.order;
    });

    return fused.map((f) => f.hit);
  }

  private mergeInto<T extends SourceHit>(
    merged: Map<string, MergedRecord<T>>,
    hits: readonly T[],
    source: Source,
  ): void {
    for (const hit of hits) {
      const identity = HitIdentity.of(hit);
      if (identity.isUnknown) {
        this.logger.warn('Hit without a complete identity key, grouping under unknown key', {
          source,
          identity: identity.toString(),
        });
      }
      const score = this.readScore(hit, source, identity);

      const existing = merged.get(identity.key);
      if (!existing) {
        merged.set(identity.key, {
          key: identity.key,
          order: merged.size,
          hit,
          lexicalScore: source === 'lexical' ? score : 0,
          vectorScore: source === 'vector' ? score : 0,
          inLexical: source === 'lexical',
          inVector: source === 'vector',
        });
        continue;
      }

      if (source === 'lexical') {
        existing.lexicalScore = Math.max(existing.lexicalScore, score);
        existing.inLexical = true;
      } else {
        existing.vectorScore = Math.max(existing.vectorScore, score);
        existing.inVector = true;
      }
    }
  }

  private readScore(hit: SourceHit, source: Source, identity: HitIdentity): number {
    if (typeof hit.score === 'number' && Number.isFinite(hit.score)) {
      return hit.score;
    }
    this.logger.warn('Hit without a usable score, treating it as 0', {
      source,
      identity: identity.toString(),
    });
    return 0;
  }
}

/**
 * 各路的 0-based 排名（依該路分數降冪，同分以首次出現順序）
 * 只有實際出現在該路清單的紀錄才有排名。
 */
function rankWithin<T extends SourceHit>(
  records: readonly MergedRecord<T>[],
  source: Source,
): Map<string, number> {
  const present = records.filter((r) => (source === 'lexical' ? r.inLexical : r.inVector));
  const scoreOf = (r: MergedRecord<T>): number => (source === 'lexical' ? r.lexicalScore : r.vectorScore);
  present.sort((a, b) => {
    const diff = scoreOf(b) - scoreOf(a);
    return diff !== 0 ? diff : a.order - b.order;
  });
  return new Map(present.map((r, rank) => [r.key, rank]));
}

function toFusedHit<T extends SourceHit>(
  hit: T,
  candidate: FusionCandidate,
  combinedScore: number,
): FusedHit<T> {
  return {
    ...hit,
    lexicalScore: candidate.lexicalScore,
    vectorScore: candidate.vectorScore,
    normalizedLexicalScore: candidate.normalizedLexicalScore,
    normalizedVectorScore: candidate.normalizedVectorScore,
    combinedScore,
  };
}

function paginate<T>(items: readonly T[], page: PageRequest): T[] {
  const { pageSize, pageNumber } = page;
  if (!Number.isInteger(pageSize) || !Number.isInteger(pageNumber) || pageSize <= 0 || pageNumber < 1) {
    return [];
  }
  const start = (pageNumber - 1) * pageSize;
  return items.slice(start, start + pageSize);
}
