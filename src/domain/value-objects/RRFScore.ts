import { InvalidFusionWeightsError } from '../errors/DomainErrors.js';
import type { FusionCandidate, FusionStrategy } from './FusionStrategy.js';
import type { FusionWeights } from './HybridScore.js';

/**
 * Reciprocal Rank Fusion (RRF)
 *
 * 以排名而非原始分數融合，不受兩路分數量級差異影響。
 * 公式：score = Σ(weight / (k + rank + 1))，rank 為 0-based，
 * 未出現在某一路的候選不取得該路貢獻。
 */
export class RRFScore implements FusionStrategy {
  /** RRF 平滑常數，降低排名差異的極端影響 */
  static readonly DEFAULT_K = 60;

  readonly name = 'rrf';
  readonly weights: Readonly<FusionWeights>;

  constructor(
    readonly k: number = RRFScore.DEFAULT_K,
    weights: FusionWeights = { lexical: 1.0, vector: 1.0 },
  ) {
    if (!Number.isFinite(k) || k < 0) {
      throw new RangeError(`RRF k must be a non-negative number, got ${k}`);
    }
    if (!Number.isFinite(weights.lexical) || !Number.isFinite(weights.vector)
      || weights.lexical < 0 || weights.vector < 0) {
      throw new InvalidFusionWeightsError(weights.lexical, weights.vector);
    }
    this.weights = Object.freeze({ ...weights });
  }

  combine(candidate: FusionCandidate): number {
    let score = 0;
    if (candidate.lexicalRank !== null) {
      score += this.weights.lexical / (this.k + candidate.lexicalRank + 1);
    }
    if (candidate.vectorRank !== null) {
      score += this.weights.vector / (this.k + candidate.vectorRank + 1);
    }
    return score;
  }
}
