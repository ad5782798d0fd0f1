import { InvalidFusionWeightsError } from '../errors/DomainErrors.js';
import type { FusionCandidate, FusionStrategy } from './FusionStrategy.js';

export interface FusionWeights {
  lexical: number;
  vector: number;
}

export const DEFAULT_FUSION_WEIGHTS: Readonly<FusionWeights> = Object.freeze({
  lexical: 0.6,
  vector: 0.4,
});

/**
 * 線性加權融合
 * combined = wLex × lexNorm + wVec × vecNorm
 *
 * 權重須為有限非負數；總和不強制為 1（設定檔層級另行驗證），
 * 預設 0.6 / 0.4 時 combined 落在 [0, 1]。
 */
export class HybridScore implements FusionStrategy {
  readonly name = 'linear';
  readonly weights: Readonly<FusionWeights>;

  constructor(weights: FusionWeights = DEFAULT_FUSION_WEIGHTS) {
    const { lexical, vector } = weights;
    if (!Number.isFinite(lexical) || !Number.isFinite(vector) || lexical < 0 || vector < 0) {
      throw new InvalidFusionWeightsError(lexical, vector);
    }
    this.weights = Object.freeze({ lexical, vector });
  }

  combine(candidate: FusionCandidate): number {
    return this.weights.lexical * candidate.normalizedLexicalScore
      + this.weights.vector * candidate.normalizedVectorScore;
  }
}
