import { describe, it, expect } from 'vitest';
import { HybridScore } from '../../../src/domain/value-objects/HybridScore.js';
import type { FusionCandidate } from '../../../src/domain/value-objects/FusionStrategy.js';
import { InvalidFusionWeightsError } from '../../../src/domain/errors/DomainErrors.js';

function candidate(normalizedLexicalScore: number, normalizedVectorScore: number): FusionCandidate {
  return {
    key: '["doc",1]',
    order: 0,
    lexicalScore: normalizedLexicalScore,
    vectorScore: normalizedVectorScore,
    normalizedLexicalScore,
    normalizedVectorScore,
    lexicalRank: 0,
    vectorRank: 0,
  };
}

describe('HybridScore', () => {
  it('should use 60/40 weights by default', () => {
    const strategy = new HybridScore();
    expect(strategy.name).toBe('linear');
    expect(strategy.weights).toEqual({ lexical: 0.6, vector: 0.4 });
    expect(strategy.combine(candidate(1, 1))).toBeCloseTo(1.0);
    expect(strategy.combine(candidate(0, 1))).toBeCloseTo(0.4);
    expect(strategy.combine(candidate(0.5, 0))).toBeCloseTo(0.3);
  });

  it('should apply custom weights', () => {
    const strategy = new HybridScore({ lexical: 1, vector: 0 });
    expect(strategy.combine(candidate(0.25, 1))).toBeCloseTo(0.25);
  });

  it('should reject negative or non-finite weights', () => {
    expect(() => new HybridScore({ lexical: -0.1, vector: 1 })).toThrow(InvalidFusionWeightsError);
    expect(() => new HybridScore({ lexical: 0.5, vector: Number.NaN })).toThrow(InvalidFusionWeightsError);
  });

  it('should freeze its weights', () => {
    const weights = { lexical: 0.7, vector: 0.3 };
    const strategy = new HybridScore(weights);
    weights.lexical = 0;
    expect(strategy.weights.lexical).toBe(0.7);
    expect(Object.isFrozen(strategy.weights)).toBe(true);
  });
});
