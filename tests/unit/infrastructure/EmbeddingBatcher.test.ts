import { describe, it, expect, vi } from 'vitest';
import { EmbeddingBatcher } from '../../../src/infrastructure/embedding/EmbeddingBatcher.js';
import type { EmbeddingPort, EmbeddingResult } from '../../../src/domain/ports/EmbeddingPort.js';
import { EmbeddingRateLimitError, EmbeddingUnavailableError } from '../../../src/domain/errors/DomainErrors.js';
import { Logger } from '../../../src/shared/Logger.js';

const silent = new Logger('test', 'error', () => {});
const noSleep = vi.fn((_ms: number) => Promise.resolve());

function mockProvider() {
  const embed = vi.fn(async (texts: string[]): Promise<EmbeddingResult[]> =>
    texts.map((t) => ({ vector: new Float32Array([t.length, 0, 0, 0]), tokensUsed: 10 }))
  );
  const provider: EmbeddingPort = {
    providerId: 'mock',
    dimension: 4,
    modelId: 'mock-model',
    embed,
    embedOne: async () => ({ vector: new Float32Array([0.1, 0.2, 0.3, 0.4]), tokensUsed: 10 }),
    isHealthy: async () => true,
  };
  return { provider, embed };
}

describe('EmbeddingBatcher', () => {
  it('should split into batches respecting maxBatchSize', async () => {
    const { provider, embed } = mockProvider();
    const batcher = new EmbeddingBatcher(provider, { maxBatchSize: 2, logger: silent });
    const results = await batcher.embedBatch(['a', 'bb', 'ccc', 'dddd', 'eeeee']);

    expect(results).toHaveLength(5);
    // 5 texts / batch size 2 = 3 calls (2+2+1)
    expect(embed).toHaveBeenCalledTimes(3);
    expect(embed.mock.calls.map((c) => c[0])).toEqual([['a', 'bb'], ['ccc', 'dddd'], ['eeeee']]);
    // 結果順序與輸入一致
    expect(results.map((r) => r.vector[0])).toEqual([1, 2, 3, 4, 5]);
  });

  it('should handle empty input', async () => {
    const { provider, embed } = mockProvider();
    const batcher = new EmbeddingBatcher(provider, { maxBatchSize: 10, logger: silent });
    expect(await batcher.embedBatch([])).toHaveLength(0);
    expect(embed).not.toHaveBeenCalled();
  });

  it('should retry a rate-limited batch', async () => {
    const { provider, embed } = mockProvider();
    embed.mockRejectedValueOnce(new EmbeddingRateLimitError('slow down'));
    const batcher = new EmbeddingBatcher(provider, { sleep: noSleep, logger: silent });

    const results = await batcher.embedBatch(['a', 'b']);

    expect(results).toHaveLength(2);
    expect(embed).toHaveBeenCalledTimes(2);
    expect(noSleep).toHaveBeenCalledTimes(1);
  });

  it('should give up after the rate-limit retry budget', async () => {
    const { provider, embed } = mockProvider();
    embed.mockRejectedValue(new EmbeddingRateLimitError('slow down'));
    const batcher = new EmbeddingBatcher(provider, { sleep: noSleep, logger: silent });

    await expect(batcher.embedBatch(['a'])).rejects.toThrow(EmbeddingRateLimitError);
    expect(embed).toHaveBeenCalledTimes(EmbeddingRateLimitError.maxRetries + 1);
  });

  it('should not retry other failures', async () => {
    const { provider, embed } = mockProvider();
    embed.mockRejectedValue(new EmbeddingUnavailableError('offline'));
    const batcher = new EmbeddingBatcher(provider, { sleep: noSleep, logger: silent });

    await expect(batcher.embedBatch(['a'])).rejects.toThrow('offline');
    expect(embed).toHaveBeenCalledTimes(1);
  });
});
