import type { EmbeddingPort, EmbeddingResult } from '../../domain/ports/EmbeddingPort.js';
import { EmbeddingRateLimitError } from '../../domain/errors/DomainErrors.js';
import { withRetry } from '../../shared/RetryPolicy.js';
import { Logger } from '../../shared/Logger.js';

export interface EmbeddingBatcherOptions {
  maxBatchSize?: number;
  /** 測試可注入，避免真的等待 */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * 將大量段落拆成批次送入 EmbeddingPort
 * 遇到 EmbeddingRateLimitError 時依其 maxRetries / baseDelayMs 退避重試該批次
 */
export class EmbeddingBatcher {
  private readonly maxBatchSize: number;
  private readonly logger: Logger;

  constructor(
    private readonly provider: EmbeddingPort,
    private readonly options: EmbeddingBatcherOptions = {},
  ) {
    this.maxBatchSize = Math.max(1, options.maxBatchSize ?? 100);
    this.logger = options.logger ?? new Logger('EmbeddingBatcher');
  }

  async embedBatch(texts: string[]): Promise<EmbeddingResult[]> {
    if (texts.length === 0) return [];

    const results: EmbeddingResult[] = [];
    for (let i = 0; i < texts.length; i += this.maxBatchSize) {
      const batch = texts.slice(i, i + this.maxBatchSize);
      const batchResults = await withRetry(() => this.provider.embed(batch), {
        maxRetries: EmbeddingRateLimitError.maxRetries,
        baseDelayMs: EmbeddingRateLimitError.baseDelayMs,
        isRetryable: (err) => err instanceof EmbeddingRateLimitError,
        onRetry: (attempt, _err, delayMs) => {
          this.logger.warn('Embedding batch rate limited, retrying', { attempt, delayMs, batchStart: i });
        },
        sleep: this.options.sleep,
      });
      results.push(...batchResults);
      this.logger.debug('Embedded batch', { batchStart: i, batchSize: batch.length });
    }
    return results;
  }
}
