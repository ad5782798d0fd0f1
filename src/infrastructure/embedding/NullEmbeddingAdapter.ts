import type { EmbeddingPort, EmbeddingResult } from '../../domain/ports/EmbeddingPort.js';
import { EmbeddingUnavailableError } from '../../domain/errors/DomainErrors.js';

/**
 * embedding.provider: 'none' 時使用
 * 每次呼叫都拋出 EmbeddingUnavailableError，SearchUseCase 據此降級為 lexical_only，
 * IndexUseCase 則略過向量寫入。
 */
export class NullEmbeddingAdapter implements EmbeddingPort {
  readonly providerId = 'none';
  readonly modelId = 'none';

  constructor(readonly dimension: number) {}

  async embed(_texts: string[]): Promise<EmbeddingResult[]> {
    throw new EmbeddingUnavailableError('Embedding provider is disabled');
  }

  async embedOne(_text: string): Promise<EmbeddingResult> {
    throw new EmbeddingUnavailableError('Embedding provider is disabled');
  }

  async isHealthy(): Promise<boolean> {
    return false;
  }
}
