import OpenAI from 'openai';
import type { EmbeddingPort, EmbeddingResult } from '../../domain/ports/EmbeddingPort.js';
import { EmbeddingUnavailableError, EmbeddingRateLimitError } from '../../domain/errors/DomainErrors.js';
import { errorMessage } from '../../shared/Logger.js';

export interface OpenAIEmbeddingConfig {
  apiKey: string;
  model?: string;
  dimension?: number;
  baseUrl?: string;
  maxRetries?: number;
}

/** 任何 OpenAI-compatible `/embeddings` endpoint */
export class OpenAIEmbeddingAdapter implements EmbeddingPort {
  readonly providerId = 'openai';
  readonly dimension: number;
  readonly modelId: string;
  private readonly client: OpenAI;

  constructor(config: OpenAIEmbeddingConfig) {
    this.dimension = config.dimension ?? 1536;
    this.modelId = config.model ?? 'text-embedding-3-small';
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: config.maxRetries ?? 2,
    });
  }

  async embed(texts: string[]): Promise<EmbeddingResult[]> {
    if (texts.length === 0) return [];

    let response: OpenAI.CreateEmbeddingResponse;
    try {
      response = await this.client.embeddings.create({
        model: this.modelId,
        input: texts,
        encoding_format: 'float',
      });
    } catch (err) {
      if (err instanceof OpenAI.APIError && err.status === 429) {
        throw new EmbeddingRateLimitError('Rate limited by embedding endpoint', { cause: err });
      }
      throw new EmbeddingUnavailableError(`Embedding request failed: ${errorMessage(err)}`, { cause: err });
    }

    return response.data.map((item) => {
      if (item.embedding.length !== this.dimension) {
        throw new EmbeddingUnavailableError(
          `Model ${this.modelId} returned ${item.embedding.length} dimensions, expected ${this.dimension}`,
        );
      }
      return {
        vector: new Float32Array(item.embedding),
        tokensUsed: response.usage?.total_tokens ?? 0,
      };
    });
  }

  async embedOne(text: string): Promise<EmbeddingResult> {
    const [result] = await this.embed([text]);
    if (!result) {
      throw new EmbeddingUnavailableError('Embedding endpoint returned no vector');
    }
    return result;
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.embed(['health check']);
      return true;
    } catch {
      return false;
    }
  }
}
