export interface EmbeddingResult {
  vector: Float32Array;
  tokensUsed: number;
}

/** 查詢與段落的向量化（模型選擇不在本系統範圍內） */
export interface EmbeddingPort {
  readonly providerId: string;
  readonly dimension: number;
  readonly modelId: string;
  embed(texts: string[]): Promise<EmbeddingResult[]>;
  embedOne(text: string): Promise<EmbeddingResult>;
  isHealthy(): Promise<boolean>;
}
