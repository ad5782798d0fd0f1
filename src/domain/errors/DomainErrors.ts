export type ErrorClassification = 'retryable' | 'degradable' | 'manual';

/** 所有 catalogue-search domain 錯誤的基底類別 */
export abstract class CatalogueSearchError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/** 判斷錯誤是否可重試（供 withRetry 的 isRetryable 使用） */
export function isRetryableError(err: unknown): boolean {
  return err instanceof CatalogueSearchError && err.classification === 'retryable';
}

// --- Retryable ---

export class SqliteBusyError extends CatalogueSearchError {
  readonly classification = 'retryable' as const;
  readonly code = 'SQLITE_BUSY';
  static readonly maxRetries = 5;
  static readonly baseDelayMs = 100;
}

export class EmbeddingRateLimitError extends CatalogueSearchError {
  readonly classification = 'retryable' as const;
  readonly code = 'EMBEDDING_RATE_LIMIT';
  static readonly maxRetries = 3;
  static readonly baseDelayMs = 1000;
}

// --- Degradable ---

export class EmbeddingUnavailableError extends CatalogueSearchError {
  readonly classification = 'degradable' as const;
  readonly code = 'EMBEDDING_UNAVAILABLE';
}

export class LexicalBackendError extends CatalogueSearchError {
  readonly classification = 'degradable' as const;
  readonly code = 'LEXICAL_BACKEND';
}

export class VectorBackendError extends CatalogueSearchError {
  readonly classification = 'degradable' as const;
  readonly code = 'VECTOR_BACKEND';
}

/** 語言偵測無法判定（輸入太短、只有符號等） */
export class DetectionFailureError extends CatalogueSearchError {
  readonly classification = 'degradable' as const;
  readonly code = 'LANGUAGE_DETECTION_FAILED';
}

// --- Manual ---

export class InvalidFusionWeightsError extends CatalogueSearchError {
  readonly classification = 'manual' as const;
  readonly code = 'INVALID_FUSION_WEIGHTS';

  constructor(
    public readonly lexical: number,
    public readonly vector: number,
    options?: ErrorOptions,
  ) {
    super(
      `Fusion weights must be finite and non-negative (lexical=${lexical}, vector=${vector})`,
      options,
    );
  }
}

export class InvalidSearchRequestError extends CatalogueSearchError {
  readonly classification = 'manual' as const;
  readonly code = 'INVALID_SEARCH_REQUEST';

  constructor(
    message: string,
    public readonly issues: string[],
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class EmbeddingDimensionMismatchError extends CatalogueSearchError {
  readonly classification = 'manual' as const;
  readonly code = 'EMBEDDING_DIMENSION_MISMATCH';

  constructor(
    public readonly storedDimension: number,
    public readonly configuredDimension: number,
    options?: ErrorOptions,
  ) {
    super(
      `Embedding dimension mismatch: database has ${storedDimension}, config specifies ${configuredDimension}. ` +
      'Delete the index database and run "catsearch index" to rebuild it with the new dimension.',
      options,
    );
  }
}

export class InvalidPageFileError extends CatalogueSearchError {
  readonly classification = 'manual' as const;
  readonly code = 'INVALID_PAGE_FILE';

  constructor(
    public readonly filePath: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid page file "${filePath}": ${reason}`, options);
  }
}
