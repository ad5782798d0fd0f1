import type { EmbeddingPort } from '../domain/ports/EmbeddingPort.js';
import type { LexicalSearchPort, VectorSearchPort, VectorQuery } from '../domain/ports/SearchBackendPort.js';
import type { PageHit } from '../domain/entities/Hit.js';
import type { LanguageClassifier } from '../domain/services/LanguageClassifier.js';
import type { ResultFusionRanker } from '../domain/services/ResultFusionRanker.js';
import { HighlightExtractor } from '../domain/services/HighlightExtractor.js';
import { groupLanguageCode } from '../domain/value-objects/LanguageFamily.js';
import type { LanguageTag } from '../domain/value-objects/LanguageFamily.js';
import { EmbeddingRateLimitError, InvalidSearchRequestError } from '../domain/errors/DomainErrors.js';
import type { SearchConfig } from '../config/types.js';
import { SearchRequestSchema } from './dto/SearchRequest.js';
import type { SearchMode, SearchRequest } from './dto/SearchRequest.js';
import type { SearchResponse, SearchResultItem } from './dto/SearchResponse.js';
import { withRetry } from '../shared/RetryPolicy.js';
import { Logger, errorMessage } from '../shared/Logger.js';

export interface SearchUseCaseDeps {
  classifier: LanguageClassifier;
  lexical: LexicalSearchPort;
  vector: VectorSearchPort;
  embedding: EmbeddingPort;
  ranker: ResultFusionRanker;
  highlighter: HighlightExtractor;
  config: SearchConfig;
  defaultLanguage: LanguageTag;
  logger?: Logger;
  /** 測試可注入，避免 rate limit 重試真的等待 */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * 搜尋管線
 *
 *   (1) 驗證請求
 *   (2) 查詢語言分類（決定 lexical 欄位）
 *   (3) lexical / vector 兩路平行查詢
 *   (4) 單路失敗 → 記錄 warning 並降級；兩路都失敗 → 空結果
 *   (5) ResultFusionRanker 合併、正規化、排序、分頁
 *   (6) 從 snippet 擷取高亮字詞
 */
export class SearchUseCase {
  private readonly logger: Logger;

  constructor(private readonly deps: SearchUseCaseDeps) {
    this.logger = deps.logger ?? new Logger('SearchUseCase');
  }

  async search(input: SearchRequest): Promise<SearchResponse> {
    const start = Date.now();
    const request = parseRequest(input);
    const { config } = this.deps;

    const pageSize = request.pageSize ?? config.defaultPageSize;
    const pageNumber = request.pageNumber ?? 1;
    const requestedMode: SearchMode = request.mode ?? 'hybrid';
    const categories = request.categories ?? {};
    const proximity = request.proximityDistance ?? config.defaultProximity;
    const limit = candidateLimit(pageSize, config);

    const classified = this.deps.classifier.classify(request.query, this.deps.defaultLanguage);
    const language = groupLanguageCode(classified) ?? this.deps.defaultLanguage;

    this.logger.info('Search request', {
      query: request.query,
      language,
      mode: requestedMode,
      pageSize,
      pageNumber,
      categories: Object.keys(categories),
    });

    const wantLexical = requestedMode !== 'vector_only';
    const wantVector = requestedMode !== 'lexical_only';

    const [lexicalOutcome, vectorOutcome] = await Promise.allSettled([
      wantLexical
        ? this.deps.lexical.searchLexical({
          text: request.query,
          language,
          proximityDistance: proximity,
          searchType: request.searchType ?? 'strict',
          categories,
          limit,
        })
        : Promise.resolve<PageHit[]>([]),
      wantVector
        ? this.searchVector(request.query, { categories, limit })
        : Promise.resolve<PageHit[]>([]),
    ]);

    const warnings: string[] = [];
    let lexicalHits: PageHit[] = [];
    let vectorHits: PageHit[] = [];
    let lexicalOk = false;
    let vectorOk = false;

    if (wantLexical) {
      if (lexicalOutcome.status === 'fulfilled') {
        lexicalHits = lexicalOutcome.value;
        lexicalOk = true;
      } else {
        warnings.push(`Lexical search failed: ${errorMessage(lexicalOutcome.reason)}`);
        this.logger.warn('Lexical search failed', { error: errorMessage(lexicalOutcome.reason) });
      }
    }
    if (wantVector) {
      if (vectorOutcome.status === 'fulfilled') {
        vectorHits = vectorOutcome.value;
        vectorOk = true;
      } else {
        warnings.push(`Vector search failed: ${errorMessage(vectorOutcome.reason)}`);
        this.logger.warn('Vector search failed', { error: errorMessage(vectorOutcome.reason) });
      }
    }

    if (!lexicalOk && !vectorOk) {
      return {
        results: [],
        totalResults: 0,
        pageSize,
        pageNumber,
        language,
        searchMode: requestedMode,
        fusionMethod: this.deps.ranker.strategyName,
        highlightWords: [],
        durationMs: Date.now() - start,
        warnings,
      };
    }

    const searchMode: SearchMode = lexicalOk && vectorOk
      ? 'hybrid'
      : lexicalOk ? 'lexical_only' : 'vector_only';

    const { hits, totalCount } = this.deps.ranker.fuse(lexicalHits, vectorHits, { pageSize, pageNumber });

    const results: SearchResultItem[] = hits.map((hit) => ({
      ...hit,
      highlightWords: this.deps.highlighter.extract([hit.snippet], proximity),
    }));

    const fromSnippets = this.deps.highlighter.extract(hits.map((h) => h.snippet), proximity);
    const highlightWords = fromSnippets.length > 0
      ? fromSnippets
      : HighlightExtractor.fromQuery(request.query, proximity);

    const durationMs = Date.now() - start;
    this.logger.info('Search completed', {
      searchMode,
      lexicalHits: lexicalHits.length,
      vectorHits: vectorHits.length,
      totalResults: totalCount,
      returned: results.length,
      durationMs,
    });

    return {
      results,
      totalResults: totalCount,
      pageSize,
      pageNumber,
      language,
      searchMode,
      fusionMethod: this.deps.ranker.strategyName,
      highlightWords,
      durationMs,
      warnings,
    };
  }

  /** 查詢向量化（rate limit 時退避重試）後做 KNN */
  private async searchVector(query: string, vectorQuery: VectorQuery): Promise<PageHit[]> {
    const embedded = await withRetry(() => this.deps.embedding.embedOne(query), {
      maxRetries: EmbeddingRateLimitError.maxRetries,
      baseDelayMs: EmbeddingRateLimitError.baseDelayMs,
      isRetryable: (err) => err instanceof EmbeddingRateLimitError,
      onRetry: (attempt, _err, delayMs) => {
        this.logger.warn('Query embedding rate limited, retrying', { attempt, delayMs });
      },
      sleep: this.deps.sleep,
    });
    return this.deps.vector.searchKNN(embedded.vector, vectorQuery);
  }
}

function parseRequest(input: SearchRequest): SearchRequest {
  const parsed = SearchRequestSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'request'}: ${i.message}`);
    throw new InvalidSearchRequestError(`Invalid search request: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

/**
 * 每路 backend 的候選數：max(maxCandidates, pageSize × candidateMultiplier)
 * 與頁碼無關，同一查詢的每一頁都從同一組候選融合，totalResults 才會一致；
 * 超出候選範圍的頁面為空。
 */
export function candidateLimit(pageSize: number, config: SearchConfig): number {
  return Math.max(config.maxCandidates, pageSize * config.candidateMultiplier);
}
