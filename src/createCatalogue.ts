import fs from 'node:fs';
import path from 'node:path';
import type { CatalogueSearchConfig } from './config/types.js';
import type { EmbeddingPort } from './domain/ports/EmbeddingPort.js';
import type { LanguageDetectorPort } from './domain/ports/LanguageDetectorPort.js';
import type { FusionStrategy } from './domain/value-objects/FusionStrategy.js';
import { HybridScore } from './domain/value-objects/HybridScore.js';
import { RRFScore } from './domain/value-objects/RRFScore.js';
import { LanguageClassifier } from './domain/services/LanguageClassifier.js';
import { HighlightExtractor } from './domain/services/HighlightExtractor.js';
import { ResultFusionRanker } from './domain/services/ResultFusionRanker.js';
import { SearchUseCase } from './application/SearchUseCase.js';
import { IndexUseCase } from './application/IndexUseCase.js';
import { MetadataUseCase } from './application/MetadataUseCase.js';
import { DatabaseManager } from './infrastructure/sqlite/DatabaseManager.js';
import { FTS5Adapter } from './infrastructure/sqlite/FTS5Adapter.js';
import { SqliteVecAdapter } from './infrastructure/sqlite/SqliteVecAdapter.js';
import { OpenAIEmbeddingAdapter } from './infrastructure/embedding/OpenAIEmbeddingAdapter.js';
import { NullEmbeddingAdapter } from './infrastructure/embedding/NullEmbeddingAdapter.js';
import { EmbeddingBatcher } from './infrastructure/embedding/EmbeddingBatcher.js';
import { TinyLdDetector } from './infrastructure/language/TinyLdDetector.js';
import { PageFileParser } from './infrastructure/pages/PageFileParser.js';
import { ParagraphChunker } from './infrastructure/pages/ParagraphChunker.js';
import { FileSystemPageSource } from './infrastructure/pages/FileSystemPageSource.js';
import { Logger } from './shared/Logger.js';

export interface CatalogueOverrides {
  embedding?: EmbeddingPort;
  detector?: LanguageDetectorPort;
  logger?: Logger;
  /** 測試可注入，避免重試真的等待 */
  sleep?: (ms: number) => Promise<void>;
}

/** 已組裝好的用例與其共用的資料庫連線 */
export interface Catalogue {
  config: CatalogueSearchConfig;
  projectRoot: string;
  dbManager: DatabaseManager;
  embedding: EmbeddingPort;
  classifier: LanguageClassifier;
  search: SearchUseCase;
  index: IndexUseCase;
  metadata: MetadataUseCase;
  /** 設定中的頁面目錄（絕對路徑） */
  pagesDir: string;
  close(): void;
}

export function createFusionStrategy(config: CatalogueSearchConfig): FusionStrategy {
  return config.search.fusionMethod === 'rrf'
    ? new RRFScore(config.search.rrfK)
    : new HybridScore(config.search.weights);
}

export function createEmbeddingAdapter(config: CatalogueSearchConfig, logger: Logger): EmbeddingPort {
  const { embedding } = config;
  if (embedding.provider === 'none') {
    return new NullEmbeddingAdapter(embedding.dimension);
  }

  const apiKey = embedding.apiKey ?? process.env.OPENAI_API_KEY;
  if (!apiKey && !embedding.baseUrl) {
    logger.warn('No embedding API key configured, vector search disabled');
    return new NullEmbeddingAdapter(embedding.dimension);
  }

  return new OpenAIEmbeddingAdapter({
    apiKey: apiKey ?? '',
    model: embedding.model,
    dimension: embedding.dimension,
    baseUrl: embedding.baseUrl,
  });
}

/**
 * 依設定組裝所有依賴（CLI 與 MCP server 共用）
 * 呼叫端負責 close()。
 */
export function createCatalogue(
  projectRoot: string,
  config: CatalogueSearchConfig,
  overrides: CatalogueOverrides = {},
): Catalogue {
  const logger = overrides.logger ?? new Logger('catsearch', config.logging.level);

  const dbPath = path.resolve(projectRoot, config.index.dbPath);
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const dbManager = new DatabaseManager(dbPath, config.embedding.dimension, logger.child('DatabaseManager'));
  const db = dbManager.getDb();

  const embedding = overrides.embedding ?? createEmbeddingAdapter(config, logger);
  const classifier = new LanguageClassifier(
    overrides.detector ?? new TinyLdDetector(),
    logger.child('LanguageClassifier'),
  );
  const fts5 = new FTS5Adapter(db, config.search.highlightMarkers);
  const vec = new SqliteVecAdapter(db);

  const search = new SearchUseCase({
    classifier,
    lexical: fts5,
    vector: vec,
    embedding,
    ranker: new ResultFusionRanker(createFusionStrategy(config), logger.child('ResultFusionRanker')),
    highlighter: new HighlightExtractor(config.search.highlightMarkers),
    config: config.search,
    defaultLanguage: config.language.defaultLanguage,
    logger: logger.child('SearchUseCase'),
    sleep: overrides.sleep,
  });

  const index = new IndexUseCase({
    dbManager,
    fts5,
    vec,
    parser: new PageFileParser(),
    chunker: new ParagraphChunker(config.index.maxChunkChars),
    pages: new FileSystemPageSource(),
    batcher: new EmbeddingBatcher(embedding, {
      maxBatchSize: config.embedding.maxBatchSize,
      sleep: overrides.sleep,
      logger: logger.child('EmbeddingBatcher'),
    }),
    classifier,
    embeddingModelId: `${embedding.providerId}:${embedding.modelId}`,
    vectorsEnabled: embedding.providerId !== 'none',
    defaultLanguage: config.language.defaultLanguage,
    logger: logger.child('IndexUseCase'),
  });

  return {
    config,
    projectRoot,
    dbManager,
    embedding,
    classifier,
    search,
    index,
    metadata: new MetadataUseCase(db),
    pagesDir: path.resolve(projectRoot, config.index.pagesDir),
    close: () => dbManager.close(),
  };
}
