// Core services
export { LanguageClassifier } from './domain/services/LanguageClassifier.js';
export { HighlightExtractor, DEFAULT_HIGHLIGHT_MARKERS } from './domain/services/HighlightExtractor.js';
export type { HighlightMarkers } from './domain/services/HighlightExtractor.js';
export { ResultFusionRanker } from './domain/services/ResultFusionRanker.js';
export type { FusionPage, PageRequest } from './domain/services/ResultFusionRanker.js';

// Value objects
export { HybridScore, DEFAULT_FUSION_WEIGHTS } from './domain/value-objects/HybridScore.js';
export type { FusionWeights } from './domain/value-objects/HybridScore.js';
export { RRFScore } from './domain/value-objects/RRFScore.js';
export { normalizeByMax } from './domain/value-objects/FusionStrategy.js';
export type { FusionCandidate, FusionStrategy } from './domain/value-objects/FusionStrategy.js';
export { HitIdentity } from './domain/value-objects/HitIdentity.js';
export {
  SUPPORTED_LANGUAGES,
  LANGUAGE_FAMILY,
  groupLanguageCode,
  isSupportedLanguage,
} from './domain/value-objects/LanguageFamily.js';
export type { LanguageTag } from './domain/value-objects/LanguageFamily.js';
export type { SourceHit, FusedHit, FusionScores, PageHit, CategoryFilter } from './domain/entities/Hit.js';

// Ports
export type { EmbeddingPort, EmbeddingResult } from './domain/ports/EmbeddingPort.js';
export type { LanguageDetectorPort } from './domain/ports/LanguageDetectorPort.js';
export type {
  LexicalQuery,
  LexicalSearchPort,
  SearchType,
  VectorQuery,
  VectorSearchPort,
} from './domain/ports/SearchBackendPort.js';

// Errors
export * from './domain/errors/DomainErrors.js';

// Application
export { SearchUseCase, candidateLimit } from './application/SearchUseCase.js';
export { IndexUseCase } from './application/IndexUseCase.js';
export { MetadataUseCase } from './application/MetadataUseCase.js';
export type { CatalogueStatus } from './application/MetadataUseCase.js';
export { SearchRequestSchema, SEARCH_MODES, SEARCH_TYPES } from './application/dto/SearchRequest.js';
export type { SearchMode, SearchRequest } from './application/dto/SearchRequest.js';
export type { SearchResponse, SearchResultItem } from './application/dto/SearchResponse.js';
export type { IndexStats } from './application/dto/IndexStats.js';

// Composition
export { createCatalogue, createEmbeddingAdapter, createFusionStrategy } from './createCatalogue.js';
export type { Catalogue, CatalogueOverrides } from './createCatalogue.js';
export { loadConfig, CONFIG_FILE_NAME } from './config/ConfigLoader.js';
export type { CatalogueSearchConfig, PartialConfig } from './config/types.js';
export { createMcpServer } from './mcp/McpServer.js';
export { Logger } from './shared/Logger.js';
export type { LogLevel, LogSink } from './shared/Logger.js';
