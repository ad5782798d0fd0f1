import type { CatalogueSearchConfig } from './types.js';

export const DEFAULT_CONFIG: CatalogueSearchConfig = {
  version: 1,
  index: {
    dbPath: '.catsearch/index.db',
    pagesDir: 'pages',
    maxChunkChars: 1200,
  },
  embedding: {
    provider: 'openai',
    model: 'text-embedding-3-small',
    dimension: 1536,
    maxBatchSize: 100,
  },
  search: {
    defaultPageSize: 20,
    candidateMultiplier: 3,
    maxCandidates: 200,
    weights: { lexical: 0.6, vector: 0.4 },
    fusionMethod: 'linear',
    rrfK: 60,
    defaultProximity: 30,
    highlightMarkers: { open: '<em>', close: '</em>' },
  },
  language: {
    defaultLanguage: 'hi',
  },
  logging: {
    level: 'info',
  },
};
