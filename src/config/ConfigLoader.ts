import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_CONFIG } from './defaults.js';
import type { CatalogueSearchConfig, PartialConfig } from './types.js';
import { isSupportedLanguage, SUPPORTED_LANGUAGES } from '../domain/value-objects/LanguageFamily.js';
import { isLogLevel } from '../shared/Logger.js';

export type { CatalogueSearchConfig } from './types.js';

export const CONFIG_FILE_NAME = '.catsearch.json';

/** .catsearch.json 的結構；每個區塊皆可部分覆寫 */
const FileConfigSchema = z.object({
  version: z.number().int().optional(),
  index: z.object({
    dbPath: z.string(),
    pagesDir: z.string(),
    maxChunkChars: z.number().int().positive(),
  }).partial().optional(),
  embedding: z.object({
    provider: z.enum(['openai', 'none']),
    model: z.string(),
    dimension: z.number(),
    maxBatchSize: z.number().int().positive(),
    apiKey: z.string(),
    baseUrl: z.string(),
  }).partial().optional(),
  search: z.object({
    defaultPageSize: z.number().int(),
    candidateMultiplier: z.number().int().positive(),
    maxCandidates: z.number().int().positive(),
    weights: z.object({ lexical: z.number(), vector: z.number() }),
    fusionMethod: z.enum(['linear', 'rrf']),
    rrfK: z.number().nonnegative(),
    defaultProximity: z.number(),
    highlightMarkers: z.object({ open: z.string(), close: z.string() }),
  }).partial().optional(),
  language: z.object({
    defaultLanguage: z.enum(SUPPORTED_LANGUAGES),
  }).partial().optional(),
  logging: z.object({
    level: z.enum(['debug', 'verbose', 'info', 'warn', 'error']),
  }).partial().optional(),
});

/** 逐區塊合併：partial 覆蓋 base */
function mergeConfig(base: CatalogueSearchConfig, partial: PartialConfig): CatalogueSearchConfig {
  return {
    version: partial.version ?? base.version,
    index: { ...base.index, ...partial.index },
    embedding: { ...base.embedding, ...partial.embedding },
    search: {
      ...base.search,
      ...partial.search,
      weights: { ...base.search.weights, ...partial.search?.weights },
      highlightMarkers: { ...base.search.highlightMarkers, ...partial.search?.highlightMarkers },
    },
    language: { ...base.language, ...partial.language },
    logging: { ...base.logging, ...partial.logging },
  };
}

function unsupportedLanguageMessage(): string {
  return `defaultLanguage must be one of: ${SUPPORTED_LANGUAGES.join(', ')}`;
}

/**
 * 環境變數覆蓋 config
 * OPENAI_BASE_URL → embedding.baseUrl
 * CATSEARCH_DEFAULT_LANGUAGE → language.defaultLanguage
 * CATSEARCH_LOG_LEVEL → logging.level
 */
function applyEnvOverrides(config: CatalogueSearchConfig, env: NodeJS.ProcessEnv): void {
  const baseUrl = env.OPENAI_BASE_URL;
  if (baseUrl) {
    config.embedding.baseUrl = baseUrl;
  }

  const defaultLanguage = env.CATSEARCH_DEFAULT_LANGUAGE?.trim().toLowerCase();
  if (defaultLanguage) {
    if (!isSupportedLanguage(defaultLanguage)) {
      throw new Error(unsupportedLanguageMessage());
    }
    config.language.defaultLanguage = defaultLanguage;
  }

  const level = env.CATSEARCH_LOG_LEVEL?.trim().toLowerCase();
  if (level && isLogLevel(level)) {
    config.logging.level = level;
  }
}

/** 驗證設定值的合法性 */
function validate(config: CatalogueSearchConfig): void {
  if (!Number.isInteger(config.embedding.dimension) || config.embedding.dimension <= 0) {
    throw new Error('dimension must be a positive integer');
  }

  const { lexical, vector } = config.search.weights;
  if (lexical < 0 || vector < 0) {
    throw new Error('weights must be non-negative');
  }
  if (Math.abs(lexical + vector - 1.0) > 0.001) {
    throw new Error('weights must sum to 1.0');
  }

  const pageSize = config.search.defaultPageSize;
  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > 100) {
    throw new Error('defaultPageSize must be an integer between 1 and 100');
  }

  const proximity = config.search.defaultProximity;
  // 0 為精確片語；未指定 proximity 的請求應為單字比對
  if (!Number.isInteger(proximity) || proximity < 1) {
    throw new Error('defaultProximity must be a positive integer');
  }

  if (!config.search.highlightMarkers.open || !config.search.highlightMarkers.close) {
    throw new Error('highlightMarkers must be non-empty');
  }

  if (!isSupportedLanguage(config.language.defaultLanguage)) {
    throw new Error(unsupportedLanguageMessage());
  }
}

function readFileConfig(configPath: string): PartialConfig {
  if (!fs.existsSync(configPath)) return {};

  const raw = fs.readFileSync(configPath, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Invalid JSON in ${configPath}`, { cause: err });
  }

  const parsed = FileConfigSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid config in ${configPath}: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/**
 * 載入設定：讀取 .catsearch.json（若存在）並合併到預設值上
 * @param projectRoot - 專案根目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 * @param env - 環境變數來源（測試可注入）
 */
export function loadConfig(
  projectRoot: string,
  overrides?: PartialConfig,
  env: NodeJS.ProcessEnv = process.env,
): CatalogueSearchConfig {
  const fileConfig = readFileConfig(path.join(projectRoot, CONFIG_FILE_NAME));

  // 合併順序：defaults < file config < overrides < env
  let merged = mergeConfig(DEFAULT_CONFIG, fileConfig);
  if (overrides) {
    merged = mergeConfig(merged, overrides);
  }

  applyEnvOverrides(merged, env);

  validate(merged);
  return merged;
}
