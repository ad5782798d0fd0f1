import type { Command } from 'commander';
import path from 'node:path';
import { loadConfig } from '../../config/ConfigLoader.js';
import { LanguageClassifier } from '../../domain/services/LanguageClassifier.js';
import { TinyLdDetector } from '../../infrastructure/language/TinyLdDetector.js';
import { isSupportedLanguage, SUPPORTED_LANGUAGES } from '../../domain/value-objects/LanguageFamily.js';
import { Logger } from '../../shared/Logger.js';

interface ClassifyOptions {
  projectRoot: string;
  defaultLanguage?: string;
}

/**
 * 註冊 classify 指令：顯示查詢會被歸到哪個語言
 * 不需要開啟索引資料庫
 */
export function registerClassifyCommand(program: Command): void {
  program
    .command('classify')
    .description('Show the language tag a text is classified as')
    .argument('<text>', 'Text to classify')
    .option('--project-root <path>', 'Project root directory', '.')
    .option('--default-language <tag>', `Fallback tag (${SUPPORTED_LANGUAGES.join(', ')}; default from config)`)
    .action((text: string, opts: ClassifyOptions) => {
      const config = loadConfig(path.resolve(opts.projectRoot));
      const fallback = opts.defaultLanguage ?? config.language.defaultLanguage;
      if (!isSupportedLanguage(fallback)) {
        throw new Error(`defaultLanguage must be one of: ${SUPPORTED_LANGUAGES.join(', ')}`);
      }

      const classifier = new LanguageClassifier(
        new TinyLdDetector(),
        new Logger('LanguageClassifier', config.logging.level),
      );
      process.stdout.write(classifier.classify(text, fallback) + '\n');
    });
}
