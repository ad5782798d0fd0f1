import type { LanguageDetectorPort } from '../ports/LanguageDetectorPort.js';
import { groupLanguageCode } from '../value-objects/LanguageFamily.js';
import { Logger, errorMessage } from '../../shared/Logger.js';

/**
 * 查詢 / 文件語言分類
 *
 * 判定順序：
 *   (a) 空字串 → defaultLanguage（刻意行為，非錯誤）
 *   (b) 偵測碼在分組表內 → 分組後的 tag
 *   (c) 偵測碼不在表內 → defaultLanguage
 *   (d) 偵測失敗 → defaultLanguage
 * 所有失敗路徑都收斂到 defaultLanguage，不向外拋錯。
 */
export class LanguageClassifier {
  private readonly logger: Logger;

  constructor(
    private readonly detector: LanguageDetectorPort,
    logger?: Logger,
  ) {
    this.logger = logger ?? new Logger('LanguageClassifier');
  }

  classify(text: string, defaultLanguage: string): string {
    if (text.trim().length === 0) {
      this.logger.debug('Empty text, using default language', { defaultLanguage });
      return defaultLanguage;
    }

    let detected: string;
    try {
      detected = this.detector.detect(text);
    } catch (err) {
      this.logger.warn('Language detection failed, using default language', {
        detector: this.detector.detectorId,
        sample: text.slice(0, 50),
        error: errorMessage(err),
        defaultLanguage,
      });
      return defaultLanguage;
    }

    const grouped = groupLanguageCode(detected);
    if (grouped === undefined) {
      this.logger.debug('Detected language is not supported, using default language', {
        detected,
        defaultLanguage,
      });
      return defaultLanguage;
    }

    if (grouped !== detected) {
      this.logger.verbose('Grouped detected language', { detected, grouped });
    }
    return grouped;
  }
}
