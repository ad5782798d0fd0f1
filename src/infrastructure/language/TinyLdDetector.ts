import { detect } from 'tinyld';
import type { LanguageDetectorPort } from '../../domain/ports/LanguageDetectorPort.js';
import { DetectionFailureError } from '../../domain/errors/DomainErrors.js';
import { errorMessage } from '../../shared/Logger.js';

/** 送進偵測器的最大字元數；頁面全文只需取樣 */
const SAMPLE_LIMIT = 8_000;

/** tinyld 統計式語言辨識；回傳空字串代表無法判定 */
export class TinyLdDetector implements LanguageDetectorPort {
  readonly detectorId = 'tinyld';

  detect(text: string): string {
    let detected: string;
    try {
      detected = detect(text.slice(0, SAMPLE_LIMIT));
    } catch (err) {
      throw new DetectionFailureError(`Language detection failed: ${errorMessage(err)}`, { cause: err });
    }
    if (!detected.trim()) {
      throw new DetectionFailureError('Language could not be determined from input');
    }
    return detected;
  }
}
