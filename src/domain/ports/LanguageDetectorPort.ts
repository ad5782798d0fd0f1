/**
 * 統計式語言辨識
 * 非空輸入回傳 ISO 639-1 類語言碼；無法判定時拋出 DetectionFailureError。
 */
export interface LanguageDetectorPort {
  readonly detectorId: string;
  detect(text: string): string;
}
