/** 下游 tokenizer / FTS 欄位支援的語言 tag */
export const SUPPORTED_LANGUAGES = ['hi', 'gu', 'en'] as const;

export type LanguageTag = (typeof SUPPORTED_LANGUAGES)[number];

/**
 * 偵測碼 → 正規語言 tag 的分組表
 *
 * 尼泊爾語、馬拉地語、梵語與印地語同為天城文，下游 analyzer 一視同仁，
 * 因此併入 hi；gu 與 en 原樣保留。不在表內的偵測碼一律視為不支援。
 */
export const LANGUAGE_FAMILY: ReadonlyMap<string, LanguageTag> = new Map<string, LanguageTag>([
  ['hi', 'hi'],
  ['ne', 'hi'],
  ['mr', 'hi'],
  ['sa', 'hi'],
  ['gu', 'gu'],
  ['en', 'en'],
]);

export function isSupportedLanguage(tag: string): tag is LanguageTag {
  return (SUPPORTED_LANGUAGES as readonly string[]).includes(tag);
}

/** 查表；不在表內回傳 undefined */
export function groupLanguageCode(code: string): LanguageTag | undefined {
  return LANGUAGE_FAMILY.get(code.trim().toLowerCase());
}
