import { createHash } from 'node:crypto';

/**
 * 頁面內容指紋（SHA-256 hex）
 * 索引時以 (頁面檔原文, embedding model) 計算；兩者皆未變的頁面可以略過。
 */
export class ContentHash {
  private constructor(public readonly value: string) {}

  /** 多段輸入以 NUL 分隔後雜湊，避免 ("ab","c") 與 ("a","bc") 相撞 */
  static of(...parts: string[]): ContentHash {
    const hash = createHash('sha256');
    parts.forEach((part, i) => {
      if (i > 0) hash.update('\u0000');
      hash.update(part, 'utf-8');
    });
    return new ContentHash(hash.digest('hex'));
  }

  /** 從資料庫讀回的 hex 字串（不重新計算） */
  static fromHex(hex: string): ContentHash {
    return new ContentHash(hex);
  }

  equals(other: ContentHash): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }
}
