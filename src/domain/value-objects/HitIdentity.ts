import type { SourceHit } from '../entities/Hit.js';

/**
 * Hit 的 identity key（documentId, pageNumber）
 *
 * 缺少 documentId 或 pageNumber 的 hit 不丟棄，而是歸到明確的 unknown 分量；
 * key 以 JSON 陣列序列化，避免 "a-1" + 2 與 "a" + "1-2" 這類字串拼接碰撞。
 */
export class HitIdentity {
  private constructor(
    public readonly documentId: string | null,
    public readonly pageNumber: number | null,
  ) {}

  static of(hit: SourceHit): HitIdentity {
    const documentId = typeof hit.documentId === 'string' && hit.documentId.length > 0
      ? hit.documentId
      : null;
    const pageNumber = typeof hit.pageNumber === 'number' && Number.isFinite(hit.pageNumber)
      ? hit.pageNumber
      : null;
    return new HitIdentity(documentId, pageNumber);
  }

  get isUnknown(): boolean {
    return this.documentId === null || this.pageNumber === null;
  }

  get key(): string {
    return JSON.stringify([this.documentId, this.pageNumber]);
  }

  toString(): string {
    return `${this.documentId ?? '<unknown>'}#${this.pageNumber ?? '<unknown>'}`;
  }
}
