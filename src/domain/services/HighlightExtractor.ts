export interface HighlightMarkers {
  open: string;
  close: string;
}

/** Lexical backend 的 snippet 以 <em>…</em> 標記命中字詞 */
export const DEFAULT_HIGHLIGHT_MARKERS: Readonly<HighlightMarkers> = Object.freeze({
  open: '<em>',
  close: '</em>',
});

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** proximityDistance === 0 為精確片語模式，其餘（含 null / undefined）為單字模式 */
function isPhraseMode(proximityDistance: number | null | undefined): boolean {
  return proximityDistance === 0;
}

/**
 * 從標記過的 snippet 擷取 UI 高亮字詞
 *
 * - 片語模式：每個 span trim 後整段保留
 * - 單字模式：span 以空白切分，每個非空 token 各自保留
 * 輸出依首次出現順序去重（Set 保留插入順序）。
 */
export class HighlightExtractor {
  private readonly spanPattern: RegExp;

  constructor(markers: HighlightMarkers = DEFAULT_HIGHLIGHT_MARKERS) {
    if (!markers.open || !markers.close) {
      throw new RangeError('Highlight markers must be non-empty strings');
    }
    this.spanPattern = new RegExp(
      `${escapeRegExp(markers.open)}([\\s\\S]*?)${escapeRegExp(markers.close)}`,
      'gi',
    );
  }

  extract(snippets: readonly string[], proximityDistance?: number | null): string[] {
    const seen = new Set<string>();
    const phraseMode = isPhraseMode(proximityDistance);

    for (const snippet of snippets) {
      if (!snippet) continue;
      for (const match of snippet.matchAll(this.spanPattern)) {
        const span = match[1] ?? '';
        if (phraseMode) {
          addTerm(seen, span);
        } else {
          for (const token of span.split(/\s+/)) {
            addTerm(seen, token);
          }
        }
      }
    }

    return [...seen];
  }

  /**
   * 以查詢字串本身作為高亮來源
   * 用於 snippet 沒有任何標記時（例如只有 vector 命中）。
   */
  static fromQuery(query: string, proximityDistance?: number | null): string[] {
    const seen = new Set<string>();
    if (isPhraseMode(proximityDistance)) {
      addTerm(seen, query);
    } else {
      for (const token of query.split(/\s+/)) {
        addTerm(seen, token);
      }
    }
    return [...seen];
  }
}

function addTerm(seen: Set<string>, raw: string): void {
  const term = raw.trim();
  if (term) seen.add(term);
}
