import type { SearchResponse, SearchResultItem } from '../../application/dto/SearchResponse.js';

export type OutputFormat = 'json' | 'text';
export type DetailLevel = 'brief' | 'normal' | 'full';

/**
 * 漸進式揭露格式化器：根據 level 控制輸出細節
 *
 * - brief：僅來源檔 / 頁碼 + score
 * - normal：再加 snippet 與高亮字詞（預設）
 * - full：含各路分數與 metadata
 */
export class SearchResultFormatter {
  formatSearchResponse(
    response: SearchResponse,
    format: OutputFormat,
    level: DetailLevel = 'normal',
  ): string {
    if (format === 'json') {
      return JSON.stringify({
        ...response,
        results: response.results.map((r) => this.shapeResult(r, level)),
      }, null, 2);
    }
    return this.textResponse(response, level);
  }

  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  private shapeResult(r: SearchResultItem, level: DetailLevel): unknown {
    if (level === 'brief') {
      return {
        documentId: r.documentId,
        pageNumber: r.pageNumber,
        originalFilename: r.originalFilename,
        score: r.combinedScore,
      };
    }
    if (level === 'full') {
      return { ...r };
    }
    return {
      documentId: r.documentId,
      pageNumber: r.pageNumber,
      originalFilename: r.originalFilename,
      snippet: r.snippet,
      highlightWords: r.highlightWords,
      score: r.combinedScore,
    };
  }

  private textResponse(response: SearchResponse, level: DetailLevel): string {
    const header = `Found ${response.totalResults} results `
      + `(page ${response.pageNumber}, mode: ${response.searchMode}, language: ${response.language}, ${response.durationMs}ms)`;
    if (response.results.length === 0) {
      return `${header}\nNo results found.`;
    }

    const lines = [header];
    if (response.highlightWords.length > 0) {
      lines.push(`Highlights: ${response.highlightWords.join(', ')}`);
    }
    lines.push('');

    const offset = (response.pageNumber - 1) * response.pageSize;
    const blocks = response.results.map((r, i) => {
      const source = r.originalFilename ?? r.documentId;
      const entry = [`[${offset + i + 1}] ${source} p.${r.pageNumber} (score: ${r.combinedScore.toFixed(4)})`];
      if (level === 'brief') return entry.join('\n');

      entry.push(`    Snippet: ${r.snippet}`);
      if (level === 'full') {
        entry.push(`    Lexical: ${r.lexicalScore.toFixed(4)} (norm ${r.normalizedLexicalScore.toFixed(4)})`
          + ` | Vector: ${r.vectorScore.toFixed(4)} (norm ${r.normalizedVectorScore.toFixed(4)})`);
        for (const [key, values] of Object.entries(r.metadata)) {
          entry.push(`    ${key}: ${values.join(', ')}`);
        }
      }
      return entry.join('\n');
    });

    return [...lines, blocks.join('\n\n')].join('\n');
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${String(val)}`;
      })
      .join('\n');
  }
}
