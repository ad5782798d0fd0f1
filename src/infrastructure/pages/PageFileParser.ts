import matter from 'gray-matter';
import { z } from 'zod';
import { InvalidPageFileError } from '../../domain/errors/DomainErrors.js';

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform(String);

/** 頁面檔 front matter；categories 的值可為單一值或清單 */
const FrontMatterSchema = z.object({
  document_id: z.union([z.string().trim().min(1), z.number()]).transform(String),
  page_number: z.number().int().nonnegative(),
  original_filename: z.string().optional(),
  language: z.string().optional(),
  categories: z.record(z.union([scalar, z.array(scalar)])).optional(),
});

export interface ParsedPageFile {
  documentId: string;
  pageNumber: number;
  originalFilename: string | null;
  /** front matter 宣告的語言（未正規化）；缺少時由 IndexUseCase 偵測 */
  language: string | null;
  metadata: Record<string, string[]>;
  body: string;
}

/**
 * 解析 OCR 產出的頁面檔（Markdown + YAML front matter）
 * @throws InvalidPageFileError 缺少 document_id / page_number 或欄位型別錯誤
 */
export class PageFileParser {
  parse(raw: string, filePath: string): ParsedPageFile {
    let parsed: matter.GrayMatterFile<string>;
    try {
      parsed = matter(raw);
    } catch (err) {
      throw new InvalidPageFileError(filePath, 'front matter is not valid YAML', { cause: err });
    }

    const result = FrontMatterSchema.safeParse(parsed.data);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.') || 'front matter'}: ${i.message}`);
      throw new InvalidPageFileError(filePath, issues.join('; '));
    }

    const fm = result.data;
    const metadata: Record<string, string[]> = {};
    for (const [key, value] of Object.entries(fm.categories ?? {})) {
      metadata[key] = Array.isArray(value) ? value : [value];
    }

    return {
      documentId: fm.document_id,
      pageNumber: fm.page_number,
      originalFilename: fm.original_filename ?? null,
      language: fm.language?.trim() || null,
      metadata,
      body: parsed.content,
    };
  }
}
