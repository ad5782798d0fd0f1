import fs from 'node:fs/promises';
import path from 'node:path';
import type { PageSourcePort } from '../../domain/ports/PageSourcePort.js';

const PAGE_FILE_EXTENSIONS = new Set(['.md', '.markdown']);

export class FileSystemPageSource implements PageSourcePort {
  async directoryExists(dirPath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(dirPath);
      return stat.isDirectory();
    } catch {
      return false;
    }
  }

  /** 遞迴收集頁面檔（跳過隱藏目錄），依路徑排序 */
  async listPageFiles(dirPath: string): Promise<string[]> {
    const results: string[] = [];
    await this.walkDir(dirPath, results);
    return results.sort();
  }

  private async walkDir(dir: string, results: string[]): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!entry.name.startsWith('.')) {
          await this.walkDir(fullPath, results);
        }
      } else if (entry.isFile() && PAGE_FILE_EXTENSIONS.has(path.extname(entry.name).toLowerCase())) {
        results.push(fullPath);
      }
    }
  }

  async readFile(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf-8');
  }
}
