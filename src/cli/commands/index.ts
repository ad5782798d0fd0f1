import type { Command } from 'commander';
import path from 'node:path';
import { loadConfig } from '../../config/ConfigLoader.js';
import { createCatalogue } from '../../createCatalogue.js';
import { SearchResultFormatter } from '../formatters/SearchResultFormatter.js';
import type { OutputFormat } from '../formatters/SearchResultFormatter.js';
import { parseFormat } from '../options.js';

interface IndexOptions {
  projectRoot: string;
  pagesDir?: string;
  force?: boolean;
  format: OutputFormat;
}

/** 註冊 index 指令：讀取頁面檔並更新索引 */
export function registerIndexCommand(program: Command): void {
  program
    .command('index')
    .description('Load page text files into the search index')
    .option('--project-root <path>', 'Project root directory', '.')
    .option('--pages-dir <dir>', 'Page files directory (default from config)')
    .option('--force', 'Re-index every page even when unchanged')
    .option('--format <format>', 'Output format: json or text', parseFormat, 'text')
    .action(async (opts: IndexOptions) => {
      const projectRoot = path.resolve(opts.projectRoot);
      const config = loadConfig(projectRoot);
      const catalogue = createCatalogue(projectRoot, config);
      const formatter = new SearchResultFormatter();

      try {
        const pagesDir = opts.pagesDir ? path.resolve(projectRoot, opts.pagesDir) : catalogue.pagesDir;
        const stats = await catalogue.index.build(pagesDir, { force: opts.force ?? false });

        process.stdout.write(formatter.formatObject(stats, opts.format) + '\n');
        process.exitCode = stats.pagesFailed > 0 ? 1 : 0;
      } finally {
        catalogue.close();
      }
    });
}
