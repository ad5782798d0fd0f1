import type { Command } from 'commander';
import path from 'node:path';
import { loadConfig } from '../../config/ConfigLoader.js';
import { createCatalogue } from '../../createCatalogue.js';
import { SearchResultFormatter } from '../formatters/SearchResultFormatter.js';
import type { OutputFormat } from '../formatters/SearchResultFormatter.js';
import { parseFormat } from '../options.js';

interface MetadataOptions {
  projectRoot: string;
  status?: boolean;
  format: OutputFormat;
}

/** 註冊 metadata 指令：列出分類值，或以 --status 顯示索引統計 */
export function registerMetadataCommand(program: Command): void {
  program
    .command('metadata')
    .description('List category values available as search filters')
    .option('--project-root <path>', 'Project root directory', '.')
    .option('--status', 'Show index statistics instead')
    .option('--format <format>', 'Output format: json or text', parseFormat, 'text')
    .action((opts: MetadataOptions) => {
      const projectRoot = path.resolve(opts.projectRoot);
      const catalogue = createCatalogue(projectRoot, loadConfig(projectRoot));
      const formatter = new SearchResultFormatter();

      try {
        const data = opts.status ? catalogue.metadata.status() : catalogue.metadata.listCategories();
        process.stdout.write(formatter.formatObject(data, opts.format) + '\n');
      } finally {
        catalogue.close();
      }
    });
}
