import type { Command } from 'commander';
import path from 'node:path';
import { loadConfig } from '../../config/ConfigLoader.js';
import { createCatalogue } from '../../createCatalogue.js';
import type { SearchMode } from '../../application/dto/SearchRequest.js';
import type { SearchType } from '../../domain/ports/SearchBackendPort.js';
import { SearchResultFormatter } from '../formatters/SearchResultFormatter.js';
import type { DetailLevel, OutputFormat } from '../formatters/SearchResultFormatter.js';
import { collectCategory, parseFormat, parseInteger, parseLevel, parseMode, parseSearchType } from '../options.js';

interface SearchOptions {
  projectRoot: string;
  pageSize?: number;
  page: number;
  proximity?: number;
  mode: SearchMode;
  searchType: SearchType;
  category: Record<string, string[]>;
  format: OutputFormat;
  level: DetailLevel;
}

/** 註冊 search 指令 */
export function registerSearchCommand(program: Command): void {
  program
    .command('search')
    .description('Search the page catalogue')
    .argument('<query>', 'Search query')
    .option('--project-root <path>', 'Project root directory', '.')
    .option('--page-size <n>', 'Results per page (1-100, default from config)', parseInteger)
    .option('--page <n>', '1-based page number', parseInteger, 1)
    .option('--proximity <n>', '0 = exact phrase; otherwise max word distance', parseInteger)
    .option('--mode <mode>', 'hybrid, lexical_only or vector_only', parseMode, 'hybrid')
    .option('--search-type <type>', 'strict or fuzzy', parseSearchType, 'strict')
    .option('--category <key=value>', 'Metadata filter (repeatable)', collectCategory, {})
    .option('--format <format>', 'Output format: json or text', parseFormat, 'text')
    .option('--level <level>', 'Detail level: brief, normal, full', parseLevel, 'normal')
    .action(async (query: string, opts: SearchOptions) => {
      const projectRoot = path.resolve(opts.projectRoot);
      const config = loadConfig(projectRoot);
      const catalogue = createCatalogue(projectRoot, config);
      const formatter = new SearchResultFormatter();

      try {
        const response = await catalogue.search.search({
          query,
          pageSize: opts.pageSize,
          pageNumber: opts.page,
          proximityDistance: opts.proximity,
          mode: opts.mode,
          searchType: opts.searchType,
          categories: opts.category,
        });

        if (response.warnings.length > 0) {
          process.stderr.write(response.warnings.map((w) => `Warning: ${w}`).join('\n') + '\n');
        }

        process.stdout.write(formatter.formatSearchResponse(response, opts.format, opts.level) + '\n');
      } finally {
        catalogue.close();
      }
    });
}
