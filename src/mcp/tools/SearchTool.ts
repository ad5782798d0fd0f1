import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { SEARCH_MODES, SEARCH_TYPES } from '../../application/dto/SearchRequest.js';
import { InvalidSearchRequestError } from '../../domain/errors/DomainErrors.js';
import type { McpDependencies } from '../McpServer.js';

/**
 * MCP Tool: catalogue_search
 * 對應 CLI: catsearch search <query>
 * 請求欄位由 SearchUseCase 再驗證一次，驗證失敗以 isError 回傳。
 */
export function registerSearchTool(server: McpServer, deps: Pick<McpDependencies, 'search'>): void {
  server.tool(
    'catalogue_search',
    'Hybrid keyword + semantic search over the page catalogue',
    {
      query: z.string().describe('Search text (Hindi, Gujarati or English)'),
      proximityDistance: z.number().int().nullable().optional()
        .describe('0 = exact phrase; otherwise max word distance (default from config)'),
      pageSize: z.number().int().optional().describe('Results per page (1-100)'),
      pageNumber: z.number().int().optional().describe('1-based page number'),
      mode: z.enum(SEARCH_MODES).optional().describe('hybrid (default), lexical_only or vector_only'),
      searchType: z.enum(SEARCH_TYPES).optional().describe('strict (default) or fuzzy'),
      categories: z.record(z.array(z.string())).optional()
        .describe('Metadata filter: key -> allowed values'),
    },
    async (args) => {
      try {
        const response = await deps.search.search(args);
        return {
          content: [{ type: 'text' as const, text: JSON.stringify(response, null, 2) }],
        };
      } catch (err) {
        if (err instanceof InvalidSearchRequestError) {
          return {
            content: [{ type: 'text' as const, text: `Error: ${err.message}` }],
            isError: true,
          };
        }
        throw err;
      }
    },
  );
}
