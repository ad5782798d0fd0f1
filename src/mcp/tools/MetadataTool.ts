import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpDependencies } from '../McpServer.js';

/**
 * MCP Tool: catalogue_metadata
 * 對應 CLI: catsearch metadata
 */
export function registerMetadataTool(server: McpServer, deps: Pick<McpDependencies, 'metadata'>): void {
  server.tool(
    'catalogue_metadata',
    'List metadata category keys and their distinct values',
    {},
    async () => ({
      content: [{
        type: 'text' as const,
        text: JSON.stringify(deps.metadata.listCategories(), null, 2),
      }],
    }),
  );
}
