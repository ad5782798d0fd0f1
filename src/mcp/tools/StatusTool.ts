import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { McpDependencies } from '../McpServer.js';

/**
 * MCP Tool: catalogue_status
 * 索引統計與 embedding 設定
 */
export function registerStatusTool(
  server: McpServer,
  deps: Pick<McpDependencies, 'metadata' | 'embedding'>,
): void {
  server.tool(
    'catalogue_status',
    'Show index statistics and embedding health',
    {},
    async () => {
      const status = deps.metadata.status();
      const reachable = await deps.embedding.isHealthy();

      const lines: string[] = [
        '# Catalogue Index Status',
        '',
        `Documents: ${status.documents}`,
        `Pages: ${status.pages}`,
        `Chunks: ${status.chunks}`,
        `Vectors: ${status.vectors}`,
        `Pages pending embedding: ${status.pagesPendingEmbedding}`,
        `Embedding: ${deps.embedding.providerId} / ${deps.embedding.modelId} (dimension ${status.embeddingDimension ?? 'unknown'})`,
        `Embedding reachable: ${reachable ? 'yes' : 'no'}`,
        `Last indexed: ${status.lastIndexedAt ?? 'never'}`,
        '',
        '## Pages by Language',
      ];

      for (const [language, count] of Object.entries(status.pagesByLanguage)) {
        lines.push(`  ${language}: ${count}`);
      }

      return {
        content: [{ type: 'text' as const, text: lines.join('\n') }],
      };
    },
  );
}
