import { McpServer as SDKMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { SearchUseCase } from '../application/SearchUseCase.js';
import type { MetadataUseCase } from '../application/MetadataUseCase.js';
import type { EmbeddingPort } from '../domain/ports/EmbeddingPort.js';
import { registerSearchTool } from './tools/SearchTool.js';
import { registerMetadataTool } from './tools/MetadataTool.js';
import { registerStatusTool } from './tools/StatusTool.js';

export interface McpDependencies {
  search: SearchUseCase;
  metadata: MetadataUseCase;
  embedding: EmbeddingPort;
  version: string;
  projectRoot: string;
}

/** 建立 MCP server 並註冊 catalogue_* 工具 */
export function createMcpServer(deps: McpDependencies): SDKMcpServer {
  const server = new SDKMcpServer(
    { name: 'catalogue-search', version: deps.version },
    { instructions: buildInstructions(deps.projectRoot) },
  );

  registerSearchTool(server, deps);
  registerMetadataTool(server, deps);
  registerStatusTool(server, deps);

  return server;
}

export function buildInstructions(projectRoot: string): string {
  return [
    'catalogue-search: multilingual (Hindi / Gujarati / English) search over a catalogue of scanned document pages.',
    '',
    'Available tools:',
    '- catalogue_search: hybrid keyword + semantic search; returns ranked pages with highlighted terms',
    '- catalogue_metadata: list category keys and their values (use them as search filters)',
    '- catalogue_status: index statistics',
    '',
    'Search tips:',
    '- proximityDistance 0 searches the exact phrase; larger values allow words further apart',
    '- searchType "fuzzy" matches word prefixes',
    '- categories filters by metadata, e.g. {"author": ["..."]}',
    '- results are pages; combinedScore is in [0, 1] with the default linear fusion',
    '',
    `Project root: ${projectRoot}`,
  ].join('\n');
}
