import type { Command } from 'commander';
import path from 'node:path';
import { loadConfig } from '../../config/ConfigLoader.js';
import { createCatalogue } from '../../createCatalogue.js';
import { createMcpServer } from '../../mcp/McpServer.js';
import { startStdioTransport } from '../../mcp/transports/StdioTransport.js';
import { startHttpTransport } from '../../mcp/transports/HttpTransport.js';
import { parseInteger } from '../options.js';

interface McpOptions {
  projectRoot: string;
  http?: boolean;
  port: number;
}

/**
 * 註冊 mcp 指令
 *
 * 用法：
 *   catsearch mcp [--project-root .] [--http] [--port 8181]
 */
export function registerMcpCommand(program: Command, version: string): void {
  program
    .command('mcp')
    .description('Start MCP server for LLM tool integration')
    .option('--project-root <path>', 'Project root directory', '.')
    .option('--http', 'Use HTTP transport instead of stdio')
    .option('--port <number>', 'HTTP server port (with --http)', parseInteger, 8181)
    .action(async (opts: McpOptions) => {
      const projectRoot = path.resolve(opts.projectRoot);
      const catalogue = createCatalogue(projectRoot, loadConfig(projectRoot));

      const server = createMcpServer({
        search: catalogue.search,
        metadata: catalogue.metadata,
        embedding: catalogue.embedding,
        version,
        projectRoot,
      });

      if (opts.http) {
        const httpServer = await startHttpTransport(server, opts.port);

        const shutdown = (): void => {
          httpServer.close();
          catalogue.close();
          process.exit(0);
        };
        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);
      } else {
        // stdio 模式：持續執行直到 stdin 關閉
        await startStdioTransport(server);

        process.on('SIGINT', () => {
          catalogue.close();
          process.exit(0);
        });
      }
    });
}
