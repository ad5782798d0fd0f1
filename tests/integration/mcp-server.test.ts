import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { createMcpServer, buildInstructions } from '../../src/mcp/McpServer.js';
import { createCatalogue } from '../../src/createCatalogue.js';
import type { Catalogue } from '../../src/createCatalogue.js';
import { loadConfig } from '../../src/config/ConfigLoader.js';
import { createMockEmbedding, makeTmpDir, scriptDetector, silentLogger, writePageFile } from './helpers.js';
import fs from 'node:fs';
import path from 'node:path';

/** 取出 tool 結果的第一段文字 */
function textOf(result: unknown): string {
  if (typeof result === 'object' && result !== null && 'content' in result && Array.isArray(result.content)) {
    const first: unknown = result.content[0];
    if (typeof first === 'object' && first !== null && 'text' in first && typeof first.text === 'string') {
      return first.text;
    }
  }
  throw new Error('Tool result has no text content');
}

function isErrorResult(result: unknown): boolean {
  return typeof result === 'object' && result !== null && 'isError' in result && result.isError === true;
}

/**
 * Feature: MCP Server 整合
 *
 * 作為 LLM client，我需要透過 MCP 工具搜尋頁面目錄、
 * 取得可用的分類篩選值與索引狀態。
 */
describe('MCP Server', () => {
  let tmpDir: string;
  let catalogue: Catalogue;
  let client: Client;

  beforeEach(async () => {
    tmpDir = makeTmpDir('catsearch-mcp-');
    writePageFile(path.join(tmpDir, 'pages'), 'gita-1.md', {
      documentId: 'gita',
      pageNumber: 1,
      language: 'en',
      categories: { author: 'Vyasa' },
      body: 'The holy river flows past the temple.',
    });

    const config = loadConfig(tmpDir, { embedding: { dimension: 4 } }, {});
    catalogue = createCatalogue(tmpDir, config, {
      embedding: createMockEmbedding().embedding,
      detector: scriptDetector,
      logger: silentLogger,
    });
    await catalogue.index.build(catalogue.pagesDir);

    const server = createMcpServer({
      search: catalogue.search,
      metadata: catalogue.metadata,
      embedding: catalogue.embedding,
      version: '0.0.0-test',
      projectRoot: tmpDir,
    });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    client = new Client({ name: 'test-client', version: '0.0.0' });
    await server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    catalogue.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  /**
   * Scenario: 成功建立 MCP Server 並註冊所有工具
   * Given 已索引的頁面目錄
   * When client 列出工具
   * Then 回傳三個 catalogue_* 工具
   */
  it('should register the catalogue tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual(['catalogue_metadata', 'catalogue_search', 'catalogue_status']);
  });

  /**
   * Scenario: 透過 catalogue_search 搜尋
   * When 以英文查詢 river
   * Then 回傳 JSON 格式的 SearchResponse
   */
  it('should answer catalogue_search with a JSON search response', async () => {
    const result = await client.callTool({ name: 'catalogue_search', arguments: { query: 'river', pageSize: 5 } });
    const response: unknown = JSON.parse(textOf(result));

    expect(response).toMatchObject({
      totalResults: 1,
      pageSize: 5,
      pageNumber: 1,
      language: 'en',
      searchMode: 'hybrid',
      highlightWords: ['river'],
      results: [{ documentId: 'gita', pageNumber: 1 }],
    });
  });

  /**
   * Scenario: 無效請求
   * When 查詢字串為空
   * Then 以 isError 回傳驗證訊息，而非中斷連線
   */
  it('should report invalid search requests as tool errors', async () => {
    const result = await client.callTool({ name: 'catalogue_search', arguments: { query: '  ' } });

    expect(isErrorResult(result)).toBe(true);
    expect(textOf(result)).toBe('Error: Invalid search request: query: query must not be empty');
  });

  it('should list category values', async () => {
    const result = await client.callTool({ name: 'catalogue_metadata', arguments: {} });
    expect(JSON.parse(textOf(result))).toEqual({ author: ['Vyasa'] });
  });

  it('should report index status', async () => {
    const result = await client.callTool({ name: 'catalogue_status', arguments: {} });
    const lines = textOf(result).split('\n');

    expect(lines[0]).toBe('# Catalogue Index Status');
    expect(lines).toContain('Documents: 1');
    expect(lines).toContain('Pages: 1');
    expect(lines).toContain('Vectors: 1');
    expect(lines).toContain('Pages pending embedding: 0');
    expect(lines).toContain('Embedding: mock / mock-model (dimension 4)');
    expect(lines).toContain('Embedding reachable: yes');
    expect(lines.slice(-2)).toEqual(['## Pages by Language', '  en: 1']);
  });

  /**
   * Scenario: buildInstructions 產生有效的指引文字
   * Given project root 路徑
   * When 建構 instructions
   * Then 包含工具說明與 project root
   */
  it('should build instructions with tool descriptions', () => {
    const instructions = buildInstructions(tmpDir);

    expect(instructions).toContain('catalogue_search');
    expect(instructions).toContain('catalogue_metadata');
    expect(instructions).toContain('catalogue_status');
    expect(instructions.endsWith(`Project root: ${tmpDir}`)).toBe(true);
  });
});
