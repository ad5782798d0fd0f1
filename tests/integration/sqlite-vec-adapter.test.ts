import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DatabaseManager } from '../../src/infrastructure/sqlite/DatabaseManager.js';
import { SqliteVecAdapter } from '../../src/infrastructure/sqlite/SqliteVecAdapter.js';
import { VectorBackendError } from '../../src/domain/errors/DomainErrors.js';
import { makeTmpDir, seedChunk, silentLogger } from './helpers.js';
import fs from 'node:fs';
import path from 'node:path';

describe('SqliteVecAdapter', () => {
  let tmpDir: string;
  let mgr: DatabaseManager;
  let adapter: SqliteVecAdapter;

  function index(documentId: string, vector: number[], text = `${documentId} text`, metadata: Record<string, string[]> = {}): number {
    const chunkId = seedChunk(mgr.getDb(), { documentId, pageNumber: 1, language: 'en', text, metadata });
    adapter.insertRows([{ chunkId, embedding: new Float32Array(vector) }]);
    return chunkId;
  }

  beforeEach(() => {
    tmpDir = makeTmpDir('catsearch-vec-');
    mgr = new DatabaseManager(path.join(tmpDir, 'test.db'), 4, silentLogger);
    adapter = new SqliteVecAdapter(mgr.getDb());
  });

  afterEach(() => {
    mgr.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should return nearest pages with similarity 1 / (1 + distance)', async () => {
    index('near', [1, 0, 0, 0]);
    index('far', [0, 1, 0, 0]);

    const hits = await adapter.searchKNN(new Float32Array([1, 0, 0, 0]), { categories: {}, limit: 10 });

    expect(hits.map((h) => h.documentId)).toEqual(['near', 'far']);
    expect(hits[0].score).toBeCloseTo(1.0);
    expect(hits[1].score).toBeCloseTo(1 / (1 + Math.SQRT2), 5);
    expect(hits[0]).toMatchObject({ pageNumber: 1, originalFilename: 'near.pdf', snippet: 'near text' });
  });

  it('should respect the limit', async () => {
    index('a', [1, 0, 0, 0]);
    index('b', [0.9, 0.1, 0, 0]);
    index('c', [0, 0, 1, 0]);

    const hits = await adapter.searchKNN(new Float32Array([1, 0, 0, 0]), { categories: {}, limit: 2 });
    expect(hits.map((h) => h.documentId)).toEqual(['a', 'b']);
    expect(await adapter.searchKNN(new Float32Array([1, 0, 0, 0]), { categories: {}, limit: 0 })).toEqual([]);
  });

  it('should apply category filters after the KNN step', async () => {
    index('a', [1, 0, 0, 0], 'a text', { author: ['Vyasa'] });
    index('b', [0.5, 0.5, 0, 0], 'b text', { author: ['Sant'] });

    const hits = await adapter.searchKNN(new Float32Array([1, 0, 0, 0]), { categories: { author: ['Sant'] }, limit: 1 });
    expect(hits.map((h) => h.documentId)).toEqual(['b']);
    expect(hits[0].metadata).toEqual({ author: ['Sant'] });
  });

  it('should cut the snippet to the start of the chunk', async () => {
    index('long', [1, 0, 0, 0], 'x'.repeat(400));
    const [hit] = await adapter.searchKNN(new Float32Array([1, 0, 0, 0]), { categories: {}, limit: 1 });
    expect(hit.snippet).toHaveLength(300);
  });

  it('should delete vectors', async () => {
    const chunkId = index('gone', [1, 0, 0, 0]);
    adapter.deleteRows([chunkId]);
    expect(await adapter.searchKNN(new Float32Array([1, 0, 0, 0]), { categories: {}, limit: 5 })).toEqual([]);
  });

  it('should wrap a dimension mismatch in VectorBackendError', async () => {
    index('a', [1, 0, 0, 0]);
    await expect(adapter.searchKNN(new Float32Array([1, 0]), { categories: {}, limit: 5 }))
      .rejects.toThrow(VectorBackendError);
  });
});
