import Database from 'better-sqlite3';
import * as sqliteVec from 'sqlite-vec';
import { PRAGMA_SQL, SCHEMA_SQL, vecTableSQL } from './schema.js';
import { EmbeddingDimensionMismatchError, SqliteBusyError } from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';

/**
 * SQLite 資料庫管理器
 *
 * 負責：初始化 DB、載入 sqlite-vec extension、執行 schema、
 * 記錄與驗證 embedding 維度（避免模型切換後維度不符）。
 */
export class DatabaseManager {
  private readonly db: Database.Database;
  private readonly logger: Logger;

  constructor(
    dbPath: string,
    private readonly embeddingDimension: number = 1536,
    logger?: Logger,
  ) {
    this.logger = logger ?? new Logger('DatabaseManager');

    this.db = new Database(dbPath);
    sqliteVec.load(this.db);

    // PRAGMA 不支援批次，逐行執行
    for (const line of PRAGMA_SQL.trim().split('\n')) {
      const trimmed = line.trim();
      if (trimmed && !trimmed.startsWith('--')) {
        this.db.pragma(trimmed.replace('PRAGMA ', '').replace(';', ''));
      }
    }

    this.db.exec(SCHEMA_SQL);
    this.db.exec(vecTableSQL(this.embeddingDimension));

    this.db.prepare(
      "INSERT OR REPLACE INTO schema_meta(key, value) VALUES('version', '1')"
    ).run();

    try {
      this.validateEmbeddingDimension();
    } catch (err) {
      this.db.close();
      throw err;
    }

    this.logger.info('Database initialized', { dbPath, embeddingDimension });
  }

  getDb(): Database.Database {
    return this.db;
  }

  /** 包一層 transaction；SQLITE_BUSY 轉成可重試的 SqliteBusyError */
  transaction<T>(fn: () => T): T {
    try {
      return this.db.transaction(fn)();
    } catch (err) {
      if (err instanceof Database.SqliteError && err.code === 'SQLITE_BUSY') {
        throw new SqliteBusyError(err.message);
      }
      throw err;
    }
  }

  close(): void {
    this.db.close();
  }

  /**
   * 記錄並驗證 embedding 維度
   * 首次使用時寫入 schema_meta；之後不一致就拒絕啟動。
   */
  private validateEmbeddingDimension(): void {
    const row = this.db.prepare<[], { value: string }>(
      "SELECT value FROM schema_meta WHERE key = 'embedding_dimension'"
    ).get();

    if (!row) {
      this.db.prepare(
        "INSERT OR REPLACE INTO schema_meta(key, value) VALUES('embedding_dimension', ?)"
      ).run(String(this.embeddingDimension));
      return;
    }

    const storedDimension = parseInt(row.value, 10);
    if (storedDimension !== this.embeddingDimension) {
      throw new EmbeddingDimensionMismatchError(storedDimension, this.embeddingDimension);
    }
  }
}
