/**
 * Database manager using sql.js
 * Creates the memory tables on open; file-backed when a path is given
 */

import initSqlJs, { type Database as SqlJsDatabase, type SqlValue } from 'sql.js';
import { createRequire } from 'module';
import { dirname, join } from 'path';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { mkdir } from 'fs/promises';
import { noopLogger, type ILogger } from '@agentloom/agents';

export interface DatabaseConfig {
  /** Database file; in-memory when omitted */
  path?: string;
  logger?: ILogger;
}

export interface RunResult {
  changes: number;
}

export type Row = Record<string, SqlValue>;

const SCHEMA_VERSION = '1.0.0';

const CREATE_TABLES_SQL = `
  CREATE TABLE IF NOT EXISTS migrations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    version TEXT NOT NULL UNIQUE,
    applied_at INTEGER NOT NULL DEFAULT (strftime('%s', 'now'))
  );

  CREATE TABLE IF NOT EXISTS threads (
    thread_id TEXT PRIMARY KEY,
    parent_thread_id TEXT,
    history TEXT NOT NULL,
    metadata TEXT NOT NULL,
    updated_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_threads_parent ON threads(parent_thread_id);

  CREATE TABLE IF NOT EXISTS memory_entries (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    thread_id TEXT NOT NULL,
    role TEXT NOT NULL CHECK(role IN ('system', 'user', 'assistant', 'tool')),
    content TEXT NOT NULL,
    tool_call_id TEXT,
    tool_name TEXT,
    recorded_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_memory_entries_thread_id ON memory_entries(thread_id);
  CREATE INDEX IF NOT EXISTS idx_memory_entries_recorded_at ON memory_entries(recorded_at DESC)
`;

/**
 * sql.js ships its WASM binary next to its main script
 */
function locateWasmFile(): ArrayBuffer {
  const require = createRequire(import.meta.url);
  const wasmPath = join(dirname(require.resolve('sql.js')), 'sql-wasm.wasm');
  const buffer = readFileSync(wasmPath);
  return buffer.buffer.slice(buffer.byteOffset, buffer.byteOffset + buffer.byteLength);
}

export class DatabaseManager {
  private readonly logger: ILogger;
  private inTransaction = false;

  private constructor(
    private readonly db: SqlJsDatabase,
    private readonly path: string | undefined,
    logger: ILogger
  ) {
    this.logger = logger;
  }

  static async create(config: DatabaseConfig = {}): Promise<DatabaseManager> {
    const logger = config.logger ?? noopLogger;
    const SQL = await initSqlJs({ wasmBinary: locateWasmFile() });

    let db: SqlJsDatabase;
    if (config.path === undefined) {
      db = new SQL.Database();
    } else {
      await mkdir(dirname(config.path), { recursive: true });
      db = existsSync(config.path)
        ? new SQL.Database(readFileSync(config.path))
        : new SQL.Database();
      logger.debug('Opened database', { path: config.path });
    }

    const manager = new DatabaseManager(db, config.path, logger);
    manager.initialize();
    await manager.save();
    return manager;
  }

  get isPersistent(): boolean {
    return this.path !== undefined;
  }

  private initialize(): void {
    for (const statement of CREATE_TABLES_SQL.split(';').filter((s) => s.trim())) {
      this.db.run(statement);
    }
    this.db.run('INSERT OR IGNORE INTO migrations (version) VALUES (?)', [SCHEMA_VERSION]);
  }

  /**
   * Execute a write statement (auto-saves when file-backed)
   */
  execute(sql: string, params: SqlValue[] = []): RunResult {
    this.db.run(sql, params);
    const changes = this.db.getRowsModified();
    if (changes > 0 && !this.inTransaction) {
      this.saveSync();
    }
    return { changes };
  }

  query(sql: string, params: SqlValue[] = []): Row[] {
    const stmt = this.db.prepare(sql);
    try {
      stmt.bind(params);
      const rows: Row[] = [];
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
      return rows;
    } finally {
      stmt.free();
    }
  }

  queryOne(sql: string, params: SqlValue[] = []): Row | null {
    return this.query(sql, params)[0] ?? null;
  }

  /**
   * Run a transaction (saves after commit)
   */
  transaction<T>(fn: (db: DatabaseManager) => T): T {
    this.db.run('BEGIN TRANSACTION');
    this.inTransaction = true;
    try {
      const result = fn(this);
      this.db.run('COMMIT');
      this.inTransaction = false;
      this.saveSync();
      return result;
    } catch (error) {
      this.inTransaction = false;
      this.db.run('ROLLBACK');
      throw error;
    }
  }

  async save(): Promise<void> {
    this.saveSync();
  }

  private saveSync(): void {
    if (this.path !== undefined) {
      writeFileSync(this.path, Buffer.from(this.db.export()));
    }
  }

  close(): void {
    this.saveSync();
    this.db.close();
    this.logger.debug('Closed database', { path: this.path ?? ':memory:' });
  }
}
