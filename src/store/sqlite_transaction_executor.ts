import * as fs from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";

import { createLogger, type StoreLogger } from "../logger";
import type { RowDecodeError, RowDecoder } from "./row_decode_error";
import {
  Cursor,
  type ChangeResult,
  type SqlArg,
  type StoreConnection,
  type TransactionExecutor,
  type UnitOfWork,
} from "./transaction_executor";

const LastInsertRow = z.object({ id: z.union([z.number(), z.bigint()]) });

class SqliteStoreConnection implements StoreConnection {
  private statements = new Map<string, Database.Statement>();

  constructor(private readonly db: Database.Database) {}

  private prepare(sql: string): Database.Statement {
    let stmt = this.statements.get(sql);
    if (!stmt) {
      stmt = this.db.prepare(sql);
      this.statements.set(sql, stmt);
    }
    return stmt;
  }

  executeChange(sql: string, args: readonly SqlArg[] = []): ChangeResult {
    const result = this.prepare(sql).run(...args);
    return { changes: result.changes, lastInsertRowid: result.lastInsertRowid };
  }

  executeQuery<T>(sql: string, args: readonly SqlArg[], decoder: RowDecoder<T>): Cursor<T> {
    const rows: T[] = [];
    const failures: RowDecodeError[] = [];
    for (const row of this.prepare(sql).all(...args)) {
      const decoded = decoder(row);
      if (decoded.ok) {
        rows.push(decoded.value);
      } else {
        failures.push(decoded.error);
      }
    }
    return new Cursor(rows, failures);
  }

  lastInsertedRowId(): number | bigint {
    return LastInsertRow.parse(this.prepare("SELECT last_insert_rowid() AS id").get()).id;
  }
}

export class SqliteTransactionExecutor implements TransactionExecutor {
  private db: Database.Database;
  private connection: SqliteStoreConnection;
  private log: StoreLogger;

  constructor(dbPath: string = "./data/tabsync.db", log: StoreLogger = createLogger()) {
    this.log = log;
    if (dbPath !== ":memory:") {
      fs.mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    if (dbPath !== ":memory:") {
      this.db.pragma("journal_mode = WAL");
    }
    this.initSchema();
    this.connection = new SqliteStoreConnection(this.db);
  }

  private initSchema() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS clients (
        guid TEXT UNIQUE,
        name TEXT NOT NULL,
        modified INTEGER NOT NULL,
        type TEXT,
        formfactor TEXT,
        os TEXT,
        version TEXT,
        fxaDeviceId TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_clients_fxa_device_id ON clients(fxaDeviceId);

      CREATE TABLE IF NOT EXISTS tabs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        client_guid TEXT,
        url TEXT NOT NULL,
        title TEXT NOT NULL,
        history TEXT,
        last_used INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_tabs_client_guid ON tabs(client_guid);

      -- Written by the remote devices registry; the tab store only reads it.
      CREATE TABLE IF NOT EXISTS remote_devices (
        guid TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        type TEXT,
        is_current_device INTEGER NOT NULL DEFAULT 0,
        date_created INTEGER NOT NULL,
        date_modified INTEGER NOT NULL,
        last_access_time INTEGER
      );
    `);
  }

  async runStatement(sql: string, args: readonly SqlArg[] = []): Promise<ChangeResult> {
    return this.connection.executeChange(sql, args);
  }

  async runQuery<T>(
    sql: string,
    args: readonly SqlArg[],
    decoder: RowDecoder<T>
  ): Promise<Cursor<T>> {
    return this.connection.executeQuery(sql, args, decoder);
  }

  async runInTransaction<T>(work: UnitOfWork<T>): Promise<T> {
    const tx = this.db.transaction(() => work(this.connection));
    try {
      return tx.immediate();
    } catch (error) {
      this.log.error(
        { evt: "store.transaction_failed", error: String(error) },
        "store.transaction_failed"
      );
      throw error;
    }
  }

  async withRawConnection<T>(work: UnitOfWork<T>): Promise<T> {
    return work(this.connection);
  }

  close() {
    this.db.close();
  }
}
