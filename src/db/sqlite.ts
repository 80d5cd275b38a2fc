/**
 * SQLite database backend using better-sqlite3.
 */
import Database from "better-sqlite3";
import type { DatabaseBackend, DbRow, SqlParam } from "./backend.js";
import { SQLITE_SCHEMA_SQL } from "./schema.js";

export class SQLiteBackend implements DatabaseBackend {
  private db: Database.Database;

  constructor(path: string = ":memory:") {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
  }

  async initialize(): Promise<void> {
    this.db.exec(SQLITE_SCHEMA_SQL);
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<number> {
    return this.db.prepare<SqlParam[]>(sql).run(...params).changes;
  }

  async query(sql: string, params: SqlParam[] = []): Promise<DbRow[]> {
    return this.db.prepare<SqlParam[], DbRow>(sql).all(...params);
  }

  async queryOne(sql: string, params: SqlParam[] = []): Promise<DbRow | null> {
    const row = this.db.prepare<SqlParam[], DbRow>(sql).get(...params);
    return row ?? null;
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
