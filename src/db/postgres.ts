/**
 * PostgreSQL database backend using postgres-js.
 */
import postgres from "postgres";
import type { DatabaseBackend, DbRow, SqlParam } from "./backend.js";
import { POSTGRES_SCHEMA_SQL } from "./schema.js";

/** Rewrite `?` placeholders to the `$1, $2, …` form postgres expects. */
export function toPostgresPlaceholders(sql: string): string {
  let index = 0;
  return sql.replace(/\?/g, () => `$${++index}`);
}

export class PostgresBackend implements DatabaseBackend {
  private sql: postgres.Sql;

  constructor(connectionString: string) {
    // One connection; the pipeline issues its statements in sequence.
    this.sql = postgres(connectionString, { max: 1, onnotice: () => {} });
  }

  async initialize(): Promise<void> {
    // Multi-statement DDL needs the simple query protocol.
    await this.sql.unsafe(POSTGRES_SCHEMA_SQL).simple();
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<number> {
    const result = await this.sql.unsafe(toPostgresPlaceholders(sql), params);
    return result.count;
  }

  async query(sql: string, params: SqlParam[] = []): Promise<DbRow[]> {
    return await this.sql.unsafe<DbRow[]>(toPostgresPlaceholders(sql), params);
  }

  async queryOne(sql: string, params: SqlParam[] = []): Promise<DbRow | null> {
    const rows = await this.query(sql, params);
    return rows[0] ?? null;
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}
