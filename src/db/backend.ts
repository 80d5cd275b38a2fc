/**
 * Abstract database backend interface.
 *
 * All implementations use raw SQL, no ORM. Statements are written with `?`
 * placeholders.
 */

export type SqlParam = string | number | null;

export type DbRow = Record<string, unknown>;

export interface DatabaseBackend {
  /** Create tables / indexes for the backend's dialect. */
  initialize(): Promise<void>;

  /** Execute a write statement (INSERT, UPDATE, DELETE); returns affected rows. */
  execute(sql: string, params?: SqlParam[]): Promise<number>;

  /** Run a SELECT (or a statement with RETURNING) and return all rows. */
  query(sql: string, params?: SqlParam[]): Promise<DbRow[]>;

  /** Run a SELECT and return the first row, or null. */
  queryOne(sql: string, params?: SqlParam[]): Promise<DbRow | null>;

  /** Close the connection / release resources. */
  close(): Promise<void>;
}

/**
 * Acquire a backend, initialise its schema and hand it to `fn`. The backend
 * is closed on every exit path.
 */
export async function withDatabase<T>(
  acquire: () => DatabaseBackend,
  fn: (db: DatabaseBackend) => Promise<T>,
): Promise<T> {
  const db = acquire();
  try {
    await db.initialize();
    return await fn(db);
  } finally {
    await db.close();
  }
}
