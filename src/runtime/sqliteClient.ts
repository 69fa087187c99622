import Database from "better-sqlite3";

/** Positional parameters bound to a prepared statement. */
export type SqliteParam = string | number | bigint | Buffer | null;

/** A row exactly as SQLite returns it. Integers come back as bigint. */
export type SqliteRow = Record<string, SqliteParam>;

/** Outcome of a write statement. */
export type SqliteRunResult = {
  /** Rows inserted, updated or deleted by the statement. */
  changes: number;
};

/**
 * Prepared statement interface used by the gateway.
 * Next: call `.run(...)`, `.get(...)` or `.all(...)`.
 */
export interface SqliteStatement {
  /** True when the statement returns rows (`SELECT`, some `PRAGMA`s). */
  readonly reader: boolean;
  /**
   * Execute a write statement.
   * Next: read `changes` for the affected row count.
   */
  run(params?: readonly SqliteParam[]): SqliteRunResult;
  /**
   * Read one row.
   * Next: decode the returned row object.
   */
  get<T = unknown>(params?: readonly SqliteParam[]): T | undefined;
  /**
   * Read all rows.
   * Next: decode and coerce each row.
   */
  all<T = unknown>(params?: readonly SqliteParam[]): T[];
}

/**
 * SQLite client used inside a single connection scope.
 * Next: obtain one through `withSqliteClient(...)`.
 */
export interface SqliteClient {
  /**
   * Execute a statement once.
   * Next: call `prepare(...)` for reads.
   */
  run(sql: string, params?: readonly SqliteParam[]): SqliteRunResult;
  /**
   * Build a prepared statement wrapper.
   * Next: call statement methods with optional parameters.
   */
  prepare(sql: string): SqliteStatement;
  /**
   * Close the underlying SQLite database handle.
   * Next: nothing; the scope owns the handle.
   */
  close(): void;
}

/** Options forwarded to `better-sqlite3` when a scope opens. */
export type SqliteOpenOptions = {
  /** Milliseconds to wait on a locked database file before failing. */
  busyTimeoutMs?: number;
  /** Called with every SQL string before it runs. */
  onStatement?: (sql: string, params: readonly SqliteParam[]) => void;
};

function adaptStatement(
  statement: Database.Statement,
  sql: string,
  options: SqliteOpenOptions,
): SqliteStatement {
  return {
    reader: statement.reader,
    run(params: readonly SqliteParam[] = []): SqliteRunResult {
      options.onStatement?.(sql, params);
      const info = statement.run(...params);
      return { changes: info.changes };
    },
    get<T = unknown>(params: readonly SqliteParam[] = []): T | undefined {
      options.onStatement?.(sql, params);
      return statement.get(...params) as T | undefined;
    },
    all<T = unknown>(params: readonly SqliteParam[] = []): T[] {
      options.onStatement?.(sql, params);
      return statement.all(...params) as T[];
    },
  };
}

/**
 * Open a SQLite client backed by `better-sqlite3`.
 * Next: prefer `withSqliteClient(...)`, which closes the handle for you.
 */
export function createSqliteClient(
  path: string,
  options: SqliteOpenOptions = {},
): SqliteClient {
  // The driver rejects an explicit `timeout: undefined`.
  const db =
    options.busyTimeoutMs === undefined
      ? new Database(path)
      : new Database(path, { timeout: options.busyTimeoutMs });
  // Integers beyond 2^53 must survive the trip back into storage strings.
  db.defaultSafeIntegers(true);
  return {
    run(sql: string, params: readonly SqliteParam[] = []): SqliteRunResult {
      return adaptStatement(db.prepare(sql), sql, options).run(params);
    },
    prepare(sql: string): SqliteStatement {
      return adaptStatement(db.prepare(sql), sql, options);
    },
    close(): void {
      db.close();
    },
  };
}

/**
 * Run `fn` inside a connection scope.
 * The handle is closed on every exit path, including thrown engine errors.
 */
export function withSqliteClient<T>(
  path: string,
  options: SqliteOpenOptions,
  fn: (client: SqliteClient) => T,
): T {
  const client = createSqliteClient(path, options);
  try {
    return fn(client);
  } finally {
    client.close();
  }
}

/** Opens a fresh connection scope per call. Bound to one database file. */
export type ConnectionScope = <T>(fn: (client: SqliteClient) => T) => T;
