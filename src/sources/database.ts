import {
  withSqliteClient,
  type ConnectionScope,
  type SqliteClient,
  type SqliteParam,
  type SqliteRow,
} from "../runtime/sqliteClient";
import {
  resolveConfig,
  type DatabaseConfig,
  type DatabaseOptions,
} from "../runtime/config";
import type { ColumnKind } from "../core/columnKind";
import { coerceOnRead, validateOnWrite } from "../core/coerce";
import {
  DecodingError,
  EmptyUpdateError,
  TableNotFoundError,
} from "../core/errors";
import {
  buildSet,
  buildWhere,
  cellEncoder,
  limitToRows,
  type Predicate,
} from "../core/predicate";
import { DataBaseResponse, FetchMode } from "../core/response";
import { recordKeyProblems, safeAssign, type Row } from "../core/safeObject";
import type { DataMode } from "../security/encoding";
import {
  columnKinds,
  listTables,
  quoteIdent,
  readColumns,
  tableExists,
  type ColumnDescriptor,
} from "./schema";
import { Table } from "./table";

/**
 * Record gateway over one SQLite file.
 * Every value passes through the configured codec on the way in and is decoded
 * and coerced to its column kind on the way out.
 * Create via `rowseal.open(...)`.
 */
export class SqliteDatabase {
  readonly config: DatabaseConfig;
  private readonly _scope: ConnectionScope;

  constructor(options: DatabaseOptions = {}) {
    this.config = resolveConfig(options);
    const { path, busyTimeoutMs, debug, logger } = this.config;
    const onStatement = debug
      ? (sql: string, params: readonly SqliteParam[]) =>
          logger.debug(`[rowseal] ${sql.replace(/\s+/g, " ")} (${params.length} params)`)
      : undefined;
    this._scope = <T>(fn: (client: SqliteClient) => T): T =>
      withSqliteClient(path, { busyTimeoutMs, onStatement }, fn);
  }

  get path(): string {
    return this.config.path;
  }

  get mode(): DataMode {
    return this.config.mode;
  }

  /**
   * Insert one record or a list of records.
   * Values bind in the table's declared column order; missing columns bind NULL.
   * Any validation failure rejects the whole call with `status: false` and nothing is written.
   * @throws {TableNotFoundError} when the table does not exist.
   */
  add(data: Row, table: string): DataBaseResponse<Row | null>;
  add(data: Row[], table: string): DataBaseResponse<Row[] | null>;
  add(data: Row | Row[], table: string): DataBaseResponse<Row | Row[] | null> {
    return this._scope((client) => {
      const columns = readColumns(client, table);
      if (!columns) throw new TableNotFoundError(table);
      const records: Row[] = Array.isArray(data) ? data : [data];

      const problems = records.flatMap((record, index) =>
        this._writeProblems(record, columns).map((p) =>
          records.length > 1 ? `record ${index}: ${p}` : p,
        ),
      );
      if (problems.length > 0) {
        this._reject("add", table, problems);
        return new DataBaseResponse<Row | Row[] | null>(false, null);
      }

      const names = columns.map((col) => quoteIdent(col.name)).join(", ");
      const slots = columns.map(() => "?").join(", ");
      const insert = client.prepare(
        `INSERT INTO ${quoteIdent(table)} (${names}) VALUES (${slots})`,
      );
      // Encode every record before the first insert.
      const encode = cellEncoder(this.config.codec, columns);
      const encoded = records.map((record) =>
        columns.map((col): SqliteParam => {
          const value = Object.hasOwn(record, col.name) ? (record[col.name] ?? null) : null;
          return value === null ? null : encode(col.name, value);
        }),
      );
      let inserted = 0;
      for (const params of encoded) {
        inserted += insert.run(params).changes;
      }
      return new DataBaseResponse<Row | Row[] | null>(inserted > 0, data);
    });
  }

  /**
   * Read rows matching every entry of `predicate`.
   * `FetchMode.ONE` (default) yields the first match or null; `FetchMode.ALL` yields a list.
   * @throws {DecodingError} when a stored value cannot be decoded or read as its column kind.
   */
  fetch(predicate: Predicate, table: string, mode?: typeof FetchMode.ONE): DataBaseResponse<Row | null>;
  fetch(predicate: Predicate, table: string, mode: typeof FetchMode.ALL): DataBaseResponse<Row[]>;
  fetch(predicate: Predicate, table: string, mode: FetchMode): DataBaseResponse<Row | Row[] | null>;
  fetch(
    predicate: Predicate,
    table: string,
    mode: FetchMode = FetchMode.ONE,
  ): DataBaseResponse<Row | Row[] | null> {
    const miss = new DataBaseResponse<Row | Row[] | null>(false, mode === FetchMode.ALL ? [] : null);
    if (this._rejectPredicates("fetch", table, [predicate])) return miss;
    return this._scope((client) => {
      const columns = readColumns(client, table);
      if (!columns) return miss;
      const where = buildWhere(predicate, cellEncoder(this.config.codec, columns));
      const limit = mode === FetchMode.ONE ? " LIMIT 1" : "";
      const rows = client
        .prepare(`SELECT * FROM ${quoteIdent(table)} WHERE ${where.sql}${limit}`)
        .all<SqliteRow>(where.params);
      const kinds = columnKinds(columns);
      const decoded = rows.map((row) => this._decodeRow(row, kinds, table));
      if (mode === FetchMode.ALL) {
        return new DataBaseResponse<Row | Row[] | null>(decoded.length > 0, decoded);
      }
      const first = decoded[0] ?? null;
      return new DataBaseResponse<Row | Row[] | null>(first !== null, first);
    });
  }

  /**
   * Delete rows matching a predicate, or each predicate of a list in turn.
   * `limit` caps every individual delete. The value is the total affected count.
   */
  remove(predicate: Predicate | Predicate[], table: string, limit?: number): DataBaseResponse<number> {
    const predicates = Array.isArray(predicate) ? predicate : [predicate];
    if (this._rejectPredicates("remove", table, predicates)) {
      return new DataBaseResponse(false, 0);
    }
    return this._scope((client) => {
      const columns = readColumns(client, table);
      if (!columns) {
        return new DataBaseResponse(false, 0);
      }
      const encode = cellEncoder(this.config.codec, columns);
      let removed = 0;
      for (const entry of predicates) {
        const where = limitToRows(table, buildWhere(entry, encode), limit);
        removed += client
          .run(`DELETE FROM ${quoteIdent(table)} WHERE ${where.sql}`, where.params)
          .changes;
      }
      return new DataBaseResponse(removed > 0, removed);
    });
  }

  /**
   * Set `values` on rows matching `predicate`. The value is the affected count.
   * New values are validated against their column kinds like `add` does.
   * @throws {EmptyUpdateError} when `values` has no entries.
   * @throws {TableNotFoundError} when the table does not exist.
   */
  update(predicate: Predicate, values: Row, table: string, limit?: number): DataBaseResponse<number> {
    if (Object.keys(values).length === 0) {
      throw new EmptyUpdateError(table);
    }
    if (this._rejectPredicates("update", table, [predicate])) {
      return new DataBaseResponse(false, 0);
    }
    return this._scope((client) => {
      const columns = readColumns(client, table);
      if (!columns) throw new TableNotFoundError(table);

      const problems = this._writeProblems(values, columns);
      if (problems.length > 0) {
        this._reject("update", table, problems);
        return new DataBaseResponse(false, 0);
      }

      const encode = cellEncoder(this.config.codec, columns);
      const set = buildSet(values, encode);
      const where = limitToRows(table, buildWhere(predicate, encode), limit);
      const updated = client.run(
        `UPDATE ${quoteIdent(table)} SET ${set.sql} WHERE ${where.sql}`,
        [...set.params, ...where.params],
      ).changes;
      return new DataBaseResponse(updated > 0, updated);
    });
  }

  /**
   * Run a raw statement. Rows come back exactly as stored, without decoding.
   * For statements that return no rows the value is the affected count.
   */
  execute(sql: string, params: readonly SqliteParam[] = []): DataBaseResponse<SqliteRow[] | number> {
    return this._scope((client) => {
      const statement = client.prepare(sql);
      if (statement.reader) {
        const rows = statement.all<SqliteRow>(params);
        return new DataBaseResponse<SqliteRow[] | number>(rows.length > 0, rows);
      }
      const { changes } = statement.run(params);
      return new DataBaseResponse<SqliteRow[] | number>(changes > 0, changes);
    });
  }

  /**
   * Create a table if it is missing and return a snapshot of it.
   * Column definitions are SQL fragments such as `"id INTEGER"`.
   */
  table(name: string, ...columnDefs: string[]): Table {
    return this._scope((client) => {
      const existed = tableExists(client, name);
      if (!existed) {
        client.run(`CREATE TABLE IF NOT EXISTS ${quoteIdent(name)} (${columnDefs.join(", ")})`);
      }
      return new Table(name, client, this._scope, !existed);
    });
  }

  /** Snapshots of every user table. */
  tables(): Table[] {
    return this._scope((client) =>
      listTables(client).map((name) => new Table(name, client, this._scope)),
    );
  }

  /** Drop a table. Returns false when it did not exist. */
  dropTable(name: string): boolean {
    return this._scope((client) => {
      if (!tableExists(client, name)) return false;
      client.run(`DROP TABLE ${quoteIdent(name)}`);
      return true;
    });
  }

  /** Columns of a table in declaration order, or null when it does not exist. */
  columns(table: string): ColumnDescriptor[] | null {
    return this._scope((client) => readColumns(client, table));
  }

  exists(table: string): boolean {
    return this._scope((client) => tableExists(client, table));
  }

  private _writeProblems(record: Row, columns: readonly ColumnDescriptor[]): string[] {
    const problems = recordKeyProblems(record);
    if (problems.length > 0) return problems;
    const kinds = columnKinds(columns);
    for (const [key, value] of Object.entries(record)) {
      const kind = kinds.get(key);
      if (kind === undefined) {
        problems.push(`unknown column "${key}"`);
        continue;
      }
      const checked = validateOnWrite(value, kind);
      if (checked.isErr()) {
        problems.push(`${key}: ${checked.error.message}`);
      }
    }
    return problems;
  }

  /** Warn and report true when any predicate has keys that cannot name a column. */
  private _rejectPredicates(
    operation: "fetch" | "remove" | "update",
    table: string,
    predicates: readonly Predicate[],
  ): boolean {
    const problems = predicates.flatMap((entry) =>
      recordKeyProblems(entry).map((p) => `predicate: ${p}`),
    );
    if (problems.length === 0) return false;
    this._reject(operation, table, problems);
    return true;
  }

  private _reject(
    operation: "add" | "fetch" | "remove" | "update",
    table: string,
    problems: string[],
  ): void {
    this.config.logger.warn(
      `[rowseal] ${operation} rejected for table "${table}": ${problems.join("; ")}`,
    );
  }

  private _decodeRow(row: SqliteRow, kinds: Map<string, ColumnKind>, table: string): Row {
    const out: Row = {};
    for (const [column, raw] of Object.entries(row)) {
      if (raw === null) {
        safeAssign(out, column, null);
        continue;
      }
      const stored = Buffer.isBuffer(raw) ? raw.toString("utf8") : String(raw);
      const decoded = this.config.codec.decode(stored);
      const coerced = coerceOnRead(decoded, kinds.get(column) ?? "opaque");
      if (coerced.isErr()) {
        throw new DecodingError(
          `Column "${column}" of table "${table}" cannot be read: ${coerced.error.message}`,
        );
      }
      safeAssign(out, column, coerced.unwrap());
    }
    return out;
  }
}
