import type {
  ConnectionScope,
  SqliteClient,
  SqliteParam,
  SqliteRow,
} from "../runtime/sqliteClient";
import type { ColumnKind } from "../core/columnKind";
import {
  columnKinds,
  quoteIdent,
  readColumns,
  tableExists,
  type ColumnDescriptor,
} from "./schema";

const RULE = "=".repeat(50);

function formatCell(value: SqliteParam): string {
  if (value === null) return "NULL";
  if (Buffer.isBuffer(value)) return `<${value.length} bytes>`;
  return String(value);
}

/**
 * Snapshot of one table, taken when the object is built.
 * `rows` is never refreshed; call `db.table(name)` again for current data.
 */
export class Table {
  readonly name: string;
  /** True when the call that built this snapshot also created the table. */
  readonly created: boolean | undefined;
  readonly columns: readonly ColumnDescriptor[];
  readonly rows: readonly SqliteRow[];
  private readonly _scope: ConnectionScope;

  /** @internal Built by `SqliteDatabase`; reads schema and rows through `client`. */
  constructor(
    name: string,
    client: SqliteClient,
    scope: ConnectionScope,
    created?: boolean,
  ) {
    this.name = name;
    this.created = created;
    this._scope = scope;
    this.columns = readColumns(client, name) ?? [];
    this.rows =
      this.columns.length > 0
        ? client.prepare(`SELECT * FROM ${quoteIdent(name)}`).all<SqliteRow>()
        : [];
  }

  /** Live check; the snapshot may outlive the table. */
  exists(): boolean {
    return this._scope((client) => tableExists(client, this.name));
  }

  /** Column name to kind, from the snapshot's columns. */
  kinds(): Map<string, ColumnKind> {
    return columnKinds(this.columns);
  }

  /**
   * Rows keyed by 1-based position, plus `_types` mapping each column to its
   * declared type (`BLOB` when untyped).
   */
  rowMap(): Record<string, Record<string, SqliteParam>> {
    const out: Record<string, Record<string, SqliteParam>> = {};
    this.rows.forEach((row, index) => {
      out[String(index + 1)] = { ...row };
    });
    out._types = Object.fromEntries(
      this.columns.map((col) => [col.name, col.declaredType ?? "BLOB"]),
    );
    return out;
  }

  /** Render the snapshot as a numbered text grid. */
  prettyPrint(): string {
    let body =
      "0. | " +
      this.columns
        .map((col) => `${col.name}: ${col.declaredType ?? "BLOB"}`)
        .join(" | ") +
      " |\n";
    this.rows.forEach((row, index) => {
      const cells = this.columns.map((col) => formatCell(row[col.name] ?? null));
      body += `${index + 1}. | ${cells.join(" | ")} |\n`;
    });
    return `table ${this.name}:\n${RULE}\n${body}${RULE}`;
  }

  /** Drop the table. Returns false when it was already gone. */
  drop(): boolean {
    return this._scope((client) => {
      if (!tableExists(client, this.name)) return false;
      client.run(`DROP TABLE ${quoteIdent(this.name)}`);
      return true;
    });
  }

  toString(): string {
    return `<Table name=${this.name}, rows=${this.rows.length}>`;
  }
}
