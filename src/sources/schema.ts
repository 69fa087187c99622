import type { SqliteClient } from "../runtime/sqliteClient";
import { classify, type ColumnKind } from "../core/columnKind";

/** A column as SQLite reports it. `declaredType` is null for untyped columns. */
export type ColumnDescriptor = {
  name: string;
  declaredType: string | null;
};

type TableInfoRow = { name: string; type: string };

/**
 * Quote a table or column name for interpolation into SQL.
 * Only plain identifiers are accepted; values always go through parameters.
 */
export function quoteIdent(name: string): string {
  if (!name || name.includes("\u0000"))
    throw new Error("Invalid identifier: " + name);
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
    throw new Error(`Unsafe identifier: ${name}`);
  }
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Read a table's columns in declaration order.
 * Returns null when the table does not exist. Never cached.
 */
export function readColumns(
  client: SqliteClient,
  table: string,
): ColumnDescriptor[] | null {
  const info = client
    .prepare(`PRAGMA table_info(${quoteIdent(table)})`)
    .all<TableInfoRow>();
  if (info.length === 0) return null;
  // PRAGMA table_info lists columns in declaration order.
  return info.map((col) => ({
    name: col.name,
    declaredType: col.type ? col.type : null,
  }));
}

/** Check `sqlite_master` for a table of this name. */
export function tableExists(client: SqliteClient, table: string): boolean {
  const row = client
    .prepare(
      `SELECT EXISTS(
            SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = ?
        ) AS e`,
    )
    .get<{ e: number | bigint }>([table]);
  return row !== undefined && Number(row.e) === 1;
}

/** Names of user tables, in creation order. */
export function listTables(client: SqliteClient): string[] {
  return client
    .prepare(
      `SELECT name FROM sqlite_master
             WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
             ORDER BY rowid`,
    )
    .all<{ name: string }>()
    .map((row) => row.name);
}

/**
 * True when SQLite's column affinity would rewrite a numeric-looking string
 * (`INTEGER`, `REAL` and `NUMERIC` affinity). TEXT and BLOB affinity keep it.
 */
export function rewritesText(declaredType: string | null): boolean {
  const upper = (declaredType ?? "").toUpperCase();
  // Same precedence as SQLite's affinity rules.
  if (upper.includes("INT")) return true;
  if (["CHAR", "CLOB", "TEXT"].some((part) => upper.includes(part))) return false;
  return upper !== "" && !upper.includes("BLOB");
}

/** Column name to kind, for decoding and validation. */
export function columnKinds(
  columns: readonly ColumnDescriptor[],
): Map<string, ColumnKind> {
  return new Map(columns.map((col) => [col.name, classify(col.declaredType)]));
}
