import type { Codec } from "../security/encoding";
import type { SqliteParam } from "../runtime/sqliteClient";
import { quoteIdent, rewritesText, type ColumnDescriptor } from "../sources/schema";
import { classify, type CellValue } from "./columnKind";
import type { Row } from "./safeObject";

/** Equality conjunction: every entry must match. `{}` matches all rows. */
export type Predicate = Row;

/** SQL fragment plus the parameters bound to its placeholders. */
export type BuiltClause = {
    sql: string;
    params: SqliteParam[];
};

/** Turns one non-null value of a named column into its bound parameter. */
export type CellEncoder = (column: string, value: Exclude<CellValue, null>) => SqliteParam;

/**
 * Encoder over `codec`. Opaque columns whose affinity would rewrite text
 * (`DECIMAL`, `NUMERIC`, ...) are bound as UTF-8 blobs so `"007"` stays `"007"`.
 */
export function cellEncoder(codec: Codec, columns: readonly ColumnDescriptor[] = []): CellEncoder {
    const asBlob = new Set(
        columns
            .filter((col) => classify(col.declaredType) === "opaque" && rewritesText(col.declaredType))
            .map((col) => col.name),
    );
    return (column, value) => {
        const stored = codec.encode(value);
        return asBlob.has(column) ? Buffer.from(stored, "utf8") : stored;
    };
}

/**
 * Build a `WHERE` body from a predicate, encoding each value once.
 * Null compares with `IS NULL`; an empty predicate yields `1=1`.
 */
export function buildWhere(predicate: Predicate, encode: CellEncoder): BuiltClause {
    const parts: string[] = [];
    const params: SqliteParam[] = [];
    for (const [column, value] of Object.entries(predicate)) {
        const name = quoteIdent(column);
        if (value === null) {
            parts.push(`${name} IS NULL`);
            continue;
        }
        parts.push(`${name} = ?`);
        params.push(encode(column, value));
    }
    return { sql: parts.length > 0 ? parts.join(" AND ") : "1=1", params };
}

/** Build a `SET` body for an update; null clears the column. */
export function buildSet(values: Row, encode: CellEncoder): BuiltClause {
    const parts: string[] = [];
    const params: SqliteParam[] = [];
    for (const [column, value] of Object.entries(values)) {
        parts.push(`${quoteIdent(column)} = ?`);
        params.push(value === null ? null : encode(column, value));
    }
    return { sql: parts.join(", "), params };
}

/**
 * Restrict a mutation to at most `limit` rows.
 * Goes through `rowid` so it does not depend on SQLite's optional `DELETE ... LIMIT`.
 */
export function limitToRows(table: string, where: BuiltClause, limit?: number): BuiltClause {
    if (limit === undefined) return where;
    if (!Number.isInteger(limit) || limit < 0) {
        throw new Error(`Limit must be a non-negative integer; got ${limit}.`);
    }
    return {
        sql: `rowid IN (SELECT rowid FROM ${quoteIdent(table)} WHERE ${where.sql} LIMIT ?)`,
        params: [...where.params, limit],
    };
}
