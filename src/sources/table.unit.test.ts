import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { SqliteDatabase } from "./database";
import { listTables, quoteIdent, readColumns, rewritesText, tableExists } from "./schema";
import { withSqliteClient } from "../runtime/sqliteClient";

const RULE = "=".repeat(50);

let root: string;
let dbPath: string;
let db: SqliteDatabase;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "rowseal-table-"));
  dbPath = path.join(root, "pets.sqlite");
  db = new SqliteDatabase({
    path: dbPath,
    mode: "plain",
    logger: { debug: vi.fn(), warn: vi.fn() },
  });
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe("schema helpers", () => {
  test("quoteIdent accepts plain identifiers only", () => {
    expect(quoteIdent("people")).toBe('"people"');
    expect(quoteIdent("_tmp1")).toBe('"_tmp1"');
    expect(() => quoteIdent("")).toThrow("Invalid identifier: ");
    expect(() => quoteIdent('a"b')).toThrow('Unsafe identifier: a"b');
    expect(() => quoteIdent("1abc")).toThrow("Unsafe identifier: 1abc");
  });

  test("rewritesText follows SQLite affinity precedence", () => {
    expect(rewritesText("DECIMAL(10,2)")).toBe(true);
    expect(rewritesText("NUMERIC")).toBe(true);
    expect(rewritesText("MEDIUMINT(5)")).toBe(true);
    expect(rewritesText("VARCHAR(20)")).toBe(false);
    expect(rewritesText("BLOB")).toBe(false);
    expect(rewritesText(null)).toBe(false);
  });

  test("reads columns in declaration order", () => {
    db.table("pets", "id INTEGER", "name TEXT", "tag");
    withSqliteClient(dbPath, {}, (client) => {
      expect(readColumns(client, "pets")).toEqual([
        { name: "id", declaredType: "INTEGER" },
        { name: "name", declaredType: "TEXT" },
        { name: "tag", declaredType: null },
      ]);
      expect(readColumns(client, "ghosts")).toBeNull();
      expect(tableExists(client, "pets")).toBe(true);
      expect(tableExists(client, "ghosts")).toBe(false);
    });
  });

  test("lists user tables in creation order", () => {
    db.table("b_first", "x TEXT");
    db.table("a_second", "y TEXT");
    const names = withSqliteClient(dbPath, {}, (client) => listTables(client));
    expect(names).toEqual(["b_first", "a_second"]);
  });
});

describe("Table", () => {
  test("reports whether the call created the table", () => {
    expect(db.table("pets", "id INTEGER", "name TEXT").created).toBe(true);
    expect(db.table("pets", "id INTEGER", "name TEXT").created).toBe(false);
  });

  test("snapshots rows as stored", () => {
    db.table("pets", "id INTEGER", "name TEXT", "tag");
    db.add({ id: 1, name: "Rex", tag: null }, "pets");
    const pets = db.table("pets");

    expect(pets.rows).toEqual([{ id: 1n, name: "Rex", tag: null }]);
    expect(pets.kinds()).toEqual(
      new Map([
        ["id", "integer"],
        ["name", "text"],
        ["tag", "opaque"],
      ]),
    );
    expect(pets.rowMap()).toEqual({
      "1": { id: 1n, name: "Rex", tag: null },
      _types: { id: "INTEGER", name: "TEXT", tag: "BLOB" },
    });
    expect(String(pets)).toBe("<Table name=pets, rows=1>");
  });

  test("prettyPrint renders a numbered grid", () => {
    db.table("pets", "id INTEGER", "name TEXT", "tag");
    db.add([{ id: 1, name: "Rex" }, { id: 2, name: "Tom", tag: "cat" }], "pets");
    expect(db.table("pets").prettyPrint()).toBe(
      [
        "table pets:",
        RULE,
        "0. | id: INTEGER | name: TEXT | tag: BLOB |",
        "1. | 1 | Rex | NULL |",
        "2. | 2 | Tom | cat |",
        RULE,
      ].join("\n"),
    );
  });

  test("the snapshot does not follow later writes", () => {
    const pets = db.table("pets", "id INTEGER");
    db.add({ id: 1 }, "pets");
    expect(pets.rows).toHaveLength(0);
    expect(db.table("pets").rows).toHaveLength(1);
  });

  test("drop removes the table once", () => {
    const pets = db.table("pets", "id INTEGER");
    expect(pets.exists()).toBe(true);
    expect(pets.drop()).toBe(true);
    expect(pets.exists()).toBe(false);
    expect(pets.drop()).toBe(false);
  });
});
