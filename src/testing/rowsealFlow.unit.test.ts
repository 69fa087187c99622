import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { rowseal } from "../rowseal";
import { DecodingError, EmptyInputError } from "../core/errors";
import type { DatabaseOptions } from "../runtime/config";
import type { DataMode } from "../security/encoding";

const SECRET = "test-secret";
const BORN = new Date(Date.UTC(1990, 4, 17, 8, 30, 0));

const MODES: { mode: DataMode; options: DatabaseOptions }[] = [
  { mode: "plain", options: { mode: "plain" } },
  { mode: "obfuscate", options: { mode: "obfuscate" } },
  { mode: "secure", options: { mode: "secure", secret: SECRET } },
  { mode: "sealed", options: { mode: "sealed", secret: SECRET } },
];

let root: string;
let dbPath: string;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "rowseal-flow-"));
  dbPath = path.join(root, "flow.sqlite");
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe.each(MODES)("$mode mode", ({ mode, options }) => {
  function open() {
    return rowseal.open({
      ...options,
      path: dbPath,
      logger: { debug: vi.fn(), warn: vi.fn() },
    });
  }

  test("full add, fetch, update, remove cycle", () => {
    const db = open();
    expect(db.mode).toBe(mode);
    db.table("users", "id INTEGER", "name TEXT", "admin BOOL", "born DATE", "balance REAL");

    const added = db.add(
      [
        { id: 1, name: "Ann", admin: true, born: BORN, balance: 12.75 },
        { id: 2, name: "Bob", admin: false, born: null, balance: -3.5 },
        { id: 3, name: "Ann", admin: false },
      ],
      "users",
    );
    expect(added.status).toBe(true);

    expect(db.fetch({ id: 1 }, "users").value).toEqual({
      id: 1,
      name: "Ann",
      admin: true,
      born: BORN,
      balance: 12.75,
    });

    const anns = db.fetch({ name: "Ann" }, "users", rowseal.FetchMode.ALL);
    expect(anns.value.map((row) => row.id)).toEqual([1, 3]);

    expect(db.update({ name: "Ann", admin: false }, { admin: true }, "users").value).toBe(1);
    expect(db.fetch({ admin: true }, "users", rowseal.FetchMode.ALL).length).toBe(2);

    expect(db.remove({ name: "Ann" }, "users").value).toBe(2);
    expect(db.fetch({}, "users", rowseal.FetchMode.ALL).value).toEqual([
      { id: 2, name: "Bob", admin: false, born: null, balance: -3.5 },
    ]);
  });

  test("large integers survive the round trip", () => {
    const db = open();
    db.table("counters", "n BIGINT");
    db.add({ n: 9007199254740993n }, "counters");
    expect(db.fetch({}, "counters").value).toEqual({ n: 9007199254740993n });
  });

  test("nulls are stored as SQL NULL in every mode", () => {
    const db = open();
    db.table("notes", "body TEXT");
    db.add({ body: null }, "notes");
    expect(db.execute('SELECT body FROM "notes"').value).toEqual([{ body: null }]);
  });
});

describe("stored form", () => {
  test("plain stores values as written", () => {
    const db = rowseal.open({ path: dbPath, mode: "plain" });
    db.table("users", "name TEXT");
    db.add({ name: "Ann" }, "users");
    expect(db.execute('SELECT name FROM "users"').value).toEqual([{ name: "Ann" }]);
  });

  test("obfuscate stores base64", () => {
    const db = rowseal.open({ path: dbPath, mode: "obfuscate" });
    db.table("users", "name TEXT");
    db.add({ name: "hello" }, "users");
    expect(db.execute('SELECT name FROM "users"').value).toEqual([{ name: "aGVsbG8=" }]);
  });

  test("keyed modes store the codec output", () => {
    for (const mode of ["secure", "sealed"] as const) {
      const file = path.join(root, `${mode}.sqlite`);
      const db = rowseal.open({ path: file, mode, secret: SECRET });
      db.table("users", "name TEXT");
      db.add({ name: "Ann" }, "users");
      const stored = rowseal.codec(mode, SECRET).encode("Ann");
      expect(stored).not.toBe("Ann");
      expect(db.execute('SELECT name FROM "users"').value).toEqual([{ name: stored }]);
    }
  });
});

describe("keyed mode failures", () => {
  test("reading with another secret raises DecodingError", () => {
    const writer = rowseal.open({ path: dbPath, mode: "secure", secret: SECRET });
    writer.table("users", "name TEXT");
    writer.add({ name: "Ann" }, "users");

    const reader = rowseal.open({ path: dbPath, mode: "secure", secret: "other-secret" });
    expect(() => reader.fetch({}, "users", rowseal.FetchMode.ALL)).toThrow(DecodingError);
  });

  test("an equality predicate under another secret matches nothing", () => {
    const writer = rowseal.open({ path: dbPath, mode: "sealed", secret: SECRET });
    writer.table("users", "name TEXT");
    writer.add({ name: "Ann" }, "users");

    const reader = rowseal.open({ path: dbPath, mode: "sealed", secret: "other-secret" });
    expect(reader.fetch({ name: "Ann" }, "users").status).toBe(false);
  });

  test("empty strings cannot be written and nothing is inserted", () => {
    const db = rowseal.open({ path: dbPath, mode: "secure", secret: SECRET });
    db.table("users", "name TEXT");
    expect(() => db.add([{ name: "Ann" }, { name: "" }], "users")).toThrow(EmptyInputError);
    expect(db.table("users").rows).toHaveLength(0);
  });

  test("plain text written outside the gateway cannot be read", () => {
    const db = rowseal.open({ path: dbPath, mode: "obfuscate" });
    db.table("users", "name TEXT");
    db.execute('INSERT INTO "users" (name) VALUES (?)', ["not base64!"]);
    expect(() => db.fetch({}, "users")).toThrow(DecodingError);
  });
});

describe("rowseal.kind", () => {
  test("classifies declared types", () => {
    expect(rowseal.kind("BIGINT")).toBe("integer");
    expect(rowseal.kind("BLOB")).toBe("opaque");
  });
});
