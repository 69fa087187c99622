import { SqliteDatabase } from "./sources/database";
import type { DatabaseOptions } from "./runtime/config";
import { createCodec, type Codec, type DataMode } from "./security/encoding";
import { classify } from "./core/columnKind";
import { FetchMode } from "./core/response";

/**
 * Main rowseal entry point.
 * Start here to open a database handle and run CRUD against its tables.
 */
const rowseal = {
  /**
   * Open a database handle. Nothing touches the file until the first call.
   * Next: call `.table(name, ...columns)` to create a table, then `.add(...)` and `.fetch(...)`.
   */
  open(options: DatabaseOptions = {}): SqliteDatabase {
    return new SqliteDatabase(options);
  },

  /**
   * Build a standalone codec, e.g. to inspect stored values by hand.
   * Next: call `.encode(value)` or `.decode(stored)`.
   */
  codec(mode: DataMode, secret?: string): Codec {
    return createCodec(mode, secret);
  },

  /** Classify a declared SQL type into the kind used for coercion. */
  kind: classify,

  /** Fetch modes for `db.fetch(...)`. */
  FetchMode,
};

export { rowseal };
