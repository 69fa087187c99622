export { rowseal } from "./rowseal";
export { SqliteDatabase } from "./sources/database";
export { Table } from "./sources/table";
export { DataBaseResponse, FetchMode } from "./core/response";
export {
    ConfigError,
    CodecError,
    DataBaseException,
    DecodingError,
    EmptyInputError,
    EmptyUpdateError,
    TableNotFoundError,
} from "./core/errors";
export {
    PlainCodec,
    ObfuscateCodec,
    SecureCodec,
    SealedCodec,
    createCodec,
} from "./security/encoding";
export { classify } from "./core/columnKind";
export { coerceOnRead, validateOnWrite } from "./core/coerce";

export type { Codec, DataMode } from "./security/encoding";
export type { CellValue, ColumnKind } from "./core/columnKind";
export type { ColumnDescriptor } from "./sources/schema";
export type { Predicate } from "./core/predicate";
export type { ResponseValue } from "./core/response";
export type { Row } from "./core/safeObject";
export type { SqliteRow, SqliteParam } from "./runtime/sqliteClient";
export type { DatabaseOptions, DatabaseConfig, Logger } from "./runtime/config";
