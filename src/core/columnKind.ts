/** Semantic category a declared column type maps to. */
export type ColumnKind =
    | "integer"
    | "real"
    | "boolean"
    | "timestamp"
    | "text"
    | "opaque";

/** Logical values accepted and returned at the gateway boundary. */
export type CellValue = number | bigint | boolean | Date | string | null;

/**
 * A cell value lifted into an explicit variant.
 * Validation and encoding switch on `tag` instead of re-inspecting the value.
 */
export type TaggedValue =
    | { tag: "int"; value: number | bigint }
    | { tag: "real"; value: number }
    | { tag: "bool"; value: boolean }
    | { tag: "time"; value: Date }
    | { tag: "text"; value: string }
    | { tag: "null"; value: null };

const INTEGER_TYPES = ["INT", "INTEGER", "TINYINT", "SMALLINT", "MEDIUMINT", "BIGINT", "UNSIGNED BIG INT"];
const REAL_TYPES = ["REAL", "DOUBLE", "DOUBLE PRECISION", "FLOAT"];
const BOOLEAN_TYPES = ["BOOLEAN", "BOOL"];
const TIMESTAMP_TYPES = ["DATE", "DATETIME", "TIME"];
const TEXT_TYPES = ["TEXT"];

const KIND_BY_TYPE: ReadonlyMap<string, ColumnKind> = new Map<string, ColumnKind>([
    ...INTEGER_TYPES.map((t): [string, ColumnKind] => [t, "integer"]),
    ...REAL_TYPES.map((t): [string, ColumnKind] => [t, "real"]),
    ...BOOLEAN_TYPES.map((t): [string, ColumnKind] => [t, "boolean"]),
    ...TIMESTAMP_TYPES.map((t): [string, ColumnKind] => [t, "timestamp"]),
    ...TEXT_TYPES.map((t): [string, ColumnKind] => [t, "text"]),
]);

/**
 * Classify a declared SQL column type.
 * Unknown, parameterized (`VARCHAR(20)`) or absent types are `"opaque"`.
 */
export function classify(declaredType: string | null | undefined): ColumnKind {
    if (!declaredType) return "opaque";
    const normalized = declaredType.trim().replace(/\s+/g, " ").toUpperCase();
    return KIND_BY_TYPE.get(normalized) ?? "opaque";
}

/** Lift a boundary value into its tagged form. */
export function tagValue(value: CellValue): TaggedValue {
    if (value === null) return { tag: "null", value };
    if (typeof value === "bigint") return { tag: "int", value };
    if (typeof value === "number") {
        return Number.isInteger(value) ? { tag: "int", value } : { tag: "real", value };
    }
    if (typeof value === "boolean") return { tag: "bool", value };
    if (value instanceof Date) return { tag: "time", value };
    return { tag: "text", value };
}

/**
 * String form a value takes before encoding.
 * Dates become ISO-8601, booleans `"true"`/`"false"`.
 */
export function toStorageString(value: Exclude<CellValue, null>): string {
    const tagged = tagValue(value);
    switch (tagged.tag) {
        case "time":
            return tagged.value.toISOString();
        case "bool":
            return tagged.value ? "true" : "false";
        case "int":
        case "real":
            return String(tagged.value);
        case "text":
            return tagged.value;
        case "null":
            return "";
    }
}
