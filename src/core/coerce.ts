import { Result } from "@fkws/klonk-result";
import { tagValue, toStorageString, type CellValue, type ColumnKind, type TaggedValue } from "./columnKind";

const INTEGER_PATTERN = /^[+-]?\d+(?:\.0+)?$/;
const NUMERIC_TIMESTAMP_PATTERN = /^-?\d+(?:\.\d+)?$/;
const ISO_DATE_PATTERN =
    /^(?:[+-]\d{6}|\d{4})-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

type Reader = (stored: string) => Result<CellValue>;

function fail(message: string): Result<CellValue> {
    return new Result({ success: false, error: new Error(message) });
}

function readInteger(stored: string): Result<CellValue> {
    const trimmed = stored.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
        return fail(`"${stored}" is not an integer.`);
    }
    const digits = trimmed.replace(/\.0+$/, "");
    const asNumber = Number(digits);
    if (Number.isSafeInteger(asNumber)) {
        return new Result({ success: true, data: asNumber });
    }
    return new Result({ success: true, data: BigInt(digits) });
}

function readReal(stored: string): Result<CellValue> {
    if (stored.trim() === "") return fail("Empty string is not a real number.");
    const parsed = Number(stored);
    if (Number.isNaN(parsed)) return fail(`"${stored}" is not a real number.`);
    return new Result({ success: true, data: parsed });
}

function readBoolean(stored: string): Result<CellValue> {
    const normalized = stored.trim().toLowerCase();
    if (normalized === "true" || normalized === "1") {
        return new Result({ success: true, data: true });
    }
    if (normalized === "false" || normalized === "0" || normalized === "") {
        return new Result({ success: true, data: false });
    }
    const numeric = Number(normalized);
    if (!Number.isNaN(numeric)) {
        return new Result({ success: true, data: numeric !== 0 });
    }
    return new Result({ success: true, data: true });
}

/**
 * Parse a timestamp the way it may have been written:
 * a purely numeric string is Unix seconds, anything else must be ISO-8601.
 */
export function parseTimestamp(stored: string): Result<Date> {
    const trimmed = stored.trim();
    let parsed: Date | undefined;
    if (NUMERIC_TIMESTAMP_PATTERN.test(trimmed)) {
        parsed = new Date(Number(trimmed) * 1000);
    } else if (ISO_DATE_PATTERN.test(trimmed)) {
        parsed = new Date(trimmed);
    }
    if (parsed && !Number.isNaN(parsed.getTime())) {
        return new Result({ success: true, data: parsed });
    }
    return new Result({
        success: false,
        error: new Error(`"${stored}" is neither a Unix timestamp nor an ISO-8601 date.`),
    });
}

function readTimestamp(stored: string): Result<CellValue> {
    const parsed = parseTimestamp(stored);
    if (parsed.isErr()) {
        return new Result({ success: false, error: parsed.error });
    }
    return new Result({ success: true, data: parsed.unwrap() });
}

function passThrough(stored: string): Result<CellValue> {
    return new Result({ success: true, data: stored });
}

const READERS: Record<ColumnKind, Reader> = {
    integer: readInteger,
    real: readReal,
    boolean: readBoolean,
    timestamp: readTimestamp,
    text: passThrough,
    opaque: passThrough,
};

/** Convert a decoded storage string into the logical type of its column kind. */
export function coerceOnRead(stored: string, kind: ColumnKind): Result<CellValue> {
    return READERS[kind](stored);
}

const ACCEPTED_TAGS: Record<Exclude<ColumnKind, "opaque" | "timestamp">, TaggedValue["tag"][]> = {
    integer: ["int"],
    real: ["int", "real"],
    boolean: ["bool"],
    text: ["text"],
};

function describe(tagged: TaggedValue): string {
    switch (tagged.tag) {
        case "int":
            return typeof tagged.value === "bigint" ? "bigint" : "integer";
        case "real":
            return "real";
        case "bool":
            return "boolean";
        case "time":
            return "Date";
        case "text":
            return "string";
        case "null":
            return "null";
    }
}

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/** Integers SQLite stores exactly and `readInteger` reads back unchanged. */
function fitsInteger(value: number | bigint): boolean {
    if (typeof value === "number") return Number.isSafeInteger(value);
    return value >= INT64_MIN && value <= INT64_MAX;
}

// Accept only what `parseTimestamp` reads back from the stored string.
function validateTimestamp(value: CellValue, tagged: TaggedValue): Result<CellValue> {
    switch (tagged.tag) {
        case "time":
            if (Number.isNaN(tagged.value.getTime())) break;
            return new Result({ success: true, data: value });
        case "int":
        case "real":
        case "text":
            if (parseTimestamp(toStorageString(tagged.value)).isErr()) break;
            return new Result({ success: true, data: value });
        default:
            break;
    }
    return new Result({
        success: false,
        error: new Error(`type mismatch: ${describe(tagged)} value does not fit kind "timestamp"`),
    });
}

/**
 * Check a logical value against a column kind before it is written.
 * Returns the value unchanged on success; failures come back as an error Result
 * so the caller decides how to report them.
 */
export function validateOnWrite(value: CellValue, kind: ColumnKind): Result<CellValue> {
    const tagged = tagValue(value);
    if (tagged.tag === "null" || kind === "opaque") {
        return new Result({ success: true, data: value });
    }
    if (kind === "timestamp") return validateTimestamp(value, tagged);
    if (tagged.tag === "real" && !Number.isFinite(tagged.value)) {
        return new Result({
            success: false,
            error: new Error(`type mismatch: ${tagged.value} does not fit kind "${kind}"`),
        });
    }
    if (kind === "integer" && tagged.tag === "int" && !fitsInteger(tagged.value)) {
        return new Result({
            success: false,
            error: new Error(`type mismatch: ${tagged.value} is outside the 64-bit range of kind "integer"`),
        });
    }
    if (ACCEPTED_TAGS[kind].includes(tagged.tag)) {
        return new Result({ success: true, data: value });
    }
    return new Result({
        success: false,
        error: new Error(`type mismatch: ${describe(tagged)} value does not fit kind "${kind}"`),
    });
}
