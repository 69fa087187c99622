import util from "node:util";
import type { Row } from "./safeObject";
import type { SqliteRow } from "../runtime/sqliteClient";

/** Values an envelope can carry. Raw rows only come from `execute`. */
export type ResponseValue = Row | Row[] | SqliteRow[] | number | null;

/** Whether `fetch` returns the first match or every match. */
export const FetchMode = {
    ONE: "one",
    ALL: "all",
} as const;

export type FetchMode = (typeof FetchMode)[keyof typeof FetchMode];

/**
 * Uniform result of every gateway operation.
 * `status` is true iff at least one row was affected or returned.
 */
export class DataBaseResponse<V extends ResponseValue = ResponseValue> {
    readonly status: boolean;
    readonly value: V;

    constructor(status: boolean, value: V) {
        this.status = status;
        this.value = value;
    }

    /** Rows carried by the envelope, or the affected count for mutations. */
    get length(): number {
        const value: ResponseValue = this.value;
        if (value === null) return 0;
        if (typeof value === "number") return value;
        if (Array.isArray(value)) return value.length;
        return 1;
    }

    toString(): string {
        return `<DataBaseResponse status=${this.status}, value=${util.inspect(this.value, { depth: 2 })}>`;
    }
}
