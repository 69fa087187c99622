import type { CellValue } from "./columnKind";

/** A row as callers write it and read it back. */
export type Row = Record<string, CellValue>;

const UNSAFE_OBJECT_KEYS = new Set(["__proto__", "prototype", "constructor"]);

export function isUnsafeObjectKey(key: string): boolean {
    return UNSAFE_OBJECT_KEYS.has(key);
}

/**
 * Reasons a record's keys cannot be written, or an empty list.
 * Symbol keys are never columns; prototype keys would poison decoded rows.
 */
export function recordKeyProblems(record: object): string[] {
    const problems: string[] = [];
    for (const symbol of Object.getOwnPropertySymbols(record)) {
        problems.push(`Only strings can be keys; found ${String(symbol)}.`);
    }
    for (const key of Object.keys(record)) {
        if (isUnsafeObjectKey(key)) problems.push(`Key "${key}" is not allowed.`);
    }
    return problems;
}

export function safeAssign(target: Row, key: string, value: CellValue): void {
    if (isUnsafeObjectKey(key)) {
        Object.defineProperty(target, key, {
            value,
            writable: true,
            enumerable: true,
            configurable: true,
        });
        return;
    }
    target[key] = value;
}
