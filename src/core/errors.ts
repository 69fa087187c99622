/** Base class for errors raised by the record gateway. */
export class DataBaseException extends Error {
    constructor(message: string) {
        super(message);
        this.name = "DataBaseException";
    }
}

/** Error thrown when `add` or `update` targets a table that does not exist. */
export class TableNotFoundError extends DataBaseException {
    readonly table: string;

    constructor(table: string) {
        super(`Table "${table}" does not exist.`);
        this.name = "TableNotFoundError";
        this.table = table;
    }
}

/** Error thrown when `update` is called without any values to set. */
export class EmptyUpdateError extends DataBaseException {
    constructor(table: string) {
        super(`Empty data to replace in table "${table}".`);
        this.name = "EmptyUpdateError";
    }
}

/** Base class for encode/decode failures. Never a database condition. */
export class CodecError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "CodecError";
    }
}

/** Error thrown when a keyed codec is handed an empty string. */
export class EmptyInputError extends CodecError {
    constructor(operation: "encode" | "decode") {
        super(`Cannot ${operation} an empty value in a keyed data mode.`);
        this.name = "EmptyInputError";
    }
}

/**
 * Error thrown when a stored value cannot be turned back into its logical form:
 * malformed encoding, a different secret, or a value its column kind cannot read.
 */
export class DecodingError extends CodecError {
    constructor(message: string) {
        super(message);
        this.name = "DecodingError";
    }
}

/** Error thrown when database options are contradictory or incomplete. */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}
