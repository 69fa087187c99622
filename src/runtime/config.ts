import { ConfigError } from "../core/errors";
import { DATA_MODES, createCodec, type Codec, type DataMode } from "../security/encoding";

/** Minimal logger surface; `console` satisfies it. */
export type Logger = Pick<Console, "debug" | "warn">;

/** Options accepted by `rowseal.open(...)`. Every field falls back to the environment. */
export type DatabaseOptions = {
    /** SQLite file path. Env: `ROWSEAL_DB_PATH`. Default `sqlite.db`. */
    path?: string;
    /** Data mode, case-insensitive. Env: `ROWSEAL_DATA_MODE`. Default `plain`. */
    mode?: DataMode | Uppercase<DataMode>;
    /** Secret for `secure` and `sealed` modes. Env: `ROWSEAL_SECRET`. */
    secret?: string;
    /** Milliseconds to wait on a locked file. Env: `ROWSEAL_BUSY_TIMEOUT_MS`. Default 5000. */
    busyTimeoutMs?: number;
    /** Log every statement through `logger.debug`. Env: `ROWSEAL_DEBUG=1`. */
    debug?: boolean;
    /** Diagnostics sink. Default `console`. */
    logger?: Logger;
};

/** Immutable configuration owned by a database handle. */
export type DatabaseConfig = Readonly<{
    path: string;
    mode: DataMode;
    codec: Codec;
    busyTimeoutMs: number;
    debug: boolean;
    logger: Logger;
}>;

const DEFAULT_PATH = "sqlite.db";
const DEFAULT_BUSY_TIMEOUT_MS = 5000;
// Largest timeout the driver accepts.
const MAX_BUSY_TIMEOUT_MS = 2147483647;

function isDataMode(value: string): value is DataMode {
    return (DATA_MODES as readonly string[]).includes(value);
}

function parseMode(raw: string): DataMode {
    const normalized = raw.trim().toLowerCase();
    if (!isDataMode(normalized)) {
        throw new ConfigError(`Mode must be one of ${DATA_MODES.join(", ")}; got "${raw}".`);
    }
    return normalized;
}

function parseTimeout(raw: string | undefined): number | undefined {
    if (raw === undefined || raw.trim() === "") return undefined;
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed < 0) {
        throw new ConfigError(`ROWSEAL_BUSY_TIMEOUT_MS must be a non-negative integer; got "${raw}".`);
    }
    return parsed;
}

/**
 * Merge explicit options with `ROWSEAL_*` environment variables.
 * The secret is hashed into the codec here and never stored on the config.
 */
export function resolveConfig(
    options: DatabaseOptions = {},
    env: NodeJS.ProcessEnv = process.env,
): DatabaseConfig {
    const mode = parseMode(options.mode ?? env.ROWSEAL_DATA_MODE ?? "plain");
    const secret = options.secret ?? env.ROWSEAL_SECRET;
    const keyed = mode === "secure" || mode === "sealed";

    if (keyed && !secret) {
        throw new ConfigError(`${mode} mode requires a data-encryption secret.`);
    }
    if (!keyed && options.secret !== undefined) {
        throw new ConfigError(`A secret was given but mode "${mode}" does not use one.`);
    }

    const busyTimeoutMs = options.busyTimeoutMs ?? parseTimeout(env.ROWSEAL_BUSY_TIMEOUT_MS) ?? DEFAULT_BUSY_TIMEOUT_MS;
    if (!Number.isInteger(busyTimeoutMs) || busyTimeoutMs < 0 || busyTimeoutMs > MAX_BUSY_TIMEOUT_MS) {
        throw new ConfigError(
            `busyTimeoutMs must be an integer from 0 to ${MAX_BUSY_TIMEOUT_MS}; got ${busyTimeoutMs}.`,
        );
    }

    return Object.freeze({
        path: options.path ?? env.ROWSEAL_DB_PATH ?? DEFAULT_PATH,
        mode,
        codec: createCodec(mode, keyed ? secret : undefined),
        busyTimeoutMs,
        debug: options.debug ?? env.ROWSEAL_DEBUG === "1",
        logger: options.logger ?? console,
    });
}
