import {
    createCipheriv,
    createDecipheriv,
    createHash,
    createHmac,
    timingSafeEqual,
} from "node:crypto";
import util from "node:util";
import { CodecError, DecodingError, EmptyInputError } from "../core/errors";
import { toStorageString, type CellValue } from "../core/columnKind";

/** Data modes a database handle can be configured with. */
export type DataMode = "plain" | "obfuscate" | "secure" | "sealed";

export const DATA_MODES: readonly DataMode[] = ["plain", "obfuscate", "secure", "sealed"];

/**
 * Encoding provider applied to every non-null value on its way to and from storage.
 * `decode` returns the storage string form; column kinds turn it back into a logical value.
 */
export interface Codec {
    readonly mode: DataMode;
    encode(value: Exclude<CellValue, null>): string;
    decode(stored: string): string;
}

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const utf8 = new util.TextDecoder("utf-8", { fatal: true });

function fromBase64(stored: string): Buffer {
    if (!BASE64_PATTERN.test(stored)) {
        throw new DecodingError("Stored value is not valid base64.");
    }
    return Buffer.from(stored, "base64");
}

function toUtf8(bytes: Uint8Array, hint: string): string {
    try {
        return utf8.decode(bytes);
    } catch (error) {
        throw new DecodingError(`${hint} (${error instanceof Error ? error.message : String(error)})`);
    }
}

/** Identity codec: values are stored as their string form. */
export class PlainCodec implements Codec {
    readonly mode = "plain";

    encode(value: Exclude<CellValue, null>): string {
        return toStorageString(value);
    }

    decode(stored: string): string {
        return stored;
    }
}

/** Base64 of the UTF-8 bytes. Hides values from casual inspection only. */
export class ObfuscateCodec implements Codec {
    readonly mode = "obfuscate";

    encode(value: Exclude<CellValue, null>): string {
        return Buffer.from(toStorageString(value), "utf8").toString("base64");
    }

    decode(stored: string): string {
        return toUtf8(fromBase64(stored), "Stored value is not base64-encoded UTF-8.");
    }
}

const KEY_CHECK_BYTES = 4;
const KEY_FACTOR = 27;

/**
 * Keyed stream transform over UTF-8 bytes.
 *
 * NOT a vetted cipher: there is no authentication beyond a 4-byte key check
 * and the same key stream is reused for every value. Use `SealedCodec` when
 * confidentiality matters.
 */
export class SecureCodec implements Codec {
    readonly mode = "secure";
    private readonly _key: string;
    private readonly _keyCheck: Buffer;

    constructor(secret: string) {
        if (!secret) throw new CodecError("Secure mode requires a data-encryption secret.");
        this._key = createHash("sha512").update(secret, "utf8").digest("hex");
        this._keyCheck = createHash("sha256").update(this._key, "utf8").digest().subarray(0, KEY_CHECK_BYTES);
    }

    /** Key stream of `length` bytes: the key, mirrored onto itself until long enough. */
    private _keyStream(length: number): Buffer {
        let stream = this._key;
        while (stream.length < length) {
            stream = stream + [...stream].reverse().join("");
        }
        return Buffer.from(stream.slice(0, length), "latin1");
    }

    encode(value: Exclude<CellValue, null>): string {
        const text = toStorageString(value);
        if (text === "") throw new EmptyInputError("encode");
        const bytes = Buffer.from(text, "utf8");
        const key = this._keyStream(bytes.length);
        const mixed = Buffer.alloc(bytes.length);
        for (let i = 0; i < bytes.length; i++) {
            mixed[i] = ((bytes[i] ?? 0) + KEY_FACTOR * (key[i] ?? 0)) % 256;
        }
        return Buffer.concat([this._keyCheck, mixed]).toString("base64");
    }

    decode(stored: string): string {
        if (stored === "") throw new EmptyInputError("decode");
        const payload = fromBase64(stored);
        if (payload.length <= KEY_CHECK_BYTES) {
            throw new DecodingError("Stored value is too short to be a secure-mode payload.");
        }
        const check = payload.subarray(0, KEY_CHECK_BYTES);
        if (!timingSafeEqual(check, this._keyCheck)) {
            throw new DecodingError("Stored value was encoded with a different secret.");
        }
        const mixed = payload.subarray(KEY_CHECK_BYTES);
        const key = this._keyStream(mixed.length);
        const bytes = Buffer.alloc(mixed.length);
        for (let i = 0; i < mixed.length; i++) {
            bytes[i] = ((((mixed[i] ?? 0) - KEY_FACTOR * (key[i] ?? 0)) % 256) + 256) % 256;
        }
        return toUtf8(bytes, "Secure-mode payload does not decode to text; wrong secret or corrupt data.");
    }

    [util.inspect.custom](): string {
        return "SecureCodec { key: [REDACTED] }";
    }
}

const NONCE_BYTES = 12;
const TAG_BYTES = 16;

/**
 * AES-256-GCM with a nonce derived from the plaintext, so equal values
 * encrypt equally and equality predicates keep working.
 */
export class SealedCodec implements Codec {
    readonly mode = "sealed";
    private readonly _key: Buffer;

    constructor(secret: string) {
        if (!secret) throw new CodecError("Sealed mode requires a data-encryption secret.");
        this._key = createHash("sha256").update(secret, "utf8").digest();
    }

    encode(value: Exclude<CellValue, null>): string {
        const text = toStorageString(value);
        if (text === "") throw new EmptyInputError("encode");
        const nonce = createHmac("sha256", this._key).update(text, "utf8").digest().subarray(0, NONCE_BYTES);
        const cipher = createCipheriv("aes-256-gcm", this._key, nonce);
        const encrypted = Buffer.concat([cipher.update(text, "utf8"), cipher.final()]);
        return Buffer.concat([nonce, cipher.getAuthTag(), encrypted]).toString("base64");
    }

    decode(stored: string): string {
        if (stored === "") throw new EmptyInputError("decode");
        const payload = fromBase64(stored);
        if (payload.length <= NONCE_BYTES + TAG_BYTES) {
            throw new DecodingError("Stored value is too short to be a sealed-mode payload.");
        }
        const nonce = payload.subarray(0, NONCE_BYTES);
        const authTag = payload.subarray(NONCE_BYTES, NONCE_BYTES + TAG_BYTES);
        const decipher = createDecipheriv("aes-256-gcm", this._key, nonce);
        decipher.setAuthTag(authTag);
        let decrypted: Buffer;
        try {
            decrypted = Buffer.concat([
                decipher.update(payload.subarray(NONCE_BYTES + TAG_BYTES)),
                decipher.final(),
            ]);
        } catch {
            throw new DecodingError("Sealed-mode payload failed authentication; wrong secret or tampered data.");
        }
        return toUtf8(decrypted, "Sealed-mode payload does not decode to text.");
    }

    [util.inspect.custom](): string {
        return "SealedCodec { key: [REDACTED] }";
    }
}

/**
 * Build the codec for a data mode.
 * Keyed modes hash the secret here, once; the secret itself is not retained.
 */
export function createCodec(mode: DataMode, secret?: string): Codec {
    switch (mode) {
        case "plain":
            return new PlainCodec();
        case "obfuscate":
            return new ObfuscateCodec();
        case "secure":
            return new SecureCodec(secret ?? "");
        case "sealed":
            return new SealedCodec(secret ?? "");
    }
}
