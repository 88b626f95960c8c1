/**
 * Values a handler may hand to the byte layer.
 */
export type Encodable = string | number | Uint8Array;

/**
 * Normalize text, numbers and byte views into a Buffer (UTF-8 for text).
 */
export function toBytes(value: Encodable): Buffer {
    if (Buffer.isBuffer(value)) {
        return value;
    }
    if (value instanceof Uint8Array) {
        return Buffer.from(value.buffer, value.byteOffset, value.byteLength);
    }
    return Buffer.from(String(value), 'utf-8');
}

export function toText(value: Encodable): string {
    if (value instanceof Uint8Array) {
        return toBytes(value).toString('utf-8');
    }
    return String(value);
}
