import { PingError } from './errors.js';
import { decodeVarInt, encodeVarInt } from './varint.js';

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Encodes a string as length-prefixed UTF-8 (VarInt byte length, then the bytes).
 */
export function encodeString(value: string): Uint8Array {
    const utf8 = utf8Encoder.encode(value);
    const lengthBytes = encodeVarInt(utf8.length);
    const result = new Uint8Array(lengthBytes.length + utf8.length);
    result.set(lengthBytes, 0);
    result.set(utf8, lengthBytes.length);
    return result;
}

/**
 * Reads a length-prefixed string from a buffer starting at the given offset.
 * Returns the decoded text, its raw UTF-8 bytes and the new offset.
 */
export function decodeString(buffer: Uint8Array, offset = 0): { value: string; bytes: Uint8Array; offset: number } {
    const header = decodeVarInt(buffer, offset);
    const end = header.offset + header.value;
    if (end > buffer.length) {
        throw new PingError(
            `String declares ${header.value} bytes but only ${buffer.length - header.offset} are available`,
            'TRUNCATED_STREAM'
        );
    }
    const bytes = buffer.subarray(header.offset, end);
    return { value: decodeUtf8(bytes), bytes, offset: end };
}

export function decodeUtf8(bytes: Uint8Array): string {
    try {
        return utf8Decoder.decode(bytes);
    } catch (error) {
        throw new PingError('String is not valid UTF-8', 'INVALID_ENCODING', undefined,
            error instanceof Error ? error : undefined);
    }
}
