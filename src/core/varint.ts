/**
 * VarInt utilities for Minecraft protocol
 * Based on Minecraft protocol specification: https://wiki.vg/Protocol#VarInt_and_VarLong
 *
 * Values are unsigned 32-bit on the wire. Negative numbers (the `-1` protocol
 * version sentinel) are written through their two's-complement bit pattern.
 */

import { PingError } from './errors.js';

const SEGMENT_BITS = 0x7f;
const CONTINUE_BIT = 0x80;

/** A VarInt never takes more than 5 bytes. */
export const MAX_VARINT_BYTES = 5;

/**
 * Encodes a value as a VarInt using the fewest bytes possible.
 */
export function encodeVarInt(value: number): Uint8Array {
    const bytes = new Uint8Array(varIntLength(value));
    writeVarIntSync(bytes, value, 0);
    return bytes;
}

/**
 * Reads a VarInt from a buffer starting at the given offset.
 * Returns the value and the new offset.
 */
export function decodeVarInt(buffer: Uint8Array, offset = 0): { value: number; offset: number } {
    const decoder = new VarIntDecoder();
    while (true) {
        const byte = buffer[offset];
        if (byte === undefined) {
            throw new PingError('Buffer ended in the middle of a VarInt', 'TRUNCATED_STREAM');
        }
        offset++;
        const value = decoder.push(byte);
        if (value !== null) return { value, offset };
    }
}

/**
 * Writes a VarInt to a buffer at the given offset.
 * Returns the new offset.
 */
export function writeVarIntSync(buffer: Uint8Array, value: number, offset: number): number {
    let remaining = value >>> 0;
    do {
        let temp = remaining & SEGMENT_BITS;
        remaining >>>= 7;
        if (remaining !== 0) {
            temp |= CONTINUE_BIT;
        }
        buffer[offset++] = temp;
    } while (remaining !== 0);
    return offset;
}

/**
 * Calculates the number of bytes required to encode a VarInt.
 */
export function varIntLength(value: number): number {
    let remaining = value >>> 0;
    let length = 0;
    do {
        remaining >>>= 7;
        length++;
    } while (remaining !== 0);
    return length;
}

/**
 * Incremental VarInt decoder, fed one byte at a time.
 * Used both over in-memory buffers and over transports that hand out single bytes.
 */
export class VarIntDecoder {
    private result = 0;
    private bytesRead = 0;

    /**
     * Consumes one byte. Returns the decoded value once the terminating byte
     * arrives, `null` while more bytes are needed.
     */
    push(byte: number): number | null {
        if (this.bytesRead === MAX_VARINT_BYTES - 1 && (byte & 0xf0) !== 0) {
            // 5th byte: only the low 4 bits fit into 32 bits, and it must be the last
            throw new PingError('VarInt is too big', 'MALFORMED_VARINT');
        }
        this.result |= (byte & SEGMENT_BITS) << (7 * this.bytesRead);
        this.bytesRead++;
        if ((byte & CONTINUE_BIT) !== 0) return null;
        return this.result >>> 0;
    }
}
