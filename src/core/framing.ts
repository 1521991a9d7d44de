/**
 * Packet framing - varint length-prefix encoding/decoding.
 * Wire format: [varint: length][varint: packet id][body...]
 * where length counts the packet id and the body.
 */

import { PingError } from './errors.js';
import type { IoStep, Packet } from './types.js';
import { VarIntDecoder, decodeVarInt, varIntLength, writeVarIntSync } from './varint.js';

/**
 * Largest declared packet length accepted by default: the largest value a
 * 3-byte VarInt holds. Status responses are a JSON document plus one small icon.
 */
export const DEFAULT_MAX_PACKET_LENGTH = 2_097_151;

/**
 * Frames a packet by prepending the varint-encoded length and id to its body.
 */
export function framePacket(packet: Packet): Uint8Array {
    const length = varIntLength(packet.id) + packet.body.length;
    const framed = new Uint8Array(varIntLength(length) + length);
    let offset = writeVarIntSync(framed, length, 0);
    offset = writeVarIntSync(framed, packet.id, offset);
    framed.set(packet.body, offset);
    return framed;
}

/**
 * Splits a length-stripped frame into its packet id and body.
 */
export function splitFrame(frame: Uint8Array): Packet {
    const { value: id, offset } = decodeVarInt(frame, 0);
    return { id, body: frame.subarray(offset) };
}

/**
 * Writes one packet as a single transport write.
 */
export function* writePacket(packet: Packet): IoStep<void> {
    yield { kind: 'write', data: framePacket(packet) };
}

/**
 * Reads a VarInt from the transport one byte at a time.
 */
export function* readVarInt(): IoStep<number> {
    const decoder = new VarIntDecoder();
    while (true) {
        const chunk = yield { kind: 'read', length: 1 };
        const byte = chunk[0];
        if (byte === undefined) {
            throw new PingError('Stream ended in the middle of a VarInt', 'TRUNCATED_STREAM');
        }
        const value = decoder.push(byte);
        if (value !== null) return value;
    }
}

/**
 * Reads one length-prefixed packet. The declared length is checked against
 * `maxPacketLength` before anything beyond the prefix is read.
 */
export function* readPacket(maxPacketLength = DEFAULT_MAX_PACKET_LENGTH): IoStep<Packet> {
    const length = yield* readVarInt();
    if (length === 0) {
        throw new PingError('Packet declares a length of 0', 'PROTOCOL_ERROR');
    }
    if (length > maxPacketLength) {
        throw new PingError(
            `Packet declares ${length} bytes, more than the limit of ${maxPacketLength}`,
            'PROTOCOL_ERROR'
        );
    }
    const frame = yield { kind: 'read', length };
    return splitFrame(frame);
}
