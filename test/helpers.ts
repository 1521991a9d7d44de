import { PingError } from '../src/core/errors.js';
import { framePacket } from '../src/core/framing.js';
import { decodeString, encodeString } from '../src/core/strings.js';
import { decodeVarInt } from '../src/core/varint.js';

export const SPEC_STATUS_JSON =
    '{"version":{"name":"1.20","protocol":763},"players":{"max":20,"online":3},"description":"A Server"}';

/**
 * A framed status response (id 0x00) carrying `json`.
 */
export function statusPacket(json: string, id = 0x00): Uint8Array {
    return framePacket({ id, body: encodeString(json) });
}

export function catchPingError(fn: () => unknown): PingError {
    try {
        fn();
    } catch (error) {
        if (error instanceof PingError) return error;
        throw error;
    }
    throw new Error('Expected a PingError to be thrown');
}

export async function rejectionOf(promise: Promise<unknown>): Promise<PingError> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof PingError) return error;
        throw error;
    }
    throw new Error('Expected the promise to reject with a PingError');
}

export interface ReceivedHandshake {
    protocolVersion: number;
    serverAddress: string;
    serverPort: number;
    nextState: number;
}

/**
 * Reads a framed handshake from the start of `buffer`, as a server would.
 * Throws while the buffer does not hold the whole packet yet.
 */
export function readHandshake(buffer: Uint8Array): { handshake: ReceivedHandshake; bytesRead: number } {
    const length = decodeVarInt(buffer, 0);
    const expectedEnd = length.offset + length.value;
    const packetId = decodeVarInt(buffer, length.offset);
    if (packetId.value !== 0x00) {
        throw new Error(`Expected a handshake packet, got 0x${packetId.value.toString(16)}`);
    }

    const version = decodeVarInt(buffer, packetId.offset);
    const address = decodeString(buffer, version.offset);
    const portHigh = buffer[address.offset];
    const portLow = buffer[address.offset + 1];
    if (portHigh === undefined || portLow === undefined) {
        throw new Error('Buffer too short for server port');
    }
    const nextState = decodeVarInt(buffer, address.offset + 2);
    if (nextState.offset !== expectedEnd) {
        throw new Error(`Handshake ended at ${nextState.offset}, expected ${expectedEnd}`);
    }

    return {
        handshake: {
            // signed: the "auto" version travels as 0xFFFFFFFF
            protocolVersion: version.value | 0,
            serverAddress: address.value,
            serverPort: (portHigh << 8) | portLow,
            nextState: nextState.value,
        },
        bytesRead: nextState.offset,
    };
}
