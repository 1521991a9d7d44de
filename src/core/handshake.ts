import { PingError } from './errors.js';
import { encodeString } from './strings.js';
import type { Packet } from './types.js';
import { encodeVarInt } from './varint.js';
import { concatBytes } from '../utils/bytes.js';

export const HANDSHAKE_PACKET_ID = 0x00;
export const STATUS_REQUEST_PACKET_ID = 0x00;
export const STATUS_RESPONSE_PACKET_ID = 0x00;

/** `nextState` value asking the server for its status. */
export const NEXT_STATE_STATUS = 1;

/**
 * Protocol version meaning "not determined yet". Servers answer a status
 * request with their own version whatever the client sends.
 */
export const PROTOCOL_VERSION_AUTO = -1;

/**
 * Builds the handshake packet (id 0x00) switching the connection to the status state.
 * The hostname is sent as given; keeping it within 255 bytes is up to the caller.
 */
export function buildHandshake(protocolVersion: number, hostname: string, port: number): Packet {
    if (!Number.isInteger(port) || port < 0 || port > 0xffff) {
        throw new PingError(`Port must be an integer from 0 to 65535, got ${port}`, 'PROTOCOL_ERROR');
    }
    const portBytes = new Uint8Array(2);
    new DataView(portBytes.buffer).setUint16(0, port, false); // big-endian

    return {
        id: HANDSHAKE_PACKET_ID,
        body: concatBytes([
            encodeVarInt(protocolVersion),
            encodeString(hostname),
            portBytes,
            encodeVarInt(NEXT_STATE_STATUS),
        ]),
    };
}

/**
 * Builds the status request packet (id 0x00, no payload).
 */
export function buildStatusRequest(): Packet {
    return { id: STATUS_REQUEST_PACKET_ID, body: new Uint8Array(0) };
}
