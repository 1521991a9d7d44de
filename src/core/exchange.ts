import { PingError, toPingError } from './errors.js';
import { DEFAULT_MAX_PACKET_LENGTH, readPacket, writePacket } from './framing.js';
import {
    PROTOCOL_VERSION_AUTO,
    STATUS_RESPONSE_PACKET_ID,
    buildHandshake,
    buildStatusRequest,
} from './handshake.js';
import { parseStatus } from './status.js';
import type { IoStep, Packet, PingResponse, ServerStatus } from './types.js';

export interface PingOptions {
    /** Protocol version announced in the handshake. Defaults to -1 (auto). */
    protocolVersion?: number;
    /** Largest status packet accepted, in bytes. */
    maxPacketLength?: number;
    /** Clock used for the latency measurement, in milliseconds. */
    now?: () => number;
}

/**
 * The whole Server List Ping exchange:
 * handshake + status request, then one status response, then decoding.
 * Every failure is rethrown as a `PingError` carrying the phase it happened in.
 */
export function* pingExchange(hostname: string, port: number, options: PingOptions = {}): IoStep<PingResponse> {
    const now = options.now ?? (() => performance.now());
    const protocolVersion = options.protocolVersion ?? PROTOCOL_VERSION_AUTO;
    const maxPacketLength = options.maxPacketLength ?? DEFAULT_MAX_PACKET_LENGTH;
    const startedAt = now();

    try {
        yield* writePacket(buildHandshake(protocolVersion, hostname, port));
        yield* writePacket(buildStatusRequest());
    } catch (error) {
        throw toPingError(error, 'handshake');
    }

    let packet: Packet;
    try {
        packet = yield* readPacket(maxPacketLength);
    } catch (error) {
        throw toPingError(error, 'response');
    }
    if (packet.id !== STATUS_RESPONSE_PACKET_ID) {
        throw new PingError(
            `Expected status response packet 0x00, got 0x${packet.id.toString(16).padStart(2, '0')}`,
            'PROTOCOL_ERROR',
            'response'
        );
    }

    let status: ServerStatus;
    try {
        status = parseStatus(packet.body);
    } catch (error) {
        throw toPingError(error, 'decode');
    }

    return { ...status, latency: now() - startedAt };
}
