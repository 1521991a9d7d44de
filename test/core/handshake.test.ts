import { describe, expect, test } from 'vitest';
import { framePacket } from '../../src/core/framing.js';
import { PROTOCOL_VERSION_AUTO, buildHandshake, buildStatusRequest } from '../../src/core/handshake.js';
import { catchPingError, readHandshake } from '../helpers.js';

const LOCALHOST = [0x6c, 0x6f, 0x63, 0x61, 0x6c, 0x68, 0x6f, 0x73, 0x74];

describe('buildHandshake', () => {
    test('encodes version, address, port and the status state', () => {
        const packet = buildHandshake(47, 'localhost', 25565);
        expect(packet.id).toBe(0x00);
        expect(Array.from(packet.body)).toEqual([
            0x2f,             // Protocol version (47)
            0x09,             // String length (9)
            ...LOCALHOST,     // "localhost"
            0x63, 0xdd,       // Port (25565)
            0x01,             // Next state (status)
        ]);
    });

    test('auto protocol version is sent as a 5-byte VarInt', () => {
        const packet = buildHandshake(PROTOCOL_VERSION_AUTO, 'a', 1);
        expect(Array.from(packet.body)).toEqual([0xff, 0xff, 0xff, 0xff, 0x0f, 0x01, 0x61, 0x00, 0x01, 0x01]);
    });

    test('address length counts UTF-8 bytes', () => {
        const packet = buildHandshake(763, 'ü.example', 25565);
        // 763 takes two bytes; "ü" is two bytes in UTF-8
        expect(packet.body[2]).toBe(10);
    });

    test('port is big-endian', () => {
        const packet = buildHandshake(0, '', 0x1234);
        expect(Array.from(packet.body)).toEqual([0x00, 0x00, 0x12, 0x34, 0x01]);
    });

    test('accepts the edges of the port range', () => {
        expect(Array.from(buildHandshake(0, '', 0).body.subarray(2, 4))).toEqual([0x00, 0x00]);
        expect(Array.from(buildHandshake(0, '', 65535).body.subarray(2, 4))).toEqual([0xff, 0xff]);
    });

    test('rejects ports that do not fit in 16 bits', () => {
        for (const port of [-1, 65536, 70000, 25565.5, Number.NaN]) {
            const error = catchPingError(() => buildHandshake(0, 'localhost', port));
            expect(error.code).toBe('PROTOCOL_ERROR');
            expect(error.message).toBe(`Port must be an integer from 0 to 65535, got ${port}`);
        }
    });

    test('a server reads back what was built', () => {
        const framed = framePacket(buildHandshake(PROTOCOL_VERSION_AUTO, 'play.example.net', 25570));
        const { handshake, bytesRead } = readHandshake(framed);
        expect(handshake).toEqual({
            protocolVersion: -1,
            serverAddress: 'play.example.net',
            serverPort: 25570,
            nextState: 1,
        });
        expect(bytesRead).toBe(framed.length);
    });
});

describe('buildStatusRequest', () => {
    test('is an empty packet 0x00', () => {
        const packet = buildStatusRequest();
        expect(packet.id).toBe(0x00);
        expect(packet.body.length).toBe(0);
        expect(Array.from(framePacket(packet))).toEqual([0x01, 0x00]);
    });
});
