/**
 * Public ping entry points. All of them run the same exchange; they differ only
 * in the kind of connection they accept.
 *
 * @example
 * ```ts
 * import { connect } from 'node:net';
 * import { pingSocket } from 'server-list-ping';
 *
 * const socket = connect(25565, 'play.example.com');
 * const status = await pingSocket(socket, 'play.example.com', 25565);
 * console.log(`${status.onlinePlayers}/${status.maxPlayers} players`);
 * socket.destroy();
 * ```
 */

import type { Duplex } from 'node:stream';
import type { ReadableStream, WritableStream } from 'node:stream/web';
import { pingExchange, type PingOptions } from './core/exchange.js';
import { runAsync, runSync } from './core/io.js';
import type { PingResponse } from './core/types.js';
import { StreamTransport } from './transports/StreamTransport.js';
import type { AsyncTransport, SyncTransport } from './transports/Transport.js';
import { WebStreamTransport } from './transports/WebStreamTransport.js';

/**
 * Pings over a blocking transport.
 */
export function pingSync(
    transport: SyncTransport,
    hostname: string,
    port: number,
    options?: PingOptions
): PingResponse {
    return runSync(pingExchange(hostname, port, options), transport);
}

/**
 * Pings over a promise-based transport.
 */
export function ping(
    transport: AsyncTransport,
    hostname: string,
    port: number,
    options?: PingOptions
): Promise<PingResponse> {
    return runAsync(pingExchange(hostname, port, options), transport);
}

/**
 * Pings over a connected Node stream such as a `net.Socket`.
 * The stream is left open; its listeners are removed once the ping settles.
 */
export async function pingSocket(
    stream: Duplex,
    hostname: string,
    port: number,
    options?: PingOptions
): Promise<PingResponse> {
    const transport = new StreamTransport(stream);
    try {
        return await ping(transport, hostname, port, options);
    } finally {
        transport.detach();
    }
}

/**
 * Pings over a pair of WHATWG streams.
 * The stream locks are released once the ping settles.
 */
export async function pingWebStream(
    streams: { readable: ReadableStream<Uint8Array>; writable: WritableStream<Uint8Array> },
    hostname: string,
    port: number,
    options?: PingOptions
): Promise<PingResponse> {
    const transport = new WebStreamTransport(streams.readable, streams.writable);
    try {
        return await ping(transport, hostname, port, options);
    } finally {
        transport.release();
    }
}
