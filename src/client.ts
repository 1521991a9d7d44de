/**
 * Convenience helpers that own the TCP connection themselves.
 * The deadline lives here: the ping exchange itself never times out.
 */

import { Socket } from 'node:net';
import { DEFAULT_PORT } from './config/config.js';
import { PingError } from './core/errors.js';
import type { PingOptions } from './core/exchange.js';
import type { PingResponse } from './core/types.js';
import { pingSocket } from './ping.js';

const DEFAULT_TIMEOUT = 5000;

export interface ServerPingOptions extends PingOptions {
    /** Milliseconds for connecting and pinging together. */
    timeout?: number;
}

/**
 * Connects to `host:port`, pings it and closes the connection.
 */
export async function pingServer(
    host: string,
    port = DEFAULT_PORT,
    options: ServerPingOptions = {}
): Promise<PingResponse> {
    const timeout = options.timeout ?? DEFAULT_TIMEOUT;
    const socket = new Socket();
    socket.setNoDelay(true);

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new PingError(`Ping to ${host}:${port} timed out after ${timeout}ms`, 'IO'));
        }, timeout);
    });

    try {
        await Promise.race([connect(socket, host, port), deadline]);
        return await Promise.race([pingSocket(socket, host, port, options), deadline]);
    } finally {
        clearTimeout(timer);
        socket.destroy();
    }
}

/**
 * Check if a server is online (simple boolean check)
 */
export async function isOnline(host: string, port = DEFAULT_PORT, timeout = DEFAULT_TIMEOUT): Promise<boolean> {
    try {
        await pingServer(host, port, { timeout });
        return true;
    } catch {
        return false;
    }
}

/**
 * Get player count from a server
 */
export async function getPlayerCount(
    host: string,
    port = DEFAULT_PORT,
    timeout = DEFAULT_TIMEOUT
): Promise<{ online: number; max: number }> {
    const status = await pingServer(host, port, { timeout });
    return {
        online: status.onlinePlayers,
        max: status.maxPlayers,
    };
}

function connect(socket: Socket, host: string, port: number): Promise<void> {
    return new Promise((resolve, reject) => {
        const onError = (error: Error) => {
            reject(new PingError(`Failed to connect to ${host}:${port}: ${error.message}`, 'IO', undefined, error));
        };
        // stays attached: errors after connecting only settle the ping itself
        socket.once('error', onError);
        socket.connect(port, host, () => resolve());
    });
}
