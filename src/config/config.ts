/**
 * Configuration for the ping CLI and client helpers.
 */

import { DEFAULT_MAX_PACKET_LENGTH } from '../core/framing.js';
import { PROTOCOL_VERSION_AUTO } from '../core/handshake.js';

export const DEFAULT_PORT = 25565;

export interface ServerEntry {
  /** Hostname or IP of the server */
  host: string;
  /** Port of the server (defaults to 25565) */
  port?: number;
}

export interface PingConfig {
  /** Servers pinged when none are given on the command line */
  servers: ServerEntry[];
  /** Milliseconds before a ping is abandoned */
  timeout: number;
  /** Protocol version announced in the handshake (-1 lets the server decide) */
  protocolVersion: number;
  /** Largest status packet accepted, in bytes */
  maxPacketLength: number;
  /** Whether to enable debug logging */
  debug: boolean;
}

/**
 * Default configuration.
 */
export const defaultConfig: PingConfig = {
  servers: [],
  timeout: 5000,
  protocolVersion: PROTOCOL_VERSION_AUTO,
  maxPacketLength: DEFAULT_MAX_PACKET_LENGTH,
  debug: false,
};

/**
 * Creates a configuration by merging user provided options with defaults.
 */
export function createConfig(overrides?: Partial<PingConfig>): PingConfig {
  return {
    ...defaultConfig,
    ...overrides,
  };
}

/**
 * Parses `host`, `host:port` or `[ipv6]:port`.
 */
export function parseServerAddress(address: string): Required<ServerEntry> {
  const bracketed = address.match(/^\[([^\]]+)\](?::(\d+))?$/);
  if (bracketed) {
    return { host: bracketed[1] ?? '', port: parsePort(bracketed[2], address) };
  }

  const parts = address.split(':');
  if (parts.length === 2) {
    return { host: parts[0] ?? '', port: parsePort(parts[1], address) };
  }
  // bare IPv6 addresses contain several colons and no port
  return { host: address, port: DEFAULT_PORT };
}

function parsePort(value: string | undefined, address: string): number {
  if (value === undefined) return DEFAULT_PORT;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port in server address '${address}'`);
  }
  return port;
}

/**
 * Parses a timeout in milliseconds, such as the `PING_TIMEOUT` variable.
 */
export function parseTimeout(value: string): number {
  const timeout = Number(value.trim());
  if (value.trim() === '' || !Number.isInteger(timeout) || timeout <= 0) {
    throw new Error(`Invalid timeout '${value}', expected a positive number of milliseconds`);
  }
  return timeout;
}
