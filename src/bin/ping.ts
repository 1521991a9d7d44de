#!/usr/bin/env node
import { loadEnv } from '../utils/env-loader.js';
import { ConfigManager } from '../config/config-manager.js';
import {
    defaultConfig,
    parseServerAddress,
    parseTimeout,
    DEFAULT_PORT,
    type PingConfig,
    type ServerEntry,
} from '../config/config.js';
import { PingError } from '../core/errors.js';
import { pingServer } from '../client.js';

loadEnv();

const manager = new ConfigManager<PingConfig>({
    fileName: process.env.PING_CONFIG || 'ping.yaml',
    defaultConfig,
    silent: process.env.DEBUG !== 'true',
    validator: (config) =>
        config.servers.every((server) => typeof server.host === 'string' && server.host.length > 0) ||
        'every entry of servers needs a host',
});

const USAGE = 'Usage: server-list-ping <host[:port]>... (or list servers in the config file)';

function fail(message: string): never {
    console.error(message);
    console.error(USAGE);
    process.exit(2);
}

const config = await manager.load();
if (process.env.PING_TIMEOUT) {
    try {
        config.timeout = parseTimeout(process.env.PING_TIMEOUT);
    } catch (error) {
        fail(`PING_TIMEOUT: ${error instanceof Error ? error.message : String(error)}`);
    }
}
if (process.env.DEBUG === 'true') config.debug = true;

const log = config.debug ? console.log : () => {};

let targets: Required<ServerEntry>[];
try {
    targets = process.argv.length > 2
        ? process.argv.slice(2).map((address) => parseServerAddress(address))
        : config.servers.map((server) => ({ host: server.host, port: server.port ?? DEFAULT_PORT }));
} catch (error) {
    fail(error instanceof Error ? error.message : String(error));
}

if (targets.length === 0) {
    fail('No servers to ping.');
}

let failures = 0;
for (const { host, port } of targets) {
    log(`Pinging ${host}:${port} (timeout ${config.timeout}ms)`);
    try {
        const status = await pingServer(host, port, {
            timeout: config.timeout,
            protocolVersion: config.protocolVersion,
            maxPacketLength: config.maxPacketLength,
        });
        console.log(`${host}:${port}`);
        console.log(`  version:  ${status.version} (protocol ${status.protocol})`);
        console.log(`  players:  ${status.onlinePlayers}/${status.maxPlayers}`);
        if (status.sample.length > 0) {
            console.log(`  sample:   ${status.sample.map((player) => player.name).join(', ')}`);
        }
        console.log(`  latency:  ${status.latency.toFixed(1)}ms`);
        console.log(`  motd:     ${status.description.replace(/\n/g, ' / ')}`);
        if (status.favicon) log(`  favicon:  ${status.favicon.length} bytes`);
    } catch (error) {
        failures++;
        if (error instanceof PingError) {
            console.error(`${host}:${port} failed (${error.code}): ${error.message}`);
        } else {
            console.error(`${host}:${port} failed:`, error);
        }
    }
}

process.exit(failures > 0 ? 1 : 0);
