export * from './config/config.js';
export * from './config/config-manager.js';
export * from './core/errors.js';
export * from './core/exchange.js';
export * from './core/framing.js';
export * from './core/handshake.js';
export * from './core/io.js';
export * from './core/json.js';
export * from './core/status.js';
export * from './core/strings.js';
export * from './core/types.js';
export * from './core/varint.js';
export * from './transports/Transport.js';
export * from './transports/BufferTransport.js';
export * from './transports/StreamTransport.js';
export * from './transports/WebStreamTransport.js';
export * from './ping.js';
export * from './client.js';
export { loadEnv } from './utils/env-loader.js';
