import type { AsyncTransport, SyncTransport } from '../transports/Transport.js';
import { PingError } from './errors.js';
import type { IoRequest, IoStep } from './types.js';

const NOTHING = new Uint8Array(0);

/**
 * Runs a protocol step against a blocking transport.
 * Transport failures are thrown back into the step so it can attribute them.
 */
export function runSync<T>(step: IoStep<T>, transport: SyncTransport): T {
    let result = step.next(NOTHING);
    while (!result.done) {
        let reply: Uint8Array;
        try {
            reply = performSync(transport, result.value);
        } catch (error) {
            result = step.throw(error);
            continue;
        }
        result = step.next(reply);
    }
    return result.value;
}

/**
 * Runs a protocol step against a promise-based transport.
 */
export async function runAsync<T>(step: IoStep<T>, transport: AsyncTransport): Promise<T> {
    let result = step.next(NOTHING);
    while (!result.done) {
        let reply: Uint8Array;
        try {
            reply = await performAsync(transport, result.value);
        } catch (error) {
            result = step.throw(error);
            continue;
        }
        result = step.next(reply);
    }
    return result.value;
}

function performSync(transport: SyncTransport, request: IoRequest): Uint8Array {
    if (request.kind === 'write') {
        transport.write(request.data);
        return NOTHING;
    }
    return checkLength(transport.read(request.length), request.length);
}

async function performAsync(transport: AsyncTransport, request: IoRequest): Promise<Uint8Array> {
    if (request.kind === 'write') {
        await transport.write(request.data);
        return NOTHING;
    }
    return checkLength(await transport.read(request.length), request.length);
}

function checkLength(bytes: Uint8Array, expected: number): Uint8Array {
    if (bytes.length < expected) {
        throw new PingError(`Stream ended after ${bytes.length} of ${expected} bytes`, 'TRUNCATED_STREAM');
    }
    if (bytes.length > expected) {
        throw new PingError(`Transport returned ${bytes.length} bytes when ${expected} were requested`, 'IO');
    }
    return bytes;
}
