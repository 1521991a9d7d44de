import { concatBytes } from '../utils/bytes.js';
import type { SyncTransport } from './Transport.js';

/**
 * Blocking in-memory transport: serves reads from a fixed inbound byte
 * sequence and records every write. Useful to replay a captured server
 * response.
 */
export class BufferTransport implements SyncTransport {
    private readonly inbound: Uint8Array;
    private position = 0;
    private readonly writes: Uint8Array[] = [];

    constructor(inbound: Uint8Array | readonly number[] = []) {
        this.inbound = Uint8Array.from(inbound);
    }

    write(data: Uint8Array): void {
        this.writes.push(data.slice());
    }

    /** Returns fewer than `length` bytes once the inbound data runs out. */
    read(length: number): Uint8Array {
        const end = Math.min(this.position + length, this.inbound.length);
        const result = this.inbound.slice(this.position, end);
        this.position = end;
        return result;
    }

    /** Every write, in order. */
    get writtenPackets(): Uint8Array[] {
        return [...this.writes];
    }

    /** All written bytes joined. */
    get written(): Uint8Array {
        return concatBytes(this.writes);
    }

    get bytesRead(): number {
        return this.position;
    }
}
