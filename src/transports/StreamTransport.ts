import type { Duplex } from 'node:stream';
import { PingError } from '../core/errors.js';
import type { AsyncTransport } from './Transport.js';

interface PendingRead {
    length: number;
    resolve: (data: Uint8Array) => void;
    reject: (error: Error) => void;
}

/**
 * Adapts a Node duplex stream (usually a `net.Socket`) to `AsyncTransport`.
 * Incoming chunks are buffered until a read can be satisfied in full.
 */
export class StreamTransport implements AsyncTransport {
    private chunks: Buffer[] = [];
    private bufferedLength = 0;
    private ended = false;
    private failure: Error | null = null;
    private pending: PendingRead | null = null;

    constructor(private readonly stream: Duplex) {
        this.ended = stream.readableEnded || stream.destroyed;
        stream.on('data', this.onData);
        stream.on('end', this.onEnd);
        stream.on('close', this.onEnd);
        stream.on('error', this.onError);
    }

    write(data: Uint8Array): Promise<void> {
        return new Promise((resolve, reject) => {
            this.stream.write(data, (error) => {
                if (error) reject(error);
                else resolve();
            });
        });
    }

    read(length: number): Promise<Uint8Array> {
        if (this.pending) {
            return Promise.reject(new PingError('A read is already in progress', 'IO'));
        }
        return new Promise((resolve, reject) => {
            this.pending = { length, resolve, reject };
            this.settle();
        });
    }

    /**
     * Stops listening to the stream. Bytes received but not read are dropped.
     */
    detach(): void {
        this.stream.off('data', this.onData);
        this.stream.off('end', this.onEnd);
        this.stream.off('close', this.onEnd);
        this.stream.off('error', this.onError);
        this.stream.pause();
    }

    private onData = (chunk: Buffer | string): void => {
        const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
        this.chunks.push(bytes);
        this.bufferedLength += bytes.length;
        this.settle();
    };

    private onEnd = (): void => {
        this.ended = true;
        this.settle();
    };

    private onError = (error: Error): void => {
        this.failure = error;
        this.settle();
    };

    private settle(): void {
        const pending = this.pending;
        if (!pending) return;

        if (this.bufferedLength >= pending.length) {
            this.pending = null;
            pending.resolve(this.take(pending.length));
        } else if (this.failure) {
            this.pending = null;
            pending.reject(this.failure);
        } else if (this.ended) {
            this.pending = null;
            pending.reject(new PingError(
                `Stream ended with ${this.bufferedLength} of ${pending.length} bytes available`,
                'TRUNCATED_STREAM'
            ));
        }
    }

    private take(length: number): Uint8Array {
        const all = this.chunks.length === 1 ? this.chunks[0] ?? Buffer.alloc(0) : Buffer.concat(this.chunks);
        const result = new Uint8Array(all.subarray(0, length));
        const rest = all.subarray(length);
        this.chunks = rest.length > 0 ? [rest] : [];
        this.bufferedLength = rest.length;
        return result;
    }
}
