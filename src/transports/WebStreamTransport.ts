import type {
    ReadableStream,
    ReadableStreamDefaultReader,
    WritableStream,
    WritableStreamDefaultWriter,
} from 'node:stream/web';
import { PingError } from '../core/errors.js';
import { concatBytes } from '../utils/bytes.js';
import type { AsyncTransport } from './Transport.js';

/**
 * Adapts a WHATWG readable/writable pair to `AsyncTransport`.
 * Holds the reader and writer locks until `release()`.
 */
export class WebStreamTransport implements AsyncTransport {
    private readonly reader: ReadableStreamDefaultReader<Uint8Array>;
    private readonly writer: WritableStreamDefaultWriter<Uint8Array>;
    private buffered: Uint8Array = new Uint8Array(0);

    constructor(readable: ReadableStream<Uint8Array>, writable: WritableStream<Uint8Array>) {
        this.reader = readable.getReader();
        this.writer = writable.getWriter();
    }

    async write(data: Uint8Array): Promise<void> {
        await this.writer.ready;
        await this.writer.write(data);
    }

    async read(length: number): Promise<Uint8Array> {
        // a chunk may carry more than requested; the remainder stays buffered
        while (this.buffered.length < length) {
            const { done, value } = await this.reader.read();
            if (done) {
                throw new PingError(
                    `Stream ended with ${this.buffered.length} of ${length} bytes available`,
                    'TRUNCATED_STREAM'
                );
            }
            this.buffered = concatBytes([this.buffered, value]);
        }
        const result = this.buffered.slice(0, length);
        this.buffered = this.buffered.subarray(length);
        return result;
    }

    release(): void {
        this.reader.releaseLock();
        this.writer.releaseLock();
    }
}
