/**
 * Byte transports the ping exchange runs over.
 *
 * The caller owns the underlying connection: transports are neither opened
 * nor closed by the protocol code, and are used by one ping at a time.
 */

/**
 * Blocking transport. `read` returns exactly `length` bytes, or fewer when
 * the source is exhausted.
 */
export interface SyncTransport {
    write(data: Uint8Array): void;
    read(length: number): Uint8Array;
}

/**
 * Promise-based transport. `write` resolves once the bytes were handed to the
 * connection; `read` resolves with exactly `length` bytes.
 */
export interface AsyncTransport {
    write(data: Uint8Array): Promise<void>;
    read(length: number): Promise<Uint8Array>;
}
