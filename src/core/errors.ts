/**
 * Error kinds raised while pinging a server.
 *
 * - `IO`: the transport failed
 * - `TRUNCATED_STREAM`: fewer bytes were available than the framing declared
 * - `MALFORMED_VARINT`: a VarInt did not terminate within 5 bytes or overflowed 32 bits
 * - `PROTOCOL_ERROR`: unexpected packet id, or a zero/oversized declared length
 * - `INVALID_ENCODING`: bad UTF-8 or base64
 * - `INVALID_JSON`: the status string is not a JSON object
 * - `INVALID_FAVICON`: the favicon lacks the `data:image/png;base64,` prefix
 */
export type PingErrorCode =
    | 'IO'
    | 'TRUNCATED_STREAM'
    | 'MALFORMED_VARINT'
    | 'PROTOCOL_ERROR'
    | 'INVALID_ENCODING'
    | 'INVALID_JSON'
    | 'INVALID_FAVICON';

/**
 * The step of a ping exchange an error happened in.
 */
export type PingPhase = 'handshake' | 'response' | 'decode';

export class PingError extends Error {
    constructor(
        message: string,
        public readonly code: PingErrorCode,
        public readonly phase?: PingPhase,
        public override readonly cause?: Error
    ) {
        super(phase ? `[${phase}] ${message}` : message);
        this.name = 'PingError';
    }

    /**
     * Returns a copy of this error attributed to `phase`.
     * Errors that already carry a phase are returned as they are.
     */
    inPhase(phase: PingPhase): PingError {
        if (this.phase) return this;
        return new PingError(this.message, this.code, phase, this.cause);
    }
}

/**
 * Normalizes anything thrown during `phase` into a `PingError`.
 * Foreign errors (socket resets, closed streams...) become `IO`, except in the
 * `decode` phase, which never touches the transport.
 */
export function toPingError(error: unknown, phase: PingPhase): PingError {
    if (error instanceof PingError) return error.inPhase(phase);
    const cause = error instanceof Error ? error : new Error(String(error));
    if (phase === 'decode') {
        return new PingError(`Status document could not be decoded: ${cause.message}`, 'INVALID_JSON', phase, cause);
    }
    return new PingError(`Transport failure: ${cause.message}`, 'IO', phase, cause);
}
