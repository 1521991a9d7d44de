/**
 * One protocol packet: its id and the bytes following the id.
 */
export interface Packet {
    id: number;
    body: Uint8Array;
}

/**
 * A request the protocol engine hands to the transport driver.
 * `read` asks for exactly `length` bytes.
 */
export type IoRequest =
    | { kind: 'write'; data: Uint8Array }
    | { kind: 'read'; length: number };

/**
 * A protocol step written once and run by either the blocking or the
 * promise-based driver. Each `yield` suspends on one transport operation;
 * reads resume with the bytes, writes with an empty array.
 */
export type IoStep<T> = Generator<IoRequest, T, Uint8Array>;

/** A sampled player from the status response. */
export interface Player {
    name: string;
    /** UUID of the player, as sent by the server. */
    id: string;
}

/**
 * Chat component used in the server description.
 * See https://wiki.vg/Chat#Current_system_.28JSON_Chat.29
 */
export interface ChatComponent {
    text: string;
    bold: boolean;
    italic: boolean;
    underlined: boolean;
    strikethrough: boolean;
    obfuscated: boolean;
    /** `undefined` means the default color. */
    color?: string;
    /** Following components; they inherit this component's styling unless they override it. */
    extra: ChatComponent[];
}

/** Mod list sent by servers running the FML protocol (1.7 - 1.12). */
export interface ModInfo {
    /** `FML` when Forge is installed. */
    type: string;
    modList: Array<{ modId: string; version: string }>;
}

/** Forge data sent by servers running the FML2 protocol (1.13+). */
export interface ForgeData {
    channels: Array<{ res: string; version: string; required: boolean }>;
    mods: Array<{ modId: string; modMarker: string }>;
    fmlNetworkVersion: number;
}

/**
 * Decoded status document.
 */
export interface ServerStatus {
    /** Version name, e.g. `1.20.1` or `Paper 1.20.1`. Empty when the server omitted it. */
    version: string;
    /** Protocol number of the server. 0 when omitted. */
    protocol: number;
    onlinePlayers: number;
    maxPlayers: number;
    /** Sampled players. Can be empty even when players are online. */
    sample: Player[];
    /** Description (MOTD) flattened to plain text. */
    description: string;
    /** Description as a chat component tree. */
    chat: ChatComponent;
    /** Favicon PNG bytes. Not validated as an image. */
    favicon?: Uint8Array;
    enforcesSecureChat?: boolean;
    previewsChat?: boolean;
    modInfo?: ModInfo;
    forgeData?: ForgeData;
    /** The status document exactly as received. */
    raw: Uint8Array;
}

/**
 * Result of a successful ping.
 */
export interface PingResponse extends ServerStatus {
    /** Milliseconds between sending the handshake and decoding the response. */
    latency: number;
}
