/**
 * Decoding of the status response packet.
 * Protocol: https://wiki.vg/Server_List_Ping#Status_Response
 */

import { PingError } from './errors.js';
import {
    getArray,
    getBoolean,
    getNumber,
    getObject,
    getString,
    isJsonObject,
    parseJsonObject,
    type JsonObject,
    type JsonValue,
} from './json.js';
import { decodeString } from './strings.js';
import type { ChatComponent, ForgeData, ModInfo, Player, ServerStatus } from './types.js';

export const FAVICON_PREFIX = 'data:image/png;base64,';

/** Deepest chat component nesting accepted in a description. */
export const MAX_CHAT_DEPTH = 128;

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Parses the body of a status response packet: one length-prefixed JSON string.
 * Missing version/players fields default to empty values; anything structurally
 * broken throws.
 */
export function parseStatus(body: Uint8Array): ServerStatus {
    const { value: json, bytes } = decodeString(body, 0);
    const document = parseJsonObject(json);

    const version = getObject(document, 'version');
    const players = getObject(document, 'players');
    const description = document['description'];
    const favicon = document['favicon'];

    const status: ServerStatus = {
        version: version ? getString(version, 'name') ?? '' : '',
        protocol: version ? getNumber(version, 'protocol') ?? 0 : 0,
        onlinePlayers: players ? getNumber(players, 'online') ?? 0 : 0,
        maxPlayers: players ? getNumber(players, 'max') ?? 0 : 0,
        sample: players ? readSample(players) : [],
        description: flattenChat(description),
        chat: toChatComponent(description),
        raw: bytes.slice(),
    };

    if (favicon !== undefined && favicon !== null) {
        if (typeof favicon !== 'string') {
            throw new PingError(`Favicon must be a string, got ${typeof favicon}`, 'INVALID_FAVICON');
        }
        status.favicon = decodeFavicon(favicon);
    }

    const enforcesSecureChat = getBoolean(document, 'enforcesSecureChat');
    if (enforcesSecureChat !== undefined) status.enforcesSecureChat = enforcesSecureChat;
    const previewsChat = getBoolean(document, 'previewsChat');
    if (previewsChat !== undefined) status.previewsChat = previewsChat;

    const modInfo = getObject(document, 'modinfo');
    if (modInfo) status.modInfo = readModInfo(modInfo);
    const forgeData = getObject(document, 'forgeData');
    if (forgeData) status.forgeData = readForgeData(forgeData);

    return status;
}

/**
 * Flattens a description to plain text: a string is used verbatim, a chat
 * component contributes its `text` followed by its `extra` children, in order.
 */
export function flattenChat(value: JsonValue | undefined, depth = 0): string {
    checkChatDepth(depth);
    if (typeof value === 'string') return value;
    if (Array.isArray(value)) return value.map((child) => flattenChat(child, depth + 1)).join('');
    if (!isJsonObject(value)) return '';

    let text = getString(value, 'text') ?? '';
    for (const child of getArray(value, 'extra') ?? []) {
        text += flattenChat(child, depth + 1);
    }
    return text;
}

/**
 * Normalizes a description into a chat component tree.
 * A top-level array behaves like its first element with the rest appended as extras.
 */
export function toChatComponent(value: JsonValue | undefined, depth = 0): ChatComponent {
    checkChatDepth(depth);
    if (Array.isArray(value)) {
        const [first, ...rest] = value.map((child) => toChatComponent(child, depth + 1));
        if (!first) return emptyComponent('');
        return { ...first, extra: [...first.extra, ...rest] };
    }
    if (!isJsonObject(value)) {
        return emptyComponent(typeof value === 'string' ? value : '');
    }

    const component: ChatComponent = {
        text: getString(value, 'text') ?? '',
        bold: getBoolean(value, 'bold') ?? false,
        italic: getBoolean(value, 'italic') ?? false,
        underlined: getBoolean(value, 'underlined') ?? false,
        strikethrough: getBoolean(value, 'strikethrough') ?? false,
        obfuscated: getBoolean(value, 'obfuscated') ?? false,
        extra: (getArray(value, 'extra') ?? []).map((child) => toChatComponent(child, depth + 1)),
    };
    const color = getString(value, 'color');
    if (color !== undefined) component.color = color;
    return component;
}

/**
 * Decodes a `data:image/png;base64,` favicon into its image bytes.
 * Line breaks inside the base64 text are ignored.
 */
export function decodeFavicon(value: string): Uint8Array {
    if (!value.startsWith(FAVICON_PREFIX)) {
        throw new PingError(`Favicon does not start with "${FAVICON_PREFIX}"`, 'INVALID_FAVICON');
    }
    const data = value.slice(FAVICON_PREFIX.length).replace(/\r?\n/g, '');
    if (!BASE64_PATTERN.test(data)) {
        throw new PingError('Favicon is not valid base64', 'INVALID_ENCODING');
    }
    return new Uint8Array(Buffer.from(data, 'base64'));
}

function checkChatDepth(depth: number): void {
    if (depth >= MAX_CHAT_DEPTH) {
        throw new PingError(`Description is nested more than ${MAX_CHAT_DEPTH} levels deep`, 'INVALID_JSON');
    }
}

function emptyComponent(text: string): ChatComponent {
    return {
        text,
        bold: false,
        italic: false,
        underlined: false,
        strikethrough: false,
        obfuscated: false,
        extra: [],
    };
}

function readSample(players: JsonObject): Player[] {
    const sample: Player[] = [];
    for (const entry of getArray(players, 'sample') ?? []) {
        if (!isJsonObject(entry)) continue;
        const name = getString(entry, 'name');
        const id = getString(entry, 'id');
        // entries without a name or id carry nothing usable
        if (name === undefined || id === undefined) continue;
        sample.push({ name, id });
    }
    return sample;
}

function readModInfo(modInfo: JsonObject): ModInfo {
    return {
        type: getString(modInfo, 'type') ?? '',
        modList: (getArray(modInfo, 'modList') ?? []).filter(isJsonObject).map((mod) => ({
            modId: getString(mod, 'modid') ?? '',
            version: getString(mod, 'version') ?? '',
        })),
    };
}

function readForgeData(forgeData: JsonObject): ForgeData {
    return {
        channels: (getArray(forgeData, 'channels') ?? []).filter(isJsonObject).map((channel) => ({
            res: getString(channel, 'res') ?? '',
            version: getString(channel, 'version') ?? '',
            required: getBoolean(channel, 'required') ?? false,
        })),
        mods: (getArray(forgeData, 'mods') ?? []).filter(isJsonObject).map((mod) => ({
            modId: getString(mod, 'modId') ?? '',
            modMarker: getString(mod, 'modmarker') ?? '',
        })),
        fmlNetworkVersion: getNumber(forgeData, 'fmlNetworkVersion') ?? 0,
    };
}
