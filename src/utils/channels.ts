import { ChannelRef } from "../types";
import { UserInputError } from "./errors";

const LINK_PREFIX = /^(?:https?:\/\/)?(?:www\.)?(?:t|telegram)\.me\//i;
const CHAT_ID = /^-?\d{4,}$/;

/**
 * Resolve free-form admin input into a channel reference.
 *
 * `https://t.me/name` and `name` both become the handle `@name`. Numeric ids
 * (private groups, usually `-100…`) stay numeric. Links that carry another
 * path segment, and `+` invite links, cannot be looked up by handle and are
 * kept verbatim as invites.
 */
export function parseChannelRef(input: string): ChannelRef {
    const value = input.trim();
    if (!value) throw new UserInputError("Channel must not be empty.");

    if (CHAT_ID.test(value)) {
        const chatId = Number(value);
        if (!Number.isSafeInteger(chatId)) throw new UserInputError(`Invalid chat id: ${value}`);
        return { kind: "chatId", chatId };
    }

    if (LINK_PREFIX.test(value)) {
        const rest = value.replace(LINK_PREFIX, "").split(/[?#]/)[0].replace(/\/+$/, "");
        if (!rest) throw new UserInputError(`Link has no channel name: ${value}`);
        if (rest.includes("/") || rest.startsWith("+")) return { kind: "invite", url: value };
        return { kind: "handle", handle: `@${rest}` };
    }

    if (value.includes("/")) return { kind: "invite", url: value };

    const name = value.startsWith("@") ? value.slice(1) : value;
    if (!name) throw new UserInputError("Channel must not be empty.");
    return { kind: "handle", handle: `@${name}` };
}

/** Handle form of a channel, or null when it cannot be looked up by handle. */
export function normalizeChannel(input: string): string | null {
    const ref = parseChannelRef(input);
    return ref.kind === "handle" ? ref.handle : null;
}

/** Storage/display form; parsing it again yields the same ref. */
export function formatChannelRef(ref: ChannelRef): string {
    switch (ref.kind) {
        case "handle":
            return ref.handle;
        case "invite":
            return ref.url;
        case "chatId":
            return String(ref.chatId);
    }
}

/** The chat argument for getChatMember, or null when the ref is not checkable. */
export function lookupTarget(ref: ChannelRef): string | number | null {
    switch (ref.kind) {
        case "handle":
            return ref.handle;
        case "chatId":
            return ref.chatId;
        case "invite":
            return null;
    }
}

export function joinUrl(ref: ChannelRef): string {
    switch (ref.kind) {
        case "handle":
            return `https://t.me/${ref.handle.slice(1)}`;
        case "invite":
            return /^https?:\/\//i.test(ref.url) ? ref.url : `https://${ref.url}`;
        case "chatId":
            // private chats have no public link
            return "https://t.me";
    }
}

export function joinLabel(ref: ChannelRef): string {
    switch (ref.kind) {
        case "handle":
            return `➕ Join ${ref.handle}`;
        case "invite":
            return "➕ Join channel";
        case "chatId":
            return "➕ Join the channel/group";
    }
}
