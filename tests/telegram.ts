import http from "http";
import { Bot } from "grammy";
import { registerHandlers } from "../src/bot";
import { AppConfig } from "../src/config";
import { BotServices, createServices } from "../src/services";
import { FileSurveyStore } from "../src/utils/fileStore";

type Update = Parameters<Bot["handleUpdate"]>[0];

export interface ApiCall {
    method: string;
    payload: Record<string, unknown>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null && !Array.isArray(value);

const parsePayload = (raw: string): Record<string, unknown> => {
    if (!raw) return {};
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : {};
};

export const BOT_USER = {
    id: 999,
    is_bot: true,
    first_name: "Survey Bot",
    username: "survey_test_bot",
    can_join_groups: true,
    can_read_all_group_messages: false,
    supports_inline_queries: false,
};

/**
 * In-process Bot API server for grammy's `apiRoot`. Records every call,
 * answers with plausible results and can hold a method until released.
 */
export class FakeTelegram {
    readonly calls: ApiCall[] = [];
    /** `${chat_id}|${user_id}` → chat member status; unknown pairs are "left". */
    readonly members = new Map<string, string>();
    /** Chats whose sendMessage/copyMessage calls fail like a user who blocked the bot. */
    readonly blockedChats = new Set<number>();
    private readonly held = new Set<string>();
    private readonly waiting: (() => void)[] = [];
    private messageId = 100;
    private readonly server = http.createServer((req, res) => {
        let body = "";
        req.on("data", (chunk) => (body += chunk));
        req.on("end", () => {
            const method = (req.url ?? "").split("/").pop() ?? "";
            const payload = parsePayload(body);
            this.calls.push({ method, payload });
            this.gate(method)
                .then(() => this.answer(method, payload))
                .then((response) => {
                    res.writeHead(200, { "Content-Type": "application/json" });
                    res.end(JSON.stringify(response));
                })
                .catch((err) => {
                    res.writeHead(500);
                    res.end(String(err));
                });
        });
    });

    url = "";

    async start(): Promise<string> {
        await new Promise<void>((resolve) => this.server.listen(0, "127.0.0.1", resolve));
        const address = this.server.address();
        if (!address || typeof address === "string") throw new Error("fake Bot API is not listening on a TCP port");
        this.url = `http://127.0.0.1:${address.port}`;
        return this.url;
    }

    async close(): Promise<void> {
        this.release();
        this.server.closeAllConnections();
        await new Promise<void>((resolve) => this.server.close(() => resolve()));
    }

    hold(method: string) {
        this.held.add(method);
    }

    release() {
        this.held.clear();
        for (const resume of this.waiting.splice(0)) resume();
    }

    payloadsOf(method: string): Record<string, unknown>[] {
        return this.calls.filter((c) => c.method === method).map((c) => c.payload);
    }

    textsSentTo(chatId: number): unknown[] {
        return this.payloadsOf("sendMessage")
            .filter((p) => p.chat_id === chatId)
            .map((p) => p.text);
    }

    private gate(method: string): Promise<void> {
        if (!this.held.has(method)) return Promise.resolve();
        return new Promise((resolve) => this.waiting.push(resolve));
    }

    private async answer(method: string, payload: Record<string, unknown>) {
        const chatId = payload.chat_id;
        switch (method) {
            case "getMe":
                return { ok: true, result: BOT_USER };
            case "getChatMember": {
                const status = this.members.get(`${String(chatId)}|${String(payload.user_id)}`) ?? "left";
                return { ok: true, result: { status, user: { id: payload.user_id, is_bot: false, first_name: "User" } } };
            }
            case "answerCallbackQuery": {
                const text = payload.text;
                if (typeof text === "string" && Array.from(text).length > 200) {
                    return { ok: false, error_code: 400, description: "Bad Request: message is too long" };
                }
                return { ok: true, result: true };
            }
            case "sendMessage":
            case "sendPhoto":
            case "copyMessage":
            case "editMessageReplyMarkup":
                if (typeof chatId === "number" && this.blockedChats.has(chatId)) {
                    return { ok: false, error_code: 403, description: "Forbidden: bot was blocked by the user" };
                }
                this.messageId += 1;
                return {
                    ok: true,
                    result: { message_id: this.messageId, date: 0, chat: { id: chatId, type: "private", first_name: "User" } },
                };
            default:
                return { ok: true, result: true };
        }
    }
}

let nextUpdateId = 1;

const userOf = (id: number) => ({ id, is_bot: false, first_name: `User ${id}` });
const chatOf = (id: number) => ({ id, type: "private" as const, first_name: `User ${id}` });

export function textUpdate(userId: number, text: string): Update {
    const id = nextUpdateId++;
    const command = /^\/\w+/.exec(text);
    return {
        update_id: id,
        message: {
            message_id: id,
            date: 0,
            chat: chatOf(userId),
            from: userOf(userId),
            text,
            entities: command ? [{ type: "bot_command", offset: 0, length: command[0].length }] : undefined,
        },
    };
}

export function photoUpdate(userId: number, fileIds: string[], caption?: string): Update {
    const id = nextUpdateId++;
    return {
        update_id: id,
        message: {
            message_id: id,
            date: 0,
            chat: chatOf(userId),
            from: userOf(userId),
            photo: fileIds.map((fileId, i) => ({ file_id: fileId, file_unique_id: `u-${fileId}`, width: 90 * (i + 1), height: 90 * (i + 1) })),
            caption,
        },
    };
}

export function callbackUpdate(userId: number, data: string): Update {
    const id = nextUpdateId++;
    return {
        update_id: id,
        callback_query: {
            id: `cb-${id}`,
            from: userOf(userId),
            chat_instance: "test-chat-instance",
            data,
            message: { message_id: 1, date: 0, chat: chatOf(userId), text: "survey" },
        },
    };
}

export const ADMIN_ID = 1;

export interface BotHarness {
    bot: Bot;
    telegram: FakeTelegram;
    store: FileSurveyStore;
    services: BotServices;
    send(update: Update): Promise<void>;
}

/** A real grammy Bot wired to every handler, talking to a FakeTelegram. */
export async function startBot(): Promise<BotHarness> {
    const telegram = new FakeTelegram();
    await telegram.start();
    const config: AppConfig = {
        botToken: "test-token",
        adminIds: [ADMIN_ID],
        supabase: null,
        dbPath: "unused.json",
        port: 0,
        broadcastDelayMs: 0,
        liveResultsIntervalMs: 1000,
        shutdownGraceMs: 0,
        logLevel: "silent",
    };
    const store = new FileSurveyStore(null);
    const bot = new Bot(config.botToken, { client: { apiRoot: telegram.url } });
    await bot.init();
    const services = createServices(config, store, bot.api);
    registerHandlers(bot, services);
    return { bot, telegram, store, services, send: (update) => bot.handleUpdate(update) };
}
