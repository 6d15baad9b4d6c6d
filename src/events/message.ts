import { Context } from "grammy";
import { findKeyboardCommand } from "../commands";
import { BotServices } from "../services";
import { deliverAll } from "../utils/broadcast";
import { logger } from "../utils/logger";
import { adminKeyboard, broadcastReportText, finishKeyboard, wizardReplyText } from "../utils/messages";
import { AdminSession, WizardInput, WizardReply } from "../utils/wizard";

const inputOf = (ctx: Context): WizardInput | null => {
    const msg = ctx.message;
    if (!msg) return null;
    if (msg.photo?.length) return { kind: "photo", fileId: msg.photo[msg.photo.length - 1].file_id };
    if (msg.text !== undefined) return { kind: "text", text: msg.text };
    return null;
};

const keyboardFor = (reply: WizardReply) => {
    if (reply.kind === "completed" || reply.kind === "aborted") return adminKeyboard();
    if (reply.kind === "prompt" && reply.state !== "CollectingTitle") return finishKeyboard();
    return undefined;
};

/** Plain messages: admin keyboard buttons and pending admin dialogues. */
export async function handleMessage(ctx: Context, services: BotServices) {
    const userId = ctx.from?.id;
    if (userId === undefined) return;

    if (services.isAdmin(userId)) {
        const command = findKeyboardCommand(ctx.message?.text);
        if (command) {
            await command.execute(ctx, services);
            return;
        }
        const session = services.sessions.get(userId);
        if (session) {
            await continueSession(ctx, services, userId, session);
            return;
        }
    }

    if (ctx.chat?.type === "private" && ctx.message?.text && !ctx.message.text.startsWith("/")) {
        await ctx.reply("Send /start to see the active surveys.");
    }
}

async function continueSession(ctx: Context, services: BotServices, adminId: number, session: AdminSession) {
    const input = inputOf(ctx);
    if (!input) {
        await ctx.reply("Please send text or a photo.");
        return;
    }

    switch (session.mode) {
        case "survey": {
            const reply = await session.wizard.handle(input);
            if (!session.wizard.inProgress) services.sessions.clear(adminId);
            await ctx.reply(wizardReplyText(reply), { reply_markup: keyboardFor(reply) });
            return;
        }
        case "welcome": {
            const screen =
                input.kind === "photo"
                    ? { text: ctx.message?.caption ?? "", image: input.fileId }
                    : { text: input.text, image: null };
            await services.store.setWelcomeScreen(screen);
            services.sessions.clear(adminId);
            await ctx.reply("✅ Welcome screen updated.", { reply_markup: adminKeyboard() });
            return;
        }
        case "broadcast": {
            const chatId = ctx.chat?.id;
            const messageId = ctx.message?.message_id;
            services.sessions.clear(adminId);
            if (chatId === undefined || messageId === undefined) return;
            const recipients = await services.store.listUserIds();
            await ctx.reply(`⏳ Sending to ${recipients.length} users…`);
            const api = ctx.api;
            services.tasks.run("broadcast", async () => {
                const report = await deliverAll(recipients, (id) => api.copyMessage(id, chatId, messageId), {
                    delayMs: services.config.broadcastDelayMs,
                });
                logger.info("Broadcast finished", { sent: report.sent, failed: report.failed });
                await api.sendMessage(chatId, broadcastReportText(report), { reply_markup: adminKeyboard() });
            });
            return;
        }
    }
}
