import { BotCommandModule } from "./command";
import { ADMIN_LABELS } from "../utils/messages";

export const broadcast: BotCommandModule = {
    name: "broadcast",
    description: "Send a message to every user",
    adminOnly: true,
    keyboardLabel: ADMIN_LABELS.broadcast,
    async execute(ctx, { sessions, store }) {
        const from = ctx.from;
        if (!from) return;
        sessions.set(from.id, { mode: "broadcast" });
        const users = await store.countUsers();
        await ctx.reply(`📢 Send the message to broadcast to ${users} users, or /cancel.`);
    },
};
