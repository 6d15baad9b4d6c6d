import { BotCommandModule } from "./command";
import { ADMIN_LABELS } from "../utils/messages";

export const welcome: BotCommandModule = {
    name: "welcome",
    description: "Customize the start screen (/welcome reset restores the default)",
    adminOnly: true,
    keyboardLabel: ADMIN_LABELS.welcome,
    async execute(ctx, { sessions, store }) {
        const from = ctx.from;
        if (!from) return;
        if (typeof ctx.match === "string" && ctx.match.trim().toLowerCase() === "reset") {
            await store.setWelcomeScreen(null);
            await ctx.reply("✅ Welcome screen restored to default.");
            return;
        }
        sessions.set(from.id, { mode: "welcome" });
        await ctx.reply("🖼 Send the new welcome text, or a photo with a caption. /cancel to abort.");
    },
};
