import { BotCommandModule } from "./command";
import { adminKeyboard } from "../utils/messages";

export const cancel: BotCommandModule = {
    name: "cancel",
    description: "Abort the current admin dialogue",
    adminOnly: true,
    async execute(ctx, { sessions, lifecycle }) {
        const from = ctx.from;
        if (!from) return;
        const session = sessions.clear(from.id);
        if (!session) {
            await ctx.reply("Nothing to cancel.", { reply_markup: adminKeyboard() });
            return;
        }
        if (session.mode === "survey" && session.wizard.inProgress && session.wizard.surveyId !== null) {
            await lifecycle.discardDraft(session.wizard.surveyId);
        }
        await ctx.reply("Cancelled.", { reply_markup: adminKeyboard() });
    },
};
