import { BotCommandModule } from "./command";
import { adminKeyboard, DEFAULT_WELCOME, surveyListKeyboard } from "../utils/messages";
import { fullName } from "../utils/replies";

export const NO_ACTIVE_SURVEYS = "There are no active surveys right now.";

export const start: BotCommandModule = {
    name: "start",
    description: "Show the active surveys",
    adminOnly: false,
    async execute(ctx, { store, lifecycle, isAdmin }) {
        const from = ctx.from;
        if (!from) return;
        await store.upsertUser({ id: from.id, username: from.username ?? null, fullName: fullName(from) });

        if (isAdmin(from.id)) {
            await ctx.reply("👨‍💼 Admin panel:", { reply_markup: adminKeyboard() });
            return;
        }

        const [welcome, surveys] = await Promise.all([store.getWelcomeScreen(), lifecycle.listActiveSurveys()]);
        const text = welcome?.text || DEFAULT_WELCOME;
        const reply_markup = surveys.length ? surveyListKeyboard(surveys, "open") : undefined;
        if (welcome?.image) await ctx.replyWithPhoto(welcome.image, { caption: text, reply_markup });
        else await ctx.reply(text, { reply_markup });
        if (!surveys.length) await ctx.reply(NO_ACTIVE_SURVEYS);
    },
};
