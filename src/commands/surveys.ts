import { BotCommandModule } from "./command";
import { ADMIN_LABELS, surveyListKeyboard } from "../utils/messages";

export const surveys: BotCommandModule = {
    name: "surveys",
    description: "List all surveys",
    adminOnly: true,
    keyboardLabel: ADMIN_LABELS.surveys,
    async execute(ctx, { lifecycle }) {
        const all = await lifecycle.listSurveys();
        if (!all.length) {
            await ctx.reply("❌ No surveys yet.");
            return;
        }
        await ctx.reply("Pick a survey:", { reply_markup: surveyListKeyboard(all, "admin_open") });
    },
};
