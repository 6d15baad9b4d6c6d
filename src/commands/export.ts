import { BotCommandModule } from "./command";
import { ADMIN_LABELS, surveyListKeyboard } from "../utils/messages";

export const exportResults: BotCommandModule = {
    name: "export",
    description: "Export survey results as CSV",
    adminOnly: true,
    keyboardLabel: ADMIN_LABELS.export,
    async execute(ctx, { lifecycle }) {
        const all = await lifecycle.listSurveys();
        if (!all.length) {
            await ctx.reply("❌ No surveys yet.");
            return;
        }
        await ctx.reply("Which survey should be exported?", { reply_markup: surveyListKeyboard(all, "export") });
    },
};
