import { BotCommandModule } from "./command";
import { ADMIN_LABELS, resultsText } from "../utils/messages";

export const results: BotCommandModule = {
    name: "results",
    description: "Show live results of the active surveys",
    adminOnly: true,
    keyboardLabel: ADMIN_LABELS.results,
    async execute(ctx, { lifecycle }) {
        const active = await lifecycle.listActiveSurveys();
        if (!active.length) {
            await ctx.reply("❌ No active surveys.");
            return;
        }
        for (const survey of active) {
            const details = await lifecycle.getDetails(survey.id);
            if (!details) continue; // deleted meanwhile
            await ctx.reply(resultsText(details.survey, details.candidates));
        }
    },
};
