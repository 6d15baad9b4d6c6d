import { BotCommandModule } from "./command";
import { ADMIN_LABELS, wizardPrompt } from "../utils/messages";
import { SurveyDraftWizard } from "../utils/wizard";

export const newSurvey: BotCommandModule = {
    name: "newsurvey",
    description: "Create a survey step by step",
    adminOnly: true,
    keyboardLabel: ADMIN_LABELS.create,
    async execute(ctx, { lifecycle, sessions }) {
        const from = ctx.from;
        if (!from) return;
        const previous = sessions.get(from.id);
        if (previous?.mode === "survey" && previous.wizard.inProgress && previous.wizard.surveyId !== null) {
            await ctx.reply("You have an unfinished survey. Send /cancel to discard it first.");
            return;
        }
        const wizard = new SurveyDraftWizard(lifecycle);
        sessions.set(from.id, { mode: "survey", wizard });
        await ctx.reply(wizardPrompt(wizard.state), { reply_markup: { remove_keyboard: true } });
    },
};
