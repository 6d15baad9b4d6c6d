import { BotCommandModule } from "./command";
import { ADMIN_LABELS } from "../utils/messages";

export const stats: BotCommandModule = {
    name: "stats",
    description: "Show the number of users and surveys",
    adminOnly: true,
    keyboardLabel: ADMIN_LABELS.stats,
    async execute(ctx, { store, lifecycle }) {
        const [users, all] = await Promise.all([store.countUsers(), lifecycle.listSurveys()]);
        const active = all.filter((s) => s.active).length;
        await ctx.reply(`👥 Users: ${users}\n🗳 Surveys: ${all.length} (active: ${active})`);
    },
};
