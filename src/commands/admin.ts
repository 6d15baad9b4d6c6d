import { BotCommandModule } from "./command";
import { adminKeyboard } from "../utils/messages";

export const admin: BotCommandModule = {
    name: "admin",
    description: "Open the admin panel",
    adminOnly: true,
    async execute(ctx) {
        await ctx.reply("👨‍💼 Admin panel:", { reply_markup: adminKeyboard() });
    },
};
