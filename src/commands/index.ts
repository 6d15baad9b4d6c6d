import { Bot } from "grammy";
import { BotServices } from "../services";
import { admin } from "./admin";
import { broadcast } from "./broadcast";
import { cancel } from "./cancel";
import { BotCommandModule } from "./command";
import { exportResults } from "./export";
import { newSurvey } from "./new-survey";
import { results } from "./results";
import { start } from "./start";
import { stats } from "./stats";
import { surveys } from "./surveys";
import { welcome } from "./welcome";

export const commands: BotCommandModule[] = [
    start,
    admin,
    newSurvey,
    surveys,
    results,
    exportResults,
    broadcast,
    welcome,
    stats,
    cancel,
];

export function findKeyboardCommand(text: string | undefined): BotCommandModule | undefined {
    if (!text) return undefined;
    return commands.find((c) => c.keyboardLabel === text);
}

export function registerCommands(bot: Bot, services: BotServices) {
    for (const command of commands) {
        bot.command(command.name, async (ctx) => {
            if (command.adminOnly && !services.isAdmin(ctx.from?.id)) {
                await ctx.reply("Permission denied.");
                return;
            }
            await command.execute(ctx, services);
        });
    }
}
