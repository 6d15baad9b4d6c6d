import { Bot, GrammyError, HttpError } from "grammy";
import { registerCommands } from "./commands";
import { handleCallbackQuery } from "./events/callbackQuery";
import { handleMessage } from "./events/message";
import { BotServices } from "./services";
import { logger } from "./utils/logger";

export function registerHandlers(bot: Bot, services: BotServices) {
    bot.use(async (ctx, next) => {
        const kind = Object.keys(ctx.update).filter((k) => k !== "update_id")[0] ?? "update";
        logger.debug(`[update] ${kind} chat=${ctx.chat?.id ?? "-"} from=${ctx.from?.id ?? "-"}`);
        await next();
    });

    registerCommands(bot, services);
    bot.on("callback_query:data", (ctx) => handleCallbackQuery(ctx, services));
    bot.on("message", (ctx) => handleMessage(ctx, services));

    bot.catch((err) => {
        const { ctx, error } = err;
        if (error instanceof GrammyError) {
            logger.error(`Telegram rejected a request in update ${ctx.update.update_id}`, { description: error.description });
        } else if (error instanceof HttpError) {
            logger.error(`Could not reach Telegram in update ${ctx.update.update_id}`, { error: error.error });
        } else {
            logger.error(`Error while handling update ${ctx.update.update_id}`, error);
        }
    });
}
