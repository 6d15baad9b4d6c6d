import { Api } from "grammy";
import { UserFromGetMe } from "grammy/types";
import { commands } from "../commands";
import { logger } from "../utils/logger";

/** Runs once polling starts: logs the bot identity and publishes the command menus. */
export async function onReady(botInfo: UserFromGetMe, api: Api, adminIds: number[]) {
    logger.info(`Logged in as @${botInfo.username}`);

    const publicCommands = commands
        .filter((c) => !c.adminOnly)
        .map((c) => ({ command: c.name, description: c.description }));
    const adminCommands = commands.map((c) => ({ command: c.name, description: c.description }));

    try {
        logger.info("Registering bot commands...");
        await api.setMyCommands(publicCommands);
        for (const chatId of adminIds) {
            await api.setMyCommands(adminCommands, { scope: { type: "chat", chat_id: chatId } });
        }
        logger.info("Commands registered.");
    } catch (err) {
        logger.error("Failed to register commands", err);
    }
}
