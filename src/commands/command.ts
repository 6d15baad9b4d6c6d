import { Context } from "grammy";
import { BotServices } from "../services";

export interface BotCommandModule {
    name: string;
    description: string;
    adminOnly: boolean;
    /** Admin reply-keyboard button that runs the same command. */
    keyboardLabel?: string;
    execute(ctx: Context, services: BotServices): Promise<void>;
}
