import { Api } from "grammy";
import { AppConfig } from "./config";
import { BackgroundTasks } from "./utils/background";
import { SurveyStore } from "./utils/db";
import { SurveyLifecycleManager } from "./utils/lifecycle";
import { MembershipVerifier } from "./utils/membership";
import { VotingEngine } from "./utils/votingEngine";
import { AdminSessionRegistry } from "./utils/wizard";

export interface BotServices {
    config: AppConfig;
    store: SurveyStore;
    engine: VotingEngine;
    lifecycle: SurveyLifecycleManager;
    sessions: AdminSessionRegistry;
    /** Fan-outs started by handlers; never awaited inside the update. */
    tasks: BackgroundTasks;
    isAdmin(userId: number | undefined): boolean;
}

export type TelegramApi = Pick<Api, "getChatMember" | "sendMessage">;

export function createServices(config: AppConfig, store: SurveyStore, api: TelegramApi): BotServices {
    const verifier = new MembershipVerifier((chat, userId) => api.getChatMember(chat, userId));
    const admins = new Set(config.adminIds);
    return {
        config,
        store,
        engine: new VotingEngine(store, verifier),
        lifecycle: new SurveyLifecycleManager(store, {
            notify: (userId, text) => api.sendMessage(userId, text),
            delayMs: config.broadcastDelayMs,
        }),
        sessions: new AdminSessionRegistry(),
        tasks: new BackgroundTasks(),
        isAdmin: (userId) => userId !== undefined && admins.has(userId),
    };
}
