import dotenv from "dotenv";
import { Bot } from "grammy";
import { registerHandlers } from "./bot";
import { AppConfig, loadConfig } from "./config";
import { onReady } from "./events/ready";
import { createServices } from "./services";
import { sleep } from "./utils/broadcast";
import { createStore } from "./utils/db";
import { createHttpServer } from "./utils/httpServer";
import { attachLiveResults, closeLiveResults } from "./utils/liveResults";
import { logger, setLogLevel } from "./utils/logger";
dotenv.config();

let config: AppConfig;
try {
    config = loadConfig();
} catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
}

setLogLevel(config.logLevel);

const store = createStore(config);
const bot = new Bot(config.botToken);
const services = createServices(config, store, bot.api);
registerHandlers(bot, services);

let shuttingDown = false;

const server = createHttpServer(() => ({
    ready: bot.isInited() && bot.isRunning(),
    shuttingDown,
    botUser: bot.isInited() ? `@${bot.botInfo.username}` : null,
}));
const liveResults = attachLiveResults(server, store, { intervalMs: config.liveResultsIntervalMs });

server.listen(config.port, () => {
    logger.info(`HTTP health server listening on port ${config.port}`);
});

bot.start({
    drop_pending_updates: false,
    onStart: (botInfo) => onReady(botInfo, bot.api, config.adminIds),
}).catch((err) => {
    logger.error("Bot polling stopped with an error", err);
    process.exit(1);
});

// graceful shutdown: stop polling, give in-flight handlers a grace period, then close everything
const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Shutting down...");

    await bot.stop();
    logger.info(`Waiting up to ${config.shutdownGraceMs}ms for in-flight work to finish...`);
    await Promise.race([services.tasks.drain(), sleep(config.shutdownGraceMs)]);
    if (services.tasks.size) logger.warn(`${services.tasks.size} background task(s) still running at shutdown`);

    await closeLiveResults(liveResults);
    server.close(() => logger.info("HTTP server closed"));
    await store.close();
    logger.info("Store closed");

    setTimeout(() => process.exit(0), 1000);
};

const onSignal = () => {
    shutdown().catch((err) => {
        logger.error("Error during shutdown", err);
        process.exit(1);
    });
};

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);

// log unhandled errors so host logs show the cause
process.on("uncaughtException", (err) => {
    logger.error("uncaughtException", err);
});
process.on("unhandledRejection", (reason) => {
    logger.error("unhandledRejection", reason);
});
