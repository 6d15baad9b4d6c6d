import path from "path";
import { z } from "zod";
import { ConfigError } from "./utils/errors";
import { isLogLevel, LogLevel } from "./utils/logger";

export interface AppConfig {
    botToken: string;
    adminIds: number[];
    supabase: { url: string; serviceKey: string } | null;
    dbPath: string;
    port: number;
    broadcastDelayMs: number;
    liveResultsIntervalMs: number;
    shutdownGraceMs: number;
    logLevel: LogLevel;
}

const optionalString = z
    .string()
    .optional()
    .transform((v) => (v && v.trim() ? v.trim() : undefined));

const numberWithDefault = (fallback: number) =>
    z
        .string()
        .optional()
        .transform((v) => (v && v.trim() ? Number(v) : fallback))
        .pipe(z.number().int().nonnegative());

const positiveNumberWithDefault = (fallback: number) =>
    z
        .string()
        .optional()
        .transform((v) => (v && v.trim() ? Number(v) : fallback))
        .pipe(z.number().int().positive());

const adminList = z
    .string()
    .optional()
    .transform((v) => (v ?? "").split(",").map((s) => s.trim()).filter(Boolean))
    .pipe(z.array(z.string().regex(/^\d+$/, "admin ids must be numeric").transform(Number)));

const envSchema = z.object({
    BOT_TOKEN: z.string({ required_error: "BOT_TOKEN is required" }).trim().min(1, "BOT_TOKEN is required"),
    ADMIN_IDS: adminList,
    ADMIN_ID: adminList,
    SUPABASE_URL: optionalString,
    SUPABASE_SERVICE_KEY: optionalString,
    DB_PATH: optionalString,
    PORT: numberWithDefault(3000),
    BROADCAST_DELAY_MS: numberWithDefault(50),
    LIVE_RESULTS_INTERVAL_MS: positiveNumberWithDefault(1000),
    SHUTDOWN_GRACE_MS: numberWithDefault(10000),
    LOG_LEVEL: z
        .string()
        .optional()
        .transform((v) => (v ?? "info").toLowerCase())
        .refine(isLogLevel, "LOG_LEVEL must be one of debug, info, warn, error, silent"),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "env"}: ${i.message}`);
        throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`);
    }
    const e = parsed.data;

    if (Boolean(e.SUPABASE_URL) !== Boolean(e.SUPABASE_SERVICE_KEY)) {
        throw new ConfigError("Invalid configuration: SUPABASE_URL and SUPABASE_SERVICE_KEY must be set together");
    }
    const logLevel = e.LOG_LEVEL;
    if (!isLogLevel(logLevel)) {
        throw new ConfigError(`Invalid configuration: unknown LOG_LEVEL ${logLevel}`);
    }

    return {
        botToken: e.BOT_TOKEN,
        adminIds: [...new Set([...e.ADMIN_IDS, ...e.ADMIN_ID])],
        supabase:
            e.SUPABASE_URL && e.SUPABASE_SERVICE_KEY ? { url: e.SUPABASE_URL, serviceKey: e.SUPABASE_SERVICE_KEY } : null,
        dbPath: path.resolve(e.DB_PATH ?? path.join("data", "survey-bot.json")),
        port: e.PORT,
        broadcastDelayMs: e.BROADCAST_DELAY_MS,
        liveResultsIntervalMs: e.LIVE_RESULTS_INTERVAL_MS,
        shutdownGraceMs: e.SHUTDOWN_GRACE_MS,
        logLevel,
    };
}
