const levels = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 } as const;

export type LogLevel = keyof typeof levels;

const isLogLevel = (value: string): value is LogLevel => value in levels;

let configuredLevel: LogLevel | null = null;

/** Pins the threshold; until called, `LOG_LEVEL` from the environment applies. */
export function setLogLevel(level: LogLevel | null) {
    configuredLevel = level;
}

const threshold = (): number => {
    if (configuredLevel) return levels[configuredLevel];
    const fromEnv = (process.env.LOG_LEVEL ?? "info").toLowerCase();
    return isLogLevel(fromEnv) ? levels[fromEnv] : levels.info;
};

const write = (level: Exclude<LogLevel, "silent">, message: string, meta?: unknown): void => {
    if (levels[level] < threshold()) return;
    const prefix = `[${new Date().toISOString()}] [${level.toUpperCase()}]`;
    const out = level === "error" || level === "warn" ? console.error : console.log;
    if (meta !== undefined) out(prefix, message, meta);
    else out(prefix, message);
};

export const logger = {
    debug: (message: string, meta?: unknown) => write("debug", message, meta),
    info: (message: string, meta?: unknown) => write("info", message, meta),
    warn: (message: string, meta?: unknown) => write("warn", message, meta),
    error: (message: string, meta?: unknown) => write("error", message, meta),
};

export { isLogLevel };
