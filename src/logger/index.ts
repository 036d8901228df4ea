import pino, { LevelWithSilent, LoggerOptions } from "pino";
import dotenv from "dotenv";

dotenv.config({
    quiet: process.env.NODE_ENV === 'test',
});

const LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function isLevel(value: string | undefined): value is LevelWithSilent {
    return LEVELS.some((level) => level === value);
}

// LOG_LEVEL wins; otherwise tests are silent and development is chatty.
export function resolveLogLevel(env: NodeJS.ProcessEnv): LevelWithSilent {
    if (isLevel(env.LOG_LEVEL)) return env.LOG_LEVEL;
    if (env.NODE_ENV === "test") return "silent";
    return env.NODE_ENV === "development" ? "debug" : "info";
}

export function loggerOptions(env: NodeJS.ProcessEnv): LoggerOptions {
    return {
        name: "city-weather",
        level: resolveLogLevel(env),
        timestamp: pino.stdTimeFunctions.isoTime,
        base: { pid: process.pid },
        transport: env.NODE_ENV === "development"
            ? {
                target: "pino-pretty",
                options: {
                    colorize: true,
                    translateTime: "yyyy-mm-dd HH:MM:ss",
                    ignore: "pid,hostname",
                },
            }
            : undefined,
    };
}

export const logger = pino(loggerOptions(process.env));
