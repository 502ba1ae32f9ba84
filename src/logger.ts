import pino, { type Logger, type LoggerOptions } from "pino";
import pinoPretty from "pino-pretty";
import { LOG_LEVELS, type LogLevel } from "./config";

export type { Logger };

const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some((level) => level === value);

// An unknown level falls back to info here; loadConfig reports it as a ConfigError.
export const resolveLogLevel = (value: string | undefined): LogLevel => value && isLogLevel(value) ? value : "info";

export const createLogger = (service: string, env: NodeJS.ProcessEnv = process.env): Logger => {
    const pretty = String(env.PRETTY_LOGS ?? "true").toLowerCase() === "true";

    const options: LoggerOptions = {
        level: resolveLogLevel(env.LOG_LEVEL),
        base: { service },
    };

    if (!pretty) return pino(options);

    return pino(options, pinoPretty({
        translateTime: "SYS:standard",
        colorize: true,
        ignore: "pid,hostname,service",
    }));
}

export const logger = createLogger("questions-tracker");
