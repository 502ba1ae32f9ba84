import { z } from "zod";
import { ConfigError } from "./errors";

const optionalString = z.string().trim().optional().transform((v) => v || undefined);
const stringWithDefault = (def: string) => z.string().trim().optional().transform((v) => v || def);

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
    SHEET_URL: z.string({ required_error: "SHEET_URL environment variable not set" }).trim().min(1, "SHEET_URL environment variable not set"),
    CLIENT_ID: z.string({ required_error: "CLIENT_ID environment variable not set" }).trim().min(1, "CLIENT_ID environment variable not set"),
    CLIENT_SECRET: z.string({ required_error: "CLIENT_SECRET environment variable not set" }).trim().min(1, "CLIENT_SECRET environment variable not set"),
    GOOGLE_REFRESH_TOKEN: z.string({ required_error: "GOOGLE_REFRESH_TOKEN environment variable not set" }).trim().min(1, "GOOGLE_REFRESH_TOKEN environment variable not set"),
    DISCORD_WEBHOOK_URL: optionalString,
    QUESTIONS_SHEET_NAME: stringWithDefault("Questions"),
    QUESTIONS_COLUMN: stringWithDefault("Group4"),
    NOTIFY_TITLE: stringWithDefault("📋 Group 4 Questions Update"),
    OUTPUT_DIR: stringWithDefault("output"),
    MONGODB_URI: optionalString,
    REDIS_URL: optionalString,
    CHECK_INTERVAL_MINUTES: z.coerce.number().int().positive().default(30),
    LOG_LEVEL: z.preprocess(
        (v) => (v === "" ? undefined : v),
        z.enum(LOG_LEVELS, { errorMap: () => ({ message: `LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}` }) }).optional(),
    ),
});

export interface AppConfig {
    sheetUrl: string;
    spreadsheetId: string;
    google: {
        clientId: string;
        clientSecret: string;
        refreshToken: string;
    };
    discordWebhookUrl?: string;
    sheetName: string;
    columnFragment: string;
    notifyTitle: string;
    outputDir: string;
    mongodbUri?: string;
    redisUrl?: string;
    checkIntervalMs: number;
}

/** Pulls the spreadsheet id out of a sharing URL (`.../spreadsheets/d/<id>/edit`). */
export const extractSpreadsheetId = (url: string): string | null => {
    const marker = "/spreadsheets/d/";
    const at = url.indexOf(marker);
    if (at === -1) return null;
    const id = url.slice(at + marker.length).split(/[/?#]/)[0];
    return id || null;
}

/**
 * Reads and validates the environment. Throws ConfigError listing every problem;
 * callers treat that as fatal before any work starts.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map((issue) => issue.message));
    }

    const e = parsed.data;
    const spreadsheetId = extractSpreadsheetId(e.SHEET_URL);
    if (!spreadsheetId) {
        throw new ConfigError([`SHEET_URL is not a Google Sheets URL: ${e.SHEET_URL}`]);
    }

    return {
        sheetUrl: e.SHEET_URL,
        spreadsheetId,
        google: {
            clientId: e.CLIENT_ID,
            clientSecret: e.CLIENT_SECRET,
            refreshToken: e.GOOGLE_REFRESH_TOKEN,
        },
        discordWebhookUrl: e.DISCORD_WEBHOOK_URL,
        sheetName: e.QUESTIONS_SHEET_NAME,
        columnFragment: e.QUESTIONS_COLUMN,
        notifyTitle: e.NOTIFY_TITLE,
        outputDir: e.OUTPUT_DIR,
        mongodbUri: e.MONGODB_URI,
        redisUrl: e.REDIS_URL,
        checkIntervalMs: e.CHECK_INTERVAL_MINUTES * 60 * 1000,
    };
}
