import type { AppConfig } from "./config";
import { refreshTokenProvider } from "./credentials/credential";
import type { Logger } from "./logger";
import { DiscordWebhook } from "./notifier/discord";
import type { QuestionsCheckDeps } from "./service/questions.service";
import { GoogleSheetsSource } from "./sheets/googleSheets";
import { FileStore } from "./store/fileStore";
import { MongoStore } from "./store/mongoStore";
import type { PersistenceSink } from "./types";

/** Wires the production collaborators of a run from configuration. */
export const buildQuestionsCheckDeps = (config: AppConfig, log: Logger): QuestionsCheckDeps => {
    const stores: PersistenceSink[] = [new FileStore(config.outputDir)];
    if (config.mongodbUri) stores.push(new MongoStore());

    return {
        source: new GoogleSheetsSource({
            spreadsheetId: config.spreadsheetId,
            getAccessToken: refreshTokenProvider(config.google),
        }),
        stores,
        notifier: config.discordWebhookUrl ? new DiscordWebhook(config.discordWebhookUrl, log) : undefined,
        options: {
            sheetName: config.sheetName,
            columnFragment: config.columnFragment,
            sheetUrl: config.sheetUrl,
            compose: { title: config.notifyTitle },
        },
        log,
    };
}
