import { errorMessage } from "../errors";
import type { Logger } from "../logger";
import { composeNotification, type ComposeOptions } from "../notifier/composer";
import { errorResult, extractQuestions } from "../parser/questionParser";
import type { NotificationSink, PersistenceSink, QuestionsResult, RunSummary, SheetSnapshot, SpreadsheetSource } from "../types";

export interface QuestionsCheckOptions {
    sheetName: string;
    columnFragment: string;
    sheetUrl?: string;
    compose?: ComposeOptions;
    now?: () => Date;
}

export interface QuestionsCheckDeps {
    source: SpreadsheetSource;
    stores: PersistenceSink[];
    notifier?: NotificationSink;
    options: QuestionsCheckOptions;
    log: Logger;
}

export interface QuestionsCheckOutcome {
    result: QuestionsResult;
    summary: RunSummary;
}

export const summarize = (result: QuestionsResult): RunSummary => ({
    status: result.status,
    timestamp: result.timestamp,
    hasNewQuestions: result.hasNewQuestions,
    todoCount: result.todoCount,
    doneCount: result.doneCount,
    totalQuestions: result.totalQuestions,
})

export const fetchQuestions = async (source: SpreadsheetSource, options: QuestionsCheckOptions, log: Logger): Promise<QuestionsResult> => {
    let snapshot: SheetSnapshot;
    try {
        snapshot = await source.fetchSheet(options.sheetName);
    } catch (error) {
        const message = `Error accessing sheet: ${errorMessage(error)}`;
        log.error({ sheet: options.sheetName }, message);
        return errorResult(message, options.now);
    }

    const { result, stats } = extractQuestions({
        grid: snapshot.values,
        formatting: snapshot.formatting,
        sheetName: options.sheetName,
        columnFragment: options.columnFragment,
        sheetUrl: options.sheetUrl,
        now: options.now,
    });

    if (result.status === "error") {
        log.warn({ sheet: options.sheetName }, result.message);
    } else {
        log.debug({ ...stats, column: result.columnHeader }, "strikethrough detection finished");
    }
    return result;
}

const saveAll = async (stores: PersistenceSink[], save: (store: PersistenceSink) => Promise<void>) => {
    for (const store of stores) {
        await save(store);
    }
}

/**
 * One pass: read the sheet, classify entries, persist, notify, persist the delivery outcome.
 * Source failures become an error result; persistence failures propagate.
 */
export const runQuestionsCheck = async (deps: QuestionsCheckDeps): Promise<QuestionsCheckOutcome> => {
    const { source, stores, notifier, options, log } = deps;

    const result = await fetchQuestions(source, options, log);
    let summary = summarize(result);

    await saveAll(stores, (store) => store.saveResult(result));
    await saveAll(stores, (store) => store.saveSummary(summary));

    if (notifier) {
        const notificationSent = await notifier.send(composeNotification(result, options.compose));
        summary = { ...summary, notificationSent };
        await saveAll(stores, (store) => store.saveSummary(summary));
    } else {
        log.info("No Discord webhook configured, skipping notification");
    }

    log.info({ ...summary }, result.status === "success" ? "Successfully processed questions" : `Run finished with error: ${result.message}`);
    return { result, summary };
}
