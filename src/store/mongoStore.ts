import { createQuestionRun, updateQuestionRunSummary } from "../model/questionRuns";
import type { PersistenceSink, QuestionsResult, RunSummary } from "../types";

/** One QuestionRun document per run, keyed by the result timestamp. */
export class MongoStore implements PersistenceSink {
    async saveResult(result: QuestionsResult): Promise<void> {
        await createQuestionRun(result);
    }

    async saveSummary(summary: RunSummary): Promise<void> {
        await updateQuestionRunSummary(summary);
    }
}
